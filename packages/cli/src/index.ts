#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import chalk from 'chalk';
import { ErrorScope, toEditorRuntimeError } from '@linedit/core';
import { handleEditCommand } from './cli/commands/index.js';
import { handleCliOptionsError, validateCliOptions, type CliOptions } from './cli/utils/options.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
    .name('linedit')
    .description('Minimal full-screen terminal text editor')
    .version(pkg.version, '-v, --version', 'output the current version')
    .argument('[file]', 'file to edit')
    .option('-c, --config <path>', 'YAML configuration file (default: $LINEDIT_CONFIG)')
    .option('--log-file <path>', 'write logs to this file')
    .option('--log-level <level>', 'error | warn | info | debug | silly')
    .option(
        '--unknown-keys <policy>',
        'what unbound keys do: insert-code (insert the key code) | ignore'
    )
    .action(async (file: string | undefined) => {
        let options: CliOptions;
        try {
            options = validateCliOptions(program.opts());
        } catch (error) {
            handleCliOptionsError(error);
        }

        const exitCode = await handleEditCommand(file, options);
        process.exit(exitCode);
    });

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const editorError = toEditorRuntimeError(error, ErrorScope.CLI);
    console.error(chalk.red(`❌ ${editorError.message}`));
    if (editorError.recovery) {
        const hints = Array.isArray(editorError.recovery)
            ? editorError.recovery
            : [editorError.recovery];
        hints.forEach((hint) => console.error(chalk.gray(`   ${hint}`)));
    }
    process.exit(1);
}
