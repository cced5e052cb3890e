import { z } from 'zod';
import chalk from 'chalk';

const CliOptionsSchema = z
    .object({
        config: z.string().min(1, 'Config path must not be empty').optional(),
        logFile: z.string().min(1, 'Log file path must not be empty').optional(),
        logLevel: z
            .enum(['error', 'warn', 'info', 'debug', 'silly'], {
                errorMap: () => ({
                    message: 'Log level must be one of "error", "warn", "info", "debug" or "silly"',
                }),
            })
            .optional(),
        unknownKeys: z
            .enum(['insert-code', 'ignore'], {
                errorMap: () => ({
                    message: 'Unknown key policy must be "insert-code" or "ignore"',
                }),
            })
            .optional(),
    })
    .strict();

export type CliOptions = z.output<typeof CliOptionsSchema>;

/**
 * Validates the command-line options.
 * @param opts - The command-line options object from commander.
 * @throws {z.ZodError} If validation fails.
 */
export function validateCliOptions(opts: Record<string, unknown>): CliOptions {
    return CliOptionsSchema.parse({
        config: opts.config,
        logFile: opts.logFile,
        logLevel: typeof opts.logLevel === 'string' ? opts.logLevel.toLowerCase() : opts.logLevel,
        unknownKeys: opts.unknownKeys,
    });
}

export function handleCliOptionsError(error: unknown): never {
    if (error instanceof z.ZodError) {
        console.error(chalk.red('❌ Invalid command-line options detected:'));
        error.errors.forEach((err) => {
            const fieldName = err.path.join('.') || 'Unknown Option';
            console.error(chalk.red(`   • Option '${fieldName}': ${err.message}`));
        });
        console.error(
            chalk.gray(
                '\nPlease check your command-line arguments or run with --help for usage details.'
            )
        );
    } else {
        console.error(
            chalk.red(
                `❌ Validation error: ${error instanceof Error ? error.message : JSON.stringify(error)}`
            )
        );
    }
    process.exit(1);
}
