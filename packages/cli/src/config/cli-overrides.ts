/**
 * CLI-specific configuration overrides
 * Handles merging command-line and environment values into the loaded config
 */

import type { EditorConfig, LogLevel, UnknownKeyPolicy } from '@linedit/core';

/**
 * Config fields that can be overridden from the command line or environment
 */
export interface CLIConfigOverrides {
    logLevel?: LogLevel;
    logFile?: string;
    unknownKeyPolicy?: UnknownKeyPolicy;
}

/**
 * Applies overrides to a configuration
 * This merges the values into a copy of the base config without validation.
 * Validation should be performed separately after this merge step.
 *
 * A log file replaces any silent transport with a file transport.
 */
export function applyCLIOverrides(
    baseConfig: EditorConfig,
    cliOverrides?: CLIConfigOverrides
): EditorConfig {
    if (!cliOverrides || Object.keys(cliOverrides).length === 0) {
        return baseConfig;
    }

    const mergedConfig = structuredClone(baseConfig);

    if (cliOverrides.logLevel) {
        mergedConfig.logger.level = cliOverrides.logLevel;
    }
    if (cliOverrides.logFile) {
        mergedConfig.logger.transports = [
            ...mergedConfig.logger.transports.filter((transport) => transport.type !== 'silent'),
            { type: 'file', path: cliOverrides.logFile, maxSize: 5 * 1024 * 1024, maxFiles: 3 },
        ];
    }
    if (cliOverrides.unknownKeyPolicy) {
        mergedConfig.keys.unknownKeyPolicy = cliOverrides.unknownKeyPolicy;
    }

    return mergedConfig;
}
