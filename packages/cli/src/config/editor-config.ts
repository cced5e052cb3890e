import path from 'node:path';
import {
    LOG_LEVELS,
    LoggerError,
    loadConfigFile,
    validateEditorConfig,
    type EditorConfig,
    type LogLevel,
} from '@linedit/core';
import type { CliOptions } from '../cli/utils/options.js';
import { applyCLIOverrides, type CLIConfigOverrides } from './cli-overrides.js';

export const ENV_CONFIG_PATH = 'LINEDIT_CONFIG';
export const ENV_LOG_LEVEL = 'LINEDIT_LOG_LEVEL';
export const ENV_LOG_FILE = 'LINEDIT_LOG_FILE';

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads overrides from LINEDIT_* environment variables.
 *
 * @throws {EditorRuntimeError} INVALID_LOG_LEVEL for an unrecognised level
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): CLIConfigOverrides {
    const overrides: CLIConfigOverrides = {};

    const level = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
    if (level) {
        if (!isLogLevel(level)) {
            throw LoggerError.invalidLogLevel(level, LOG_LEVELS);
        }
        overrides.logLevel = level;
    }

    const logFile = env[ENV_LOG_FILE]?.trim();
    if (logFile) {
        overrides.logFile = path.resolve(logFile);
    }

    return overrides;
}

export function cliOverridesFromOptions(options: CliOptions): CLIConfigOverrides {
    const overrides: CLIConfigOverrides = {};
    if (options.logLevel) overrides.logLevel = options.logLevel;
    if (options.logFile) overrides.logFile = path.resolve(options.logFile);
    if (options.unknownKeys) overrides.unknownKeyPolicy = options.unknownKeys;
    return overrides;
}

/**
 * Resolves the effective configuration: YAML file, then environment
 * variables, then command-line options, validated once merged.
 */
export async function loadEditorConfig(
    options: CliOptions,
    env: NodeJS.ProcessEnv = process.env
): Promise<EditorConfig> {
    const configPath = options.config ?? env[ENV_CONFIG_PATH];
    const raw = configPath ? await loadConfigFile(configPath) : {};
    const base = validateEditorConfig(raw);

    const merged = applyCLIOverrides(base, {
        ...readEnvOverrides(env),
        ...cliOverridesFromOptions(options),
    });
    return validateEditorConfig(merged);
}
