import type { ZodIssue } from 'zod';
import { EditorRuntimeError } from '../errors/EditorRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue } from '../errors/types.js';
import { ConfigErrorCode } from './error-codes.js';

/**
 * Config runtime error factory methods
 */
export class ConfigError {
    static fileNotFound(configPath: string) {
        return new EditorRuntimeError(
            ConfigErrorCode.FILE_NOT_FOUND,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Configuration file not found: ${configPath}`,
            { configPath },
            'Ensure the configuration file exists at the specified path'
        );
    }

    static fileReadError(configPath: string, cause: string) {
        return new EditorRuntimeError(
            ConfigErrorCode.FILE_READ_ERROR,
            ErrorScope.CONFIG,
            ErrorType.SYSTEM,
            `Failed to read configuration file: ${cause}`,
            { configPath, cause },
            'Check file permissions'
        );
    }

    static parseError(configPath: string, cause: string) {
        return new EditorRuntimeError(
            ConfigErrorCode.PARSE_ERROR,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Failed to parse configuration file: ${cause}`,
            { configPath, cause },
            'Ensure the configuration file contains valid YAML syntax'
        );
    }

    static validationFailed(issues: Issue[]) {
        return new EditorRuntimeError<{ issues: Issue[] }>(
            ConfigErrorCode.VALIDATION_FAILED,
            ErrorScope.CONFIG,
            ErrorType.USER,
            `Invalid configuration: ${issues.map((issue) => issue.message).join('; ')}`,
            { issues }
        );
    }
}

/**
 * Converts zod issues into editor issues, keeping their paths.
 */
export function zodToIssues(issues: readonly ZodIssue[]): Issue[] {
    return issues.map((issue) => ({
        code: ConfigErrorCode.VALIDATION_FAILED,
        message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        scope: ErrorScope.CONFIG,
        type: ErrorType.USER,
        severity: 'error',
        path: issue.path,
    }));
}
