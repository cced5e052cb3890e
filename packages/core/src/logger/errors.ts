import { EditorRuntimeError } from '../errors/EditorRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

/**
 * Logger error factory with typed methods for creating logger-specific errors
 */
export class LoggerError {
    static unknownTransportType(transportType: string): EditorRuntimeError {
        return new EditorRuntimeError(
            LoggerErrorCode.TRANSPORT_UNKNOWN_TYPE,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Unknown transport type: ${transportType}`,
            { transportType }
        );
    }

    static transportInitializationFailed(
        transportType: string,
        reason: string,
        details?: Record<string, unknown>
    ): EditorRuntimeError {
        return new EditorRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Failed to initialize ${transportType} transport: ${reason}`,
            { transportType, reason, ...details }
        );
    }

    static invalidLogLevel(level: string, validLevels: readonly string[]): EditorRuntimeError {
        return new EditorRuntimeError(
            LoggerErrorCode.INVALID_LOG_LEVEL,
            ErrorScope.LOGGER,
            ErrorType.USER,
            `Invalid log level '${level}'. Valid levels: ${validLevels.join(', ')}`,
            { level, validLevels }
        );
    }
}
