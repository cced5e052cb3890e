import type { ConfigErrorCode } from '../config/error-codes.js';
import type { DocumentErrorCode } from '../document/error-codes.js';
import type { LoggerErrorCode } from '../logger/error-codes.js';

/**
 * Error scopes representing functional domains in the editor
 * Each scope owns its validation and error logic
 */
export enum ErrorScope {
    CONFIG = 'config', // Config file loading, parsing, validation
    DOCUMENT = 'document', // Loading and saving the edited file
    LOGGER = 'logger', // Logging transports and configuration
    TERMINAL = 'terminal', // Raw mode, screen and input stream
    CLI = 'cli', // Argument and option handling
}

/**
 * Error types describing the nature of the failure
 */
export enum ErrorType {
    USER = 'user', // bad input, config errors, validation failures
    FORBIDDEN = 'forbidden', // permission denied
    NOT_FOUND = 'not_found', // file doesn't exist
    SYSTEM = 'system', // bugs, internal failures, unexpected I/O states
    UNKNOWN = 'unknown', // unclassified errors, fallback
}

/**
 * Union type for all error codes across domains
 */
export type EditorErrorCode = ConfigErrorCode | DocumentErrorCode | LoggerErrorCode;

/** Severity of an issue */
export type Severity = 'error' | 'warning';

/** Generic issue type for validation results */
export interface Issue<C = unknown> {
    code: EditorErrorCode | string;
    message: string;
    scope: ErrorScope | string;
    type: ErrorType;
    severity: Severity;
    path?: Array<string | number>;
    context?: C;
}
