/**
 * Logger Types and Interfaces
 *
 * Core abstractions for the multi-transport logger.
 */

/**
 * Log levels in order of severity
 * Following Winston convention: error < warn < info < debug < silly
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silly';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silly'];

/**
 * Component identifiers for structured logging
 */
export enum EditorLogComponent {
    EDITOR = 'editor',
    DOCUMENT = 'document',
    CONFIG = 'config',
    CLI = 'cli',
    TERMINAL = 'terminal',
}

/**
 * Structured log entry
 * All logs are converted to this format before being sent to transports
 */
export interface LogEntry {
    level: LogLevel;
    message: string;
    /** ISO timestamp */
    timestamp: string;
    component: EditorLogComponent;
    /** Identifies one editor process run; shared by child loggers */
    sessionId: string;
    context?: Record<string, unknown> | undefined;
}

/**
 * Logger type
 * All logger implementations must implement this shape.
 */
export type Logger = {
    debug(message: string, context?: Record<string, unknown>): void;

    /**
     * Most verbose level, for dumps such as raw key sequences
     */
    silly(message: string, context?: Record<string, unknown>): void;

    info(message: string, context?: Record<string, unknown>): void;

    warn(message: string, context?: Record<string, unknown>): void;

    error(message: string, context?: Record<string, unknown>): void;

    /**
     * Track exception with stack trace
     */
    trackException(error: Error, context?: Record<string, unknown>): void;

    /**
     * Create a child logger with a different component
     * Shares the same transports, sessionId and level reference
     */
    createChild(component: EditorLogComponent): Logger;

    /**
     * Set the log level dynamically
     * Affects this logger and all child loggers created from it
     */
    setLevel(level: LogLevel): void;

    getLevel(): LogLevel;

    /**
     * @returns Log file path or null if file logging is not configured
     */
    getLogFilePath(): string | null;

    /**
     * Cleanup resources and close transports
     */
    destroy(): Promise<void>;
};

/**
 * Base transport interface
 */
export type LoggerTransport = {
    write(entry: LogEntry): void | Promise<void>;

    destroy?(): void | Promise<void>;
};
