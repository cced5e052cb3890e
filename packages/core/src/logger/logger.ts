/**
 * Editor Logger
 *
 * Multi-transport logger with structured entries and component-based categorization.
 */

import type { Logger, LoggerTransport, LogEntry, LogLevel, EditorLogComponent } from './types.js';
import { FileTransport } from './transports/file-transport.js';

export interface EditorLoggerConfig {
    /** Minimum log level to record */
    level: LogLevel;
    component: EditorLogComponent;
    sessionId: string;
    transports: LoggerTransport[];
}

/**
 * Shared mutable level so that setLevel() on a parent reaches its children
 */
interface LevelRef {
    current: LogLevel;
}

export class EditorLogger implements Logger {
    private readonly levelRef: LevelRef;
    private readonly component: EditorLogComponent;
    private readonly sessionId: string;
    private readonly transports: LoggerTransport[];

    // Lower number = more severe. 'debug' records error, warn, info, debug but not silly.
    private static readonly LEVELS: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3,
        silly: 4,
    };

    constructor(config: EditorLoggerConfig, levelRef?: LevelRef) {
        this.levelRef = levelRef ?? { current: config.level };
        this.component = config.component;
        this.sessionId = config.sessionId;
        this.transports = config.transports;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('debug')) {
            this.log('debug', message, context);
        }
    }

    silly(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('silly')) {
            this.log('silly', message, context);
        }
    }

    info(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('info')) {
            this.log('info', message, context);
        }
    }

    warn(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('warn')) {
            this.log('warn', message, context);
        }
    }

    error(message: string, context?: Record<string, unknown>): void {
        if (this.shouldLog('error')) {
            this.log('error', message, context);
        }
    }

    trackException(error: Error, context?: Record<string, unknown>): void {
        this.error(error.message, {
            ...context,
            errorName: error.name,
            errorStack: error.stack,
            errorType: error.constructor.name,
        });
    }

    private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            component: this.component,
            sessionId: this.sessionId,
            context,
        };

        for (const transport of this.transports) {
            try {
                const pending = transport.write(entry);
                if (pending instanceof Promise) {
                    pending.catch((error: unknown) => {
                        console.error('Logger transport error:', error);
                    });
                }
            } catch (error) {
                // Don't let transport errors break the editor
                console.error('Logger transport error:', error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return EditorLogger.LEVELS[level] <= EditorLogger.LEVELS[this.levelRef.current];
    }

    createChild(component: EditorLogComponent): EditorLogger {
        return new EditorLogger(
            {
                level: this.levelRef.current,
                component,
                sessionId: this.sessionId,
                transports: this.transports,
            },
            this.levelRef
        );
    }

    setLevel(level: LogLevel): void {
        this.levelRef.current = level;
    }

    getLevel(): LogLevel {
        return this.levelRef.current;
    }

    getLogFilePath(): string | null {
        const fileTransport = this.transports.find(
            (transport): transport is FileTransport => transport instanceof FileTransport
        );
        return fileTransport ? fileTransport.getFilePath() : null;
    }

    async destroy(): Promise<void> {
        for (const transport of this.transports) {
            if (transport.destroy) {
                try {
                    await transport.destroy();
                } catch (error) {
                    console.error('Error destroying transport:', error);
                }
            }
        }
    }
}
