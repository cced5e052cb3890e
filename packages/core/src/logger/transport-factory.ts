/**
 * Transport Factory
 *
 * Creates transport instances from validated configuration.
 */

import type { LoggerTransport } from './types.js';
import type { LoggerConfig, LoggerTransportConfig } from './schemas.js';
import { SilentTransport } from './transports/silent-transport.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { LoggerError } from './errors.js';
import { EditorLogger } from './logger.js';
import { EditorLogComponent } from './types.js';

export function createTransport(config: LoggerTransportConfig): LoggerTransport {
    switch (config.type) {
        case 'silent':
            return new SilentTransport();

        case 'console':
            return new ConsoleTransport({ colorize: config.colorize });

        case 'file':
            try {
                return new FileTransport({
                    path: config.path,
                    maxSize: config.maxSize,
                    maxFiles: config.maxFiles,
                });
            } catch (error) {
                throw LoggerError.transportInitializationFailed(
                    'file',
                    error instanceof Error ? error.message : String(error),
                    { path: config.path }
                );
            }

        default:
            throw LoggerError.unknownTransportType(JSON.stringify(config));
    }
}

export function createTransports(configs: LoggerTransportConfig[]): LoggerTransport[] {
    return configs.map(createTransport);
}

function generateSessionId(): string {
    return `ed_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Builds the root logger for one editor run.
 */
export function createLogger(
    config: LoggerConfig,
    component: EditorLogComponent = EditorLogComponent.CLI,
    sessionId: string = generateSessionId()
): EditorLogger {
    return new EditorLogger({
        level: config.level,
        component,
        sessionId,
        transports: createTransports(config.transports),
    });
}
