export { EditorLogger } from './logger.js';
export type { EditorLoggerConfig } from './logger.js';
export { EditorLogComponent, LOG_LEVELS } from './types.js';
export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { LoggerConfigSchema, LoggerTransportSchema, LogLevelSchema } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { createLogger, createTransport, createTransports } from './transport-factory.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
export { ConsoleTransport } from './transports/console-transport.js';
export { FileTransport } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
