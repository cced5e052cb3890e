import type { LoggerTransport, LogEntry } from '../types.js';

/**
 * Discards every entry. Default while the editor owns the screen.
 */
export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}

    destroy(): void {}
}
