import { describe, it, expect, vi, afterEach } from 'vitest';
import { EditorLogger } from './logger.js';
import { EditorLogComponent, type LogEntry, type LoggerTransport } from './types.js';

class MemoryTransport implements LoggerTransport {
    readonly entries: LogEntry[] = [];

    write(entry: LogEntry): void {
        this.entries.push(entry);
    }
}

function createLogger(level: 'error' | 'info' | 'debug' = 'info') {
    const transport = new MemoryTransport();
    const logger = new EditorLogger({
        level,
        component: EditorLogComponent.CLI,
        sessionId: 'ed_test',
        transports: [transport],
    });
    return { logger, transport };
}

describe('EditorLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should drop entries below the configured level', () => {
        const { logger, transport } = createLogger('info');

        logger.debug('hidden');
        logger.info('shown');
        logger.error('also shown');

        expect(transport.entries.map((entry) => entry.message)).toEqual(['shown', 'also shown']);
    });

    it('should write structured entries', () => {
        const { logger, transport } = createLogger();

        logger.warn('careful', { row: 3 });

        expect(transport.entries[0]).toMatchObject({
            level: 'warn',
            message: 'careful',
            component: EditorLogComponent.CLI,
            sessionId: 'ed_test',
            context: { row: 3 },
        });
    });

    it('should tag child entries with their component and share the session', () => {
        const { logger, transport } = createLogger();

        logger.createChild(EditorLogComponent.DOCUMENT).info('loaded');

        expect(transport.entries[0]).toMatchObject({
            component: EditorLogComponent.DOCUMENT,
            sessionId: 'ed_test',
        });
    });

    it('should apply setLevel to existing children', () => {
        const { logger, transport } = createLogger('error');
        const child = logger.createChild(EditorLogComponent.EDITOR);

        logger.setLevel('debug');
        child.debug('now visible');

        expect(child.getLevel()).toBe('debug');
        expect(transport.entries.map((entry) => entry.message)).toEqual(['now visible']);
    });

    it('should record exception details', () => {
        const { logger, transport } = createLogger();

        logger.trackException(new TypeError('bad input'), { key: 'x' });

        expect(transport.entries[0]).toMatchObject({
            level: 'error',
            message: 'bad input',
            context: { key: 'x', errorName: 'TypeError', errorType: 'TypeError' },
        });
    });

    it('should keep logging when a transport throws', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const healthy = new MemoryTransport();
        const logger = new EditorLogger({
            level: 'info',
            component: EditorLogComponent.CLI,
            sessionId: 'ed_test',
            transports: [
                {
                    write: () => {
                        throw new Error('disk full');
                    },
                },
                healthy,
            ],
        });

        logger.info('still delivered');

        expect(healthy.entries).toHaveLength(1);
        expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('should report no log file without a file transport', () => {
        const { logger } = createLogger();

        expect(logger.getLogFilePath()).toBeNull();
    });
});
