import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { LoggerConfigSchema } from './schemas.js';
import { createLogger, createTransport } from './transport-factory.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { SilentTransport } from './transports/silent-transport.js';
import { EditorLogComponent } from './types.js';

describe('createTransport', () => {
    it('should build each configured transport type', () => {
        expect(createTransport({ type: 'silent' })).toBeInstanceOf(SilentTransport);
        expect(createTransport({ type: 'console', colorize: false })).toBeInstanceOf(
            ConsoleTransport
        );
    });
});

describe('createLogger', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linedit-log-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should default to a silent logger at info level', () => {
        const logger = createLogger(LoggerConfigSchema.parse({}));

        expect(logger.getLevel()).toBe('info');
        expect(logger.getLogFilePath()).toBeNull();
    });

    it('should append JSON lines to the configured file', async () => {
        const logPath = path.join(tempDir, 'logs', 'linedit.log');
        const logger = createLogger(
            LoggerConfigSchema.parse({ level: 'debug', transports: [{ type: 'file', path: logPath }] }),
            EditorLogComponent.EDITOR,
            'ed_fixed'
        );

        logger.debug('first', { step: 1 });
        logger.info('second');
        await logger.destroy();

        const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
        expect(lines).toHaveLength(2);
        expect(JSON.parse(lines[0] ?? '')).toMatchObject({
            level: 'debug',
            message: 'first',
            component: 'editor',
            sessionId: 'ed_fixed',
            context: { step: 1 },
        });
        expect(logger.getLogFilePath()).toBe(logPath);
    });
});

describe('FileTransport', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linedit-rotate-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should create missing parent directories', async () => {
        const logPath = path.join(tempDir, 'a', 'b', 'out.log');

        const transport = new FileTransport({ path: logPath });
        await transport.destroy();

        await expect(fs.stat(path.dirname(logPath))).resolves.toBeDefined();
    });
});
