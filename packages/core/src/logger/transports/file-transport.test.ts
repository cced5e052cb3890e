import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileTransport } from './file-transport.js';
import { EditorLogComponent, type LogEntry } from '../types.js';

function entry(n: number): LogEntry {
    return {
        level: 'info',
        message: `line-${n}`,
        timestamp: '2026-01-02T12:34:56.789Z',
        component: EditorLogComponent.EDITOR,
        sessionId: 'ed_test',
    };
}

// Every entry above serialises to the same number of bytes
const LINE_SIZE = Buffer.byteLength(JSON.stringify(entry(1)) + '\n', 'utf8');

describe('FileTransport rotation', () => {
    let tempDir: string;
    let logPath: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'linedit-rotate-'));
        logPath = path.join(tempDir, 'x.log');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    async function messages(file: string): Promise<string[]> {
        const content = await fs.readFile(file, 'utf8');
        return content
            .trim()
            .split('\n')
            .map((line) => JSON.parse(line).message);
    }

    async function files(): Promise<string[]> {
        return (await fs.readdir(tempDir)).sort();
    }

    it('should shift rotated files and drop the oldest', async () => {
        const transport = new FileTransport({ path: logPath, maxSize: LINE_SIZE * 2, maxFiles: 2 });

        for (let n = 1; n <= 7; n++) {
            transport.write(entry(n));
            await transport.flush();
        }
        await transport.destroy();

        expect(await files()).toEqual(['x.log', 'x.log.1', 'x.log.2']);
        expect(await messages(logPath)).toEqual(['line-7']);
        expect(await messages(`${logPath}.1`)).toEqual(['line-5', 'line-6']);
        expect(await messages(`${logPath}.2`)).toEqual(['line-3', 'line-4']);
    });

    it('should keep lines written while a rotation is in progress', async () => {
        const transport = new FileTransport({ path: logPath, maxSize: LINE_SIZE * 2, maxFiles: 3 });

        for (let n = 1; n <= 5; n++) {
            transport.write(entry(n));
        }
        await transport.destroy();

        expect(await files()).toEqual(['x.log', 'x.log.1']);
        expect(await messages(`${logPath}.1`)).toEqual(['line-1', 'line-2']);
        expect(await messages(logPath)).toEqual(['line-3', 'line-4', 'line-5']);
    });
});
