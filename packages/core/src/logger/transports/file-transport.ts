/**
 * File Transport
 *
 * Appends JSON lines to a file, rotating it once it grows past `maxSize`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LoggerTransport, LogEntry } from '../types.js';
import { isErrnoException } from '../../utils/errno.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 5MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 3) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private readonly filePath: string;
    private readonly maxSize: number;
    private readonly maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize = 0;
    private isRotating = false;
    private rotation: Promise<void> | null = null;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 5 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 3;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.createWriteStream();
    }

    private createWriteStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            this.rotation = this.rotate();
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Renames the current file to `.1`, shifting older files up and dropping
     * the oldest, then flushes buffered lines into a fresh file.
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }
        this.isRotating = true;

        try {
            const stream = this.writeStream;
            if (stream) {
                await new Promise<void>((resolve) => stream.end(() => resolve()));
                this.writeStream = null;
            }

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.writeStream = this.createWriteStream();
            this.flushPendingLogs();
        } catch (error) {
            console.error('FileTransport rotation error:', error);
        } finally {
            this.isRotating = false;
        }
    }

    private flushPendingLogs(): void {
        const stream = this.writeStream;
        if (!stream) {
            return;
        }
        for (const line of this.pendingLogs.splice(0)) {
            stream.write(line);
            this.currentSize += Buffer.byteLength(line, 'utf8');
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Resolves once a rotation in progress, and the lines buffered during it,
     * have been handed to the new file.
     */
    async flush(): Promise<void> {
        await this.rotation;
    }

    async destroy(): Promise<void> {
        await this.flush();
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }
    }
}

async function renameIfExists(from: string, to: string): Promise<void> {
    try {
        await fs.promises.rename(from, to);
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            return;
        }
        throw error;
    }
}
