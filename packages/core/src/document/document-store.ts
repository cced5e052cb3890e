import * as fs from 'node:fs/promises';
import type { Logger } from '../logger/types.js';
import { EditorLogComponent } from '../logger/types.js';
import { isErrnoException } from '../utils/errno.js';
import { fail, ok, type Result } from '../utils/result.js';
import { DocumentError } from './errors.js';
import { joinLines, splitLines } from './line-codec.js';
import type { DocumentStorage, LoadFailure, LoadFailureKind } from './types.js';

const FAILURE_KINDS: Record<string, LoadFailureKind> = {
    ENOENT: 'not_found',
    ENOTDIR: 'not_found',
    EACCES: 'permission_denied',
    EPERM: 'permission_denied',
    EISDIR: 'is_directory',
};

/**
 * Reads and writes the edited file as UTF-8 lines.
 */
export class DocumentStore implements DocumentStorage {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.createChild(EditorLogComponent.DOCUMENT);
    }

    async load(filePath: string): Promise<Result<string[], LoadFailure>> {
        try {
            const content = await fs.readFile(filePath, 'utf8');
            const lines = splitLines(content);
            this.logger.debug(`Loaded ${filePath}`, { lines: lines.length });
            return ok(lines);
        } catch (error) {
            const code = isErrnoException(error) ? error.code : undefined;
            const failure: LoadFailure = {
                kind: (code && FAILURE_KINDS[code]) || 'read_failed',
                path: filePath,
                reason: error instanceof Error ? error.message : String(error),
            };
            this.logger.debug(`Could not load ${filePath}`, { kind: failure.kind, code });
            return fail(failure);
        }
    }

    /**
     * @throws EditorRuntimeError with DocumentErrorCode.WRITE_FAILED
     */
    async save(filePath: string, lines: readonly string[]): Promise<void> {
        try {
            await fs.writeFile(filePath, joinLines(lines), 'utf8');
        } catch (error) {
            throw DocumentError.writeFailed(
                filePath,
                error instanceof Error ? error.message : String(error)
            );
        }
        this.logger.info(`Wrote ${filePath}`, { lines: lines.length });
    }
}
