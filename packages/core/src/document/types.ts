import type { Result } from '../utils/result.js';

export type LoadFailureKind = 'not_found' | 'permission_denied' | 'is_directory' | 'read_failed';

/**
 * Why a document could not be opened. Every kind is currently recovered the
 * same way (an empty document), but callers can tell them apart.
 */
export interface LoadFailure {
    kind: LoadFailureKind;
    path: string;
    reason: string;
}

export interface DocumentStorage {
    load(filePath: string): Promise<Result<string[], LoadFailure>>;
    save(filePath: string, lines: readonly string[]): Promise<void>;
}
