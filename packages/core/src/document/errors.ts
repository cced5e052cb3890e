import { EditorRuntimeError } from '../errors/EditorRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { DocumentErrorCode } from './error-codes.js';
import type { LoadFailure } from './types.js';

/**
 * Document error factory with typed methods for file load/save failures
 */
export class DocumentError {
    /**
     * Converts a recovered load failure into an error, for logging
     */
    static fromLoadFailure(failure: LoadFailure) {
        const codes = {
            not_found: [DocumentErrorCode.NOT_FOUND, ErrorType.NOT_FOUND],
            permission_denied: [DocumentErrorCode.PERMISSION_DENIED, ErrorType.FORBIDDEN],
            is_directory: [DocumentErrorCode.IS_DIRECTORY, ErrorType.USER],
            read_failed: [DocumentErrorCode.READ_FAILED, ErrorType.SYSTEM],
        } as const;
        const [code, type] = codes[failure.kind];
        return new EditorRuntimeError(
            code,
            ErrorScope.DOCUMENT,
            type,
            `Could not read ${failure.path}: ${failure.reason}`,
            { path: failure.path, kind: failure.kind }
        );
    }

    static writeFailed(filePath: string, reason: string) {
        return new EditorRuntimeError(
            DocumentErrorCode.WRITE_FAILED,
            ErrorScope.DOCUMENT,
            ErrorType.SYSTEM,
            `Failed to write ${filePath}: ${reason}`,
            { path: filePath, reason },
            'Check that the directory exists and is writable'
        );
    }
}
