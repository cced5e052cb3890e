import type { EditorErrorCode } from './types.js';
import { ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error carrying a typed code, the domain that raised it and
 * optional structured context for logging.
 *
 * Created through the per-domain factories (`DocumentError`, `ConfigError`, ...)
 * rather than directly.
 */
export class EditorRuntimeError<C = Record<string, unknown>> extends Error {
    constructor(
        public readonly code: EditorErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
        this.name = 'EditorRuntimeError';
    }

    toJSON() {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
        };
    }
}

/**
 * Wraps any thrown value so callers can rely on the EditorRuntimeError shape.
 */
export function toEditorRuntimeError(error: unknown, scope: ErrorScope | string): EditorRuntimeError {
    if (error instanceof EditorRuntimeError) {
        return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new EditorRuntimeError('unknown_error', scope, ErrorType.UNKNOWN, message, {
        originalError: error instanceof Error ? error.name : typeof error,
    });
}

export { ErrorScope, ErrorType };
