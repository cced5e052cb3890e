import { EditorRuntimeError, ErrorScope, ErrorType } from '@linedit/core';
import { TerminalErrorCode } from './error-codes.js';

/**
 * Terminal error factory
 */
export class TerminalError {
    static rawModeFailed(reason: string) {
        return new EditorRuntimeError(
            TerminalErrorCode.RAW_MODE_FAILED,
            ErrorScope.TERMINAL,
            ErrorType.SYSTEM,
            `Could not switch the terminal to raw mode: ${reason}`,
            { reason },
            'Run linedit from an interactive terminal'
        );
    }

    static restoreFailed(reason: string) {
        return new EditorRuntimeError(
            TerminalErrorCode.RESTORE_FAILED,
            ErrorScope.TERMINAL,
            ErrorType.SYSTEM,
            `Could not restore the terminal: ${reason}`,
            { reason },
            'Run `reset` to restore the terminal'
        );
    }
}
