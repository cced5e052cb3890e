/**
 * Terminal-specific error codes
 */
export enum TerminalErrorCode {
    RAW_MODE_FAILED = 'terminal_raw_mode_failed',
    RESTORE_FAILED = 'terminal_restore_failed',
}
