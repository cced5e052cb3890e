/**
 * Document (file load/save) error codes
 */
export enum DocumentErrorCode {
    NOT_FOUND = 'document_not_found',
    PERMISSION_DENIED = 'document_permission_denied',
    IS_DIRECTORY = 'document_is_directory',
    READ_FAILED = 'document_read_failed',
    WRITE_FAILED = 'document_write_failed',
}
