/**
 * Configuration error codes
 */
export enum ConfigErrorCode {
    FILE_NOT_FOUND = 'config_file_not_found',
    FILE_READ_ERROR = 'config_file_read_error',
    PARSE_ERROR = 'config_parse_error',
    VALIDATION_FAILED = 'config_validation_failed',
}
