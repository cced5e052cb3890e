/**
 * Narrows an unknown thrown value to a Node system error carrying `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
