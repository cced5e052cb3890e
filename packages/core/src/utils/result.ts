/**
 * Result pattern for operations whose failure is an expected outcome
 * rather than an exception (e.g. opening a file that may not exist).
 */
export type Result<T, E> = { ok: true; data: T } | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
    return { ok: true, data };
}

export function fail<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Unwraps a Result, substituting `fallback` on failure.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
    return result.ok ? result.data : fallback;
}
