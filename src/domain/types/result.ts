/**
 * Result Pattern
 * Discriminated union for operations that report failure without throwing
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T, never> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Type guard to check if result is a failure
 */
export const isFail = <T, E>(result: Result<T, E>): result is { ok: false; error: E } =>
  !result.ok;
