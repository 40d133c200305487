/**
 * @fileoverview Result type for request-level outcomes
 *
 * The pipeline returns typed failures instead of throwing across the request
 * surface; stages below it throw and the pipeline folds them into `Err`.
 */

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return !result.ok;
}

/**
 * Unwrap a Result, throwing the error if it is one.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

/**
 * Run a synchronous stage, converting errors the caller recognizes into `Err`.
 * Anything `accept` rejects is rethrown.
 */
export function captureSync<T, E>(fn: () => T, accept: (error: unknown) => error is E): Result<T, E> {
  try {
    return Ok(fn());
  } catch (error) {
    if (accept(error)) return Err(error);
    throw error;
  }
}
