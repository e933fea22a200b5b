/**
 * Result type for operations that report failure as a value instead of throwing
 */
export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Wrap a value in a successful result
 */
export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Wrap an error in a failed result
 */
export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

export function isSuccess<T, E>(
  result: Result<T, E>,
): result is { success: true; data: T } {
  return result.success === true;
}

export function isFailure<T, E>(
  result: Result<T, E>,
): result is { success: false; error: E } {
  return result.success === false;
}
