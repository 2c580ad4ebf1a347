/**
 * Result type for operations that hand a driver error back to the caller
 * instead of throwing it
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/**
 * Create a success result
 */
export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Create a failure result
 */
export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Run a sync or async function, capturing whatever it throws as a failure.
 * The thrown value is kept as-is, so the error type is unknown.
 */
export async function attempt<T>(
  fn: () => T | Promise<T>,
): Promise<Result<T, unknown>> {
  try {
    return success(await fn());
  } catch (error) {
    return failure(error);
  }
}
