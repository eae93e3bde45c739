/**
 * Result type for adapter boundaries that must not throw.
 *
 * The AI metadata adapter returns a Result so the caller decides, visibly,
 * when a failure becomes the default record.
 *
 * @module utils/result
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/**
 * Run an async function and capture a rejection as Err, mapped through toError.
 */
export async function tryCatchAsync<T, E>(
  fn: () => Promise<T>,
  toError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(toError(error));
  }
}
