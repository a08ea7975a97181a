/**
 * Result type for lookups that report failure as a value
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Try each lookup in order and return the first success.
 * When every lookup fails, `onAllFailed` builds the combined error.
 */
export const firstOk = <T, E>(
  lookups: readonly (() => Result<T, E>)[],
  onAllFailed: (errors: readonly E[]) => E
): Result<T, E> => {
  const errors: E[] = [];
  for (const lookup of lookups) {
    const result = lookup();
    if (result.ok) {
      return result;
    }
    errors.push(result.error);
  }
  return error(onAllFailed(errors));
};

/**
 * Return the value of an ok result, or throw what `toThrown` builds from the error.
 */
export const unwrapOrThrow = <T, E>(
  result: Result<T, E>,
  toThrown: (error: E) => Error
): T => {
  if (result.ok) {
    return result.value;
  }
  throw toThrown(result.error);
};
