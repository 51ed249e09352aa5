export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

/**
 * Run a host call that may throw and capture the outcome as a Result.
 * `mapError` receives whatever was thrown.
 */
export const tryCatch = <T, E>(
  fn: () => T,
  mapError: (thrown: unknown) => E
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (thrown) {
    return err(mapError(thrown));
  }
};

/**
 * Returns the data of a successful result, or `fallback` otherwise.
 */
export const unwrapOr = <T, E>(result: Result<T, E>, fallback: T): T => {
  if (result.success) return result.data;
  return fallback;
};

/**
 * Human readable text for a thrown value. Hosts throw strings, Error
 * instances and occasionally objects that refuse to become strings.
 */
export const describeThrown = (thrown: unknown): string => {
  if (thrown instanceof Error) return thrown.message;
  try {
    return String(thrown);
  } catch {
    return "unrepresentable error";
  }
};
