/**
 * Narrows `T | undefined | null` to `T` in test code, failing the test with
 * a readable message instead of a TypeError further down.
 */
export function assertDefined<T>(
  value: T | undefined | null,
  what = "value",
): T {
  if (value === undefined || value === null) {
    throw new Error(`Expected ${what} to be defined, got ${String(value)}`);
  }
  return value;
}
