/**
 * Returns a copy of `base` with `overrides` applied. Stub factories share
 * their defaults, so the base object is never mutated.
 */
export function withOverrides<T extends object>(
  base: T,
  overrides?: Partial<T>,
): T {
  if (!overrides) {
    return base;
  }
  return { ...base, ...overrides };
}
