/**
 * Recursively freezes plain objects and arrays in place and returns the
 * same reference. Engine results are frozen before they leave the engine.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }

  Object.freeze(value);
  return value;
}
