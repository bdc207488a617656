/**
 * Recursively sorts the keys of an object, including nested objects.
 * This is the core of canonical serialization.
 */
function sortKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    // plain assignment of "__proto__" would set the prototype instead of a key
    Object.defineProperty(sorted, key, {
      value: sortKeys(Reflect.get(value, key)),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return sorted;
}

/**
 * Deterministic JSON: two values that differ only in key order serialize
 * to the same string.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}
