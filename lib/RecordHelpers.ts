// Assigning "__proto__" on a plain object swaps its prototype instead of adding a key
export function setOwn<T>(record: Record<string, T>, key: string, value: T) {
  Object.defineProperty(record, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function getOwn<T>(
  record: Record<string, T>,
  key: string,
  fallback: T
): T {
  return Object.hasOwn(record, key) ? record[key] : fallback;
}
