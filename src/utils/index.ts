export { escapeRegExp, matchPattern, matchesAny } from './pattern.js';

export function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** Freeze a plain JSON-like value and everything it contains. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/** Rebuild a record with its keys in ascending code-unit order. */
export function sortByKey<V>(record: Record<string, V>): Record<string, V> {
  const sorted: Record<string, V> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}
