/**
 * Object Utility Functions
 *
 * @module utils/object_utils
 */

/**
 * Builds an optional block from named optional values.
 * Keeps only the names whose value is present and returns `undefined`
 * when none is, so callers never emit an empty `{}`.
 *
 * @example
 * compactBlock({ assignedTo: 'Jane Doe', reviewer: undefined }) // { assignedTo: 'Jane Doe' }
 * compactBlock({ assignedTo: undefined, reviewer: undefined }) // undefined
 */
export function compactBlock<K extends string, V>(
  fields: Record<K, V | undefined>
): Partial<Record<K, V>> | undefined {
  const block: Partial<Record<K, V>> = {};
  let hasValue = false;

  for (const key in fields) {
    const value = fields[key];
    if (value !== undefined) {
      block[key] = value;
      hasValue = true;
    }
  }

  return hasValue ? block : undefined;
}

/**
 * Counts items per key in order of first appearance; items whose key is
 * `undefined` are not counted. Keys may be any text (`constructor`,
 * `__proto__`), so every count is an own data property.
 *
 * @example
 * countBy(['a', 'b', 'a'], item => item) // { a: 2, b: 1 }
 */
export function countBy<T, K extends string>(
  items: Iterable<T>,
  keyOf: (item: T) => K | undefined
): Partial<Record<K, number>> {
  const tally = new Map<K, number>();
  for (const item of items) {
    const key = keyOf(item);
    if (key !== undefined) {
      tally.set(key, (tally.get(key) ?? 0) + 1);
    }
  }

  const counts: Partial<Record<K, number>> = {};
  for (const [key, count] of tally) {
    Object.defineProperty(counts, key, { value: count, enumerable: true, writable: true, configurable: true });
  }
  return counts;
}
