/**
 * Deterministic ordering helpers. Comparison is by UTF-16 code unit so the
 * result does not depend on the host locale.
 */

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortStrings(values: Iterable<string>): string[] {
  return [...values].sort(compareStrings);
}

export function sortBy<T>(values: Iterable<T>, ...keys: Array<(value: T) => string>): T[] {
  return [...values].sort((a, b) => {
    for (const key of keys) {
      const order = compareStrings(key(a), key(b));
      if (order !== 0) return order;
    }
    return 0;
  });
}
