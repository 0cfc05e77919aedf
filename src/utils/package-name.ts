/**
 * System and release names are compared case-insensitively.
 */

/**
 * Map key for a system or release name
 */
export function normalizeName(name: string): string {
  return name.toLowerCase();
}

/**
 * Ordering used for every sorted listing: normalized name, code-point order,
 * with the raw name as tie-breaker so output never depends on insertion order.
 */
export function compareNames(a: string, b: string): number {
  const ka = normalizeName(a);
  const kb = normalizeName(b);
  if (ka !== kb) {
    return ka < kb ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
