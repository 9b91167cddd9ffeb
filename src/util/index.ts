/**
 * Code-unit order comparison, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort an array by a key function. Returns a new array.
 */
export function sortBy<T>(arr: readonly T[], keyFn: (item: T) => string): T[] {
  return [...arr].sort((a, b) => compareStrings(keyFn(a), keyFn(b)));
}

/**
 * Sorted copy of a set of strings.
 */
export function sortedValues(values: Iterable<string>): string[] {
  return [...values].sort(compareStrings);
}

/**
 * Format with one decimal place. A value exactly halfway between two tenths
 * takes the even digit, so `0.25` is `0.2` and `0.75` is `0.8`.
 */
export function formatTenths(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 10).toFixed(1);
  }
  return value.toFixed(1);
}
