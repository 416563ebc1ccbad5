/** Code-unit string comparison, independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * All k-element combinations of `items`, in lexicographic index order.
 */
export function combinations<T>(items: readonly T[], k: number): T[][] {
  if (k === 0) {
    return [[]];
  }
  const result: T[][] = [];
  items.forEach((item, i) => {
    for (const rest of combinations(items.slice(i + 1), k - 1)) {
      result.push([item, ...rest]);
    }
  });
  return result;
}
