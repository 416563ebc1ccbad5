import type { Row, ScalarValue } from './types.js';
import { compareStrings } from '../../util/index.js';

/** Identity key for a scalar. Distinguishes `1` from `"1"` and `null`. */
export function valueKey(value: ScalarValue): string {
  return JSON.stringify(value);
}

/** Identity key for the values of `columns` in `row`, in that column order. */
export function rowKey(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map((c) => row[c] ?? null));
}

export function pickValues(row: Row, columns: readonly string[]): ScalarValue[] {
  return columns.map((c) => row[c] ?? null);
}

export function hasNull(row: Row, columns: readonly string[]): boolean {
  return columns.some((c) => (row[c] ?? null) === null);
}

function rankOf(value: ScalarValue): number {
  if (value === null) {
    return 0;
  }
  switch (typeof value) {
    case 'boolean':
      return 1;
    case 'number':
      return 2;
    default:
      return 3;
  }
}

/**
 * Total order over scalars: nulls first, then booleans, numbers, strings.
 */
export function compareValues(a: ScalarValue, b: ScalarValue): number {
  const rankDiff = rankOf(a) - rankOf(b);
  if (rankDiff !== 0) {
    return rankDiff;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b);
  }
  return 0;
}

/** Compare two rows on `columns`, left to right. */
export function compareRows(a: Row, b: Row, columns: readonly string[]): number {
  for (const column of columns) {
    const cmp = compareValues(a[column] ?? null, b[column] ?? null);
    if (cmp !== 0) {
      return cmp;
    }
  }
  return 0;
}
