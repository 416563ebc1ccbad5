import { compareStrings } from '../../util/index.js';

/**
 * A set of column names in canonical form: sorted, without duplicates.
 * Two attribute sets are equal exactly when their arrays are element-wise equal.
 */
export type AttributeSet = readonly string[];

/** Normalize any collection of column names to its canonical sorted form. */
export function toAttributeSet(attributes: Iterable<string>): AttributeSet {
  return [...new Set(attributes)].sort(compareStrings);
}

/** Stable string key for maps and dedupe sets. */
export function attributeSetKey(attributes: AttributeSet): string {
  return JSON.stringify(attributes);
}

export function isSubset(subset: Iterable<string>, superset: Iterable<string>): boolean {
  const lookup = new Set(superset);
  for (const attr of subset) {
    if (!lookup.has(attr)) {
      return false;
    }
  }
  return true;
}

export function isProperSubset(subset: AttributeSet, superset: AttributeSet): boolean {
  return subset.length < superset.length && isSubset(subset, superset);
}

export function union(...sets: readonly AttributeSet[]): AttributeSet {
  return toAttributeSet(sets.flat());
}

export function intersection(a: AttributeSet, b: AttributeSet): AttributeSet {
  const lookup = new Set(b);
  return a.filter((attr) => lookup.has(attr));
}

export function difference(a: AttributeSet, b: AttributeSet): AttributeSet {
  const lookup = new Set(b);
  return a.filter((attr) => !lookup.has(attr));
}

export function sameAttributes(a: AttributeSet, b: AttributeSet): boolean {
  return a.length === b.length && a.every((attr, i) => attr === b[i]);
}

/**
 * Lexicographic order over canonical attribute sets: element by element,
 * and a prefix sorts before its extensions.
 */
export function compareAttributeSets(a: AttributeSet, b: AttributeSet): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const cmp = compareStrings(a[i] ?? '', b[i] ?? '');
    if (cmp !== 0) {
      return cmp;
    }
  }
  return a.length - b.length;
}

/** Render as `{a, b}` for messages. */
export function formatAttributeSet(attributes: AttributeSet): string {
  return `{${attributes.join(', ')}}`;
}
