import { combinations } from '../../util/index.js';
import type { AttributeSet } from './attributeSet.js';
import { compareAttributeSets, difference, isSubset, toAttributeSet, union } from './attributeSet.js';
import { isSuperkey } from './closure.js';
import type { FunctionalDependency } from './dependency.js';
import { validateDependencySet } from './dependency.js';

/** A minimal attribute set whose closure is the whole relation. */
export type CandidateKey = AttributeSet;

/**
 * Find every minimal candidate key of `attributes` under `fds`.
 *
 * Attributes that never appear on a dependent side belong to every key, so the
 * search starts from them and adds the remaining determinant attributes,
 * smallest additions first. Attributes that only ever appear as dependents
 * can never be part of a minimal key.
 *
 * Returns [] when `fds` is empty: with no known dependencies there is no
 * known key, and callers fall back to the full row.
 */
export function inferCandidateKeys(
  attributes: Iterable<string>,
  fds: readonly FunctionalDependency[],
): CandidateKey[] {
  const all = toAttributeSet(attributes);
  validateDependencySet(all, fds);
  if (fds.length === 0) {
    return [];
  }

  const dependents = toAttributeSet(fds.flatMap((fd) => fd.dependent));
  const determinants = toAttributeSet(fds.flatMap((fd) => fd.determinant));
  const core = difference(all, dependents);

  if (isSuperkey(core, all, fds)) {
    return [minimize(core, all, fds)];
  }

  // Attributes on both sides are the only ones worth adding to the core.
  const optional = difference(determinants, core);
  const keys: CandidateKey[] = [];

  for (let size = 1; size <= optional.length; size++) {
    for (const extra of combinations(optional, size)) {
      const candidate = union(core, extra);
      if (keys.some((key) => isSubset(key, candidate))) {
        continue;
      }
      if (isSuperkey(candidate, all, fds)) {
        keys.push(candidate);
      }
    }
  }

  return keys.sort(compareKeys);
}

/** Drop attributes one at a time while the remainder is still a superkey. */
export function minimize(
  superkey: AttributeSet,
  attributes: AttributeSet,
  fds: readonly FunctionalDependency[],
): CandidateKey {
  let key = toAttributeSet(superkey);
  for (const attr of superkey) {
    const reduced = key.filter((a) => a !== attr);
    if (isSuperkey(reduced, attributes, fds)) {
      key = reduced;
    }
  }
  return key;
}

/** Smaller keys first, then lexicographic. */
export function compareKeys(a: CandidateKey, b: CandidateKey): number {
  return a.length - b.length || compareAttributeSets(a, b);
}

/** Attributes that belong to at least one candidate key. */
export function primeAttributes(keys: readonly CandidateKey[]): ReadonlySet<string> {
  return new Set(keys.flat());
}
