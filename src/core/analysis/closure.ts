import type { FunctionalDependency } from './dependency.js';
import type { AttributeSet } from './attributeSet.js';
import { toAttributeSet } from './attributeSet.js';

type Dependencies = readonly Pick<FunctionalDependency, 'determinant' | 'dependent'>[];

/**
 * Compute the attribute closure of a set of attributes under given FDs.
 * Uses Armstrong's axioms (reflexivity, augmentation, transitivity).
 *
 * Given attributes X and a set of FDs, returns X+ (all attributes
 * functionally determined by X). The result does not depend on FD order,
 * and `fds` is only read.
 */
export function attributeClosure(
  attributes: Iterable<string>,
  fds: Dependencies,
): ReadonlySet<string> {
  const closure = new Set(attributes);

  let changed = true;
  while (changed) {
    changed = false;
    for (const fd of fds) {
      if (fd.determinant.every((attr) => closure.has(attr))) {
        for (const dep of fd.dependent) {
          if (!closure.has(dep)) {
            closure.add(dep);
            changed = true;
          }
        }
      }
    }
  }

  return closure;
}

/** The closure as a canonical attribute set. */
export function closureOf(attributes: Iterable<string>, fds: Dependencies): AttributeSet {
  return toAttributeSet(attributeClosure(attributes, fds));
}

/**
 * Check if a set of attributes is a superkey of `allAttributes`.
 * A superkey determines all attributes.
 */
export function isSuperkey(
  attributes: Iterable<string>,
  allAttributes: Iterable<string>,
  fds: Dependencies,
): boolean {
  return implies(fds, attributes, allAttributes);
}

/** True when `fds` entail determinant → dependent. */
export function implies(
  fds: Dependencies,
  determinant: Iterable<string>,
  dependent: Iterable<string>,
): boolean {
  const closure = attributeClosure(determinant, fds);
  for (const attr of dependent) {
    if (!closure.has(attr)) {
      return false;
    }
  }
  return true;
}

/** FDs whose attributes all lie inside `attributes`. */
export function dependenciesWithin<T extends Pick<FunctionalDependency, 'determinant' | 'dependent'>>(
  fds: readonly T[],
  attributes: Iterable<string>,
): T[] {
  const scope = new Set(attributes);
  return fds.filter(
    (fd) => fd.determinant.every((a) => scope.has(a)) && fd.dependent.every((a) => scope.has(a)),
  );
}
