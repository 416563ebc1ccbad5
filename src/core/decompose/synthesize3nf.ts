import type { AttributeSet } from '../analysis/attributeSet.js';
import {
  attributeSetKey,
  formatAttributeSet,
  isSubset,
  toAttributeSet,
  union,
} from '../analysis/attributeSet.js';
import { dependenciesWithin, isSuperkey } from '../analysis/closure.js';
import type { CandidateKey } from '../analysis/computeKeys.js';
import { compareKeys, inferCandidateKeys } from '../analysis/computeKeys.js';
import type { FunctionalDependency } from '../analysis/dependency.js';
import { sortDependencies, validateDependencySet } from '../analysis/dependency.js';
import { InternalInvariantViolationError, InvalidDependencySetError } from '../errors.js';
import { verifyLosslessDecomposition } from './lossless.js';
import type { DecompositionPlan, PlanOptions, RelationDraft } from './plan.js';
import { assemblePlan, dropSubsumed } from './plan.js';

/**
 * Bernstein synthesis: one relation per determinant of the minimal cover,
 * holding the determinant and everything it determines, plus a key relation
 * when no relation already holds a key of the whole attribute set.
 *
 * The result is lossless and preserves every dependency in `cover`.
 * `keys` may be empty, in which case keys are inferred from `cover`.
 */
export function synthesize3nf(
  cover: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
  attributes: Iterable<string>,
  options: PlanOptions = {},
): DecompositionPlan {
  const source = [...new Set(attributes)];
  const all = toAttributeSet(source);
  validateDependencySet(all, cover);
  const effectiveKeys = resolveKeys(all, cover, keys);

  const groups = new Map<string, { determinant: AttributeSet; attributes: AttributeSet }>();
  for (const fd of sortDependencies(cover)) {
    const key = attributeSetKey(fd.determinant);
    const group = groups.get(key);
    groups.set(key, {
      determinant: fd.determinant,
      attributes: union(group?.attributes ?? fd.determinant, fd.dependent),
    });
  }

  const drafts: RelationDraft[] = [...groups.values()].map((group) => ({
    attributes: group.attributes,
    primaryKey: group.determinant,
    dependencies: dependenciesWithin(cover, group.attributes),
  }));

  if (!drafts.some((draft) => isSuperkey(draft.attributes, all, cover))) {
    const key = effectiveKeys[0] ?? all;
    drafts.push({ attributes: key, primaryKey: key, dependencies: [] });
  }

  const relations = dropSubsumed(drafts);
  const covered = union(...relations.map((r) => r.attributes));
  if (covered.length !== all.length) {
    throw new InternalInvariantViolationError(
      `3NF synthesis left columns uncovered: ${all.filter((a) => !covered.includes(a)).join(', ')}`,
    );
  }
  if (!verifyLosslessDecomposition(all, relations.map((r) => r.attributes), cover)) {
    throw new InternalInvariantViolationError('3NF synthesis produced a lossy decomposition');
  }

  return assemblePlan('3NF', source, relations, cover, options);
}

function resolveKeys(
  all: AttributeSet,
  cover: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
): CandidateKey[] {
  if (keys.length === 0) {
    return inferCandidateKeys(all, cover);
  }
  const canonical = keys.map((k) => toAttributeSet(k));
  const problems = canonical
    .filter((k) => !isSubset(k, all) || !isSuperkey(k, all, cover))
    .map((k) => `key ${formatAttributeSet(k)} does not determine every column`);
  if (problems.length > 0) {
    throw new InvalidDependencySetError(problems);
  }
  return canonical.sort(compareKeys);
}
