import type { AttributeSet } from '../analysis/attributeSet.js';
import {
  attributeSetKey,
  compareAttributeSets,
  difference,
  formatAttributeSet,
  intersection,
  toAttributeSet,
  union,
} from '../analysis/attributeSet.js';
import { closureOf, dependenciesWithin, isSuperkey } from '../analysis/closure.js';
import { inferCandidateKeys, minimize } from '../analysis/computeKeys.js';
import type { FunctionalDependency } from '../analysis/dependency.js';
import { validateDependencySet } from '../analysis/dependency.js';
import { InternalInvariantViolationError } from '../errors.js';
import { isLosslessSplit } from './lossless.js';
import type { DecompositionPlan, PlanOptions, RelationDraft } from './plan.js';
import { assemblePlan, dropSubsumed } from './plan.js';

interface GroupedDependency {
  readonly determinant: AttributeSet;
  readonly dependent: AttributeSet;
}

/**
 * Split the relation until every dependency applicable to each part has a
 * superkey determinant.
 *
 * Uses an explicit work stack. Each step takes the first violating
 * determinant X (lexicographic order) with Y = X⁺ ∩ R − X, moves X ∪ Y into
 * its own relation and keeps (R − Y) ∪ X, then processes the X ∪ Y side
 * first. Every split is checked for a lossless join.
 *
 * Dependencies that no single relation can enforce any more are listed in
 * the plan's `lostDependencies`.
 */
export function decomposeBcnf(
  attributes: Iterable<string>,
  cover: readonly FunctionalDependency[],
  options: PlanOptions = {},
): DecompositionPlan {
  const source = [...new Set(attributes)];
  const all = toAttributeSet(source);
  validateDependencySet(all, cover);

  const terminal: AttributeSet[] = [];
  const stack: AttributeSet[] = [all];

  for (let next = stack.pop(); next !== undefined; next = stack.pop()) {
    const relation = next;
    const violation = findViolation(relation, cover);
    if (violation === undefined) {
      terminal.push(relation);
      continue;
    }

    const r1 = union(violation.determinant, violation.dependent);
    const r2 = union(difference(relation, violation.dependent), violation.determinant);
    if (!isLosslessSplit(r1, r2, cover)) {
      throw new InternalInvariantViolationError(
        `BCNF split of ${formatAttributeSet(relation)} on ${formatAttributeSet(violation.determinant)} is not lossless`,
      );
    }
    stack.push(r2, r1);
  }

  const seen = new Set<string>();
  const drafts: RelationDraft[] = [];
  for (const relation of terminal) {
    const key = attributeSetKey(relation);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    const within = dependenciesWithin(cover, relation);
    drafts.push({
      attributes: relation,
      primaryKey: inferCandidateKeys(relation, within)[0] ?? minimize(relation, relation, cover),
      dependencies: within,
    });
  }

  return assemblePlan('BCNF', source, dropSubsumed(drafts), cover, options);
}

/**
 * The first determinant inside `relation` (lexicographic order) that is not a
 * superkey of it, paired with every other attribute of the relation it
 * determines.
 */
export function findViolation(
  relation: AttributeSet,
  cover: readonly FunctionalDependency[],
): GroupedDependency | undefined {
  const determinants = new Map<string, AttributeSet>();
  for (const fd of dependenciesWithin(cover, relation)) {
    determinants.set(attributeSetKey(fd.determinant), fd.determinant);
  }

  const violating = [...determinants.values()]
    .sort(compareAttributeSets)
    .find((determinant) => !isSuperkey(determinant, relation, cover));
  if (violating === undefined) {
    return undefined;
  }
  return {
    determinant: violating,
    dependent: difference(intersection(closureOf(violating, cover), relation), violating),
  };
}
