import type { Finding } from '../../report/reportTypes.js';
import type { CandidateKey } from '../computeKeys.js';
import type { FunctionalDependency } from '../dependency.js';
import { formatAttributeSet, isProperSubset } from '../attributeSet.js';

/**
 * Check for 2NF violations: partial dependencies.
 *
 * NF2_PARTIAL_DEPENDENCY: X → A where X is a proper subset of some candidate
 * key and A is non-prime (in no candidate key). `fds` must have single-attribute
 * dependents.
 */
export function check2nf(
  fds: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
  prime: ReadonlySet<string>,
): readonly Finding[] {
  const findings: Finding[] = [];

  for (const fd of fds) {
    const key = keys.find((k) => isProperSubset(fd.determinant, k));
    if (key === undefined) {
      continue;
    }

    for (const dep of fd.dependent) {
      if (prime.has(dep)) {
        continue;
      }
      const det = formatAttributeSet(fd.determinant);
      findings.push({
        rule: 'NF2_PARTIAL_DEPENDENCY',
        severity: 'error',
        normalForm: '2NF',
        column: dep,
        determinant: fd.determinant,
        key,
        message: `FD ${det} → {${dep}}: "${dep}" depends on part of the key ${formatAttributeSet(key)}.`,
        fix: `Move "${dep}" into a relation keyed by ${det}.`,
      });
    }
  }

  return findings;
}

/** A determinant that is a proper subset of a candidate key. */
export function isPartialDeterminant(
  determinant: readonly string[],
  keys: readonly CandidateKey[],
): boolean {
  return keys.some((k) => isProperSubset(determinant, k));
}
