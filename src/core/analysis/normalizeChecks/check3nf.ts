import type { Finding } from '../../report/reportTypes.js';
import type { AttributeSet } from '../attributeSet.js';
import { formatAttributeSet } from '../attributeSet.js';
import { isSuperkey } from '../closure.js';
import type { CandidateKey } from '../computeKeys.js';
import type { FunctionalDependency } from '../dependency.js';
import { isPartialDeterminant } from './check2nf.js';

/**
 * Check for 3NF and BCNF violations.
 *
 * 3NF violation: X → A where X is not a superkey AND A is not part of
 *   any candidate key (transitive dependency).
 *
 * BCNF violation: X → A where X is not a superkey (regardless of whether
 *   A is in a candidate key).
 *
 * Partial dependencies are reported by check2nf and skipped here, so each
 * dependency lands at the lowest level it breaks. `fds` must have
 * single-attribute dependents; superkey tests use the whole set.
 */
export function check3nf(
  attributes: AttributeSet,
  fds: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
  prime: ReadonlySet<string>,
): readonly Finding[] {
  const findings: Finding[] = [];

  for (const fd of fds) {
    if (isSuperkey(fd.determinant, attributes, fds)) {
      continue;
    }

    const det = formatAttributeSet(fd.determinant);
    for (const dep of fd.dependent) {
      if (prime.has(dep)) {
        // Dependent is in a candidate key - BCNF violation only (3NF is satisfied)
        findings.push({
          rule: 'BCNF_NON_SUPERKEY_DETERMINANT',
          severity: 'warning',
          normalForm: 'BCNF',
          column: dep,
          determinant: fd.determinant,
          key: null,
          message: `FD ${det} → {${dep}}: determinant is not a superkey. BCNF violation (${dep} is part of a candidate key, so 3NF is satisfied).`,
          fix: `Split ${det} ∪ {${dep}} into its own relation; the dependency may no longer be enforceable by a single key.`,
        });
      } else if (!isPartialDeterminant(fd.determinant, keys)) {
        findings.push({
          rule: 'NF3_TRANSITIVE_DEPENDENCY',
          severity: 'error',
          normalForm: '3NF',
          column: dep,
          determinant: fd.determinant,
          key: null,
          message: `FD ${det} → {${dep}}: transitive dependency detected. "${dep}" depends on non-key attributes ${det} rather than a candidate key.`,
          fix: `Move "${dep}" into a relation keyed by ${det} and keep ${det} as a foreign key.`,
        });
      }
    }
  }

  return findings;
}
