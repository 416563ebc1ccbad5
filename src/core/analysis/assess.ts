import type { Dataset } from '../dataset/types.js';
import type { Finding, NormalForm, NormalFormReport } from '../report/reportTypes.js';
import { difference, toAttributeSet } from './attributeSet.js';
import type { CandidateKey } from './computeKeys.js';
import { inferCandidateKeys, primeAttributes } from './computeKeys.js';
import type { FunctionalDependency } from './dependency.js';
import { dependencyProblems, splitDependents } from './dependency.js';
import { check1nf } from './normalizeChecks/check1nf.js';
import { check2nf } from './normalizeChecks/check2nf.js';
import { check3nf } from './normalizeChecks/check3nf.js';

/**
 * Classify the relation over `attributes` and list every violation above 1NF.
 *
 * Without keys they are inferred from `fds`; with no inferable key the full
 * row is the key. When `dataset` is given, 1NF heuristics run too and their
 * findings are attached as warnings.
 *
 * Never throws: dependencies that cannot apply to `attributes` (unknown
 * columns, an empty side, overlapping sides) are left out of the checks and
 * reported as DEPENDENCY_IGNORED warnings.
 */
export function assessNormalForm(
  attributes: Iterable<string>,
  fds: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
  dataset?: Dataset,
): NormalFormReport {
  const all = toAttributeSet(attributes);
  const known = new Set(all);
  const ignored: Finding[] = [];
  const usable: FunctionalDependency[] = [];
  for (const fd of fds) {
    const problems = dependencyProblems(known, fd);
    if (problems.length === 0) {
      usable.push(fd);
      continue;
    }
    ignored.push({
      rule: 'DEPENDENCY_IGNORED',
      severity: 'warning',
      normalForm: '1NF',
      column: null,
      determinant: fd.determinant,
      key: null,
      message: `Ignored dependency ${problems.join('; ')}`,
      fix: 'Correct the dependency or remove it.',
    });
  }

  const effectiveKeys = resolveKeys(all, usable, keys);
  const prime = primeAttributes(effectiveKeys);
  const singles = splitDependents(usable)
    .map((fd) => ({ ...fd, dependent: difference(fd.dependent, fd.determinant) }))
    .filter((fd) => fd.dependent.length > 0);

  const nf2 = check2nf(singles, effectiveKeys, prime);
  const higher = check3nf(all, singles, effectiveKeys, prime);
  const nf3 = higher.filter((f) => f.normalForm === '3NF');
  const bcnf = higher.filter((f) => f.normalForm === 'BCNF');

  return {
    normalForm: classify(nf2, nf3, bcnf),
    keys: effectiveKeys,
    violations: { '2NF': nf2, '3NF': nf3, BCNF: bcnf },
    warnings: dataset !== undefined ? [...ignored, ...check1nf(dataset)] : ignored,
  };
}

function resolveKeys(
  all: readonly string[],
  fds: readonly FunctionalDependency[],
  keys: readonly CandidateKey[],
): readonly CandidateKey[] {
  if (keys.length > 0) {
    return keys.map((k) => toAttributeSet(k));
  }
  const inferred = inferCandidateKeys(all, fds);
  return inferred.length > 0 ? inferred : [all];
}

function classify(
  nf2: readonly Finding[],
  nf3: readonly Finding[],
  bcnf: readonly Finding[],
): NormalForm {
  if (nf2.length > 0) return '1NF';
  if (nf3.length > 0) return '2NF';
  if (bcnf.length > 0) return '3NF';
  return 'BCNF';
}
