import type { AttributeSet } from '../analysis/attributeSet.js';
import { intersection, isSubset, toAttributeSet } from '../analysis/attributeSet.js';
import { attributeClosure } from '../analysis/closure.js';
import type { FunctionalDependency } from '../analysis/dependency.js';

type Dependencies = readonly Pick<FunctionalDependency, 'determinant' | 'dependent'>[];

/**
 * Binary lossless-join test: the split of R into R1 and R2 is lossless iff
 * (R1 ∩ R2) → R1 or (R1 ∩ R2) → R2.
 */
export function isLosslessSplit(r1: AttributeSet, r2: AttributeSet, fds: Dependencies): boolean {
  const closure = attributeClosure(intersection(toAttributeSet(r1), toAttributeSet(r2)), fds);
  return isSubset(r1, closure) || isSubset(r2, closure);
}

/**
 * N-ary lossless-join test (chase). Builds one tableau row per relation,
 * equates symbols the dependencies force equal, and succeeds when some row
 * becomes fully distinguished.
 */
export function verifyLosslessDecomposition(
  attributes: Iterable<string>,
  relations: readonly AttributeSet[],
  fds: Dependencies,
): boolean {
  const columns = toAttributeSet(attributes);
  if (relations.length === 0) {
    return columns.length === 0;
  }

  const distinguished = (column: string): string => `a:${column}`;
  const tableau: string[][] = relations.map((relation, i) => {
    const members = new Set(relation);
    return columns.map((column) => (members.has(column) ? distinguished(column) : `b${String(i)}:${column}`));
  });
  const indexOf = new Map(columns.map((column, i) => [column, i]));

  const equate = (col: number, left: string, right: string): void => {
    const keep = left.startsWith('a:') ? left : right.startsWith('a:') ? right : left < right ? left : right;
    const drop = keep === left ? right : left;
    for (const row of tableau) {
      if (row[col] === drop) {
        row[col] = keep;
      }
    }
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const fd of fds) {
      const detCols = fd.determinant.map((a) => indexOf.get(a));
      const depCols = fd.dependent.map((a) => indexOf.get(a));
      if (detCols.some((c) => c === undefined)) {
        continue;
      }
      for (let i = 0; i < tableau.length; i++) {
        for (let j = i + 1; j < tableau.length; j++) {
          const a = tableau[i];
          const b = tableau[j];
          if (a === undefined || b === undefined) {
            continue;
          }
          const agree = detCols.every((c) => c !== undefined && a[c] === b[c]);
          if (!agree) {
            continue;
          }
          for (const c of depCols) {
            if (c === undefined) {
              continue;
            }
            const left = a[c];
            const right = b[c];
            if (left !== undefined && right !== undefined && left !== right) {
              equate(c, left, right);
              changed = true;
            }
          }
        }
      }
    }
  }

  return tableau.some((row) => row.every((symbol) => symbol.startsWith('a:')));
}
