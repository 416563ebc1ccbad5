import { InvalidDependencySetError } from '../errors.js';
import type { AttributeSet } from './attributeSet.js';
import {
  attributeSetKey,
  compareAttributeSets,
  difference,
  formatAttributeSet,
  intersection,
  toAttributeSet,
} from './attributeSet.js';

/**
 * Review state of a dependency.
 * - auto_confirmed: held on every row (confidence 1, no violations)
 * - needs_review: held on at least 95% of determinant groups
 * - confirmed / rejected: explicit user decisions
 */
export type DependencyStatus = 'auto_confirmed' | 'needs_review' | 'confirmed' | 'rejected';

/** Where a dependency came from. */
export type DependencySource = 'detected' | 'unique' | 'declared';

/** A functional dependency: determinant → dependent columns. */
export interface FunctionalDependency {
  readonly determinant: AttributeSet;
  readonly dependent: AttributeSet;
  readonly confidence: number;
  readonly violationCount: number;
  readonly status: DependencyStatus;
  readonly source: DependencySource;
}

/** A user decision about one dependency, matched on canonical determinant and dependent. */
export interface DependencyDecision {
  readonly determinant: readonly string[];
  readonly dependent: readonly string[];
  readonly action: 'confirm' | 'reject';
}

export interface DependencyInit {
  readonly confidence?: number | undefined;
  readonly violationCount?: number | undefined;
  readonly status?: DependencyStatus | undefined;
  readonly source?: DependencySource | undefined;
}

/**
 * Create a dependency with canonical attribute sets.
 * Defaults describe a user-declared, confirmed dependency.
 */
export function createDependency(
  determinant: Iterable<string>,
  dependent: Iterable<string>,
  init: DependencyInit = {},
): FunctionalDependency {
  return {
    determinant: toAttributeSet(determinant),
    dependent: toAttributeSet(dependent),
    confidence: init.confidence ?? 1,
    violationCount: init.violationCount ?? 0,
    status: init.status ?? 'confirmed',
    source: init.source ?? 'declared',
  };
}

/**
 * The dependency a key candidate implies: key → every other attribute.
 * One dependency per key, not one per attribute.
 */
export function keyDependency(key: AttributeSet, attributes: AttributeSet): FunctionalDependency {
  return createDependency(key, difference(toAttributeSet(attributes), key), {
    status: 'auto_confirmed',
    source: 'unique',
  });
}

export function dependencyKey(fd: Pick<FunctionalDependency, 'determinant' | 'dependent'>): string {
  return `${attributeSetKey(fd.determinant)}->${attributeSetKey(fd.dependent)}`;
}

/** Order by determinant, then dependent. */
export function compareDependencies(
  a: Pick<FunctionalDependency, 'determinant' | 'dependent'>,
  b: Pick<FunctionalDependency, 'determinant' | 'dependent'>,
): number {
  return (
    compareAttributeSets(a.determinant, b.determinant) ||
    compareAttributeSets(a.dependent, b.dependent)
  );
}

export function sortDependencies<T extends Pick<FunctionalDependency, 'determinant' | 'dependent'>>(
  fds: readonly T[],
): T[] {
  return [...fds].sort(compareDependencies);
}

export function formatDependency(fd: Pick<FunctionalDependency, 'determinant' | 'dependent'>): string {
  return `${formatAttributeSet(fd.determinant)} → ${formatAttributeSet(fd.dependent)}`;
}

/** Dependencies an algorithm may consume: auto-confirmed or explicitly confirmed. */
export function selectConfirmed(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  return fds.filter((fd) => fd.status === 'confirmed' || fd.status === 'auto_confirmed');
}

export function confirmDependency(fd: FunctionalDependency): FunctionalDependency {
  return { ...fd, status: 'confirmed' };
}

export function rejectDependency(fd: FunctionalDependency): FunctionalDependency {
  return { ...fd, status: 'rejected' };
}

/**
 * Apply user decisions, returning a new list. Dependencies without a decision
 * are returned unchanged; decisions matching nothing are ignored.
 */
export function applyDecisions(
  fds: readonly FunctionalDependency[],
  decisions: readonly DependencyDecision[],
): FunctionalDependency[] {
  const byKey = new Map(
    decisions.map((d) => [
      dependencyKey({ determinant: toAttributeSet(d.determinant), dependent: toAttributeSet(d.dependent) }),
      d.action,
    ]),
  );

  return fds.map((fd) => {
    const action = byKey.get(dependencyKey(fd));
    if (action === 'confirm') return confirmDependency(fd);
    if (action === 'reject') return rejectDependency(fd);
    return fd;
  });
}

/**
 * Rewrite every dependency as one dependency per dependent attribute.
 * Duplicates are dropped, keeping the first occurrence.
 */
export function splitDependents(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const seen = new Set<string>();
  const result: FunctionalDependency[] = [];
  for (const fd of fds) {
    for (const attr of fd.dependent) {
      const single: FunctionalDependency = { ...fd, dependent: [attr] };
      const key = dependencyKey(single);
      if (!seen.has(key)) {
        seen.add(key);
        result.push(single);
      }
    }
  }
  return result;
}

/**
 * Reject dependency sets that reference unknown columns, have empty sides, or
 * overlap determinant and dependent. Reports every problem at once.
 */
export function validateDependencySet(
  attributes: Iterable<string>,
  fds: readonly FunctionalDependency[],
): void {
  const known = new Set(attributes);
  const problems = fds.flatMap((fd) => dependencyProblems(known, fd));
  if (problems.length > 0) {
    throw new InvalidDependencySetError(problems);
  }
}

/** Everything wrong with one dependency over the `known` columns; empty when it is usable. */
export function dependencyProblems(known: ReadonlySet<string>, fd: FunctionalDependency): string[] {
  const label = formatDependency(fd);
  const problems: string[] = [];
  if (fd.determinant.length === 0) {
    problems.push(`${label}: determinant is empty`);
  }
  if (fd.dependent.length === 0) {
    problems.push(`${label}: dependent is empty`);
  }
  const unknown = [...fd.determinant, ...fd.dependent].filter((attr) => !known.has(attr));
  if (unknown.length > 0) {
    problems.push(`${label}: unknown column(s) ${[...new Set(unknown)].join(', ')}`);
  }
  const overlap = intersection(toAttributeSet(fd.determinant), toAttributeSet(fd.dependent));
  if (overlap.length > 0) {
    problems.push(`${label}: determinant and dependent share ${overlap.join(', ')}`);
  }
  return problems;
}

/** Every attribute mentioned by any dependency. */
export function mentionedAttributes(fds: readonly FunctionalDependency[]): AttributeSet {
  return toAttributeSet(fds.flatMap((fd) => [...fd.determinant, ...fd.dependent]));
}
