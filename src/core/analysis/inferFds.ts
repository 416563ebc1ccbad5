import type { Dataset, Row } from '../dataset/types.js';
import { hasNull, rowKey } from '../dataset/values.js';
import { DEFAULT_SAMPLE_SEED, sampleRows } from '../dataset/sample.js';
import { combinations } from '../../util/index.js';
import type { AttributeSet } from './attributeSet.js';
import { isProperSubset, isSubset, toAttributeSet } from './attributeSet.js';
import type { DependencyStatus, FunctionalDependency } from './dependency.js';
import { createDependency, keyDependency, sortDependencies } from './dependency.js';

export const DEFAULT_MAX_ARITY = 2;
export const DEFAULT_SAMPLE_THRESHOLD = 10_000;

/** Candidates below this confidence are discarded, never reported. */
export const REVIEW_THRESHOLD = 0.95;

/** Options for dependency detection. */
export interface DetectOptions {
  /** Largest determinant size to try. */
  readonly maxArity?: number | undefined;
  /** Datasets with more rows than this are scanned on a sample. */
  readonly sampleThreshold?: number | undefined;
  /** Rows in the sample; defaults to `sampleThreshold`. */
  readonly sampleSize?: number | undefined;
  readonly seed?: number | undefined;
}

/** Confidence measurement of determinant → dependent over a set of rows. */
export interface DependencyMeasurement {
  readonly confidence: number;
  readonly violationCount: number;
  readonly groupCount: number;
}

/** Result of scanning a dataset for dependency candidates. */
export interface DetectionReport {
  readonly dependencies: readonly FunctionalDependency[];
  readonly keyCandidates: readonly AttributeSet[];
  readonly sampled: boolean;
  readonly rowsScanned: number;
  readonly totalRows: number;
}

/**
 * Measure how well determinant → dependent holds on `rows`.
 *
 * Rows with a null in either side are left out: nulls neither support nor
 * refute a dependency. A determinant group is a violation when it maps to
 * more than one dependent value; confidence is the share of groups that don't.
 */
export function measureDependency(
  rows: readonly Row[],
  determinant: readonly string[],
  dependent: readonly string[],
): DependencyMeasurement {
  const groups = new Map<string, { readonly first: string; violated: boolean }>();

  for (const row of rows) {
    if (hasNull(row, determinant) || hasNull(row, dependent)) {
      continue;
    }
    const groupKey = rowKey(row, determinant);
    const value = rowKey(row, dependent);
    const group = groups.get(groupKey);
    if (group === undefined) {
      groups.set(groupKey, { first: value, violated: false });
    } else if (group.first !== value) {
      group.violated = true;
    }
  }

  const groupCount = groups.size;
  if (groupCount === 0) {
    return { confidence: 0, violationCount: 0, groupCount };
  }

  let violationCount = 0;
  for (const group of groups.values()) {
    if (group.violated) {
      violationCount++;
    }
  }

  return { confidence: 1 - violationCount / groupCount, violationCount, groupCount };
}

/** Status for a measurement, or null when it falls below the review threshold. */
export function classifyMeasurement(measurement: DependencyMeasurement): DependencyStatus | null {
  if (measurement.confidence === 1 && measurement.violationCount === 0) {
    return 'auto_confirmed';
  }
  if (measurement.confidence >= REVIEW_THRESHOLD) {
    return 'needs_review';
  }
  return null;
}

/** Every row has a distinct, null-free combination of `columns`. */
export function isUniqueCombination(rows: readonly Row[], columns: readonly string[]): boolean {
  if (rows.length === 0) {
    return false;
  }
  const seen = new Set<string>();
  for (const row of rows) {
    if (hasNull(row, columns)) {
      return false;
    }
    const key = rowKey(row, columns);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
  }
  return true;
}

/**
 * Propose functional dependencies from data patterns.
 *
 * Rules:
 * - Every column subset up to `maxArity` is a candidate determinant, tried
 *   against every other column.
 * - Confidence 1 → auto_confirmed; [0.95, 1) → needs_review with the
 *   violation count; anything lower is dropped.
 * - A column (or minimal column combination) unique on every row is a key
 *   candidate. It is reported once, as key → all other columns, and is not
 *   expanded into further determinants.
 * - A determinant is skipped for a dependent that a proper subset of it
 *   already determines outright.
 * - Above `sampleThreshold` rows, candidates are found on a seeded sample and
 *   then re-measured on the full dataset; reported numbers are full-data numbers.
 *
 * Never throws; the result may be empty.
 */
export function detectFunctionalDependencies(
  dataset: Dataset,
  options: DetectOptions = {},
): DetectionReport {
  const maxArity = options.maxArity ?? DEFAULT_MAX_ARITY;
  const sampleThreshold = options.sampleThreshold ?? DEFAULT_SAMPLE_THRESHOLD;
  const sampleSize = options.sampleSize ?? sampleThreshold;

  const names = dataset.columns.map((c) => c.name);
  const allRows = dataset.rows;
  const sampled = allRows.length > sampleThreshold;
  const rows = sampled ? sampleRows(allRows, sampleSize, options.seed ?? DEFAULT_SAMPLE_SEED) : allRows;

  // Single-column uniqueness is cheap, so it is always judged on the full data.
  const keyCandidates: AttributeSet[] = names
    .filter((name) => isUniqueCombination(allRows, [name]))
    .map((name) => [name]);
  const pool = names.filter((name) => !keyCandidates.some((k) => k[0] === name));

  const found: FunctionalDependency[] = [];
  const autoDeterminants = new Map<string, AttributeSet[]>();

  for (let arity = 1; arity <= maxArity; arity++) {
    for (const columns of combinations(pool, arity)) {
      const determinant = toAttributeSet(columns);

      if (keyCandidates.some((key) => isSubset(key, determinant))) {
        continue;
      }
      if (
        arity > 1 &&
        isUniqueCombination(rows, determinant) &&
        (!sampled || isUniqueCombination(allRows, determinant))
      ) {
        keyCandidates.push(determinant);
        continue;
      }

      for (const dependent of names) {
        if (determinant.includes(dependent)) {
          continue;
        }
        const known = autoDeterminants.get(dependent) ?? [];
        if (known.some((d) => isProperSubset(d, determinant))) {
          continue;
        }

        let measurement = measureDependency(rows, determinant, [dependent]);
        if (classifyMeasurement(measurement) === null) {
          continue;
        }
        if (sampled) {
          measurement = measureDependency(allRows, determinant, [dependent]);
        }
        const status = classifyMeasurement(measurement);
        if (status === null) {
          continue;
        }

        if (status === 'auto_confirmed') {
          autoDeterminants.set(dependent, [...known, determinant]);
        }
        found.push(
          createDependency(determinant, [dependent], {
            confidence: measurement.confidence,
            violationCount: measurement.violationCount,
            status,
            source: 'detected',
          }),
        );
      }
    }
  }

  const keyFds = keyCandidates
    .map((key) => keyDependency(key, names))
    .filter((fd) => fd.dependent.length > 0);

  return {
    dependencies: sortDependencies([...found, ...keyFds]),
    keyCandidates,
    sampled,
    rowsScanned: rows.length,
    totalRows: allRows.length,
  };
}
