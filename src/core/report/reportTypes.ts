import type { AttributeSet } from '../analysis/attributeSet.js';
import type { CandidateKey } from '../analysis/computeKeys.js';
import type { FunctionalDependency } from '../analysis/dependency.js';
import type { ColumnProfile } from '../dataset/types.js';

/** Severity levels for assessment findings. */
export type Severity = 'error' | 'warning' | 'info';

/** Normal form levels. */
export type NormalForm = '1NF' | '2NF' | '3NF' | 'BCNF';

/** Unique finding rule codes. */
export type RuleCode =
  | 'NF1_LIST_IN_STRING_SUSPECTED'
  | 'NF1_REPEATING_GROUP_SUSPECTED'
  | 'NF2_PARTIAL_DEPENDENCY'
  | 'NF3_TRANSITIVE_DEPENDENCY'
  | 'BCNF_NON_SUPERKEY_DETERMINANT'
  | 'DEPENDENCY_IGNORED';

/** A single normalization finding. */
export interface Finding {
  readonly rule: RuleCode;
  readonly severity: Severity;
  readonly normalForm: NormalForm;
  /** The offending (dependent) column, when the finding is about one column. */
  readonly column: string | null;
  readonly determinant: AttributeSet | null;
  /** The candidate key the finding was measured against, if any. */
  readonly key: CandidateKey | null;
  readonly message: string;
  readonly fix: string | null;
}

/** Violations grouped by the level they break. */
export interface ViolationsByLevel {
  readonly '2NF': readonly Finding[];
  readonly '3NF': readonly Finding[];
  readonly BCNF: readonly Finding[];
}

/**
 * Current classification: the highest level with no violations at or below it.
 * 1NF is assumed (the data is already tabular); 1NF heuristics are warnings.
 */
export interface NormalFormReport {
  readonly normalForm: NormalForm;
  readonly keys: readonly CandidateKey[];
  readonly violations: ViolationsByLevel;
  readonly warnings: readonly Finding[];
}

/** A needs_review dependency phrased for a human reviewer. */
export interface ReviewQuestion {
  readonly determinant: AttributeSet;
  readonly dependent: AttributeSet;
  readonly confidence: number;
  readonly violationCount: number;
  readonly question: string;
}

/** Metadata about the analysis run. */
export interface AnalysisMetadata {
  readonly source: string | null;
  readonly timestamp: string | null;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly rowsScanned: number;
  readonly sampled: boolean;
  readonly dependencyCount: number;
}

/** The complete analysis result. */
export interface AnalysisReport {
  readonly columns: readonly ColumnProfile[];
  readonly dependencies: readonly FunctionalDependency[];
  readonly keyCandidates: readonly CandidateKey[];
  readonly assessment: NormalFormReport;
  readonly questions: readonly ReviewQuestion[];
  readonly metadata: AnalysisMetadata;
}

/** Output format options. */
export type OutputFormat = 'json' | 'text';
