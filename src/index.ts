export type {
  AnalysisReport,
  AnalysisMetadata,
  Finding,
  NormalForm,
  NormalFormReport,
  OutputFormat,
  ReviewQuestion,
  RuleCode,
  Severity,
  ViolationsByLevel,
} from './core/report/reportTypes.js';

export type { Column, ColumnProfile, ColumnType, Dataset, Row, ScalarValue, SemanticType } from './core/dataset/types.js';
export type { AttributeSet } from './core/analysis/attributeSet.js';
export type {
  DependencyDecision,
  DependencySource,
  DependencyStatus,
  FunctionalDependency,
} from './core/analysis/dependency.js';
export type { CandidateKey } from './core/analysis/computeKeys.js';
export type { DetectOptions, DetectionReport, DependencyMeasurement } from './core/analysis/inferFds.js';
export type {
  DecompositionPlan,
  ForeignKey,
  PlanOptions,
  RelationSchema,
  TargetForm,
} from './core/decompose/plan.js';
export type { ApplyOptions, KeyConflict, TransformResult } from './core/transform/applyPlan.js';
export type { DependencyFile, PlanFile } from './core/persist/schema.js';
export type { ErrorKind, OrphanReference } from './core/errors.js';

export {
  NormalizerError,
  SchemaMismatchError,
  OrphanForeignKeyError,
  InvalidDependencySetError,
  InternalInvariantViolationError,
} from './core/errors.js';
export { parseCsv, readCsvFile, datasetFromRecords } from './core/dataset/load.js';
export { profileColumns } from './core/dataset/profile.js';
export { sampleRows } from './core/dataset/sample.js';
export { toAttributeSet } from './core/analysis/attributeSet.js';
export {
  applyDecisions,
  confirmDependency,
  createDependency,
  rejectDependency,
  selectConfirmed,
  validateDependencySet,
} from './core/analysis/dependency.js';
export { attributeClosure, isSuperkey } from './core/analysis/closure.js';
export { detectFunctionalDependencies, measureDependency } from './core/analysis/inferFds.js';
export { inferCandidateKeys } from './core/analysis/computeKeys.js';
export { assessNormalForm } from './core/analysis/assess.js';
export { computeMinimalCover } from './core/analysis/minimalCover.js';
export { synthesize3nf } from './core/decompose/synthesize3nf.js';
export { decomposeBcnf } from './core/decompose/decomposeBcnf.js';
export { isLosslessSplit, verifyLosslessDecomposition } from './core/decompose/lossless.js';
export { applyPlan, validateForeignKeys } from './core/transform/applyPlan.js';
export { parseDependencies, parseDependencyFile, parsePlan, parsePlanFile } from './core/persist/parse.js';
export { generateDependencyFile } from './core/persist/generate.js';
export { toJson } from './core/report/toJson.js';
export { toText } from './core/report/toText.js';
export { toSqlDdl } from './core/report/toSqlDdl.js';
export { toMermaidErd } from './core/report/toMermaidErd.js';
export { toReadme } from './core/report/toReadme.js';

import { formatAttributeSet } from './core/analysis/attributeSet.js';
import { assessNormalForm } from './core/analysis/assess.js';
import type { CandidateKey } from './core/analysis/computeKeys.js';
import { inferCandidateKeys } from './core/analysis/computeKeys.js';
import type { FunctionalDependency } from './core/analysis/dependency.js';
import { selectConfirmed, validateDependencySet } from './core/analysis/dependency.js';
import type { DetectOptions } from './core/analysis/inferFds.js';
import { detectFunctionalDependencies } from './core/analysis/inferFds.js';
import { computeMinimalCover } from './core/analysis/minimalCover.js';
import { profileColumns } from './core/dataset/profile.js';
import type { Dataset } from './core/dataset/types.js';
import { decomposeBcnf } from './core/decompose/decomposeBcnf.js';
import type { DecompositionPlan, TargetForm } from './core/decompose/plan.js';
import { synthesize3nf } from './core/decompose/synthesize3nf.js';
import type { AnalysisReport, ReviewQuestion } from './core/report/reportTypes.js';
import type { TransformResult } from './core/transform/applyPlan.js';
import { applyPlan } from './core/transform/applyPlan.js';

/** Options for the analyze function. */
export interface AnalyzeOptions extends DetectOptions {
  /** Where the dataset came from, for the report metadata. */
  readonly source?: string | undefined;
  readonly noTimestamp?: boolean | undefined;
}

/**
 * Profile a dataset, detect dependency candidates and assess its normal form
 * under the dependencies that need no review.
 * Never throws for well-formed datasets; the report may be empty.
 */
export function analyze(dataset: Dataset, options: AnalyzeOptions = {}): AnalysisReport {
  const names = dataset.columns.map((c) => c.name);
  const detection = detectFunctionalDependencies(dataset, options);
  const confirmed = selectConfirmed(detection.dependencies);
  const keys = inferCandidateKeys(names, confirmed);

  return {
    columns: profileColumns(dataset),
    dependencies: detection.dependencies,
    keyCandidates: detection.keyCandidates,
    assessment: assessNormalForm(names, confirmed, keys, dataset),
    questions: detection.dependencies
      .filter((fd) => fd.status === 'needs_review')
      .map(toQuestion),
    metadata: {
      source: options.source ?? null,
      timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
      rowCount: dataset.rows.length,
      columnCount: dataset.columns.length,
      rowsScanned: detection.rowsScanned,
      sampled: detection.sampled,
      dependencyCount: detection.dependencies.length,
    },
  };
}

/** Options for the normalize function. */
export interface NormalizeOptions {
  readonly target?: TargetForm | undefined;
  readonly rootName?: string | undefined;
}

/** Everything a normalization run produces. */
export interface NormalizeResult {
  readonly cover: readonly FunctionalDependency[];
  readonly keys: readonly CandidateKey[];
  readonly plan: DecompositionPlan;
  readonly transform: TransformResult;
}

/**
 * Decompose `dataset` using the confirmed entries of `dependencies`
 * (statuses `confirmed` and `auto_confirmed`; the rest are ignored) and
 * materialize the tables.
 *
 * @throws InvalidDependencySetError when a confirmed dependency names an unknown column
 */
export function normalize(
  dataset: Dataset,
  dependencies: readonly FunctionalDependency[],
  options: NormalizeOptions = {},
): NormalizeResult {
  const names = dataset.columns.map((c) => c.name);
  const confirmed = selectConfirmed(dependencies);
  validateDependencySet(names, confirmed);

  const cover = computeMinimalCover(confirmed);
  const keys = inferCandidateKeys(names, cover);
  const planOptions = { rootName: options.rootName };
  const plan = options.target === 'BCNF'
    ? decomposeBcnf(names, cover, planOptions)
    : synthesize3nf(cover, keys, names, planOptions);

  return { cover, keys, plan, transform: applyPlan(plan, dataset, { strict: true }) };
}

function toQuestion(fd: FunctionalDependency): ReviewQuestion {
  const percent = (fd.confidence * 100).toFixed(2);
  return {
    determinant: fd.determinant,
    dependent: fd.dependent,
    confidence: fd.confidence,
    violationCount: fd.violationCount,
    question:
      `Does ${formatAttributeSet(fd.determinant)} always determine ${formatAttributeSet(fd.dependent)}? ` +
      `It holds for ${percent}% of groups; ${String(fd.violationCount)} group(s) disagree.`,
  };
}
