import { formatAttributeSet } from '../analysis/attributeSet.js';
import { formatDependency } from '../analysis/dependency.js';
import type { AnalysisReport, Finding } from './reportTypes.js';

/**
 * Format an AnalysisReport as human-readable text.
 */
export function toText(report: AnalysisReport): string {
  const lines: string[] = [];
  const { metadata, assessment } = report;

  lines.push('=== Dataset Normalization Analysis ===');
  lines.push('');

  if (metadata.timestamp !== null) {
    lines.push(`Timestamp:    ${metadata.timestamp}`);
  }
  if (metadata.source !== null) {
    lines.push(`Source:       ${metadata.source}`);
  }
  lines.push(`Rows:         ${String(metadata.rowCount)}`);
  lines.push(`Columns:      ${String(metadata.columnCount)}`);
  if (metadata.sampled) {
    lines.push(`Sampled:      ${String(metadata.rowsScanned)} rows`);
  }
  lines.push(`Dependencies: ${String(metadata.dependencyCount)}`);
  lines.push(`Normal form:  ${assessment.normalForm}`);
  lines.push('');

  lines.push('--- Columns ---');
  for (const column of report.columns) {
    const nullable = column.nullable ? ' nullable' : '';
    lines.push(
      `  ${column.name}: ${column.type}${nullable} (${column.semanticType}, ${String(column.distinctCount)} distinct)`,
    );
  }
  lines.push('');

  lines.push('--- Candidate Keys ---');
  if (assessment.keys.length > 0) {
    for (const key of assessment.keys) {
      lines.push(`  ${formatAttributeSet(key)}`);
    }
  } else {
    lines.push('  (none)');
  }
  lines.push('');

  lines.push('--- Functional Dependencies ---');
  for (const fd of report.dependencies) {
    const confidence = fd.status === 'needs_review'
      ? ` confidence=${fd.confidence.toFixed(4)} violations=${String(fd.violationCount)}`
      : '';
    lines.push(`  ${formatDependency(fd)} [${fd.status}, ${fd.source}]${confidence}`);
  }
  if (report.dependencies.length === 0) {
    lines.push('  (none)');
  }
  lines.push('');

  const violations = [
    ...assessment.violations['2NF'],
    ...assessment.violations['3NF'],
    ...assessment.violations.BCNF,
  ];
  if (violations.length > 0 || assessment.warnings.length > 0) {
    lines.push('--- Findings ---');
    for (const f of [...assessment.warnings, ...violations]) {
      lines.push(formatFinding(f));
      lines.push(`    ${f.message}`);
    }
  } else {
    lines.push('No normalization findings.');
  }

  if (report.questions.length > 0) {
    lines.push('');
    lines.push('--- Needs Review ---');
    for (const q of report.questions) {
      lines.push(`  ${q.question}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}

function formatFinding(f: Finding): string {
  const column = f.column !== null ? ` @ ${f.column}` : '';
  return `  [${f.severity.toUpperCase()}] ${f.rule} (${f.normalForm})${column}`;
}
