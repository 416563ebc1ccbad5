import type { Column, Dataset } from '../../dataset/types.js';
import type { Finding } from '../../report/reportTypes.js';

/** Characters that suggest several values packed into one cell. */
const LIST_DELIMITER_PATTERN = /[,;|]/;

/** Share of sampled values that must contain a delimiter to raise a finding. */
const LIST_VALUE_RATIO = 0.3;
const LIST_SAMPLE_SIZE = 100;

/**
 * Pattern to detect repeating groups: column names ending with a numeric suffix.
 * e.g., phone1, phone2, address_1, address_2
 */
const REPEATING_GROUP_PATTERN = /^(.+?)_?(\d+)$/;

/**
 * Check for 1NF violations (heuristic-based).
 *
 * Checks:
 * - NF1_LIST_IN_STRING_SUSPECTED: string columns whose values often contain
 *   list delimiters
 * - NF1_REPEATING_GROUP_SUSPECTED: same-typed columns with numeric suffixes
 *   (phone1, phone2)
 */
export function check1nf(dataset: Dataset): readonly Finding[] {
  const findings: Finding[] = [];
  checkListInString(dataset, findings);
  checkRepeatingGroups(dataset.columns, findings);
  return findings;
}

function checkListInString(dataset: Dataset, findings: Finding[]): void {
  for (const column of dataset.columns) {
    if (column.type !== 'string') {
      continue;
    }
    const sample: string[] = [];
    for (const row of dataset.rows) {
      const value = row[column.name];
      if (typeof value === 'string') {
        sample.push(value);
        if (sample.length === LIST_SAMPLE_SIZE) {
          break;
        }
      }
    }
    if (sample.length === 0) {
      continue;
    }

    const listLike = sample.filter((v) => LIST_DELIMITER_PATTERN.test(v)).length;
    if (listLike / sample.length > LIST_VALUE_RATIO) {
      findings.push({
        rule: 'NF1_LIST_IN_STRING_SUSPECTED',
        severity: 'warning',
        normalForm: '1NF',
        column: column.name,
        determinant: null,
        key: null,
        message: `Column "${column.name}" may contain delimited lists (${String(listLike)} of ${String(sample.length)} sampled values contain a delimiter).`,
        fix: `Split "${column.name}" into one row per value in a separate relation.`,
      });
    }
  }
}

function checkRepeatingGroups(columns: readonly Column[], findings: Finding[]): void {
  // Group columns by their base name (strip trailing digits)
  const groups = new Map<string, Column[]>();

  for (const column of columns) {
    const match = REPEATING_GROUP_PATTERN.exec(column.name);
    if (match?.[1] !== undefined) {
      const baseName = match[1];
      const existing = groups.get(baseName);
      if (existing !== undefined) {
        existing.push(column);
      } else {
        groups.set(baseName, [column]);
      }
    }
  }

  // Only flag groups with 2+ numbered columns of the same type
  for (const [baseName, group] of groups) {
    if (group.length >= 2) {
      const firstType = group[0]?.type;
      const allSameType = firstType !== undefined && group.every((c) => c.type === firstType);
      if (allSameType) {
        const columnNames = group.map((c) => c.name).join(', ');
        findings.push({
          rule: 'NF1_REPEATING_GROUP_SUSPECTED',
          severity: 'warning',
          normalForm: '1NF',
          column: null,
          determinant: null,
          key: null,
          message: `Columns [${columnNames}] appear to be a repeating group for "${baseName}".`,
          fix: `Move [${columnNames}] into a separate relation with one row per "${baseName}".`,
        });
      }
    }
  }
}
