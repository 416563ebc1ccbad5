import type { ColumnProfile, ColumnType, Dataset, ScalarValue, SemanticType } from './types.js';
import { valueKey } from './values.js';

const ZIP_PATTERN = /^\d{5}(-\d{4})?$/;
const EMAIL_PATTERN = /^[\w.-]+@[\w.-]+\.\w+$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}/;

const SAMPLE_VALUE_COUNT = 5;
const PATTERN_SAMPLE_SIZE = 100;

/**
 * Per-column statistics: distinct counts, null and uniqueness ratios, and a
 * semantic type guess from the first values.
 */
export function profileColumns(dataset: Dataset): readonly ColumnProfile[] {
  const rowCount = dataset.rows.length;

  return dataset.columns.map((column) => {
    const present: ScalarValue[] = [];
    for (const row of dataset.rows) {
      const value = row[column.name] ?? null;
      if (value !== null) {
        present.push(value);
      }
    }

    const distinctCount = new Set(present.map(valueKey)).size;
    const nullRatio = rowCount === 0 ? 0 : (rowCount - present.length) / rowCount;
    const uniqueRatio = present.length === 0 ? 0 : distinctCount / present.length;

    return {
      name: column.name,
      type: column.type,
      nullable: column.nullable,
      semanticType: classify(column.type, present, uniqueRatio),
      distinctCount,
      nullRatio: round4(nullRatio),
      uniqueRatio: round4(uniqueRatio),
      sampleValues: present.slice(0, SAMPLE_VALUE_COUNT),
    };
  });
}

function classify(type: ColumnType, present: readonly ScalarValue[], uniqueRatio: number): SemanticType {
  if (present.length === 0) {
    return 'empty';
  }
  if (uniqueRatio === 1) {
    return 'unique_identifier';
  }
  if (type === 'integer' || type === 'number') {
    return 'numeric';
  }
  const sample = present.slice(0, PATTERN_SAMPLE_SIZE).map(String);
  if (sample.every((v) => ZIP_PATTERN.test(v))) {
    return 'zip_code';
  }
  if (sample.every((v) => EMAIL_PATTERN.test(v))) {
    return 'email';
  }
  if (sample.some((v) => DATE_PATTERN.test(v))) {
    return 'date';
  }
  return 'text';
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}
