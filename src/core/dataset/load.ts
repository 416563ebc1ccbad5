import { readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod/v4';
import type { Column, ColumnType, Dataset, Row, ScalarValue } from './types.js';

const INTEGER_PATTERN = /^[-+]?(0|[1-9]\d*)$/;
const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}/;

const csvRecordsSchema = z.array(z.array(z.string()));

/** Options for CSV parsing. */
export interface CsvOptions {
  readonly delimiter?: string | undefined;
}

/**
 * Parse CSV text with a header row into a typed Dataset.
 * Empty cells become null; each column gets the narrowest type all its values fit.
 */
export function parseCsv(text: string, options: CsvOptions = {}): Dataset {
  const records = csvRecordsSchema.parse(
    parse(text, {
      delimiter: options.delimiter ?? ',',
      skip_empty_lines: true,
      trim: true,
    }),
  );

  const [header, ...body] = records;
  if (header === undefined) {
    return { columns: [], rows: [] };
  }
  assertUniqueNames(header);

  const rawColumns = header.map((_, i) => body.map((record) => emptyToNull(record[i])));
  const types = rawColumns.map(inferTypeFromText);

  const columns: Column[] = header.map((name, i) => ({
    name,
    type: types[i] ?? 'string',
    nullable: (rawColumns[i] ?? []).some((v) => v === null),
  }));

  const rows: Row[] = body.map((record) => {
    const row: Record<string, ScalarValue> = {};
    header.forEach((name, i) => {
      row[name] = convertText(emptyToNull(record[i]), types[i] ?? 'string');
    });
    return row;
  });

  return { columns, rows };
}

/** Read and parse a CSV file. */
export function readCsvFile(filePath: string, options: CsvOptions = {}): Dataset {
  return parseCsv(readFileSync(filePath, 'utf-8'), options);
}

/**
 * Build a Dataset from already-typed row objects.
 * Column order follows `columnNames`, or the keys of the first record.
 */
export function datasetFromRecords(
  records: readonly Readonly<Record<string, ScalarValue | undefined>>[],
  columnNames?: readonly string[],
): Dataset {
  const names = columnNames ?? Object.keys(records[0] ?? {});
  assertUniqueNames(names);

  const rows: Row[] = records.map((record) => {
    const row: Record<string, ScalarValue> = {};
    for (const name of names) {
      row[name] = record[name] ?? null;
    }
    return row;
  });

  const columns: Column[] = names.map((name) => {
    const values = rows.map((row) => row[name] ?? null);
    return {
      name,
      type: inferTypeFromValues(values),
      nullable: values.some((v) => v === null),
    };
  });

  return { columns, rows };
}

function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new Error(`Duplicate column name "${name}"`);
    }
    seen.add(name);
  }
}

function emptyToNull(cell: string | undefined): string | null {
  return cell === undefined || cell === '' ? null : cell;
}

function inferTypeFromText(values: readonly (string | null)[]): ColumnType {
  const present = values.filter((v): v is string => v !== null);
  if (present.length === 0) {
    return 'empty';
  }
  if (present.every((v) => BOOLEAN_PATTERN.test(v))) {
    return 'boolean';
  }
  if (present.every((v) => INTEGER_PATTERN.test(v) && Number.isSafeInteger(Number(v)))) {
    return 'integer';
  }
  if (present.every((v) => NUMBER_PATTERN.test(v) && !/^[-+]?0\d/.test(v) && isExactNumber(v))) {
    return 'number';
  }
  if (present.every((v) => DATE_PATTERN.test(v))) {
    return 'date';
  }
  return 'string';
}

/** Integers beyond 2^53 and out-of-range values would not survive `Number()`; they stay text. */
function isExactNumber(value: string): boolean {
  const n = Number(value);
  return INTEGER_PATTERN.test(value) ? Number.isSafeInteger(n) : Number.isFinite(n);
}

function convertText(value: string | null, type: ColumnType): ScalarValue {
  if (value === null) {
    return null;
  }
  switch (type) {
    case 'boolean':
      return value.toLowerCase() === 'true';
    case 'integer':
    case 'number':
      return Number(value);
    default:
      return value;
  }
}

function inferTypeFromValues(values: readonly ScalarValue[]): ColumnType {
  const present = values.filter((v) => v !== null);
  if (present.length === 0) {
    return 'empty';
  }
  if (present.every((v) => typeof v === 'boolean')) {
    return 'boolean';
  }
  if (present.every((v) => typeof v === 'number' && Number.isInteger(v))) {
    return 'integer';
  }
  if (present.every((v) => typeof v === 'number')) {
    return 'number';
  }
  if (present.every((v) => typeof v === 'string' && DATE_PATTERN.test(v))) {
    return 'date';
  }
  return 'string';
}
