import type { Column, Dataset, Row, ScalarValue } from './types.js';
import { compareRows, rowKey } from './values.js';

/**
 * Project a dataset onto `columns` (in that order), drop duplicate rows and
 * sort by `sortColumns` first, then by the remaining columns.
 */
export function projectDataset(
  dataset: Dataset,
  columns: readonly string[],
  sortColumns: readonly string[] = [],
): Dataset {
  const byName = new Map(dataset.columns.map((c) => [c.name, c]));
  const projectedColumns: Column[] = columns.map(
    (name) => byName.get(name) ?? { name, type: 'empty', nullable: true },
  );

  const rows = dedupeRows(
    dataset.rows.map((row) => {
      const projected: Record<string, ScalarValue> = {};
      for (const name of columns) {
        projected[name] = row[name] ?? null;
      }
      return projected;
    }),
    columns,
  );

  const order = [...sortColumns, ...columns.filter((c) => !sortColumns.includes(c))];
  rows.sort((a, b) => compareRows(a, b, order));

  return { columns: projectedColumns, rows };
}

/** Keep the first occurrence of each distinct row (compared on `columns`). */
export function dedupeRows(rows: readonly Row[], columns: readonly string[]): Row[] {
  const seen = new Set<string>();
  const result: Row[] = [];
  for (const row of rows) {
    const key = rowKey(row, columns);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(row);
    }
  }
  return result;
}
