import type { Column, Dataset } from '../dataset/types.js';
import type { DecompositionPlan } from '../decompose/plan.js';
import { outputColumns } from '../transform/applyPlan.js';

const INT32_MAX = 2_147_483_647;
const DEFAULT_VARCHAR = 255;
const VARCHAR_HEADROOM = 50;

/**
 * Render the plan as SQL DDL: one CREATE TABLE per relation, then one
 * ALTER TABLE per foreign key so that tables may reference each other in
 * any order. Column types come from `dataset`.
 */
export function toSqlDdl(plan: DecompositionPlan, dataset: Dataset): string {
  const columnsByName = new Map(dataset.columns.map((c) => [c.name, c]));
  const statements: string[] = [];

  for (const relation of plan.relations) {
    const key = new Set(relation.primaryKey);
    const lines = outputColumns(plan, relation).map((name) => {
      const type = sqlType(columnsByName.get(name), dataset);
      return `    ${quote(name)} ${type}${key.has(name) ? ' NOT NULL' : ''}`;
    });
    lines.push(`    PRIMARY KEY (${relation.primaryKey.map(quote).join(', ')})`);
    statements.push(`CREATE TABLE ${quote(relation.name)} (\n${lines.join(',\n')}\n);`);
  }

  for (const relation of plan.relations) {
    for (const fk of relation.foreignKeys) {
      statements.push(
        `ALTER TABLE ${quote(relation.name)} ADD FOREIGN KEY (${fk.columns.map(quote).join(', ')}) ` +
          `REFERENCES ${quote(fk.parentRelation)} (${fk.parentKey.map(quote).join(', ')});`,
      );
    }
  }

  return `${statements.join('\n\n')}\n`;
}

/** Plain identifiers stay bare; anything else is double-quoted. */
export function quote(identifier: string): string {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(identifier)
    ? identifier
    : `"${identifier.replaceAll('"', '""')}"`;
}

function sqlType(column: Column | undefined, dataset: Dataset): string {
  if (column === undefined) {
    return `VARCHAR(${String(DEFAULT_VARCHAR)})`;
  }
  const values = dataset.rows.map((row) => row[column.name] ?? null);

  switch (column.type) {
    case 'integer':
      return values.some((v) => typeof v === 'number' && Math.abs(v) > INT32_MAX) ? 'BIGINT' : 'INTEGER';
    case 'number':
      return 'DECIMAL(18,6)';
    case 'boolean':
      return 'BOOLEAN';
    case 'date':
      return values.every((v) => v === null || String(v).length === 10) ? 'DATE' : 'TIMESTAMP';
    case 'string': {
      const longest = Math.max(0, ...values.map((v) => (v === null ? 0 : String(v).length)));
      return `VARCHAR(${String(longest + VARCHAR_HEADROOM)})`;
    }
    case 'empty':
      return `VARCHAR(${String(DEFAULT_VARCHAR)})`;
  }
}
