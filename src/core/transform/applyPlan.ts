import type { AttributeSet } from '../analysis/attributeSet.js';
import { formatAttributeSet } from '../analysis/attributeSet.js';
import { projectDataset } from '../dataset/project.js';
import type { Dataset, ScalarValue } from '../dataset/types.js';
import { hasNull, pickValues, rowKey } from '../dataset/values.js';
import type { DecompositionPlan, RelationSchema } from '../decompose/plan.js';
import type { OrphanReference } from '../errors.js';
import { OrphanForeignKeyError, SchemaMismatchError } from '../errors.js';

export interface ApplyOptions {
  /**
   * When false, relations marked optional are skipped if their columns are
   * missing, with a warning. Defaults to true.
   */
  readonly strict?: boolean | undefined;
}

/** Distinct rows that share one primary key value after projection. */
export interface KeyConflict {
  readonly relation: string;
  readonly primaryKey: AttributeSet;
  readonly value: readonly ScalarValue[];
  readonly rowCount: number;
}

export interface TransformResult {
  /** Output tables by relation name, in plan order. */
  readonly tables: ReadonlyMap<string, Dataset>;
  readonly skipped: readonly string[];
  readonly warnings: readonly string[];
  readonly keyConflicts: readonly KeyConflict[];
}

/**
 * Materialize `plan` over `dataset`.
 *
 * Each relation is projected, deduplicated and sorted by its primary key, with
 * key columns first and the rest in source order. Foreign keys are checked
 * across every produced table. Rows that disagree on a primary key are kept
 * and reported as key conflicts.
 *
 * @throws SchemaMismatchError when required columns are missing
 * @throws OrphanForeignKeyError when a child value has no parent row
 */
export function applyPlan(
  plan: DecompositionPlan,
  dataset: Dataset,
  options: ApplyOptions = {},
): TransformResult {
  const strict = options.strict ?? true;
  const present = new Set(dataset.columns.map((c) => c.name));
  const warnings: string[] = [];

  const blocked = plan.relations
    .map((relation) => ({
      relation,
      missing: relation.attributes.filter((a) => !present.has(a)),
    }))
    .filter((entry) => entry.missing.length > 0);

  if (blocked.length > 0) {
    const missingColumns = plan.sourceColumns.filter((c) => !present.has(c));
    if (strict || blocked.some((entry) => !entry.relation.optional)) {
      throw new SchemaMismatchError(
        missingColumns,
        blocked.map((entry) => entry.relation.name),
      );
    }
    for (const entry of blocked) {
      warnings.push(
        `Skipped relation "${entry.relation.name}": missing column(s) ${entry.missing.join(', ')}`,
      );
    }
  }

  const known = new Set(plan.sourceColumns);
  const extra = dataset.columns.map((c) => c.name).filter((name) => !known.has(name));
  if (extra.length > 0) {
    warnings.push(`Ignored column(s) not in the plan: ${extra.join(', ')}`);
  }

  const skipped = new Set(blocked.map((entry) => entry.relation.name));
  const tables = new Map<string, Dataset>();
  const keyConflicts: KeyConflict[] = [];

  for (const relation of plan.relations) {
    if (skipped.has(relation.name)) {
      continue;
    }
    const table = projectDataset(dataset, outputColumns(plan, relation), relation.primaryKey);
    tables.set(relation.name, table);
    keyConflicts.push(...findKeyConflicts(relation, table));

    for (const fk of relation.foreignKeys) {
      if (skipped.has(fk.parentRelation)) {
        warnings.push(
          `Foreign key ${relation.name}${formatAttributeSet(fk.columns)} -> ${fk.parentRelation} not checked: parent relation was skipped`,
        );
      }
    }
  }

  validateForeignKeys(plan, tables);

  return { tables, skipped: [...skipped], warnings, keyConflicts };
}

/** Primary key columns first, then the remaining attributes in source order. */
export function outputColumns(plan: DecompositionPlan, relation: RelationSchema): string[] {
  const key = new Set(relation.primaryKey);
  const members = new Set(relation.attributes);
  return [
    ...relation.primaryKey,
    ...plan.sourceColumns.filter((c) => members.has(c) && !key.has(c)),
  ];
}

/**
 * Every child value with no matching parent key, for relations present in
 * `tables`. Child rows with a null in the foreign key columns are not orphans.
 */
export function findOrphans(
  plan: DecompositionPlan,
  tables: ReadonlyMap<string, Dataset>,
): OrphanReference[] {
  const orphans: OrphanReference[] = [];

  for (const relation of plan.relations) {
    const child = tables.get(relation.name);
    if (child === undefined) {
      continue;
    }
    for (const fk of relation.foreignKeys) {
      const parent = tables.get(fk.parentRelation);
      if (parent === undefined) {
        continue;
      }
      const parentKeys = new Set(parent.rows.map((row) => rowKey(row, fk.parentKey)));
      const seen = new Set<string>();
      const values: ScalarValue[][] = [];
      for (const row of child.rows) {
        if (hasNull(row, fk.columns)) {
          continue;
        }
        const key = rowKey(row, fk.columns);
        if (!parentKeys.has(key) && !seen.has(key)) {
          seen.add(key);
          values.push(pickValues(row, fk.columns));
        }
      }
      if (values.length > 0) {
        orphans.push({
          relation: relation.name,
          columns: fk.columns,
          parentRelation: fk.parentRelation,
          parentKey: fk.parentKey,
          values,
        });
      }
    }
  }

  return orphans;
}

/** @throws OrphanForeignKeyError listing every orphan value */
export function validateForeignKeys(
  plan: DecompositionPlan,
  tables: ReadonlyMap<string, Dataset>,
): void {
  const orphans = findOrphans(plan, tables);
  if (orphans.length > 0) {
    throw new OrphanForeignKeyError(orphans);
  }
}

function findKeyConflicts(relation: RelationSchema, table: Dataset): KeyConflict[] {
  const counts = new Map<string, { value: ScalarValue[]; rowCount: number }>();
  for (const row of table.rows) {
    if (hasNull(row, relation.primaryKey)) {
      continue;
    }
    const key = rowKey(row, relation.primaryKey);
    const entry = counts.get(key);
    if (entry === undefined) {
      counts.set(key, { value: pickValues(row, relation.primaryKey), rowCount: 1 });
    } else {
      entry.rowCount += 1;
    }
  }

  return [...counts.values()]
    .filter((entry) => entry.rowCount > 1)
    .map((entry) => ({
      relation: relation.name,
      primaryKey: relation.primaryKey,
      value: entry.value,
      rowCount: entry.rowCount,
    }));
}
