import type { AttributeSet } from '../analysis/attributeSet.js';
import { intersection, isSubset, sameAttributes, toAttributeSet } from '../analysis/attributeSet.js';
import { attributeClosure, isSuperkey } from '../analysis/closure.js';
import type { FunctionalDependency } from '../analysis/dependency.js';

/** Normal form a plan targets. */
export type TargetForm = '3NF' | 'BCNF';

/** A reference from a relation's columns to another relation's primary key. */
export interface ForeignKey {
  readonly columns: AttributeSet;
  readonly parentRelation: string;
  readonly parentKey: AttributeSet;
}

/** One output relation of a decomposition. */
export interface RelationSchema {
  readonly name: string;
  readonly attributes: AttributeSet;
  readonly primaryKey: AttributeSet;
  readonly foreignKeys: readonly ForeignKey[];
  /** Dependencies this relation expresses. */
  readonly dependencies: readonly FunctionalDependency[];
  /** Non-strict transforms may skip an optional relation whose columns are missing. */
  readonly optional: boolean;
}

/** The result of a normalization run; reused unchanged by later transforms. */
export interface DecompositionPlan {
  readonly version: 1;
  readonly target: TargetForm;
  /** Original columns, in dataset order. */
  readonly sourceColumns: readonly string[];
  readonly relations: readonly RelationSchema[];
  /** Cover dependencies no single relation can enforce. Always empty for 3NF. */
  readonly lostDependencies: readonly FunctionalDependency[];
}

/** Naming options for plan assembly. */
export interface PlanOptions {
  /** Name for the relation that holds a key of the whole dataset. */
  readonly rootName?: string | undefined;
}

/** A relation before it is named and linked. */
export interface RelationDraft {
  readonly attributes: AttributeSet;
  readonly primaryKey: AttributeSet;
  readonly dependencies: readonly FunctionalDependency[];
}

/**
 * Name the drafts, link them with foreign keys, and mark every relation but
 * the root (the first one whose attributes are a superkey of the source) as
 * optional.
 */
export function assemblePlan(
  target: TargetForm,
  sourceColumns: readonly string[],
  drafts: readonly RelationDraft[],
  cover: readonly FunctionalDependency[],
  options: PlanOptions = {},
): DecompositionPlan {
  const rootIndex = drafts.findIndex((d) => isSuperkey(d.attributes, sourceColumns, cover));
  const names = nameRelations(drafts, rootIndex, options.rootName);

  const relations: RelationSchema[] = drafts.map((draft, i) => ({
    name: names[i] ?? `relation_${String(i + 1)}`,
    attributes: draft.attributes,
    primaryKey: draft.primaryKey,
    foreignKeys: [],
    dependencies: draft.dependencies,
    optional: rootIndex !== -1 && i !== rootIndex,
  }));

  return {
    version: 1,
    target,
    sourceColumns: [...sourceColumns],
    relations: linkForeignKeys(relations),
    lostDependencies: findLostDependencies(
      cover,
      drafts.map((d) => d.attributes),
    ),
  };
}

/**
 * A relation references every other relation whose primary key it contains,
 * unless the two share the same primary key.
 */
export function linkForeignKeys(relations: readonly RelationSchema[]): RelationSchema[] {
  return relations.map((child) => {
    const foreignKeys: ForeignKey[] = [];
    for (const parent of relations) {
      if (parent === child || sameAttributes(parent.primaryKey, child.primaryKey)) {
        continue;
      }
      if (isSubset(parent.primaryKey, child.attributes)) {
        foreignKeys.push({
          columns: parent.primaryKey,
          parentRelation: parent.name,
          parentKey: parent.primaryKey,
        });
      }
    }
    return { ...child, foreignKeys };
  });
}

/**
 * Dependency-preservation test per dependency: grow the determinant through
 * each relation's projected closure until nothing changes.
 */
export function findLostDependencies(
  fds: readonly FunctionalDependency[],
  relations: readonly AttributeSet[],
): FunctionalDependency[] {
  return fds.filter((fd) => {
    const reached = new Set(fd.determinant);
    let changed = true;
    while (changed) {
      changed = false;
      for (const relation of relations) {
        const local = intersection(relation, toAttributeSet(reached));
        const closure = attributeClosure(local, fds);
        for (const attr of relation) {
          if (closure.has(attr) && !reached.has(attr)) {
            reached.add(attr);
            changed = true;
          }
        }
      }
    }
    return !fd.dependent.every((attr) => reached.has(attr));
  });
}

/**
 * Drop drafts whose attributes are contained in another draft's. Of two
 * identical drafts the earlier one stays.
 */
export function dropSubsumed(drafts: readonly RelationDraft[]): RelationDraft[] {
  return drafts.filter(
    (draft, i) =>
      !drafts.some(
        (other, j) =>
          j !== i &&
          isSubset(draft.attributes, other.attributes) &&
          (other.attributes.length > draft.attributes.length || j < i),
      ),
  );
}

/** Relation name from its key: `customer_id` → `customers`; composite keys join with `_`. */
export function relationName(primaryKey: AttributeSet): string {
  if (primaryKey.length === 1 && primaryKey[0] !== undefined) {
    const column = primaryKey[0];
    const stem = column.replace(/(?:[_-][iI][dD]|Id|ID)$/, '');
    return pluralize(stem.length > 0 ? stem : column);
  }
  return primaryKey.join('_');
}

function pluralize(word: string): string {
  if (/[^aeiou]y$/i.test(word)) {
    return `${word.slice(0, -1)}ies`;
  }
  if (/(?:s|x|z|ch|sh)$/i.test(word)) {
    return `${word}es`;
  }
  return `${word}s`;
}

function nameRelations(
  drafts: readonly RelationDraft[],
  rootIndex: number,
  rootName: string | undefined,
): string[] {
  const used = new Map<string, number>();
  const claim = (base: string): string => {
    const count = (used.get(base) ?? 0) + 1;
    used.set(base, count);
    return count === 1 ? base : `${base}_${String(count)}`;
  };

  const names = new Array<string>(drafts.length);
  if (rootName !== undefined && rootIndex !== -1) {
    names[rootIndex] = claim(rootName);
  }
  drafts.forEach((draft, i) => {
    if (names[i] === undefined) {
      names[i] = claim(relationName(draft.primaryKey));
    }
  });
  return names;
}
