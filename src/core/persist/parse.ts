import { readFileSync } from 'node:fs';
import { toAttributeSet } from '../analysis/attributeSet.js';
import type { FunctionalDependency } from '../analysis/dependency.js';
import { createDependency } from '../analysis/dependency.js';
import type { DecompositionPlan } from '../decompose/plan.js';
import { dependencyFileSchema, planFileSchema } from './schema.js';
import type { DependencyEntry } from './schema.js';

/**
 * Parse and validate a dependency file.
 * Attribute sets come back canonical; throws the zod error on invalid input.
 */
export function parseDependencyFile(filePath: string): FunctionalDependency[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return parseDependencies(raw);
}

export function parseDependencies(raw: unknown): FunctionalDependency[] {
  return dependencyFileSchema.parse(raw).dependencies.map(toDependency);
}

/** Parse and validate a plan file written by `normalize`. */
export function parsePlanFile(filePath: string): DecompositionPlan {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  return parsePlan(raw);
}

export function parsePlan(raw: unknown): DecompositionPlan {
  const file = planFileSchema.parse(raw);
  return {
    version: file.version,
    target: file.target,
    sourceColumns: file.sourceColumns,
    relations: file.relations.map((relation) => ({
      name: relation.name,
      attributes: toAttributeSet(relation.attributes),
      primaryKey: toAttributeSet(relation.primaryKey),
      foreignKeys: relation.foreignKeys.map((fk) => ({
        columns: toAttributeSet(fk.columns),
        parentRelation: fk.parentRelation,
        parentKey: toAttributeSet(fk.parentKey),
      })),
      dependencies: relation.dependencies.map(toDependency),
      optional: relation.optional,
    })),
    lostDependencies: file.lostDependencies.map(toDependency),
  };
}

function toDependency(entry: DependencyEntry): FunctionalDependency {
  return createDependency(entry.determinant, entry.dependent, {
    confidence: entry.confidence,
    violationCount: entry.violationCount,
    status: entry.status,
    source: entry.source,
  });
}
