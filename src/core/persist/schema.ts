import { z } from 'zod/v4';

const attributeListSchema = z.array(z.string().min(1)).min(1);

/**
 * Zod schema for one functional dependency entry.
 * Only the two sides are required; a hand-written entry is a declared,
 * confirmed dependency.
 */
export const dependencySchema = z.object({
  determinant: attributeListSchema,
  dependent: attributeListSchema,
  confidence: z.number().min(0).max(1).default(1),
  violationCount: z.number().int().min(0).default(0),
  status: z.enum(['auto_confirmed', 'needs_review', 'confirmed', 'rejected']).default('confirmed'),
  source: z.enum(['detected', 'unique', 'declared']).default('declared'),
  note: z.string().optional(),
});

/**
 * Zod schema for the dependency file written by `analyze` and edited by the
 * user before `normalize`.
 */
export const dependencyFileSchema = z.object({
  dependencies: z.array(dependencySchema),
});

const foreignKeySchema = z.object({
  columns: attributeListSchema,
  parentRelation: z.string().min(1),
  parentKey: attributeListSchema,
});

const relationSchema = z.object({
  name: z.string().min(1),
  attributes: attributeListSchema,
  primaryKey: attributeListSchema,
  foreignKeys: z.array(foreignKeySchema).default([]),
  dependencies: z.array(dependencySchema).default([]),
  optional: z.boolean().default(false),
});

/**
 * Zod schema for a persisted decomposition plan.
 */
export const planFileSchema = z
  .object({
    version: z.literal(1),
    target: z.enum(['3NF', 'BCNF']),
    sourceColumns: z.array(z.string().min(1)).min(1),
    relations: z.array(relationSchema).min(1),
    lostDependencies: z.array(dependencySchema).default([]),
  })
  .refine(
    (plan) => new Set(plan.relations.map((r) => r.name)).size === plan.relations.length,
    { message: 'Relation names must be unique' },
  )
  .refine(
    (plan) => {
      const columns = new Set(plan.sourceColumns);
      return plan.relations.every((r) => r.attributes.every((a) => columns.has(a)));
    },
    { message: 'Relations may only use source columns' },
  )
  .refine(
    (plan) => plan.relations.every((r) => r.primaryKey.every((a) => r.attributes.includes(a))),
    { message: 'Primary key columns must belong to their relation' },
  )
  .refine(
    (plan) => {
      const names = new Set(plan.relations.map((r) => r.name));
      return plan.relations.every((r) => r.foreignKeys.every((fk) => names.has(fk.parentRelation)));
    },
    { message: 'Foreign keys must reference a relation of the plan' },
  );

/** Parsed type for a dependency entry. */
export type DependencyEntry = z.infer<typeof dependencySchema>;

/** Parsed type for the dependency file. */
export type DependencyFile = z.infer<typeof dependencyFileSchema>;

/** Parsed type for the plan file. */
export type PlanFile = z.infer<typeof planFileSchema>;
