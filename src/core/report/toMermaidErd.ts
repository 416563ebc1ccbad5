import type { Column } from '../dataset/types.js';
import type { DecompositionPlan } from '../decompose/plan.js';
import { outputColumns } from '../transform/applyPlan.js';

/**
 * Render the plan as a Mermaid entity-relationship diagram.
 * Attribute types are the inferred column types; unknown columns show as `string`.
 */
export function toMermaidErd(plan: DecompositionPlan, columns: readonly Column[] = []): string {
  const types = new Map(columns.map((c) => [c.name, c.type]));
  const lines = ['erDiagram'];

  for (const relation of plan.relations) {
    for (const fk of relation.foreignKeys) {
      lines.push(`    ${fk.parentRelation} ||--o{ ${relation.name} : "${fk.columns.join(', ')}"`);
    }
  }

  for (const relation of plan.relations) {
    const key = new Set(relation.primaryKey);
    const referencing = new Set(relation.foreignKeys.flatMap((fk) => fk.columns));
    lines.push(`    ${relation.name} {`);
    for (const name of outputColumns(plan, relation)) {
      const marks = [key.has(name) ? 'PK' : null, referencing.has(name) ? 'FK' : null].filter(
        (m): m is string => m !== null,
      );
      const suffix = marks.length > 0 ? ` ${marks.join(', ')}` : '';
      lines.push(`        ${types.get(name) ?? 'string'} ${name}${suffix}`);
    }
    lines.push('    }');
  }

  return `${lines.join('\n')}\n`;
}
