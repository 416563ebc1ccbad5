import { formatDependency } from '../analysis/dependency.js';
import type { DecompositionPlan } from '../decompose/plan.js';
import { outputColumns } from '../transform/applyPlan.js';

/**
 * Describe a normalize output directory in Markdown: the tables, how they
 * reference each other and how to apply the plan to new data.
 */
export function toReadme(plan: DecompositionPlan, source: string): string {
  const tables = plan.relations.map(
    (r) => `- \`${r.name}.csv\`: ${outputColumns(plan, r).join(', ')} (primary key: ${r.primaryKey.join(', ')})`,
  );
  const relationships = plan.relations.flatMap((r) =>
    r.foreignKeys.map(
      (fk) => `- \`${r.name}(${fk.columns.join(', ')})\` → \`${fk.parentRelation}(${fk.parentKey.join(', ')})\``,
    ),
  );

  const lines = [
    '# Normalized schema',
    '',
    '## Source',
    '',
    `- Original file: \`${source}\``,
    `- Target normal form: ${plan.target}`,
    '',
    '## Tables',
    '',
    ...tables,
    '',
    '## Relationships',
    '',
    ...(relationships.length > 0 ? relationships : ['None']),
    '',
  ];

  if (plan.lostDependencies.length > 0) {
    lines.push(
      '## Dependencies not enforced by a single table',
      '',
      ...plan.lostDependencies.map((fd) => `- ${formatDependency(fd)}`),
      '',
    );
  }

  lines.push(
    '## Files',
    '',
    '- `tables/`: one CSV file per table',
    '- `schema.sql`: SQL DDL',
    '- `erd.md`: entity-relationship diagram (Mermaid)',
    '- `plan.json`: the decomposition plan',
    '',
    '## Re-running the transform',
    '',
    '```sh',
    'schema-normalizer transform new_data.csv --plan plan.json --out-dir ./output',
    '```',
    '',
  );

  return lines.join('\n');
}
