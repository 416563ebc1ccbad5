import type { FunctionalDependency } from '../analysis/dependency.js';
import type { DependencyEntry } from './schema.js';

/**
 * Build the dependency file for a list of dependencies.
 *
 * Entries waiting on a decision get a note saying how often the dependency
 * failed, so the reviewer can confirm or reject it in place.
 */
export function generateDependencyFile(fds: readonly FunctionalDependency[]): {
  dependencies: DependencyEntry[];
} {
  return {
    dependencies: fds.map((fd) => {
      const entry: DependencyEntry = {
        determinant: [...fd.determinant],
        dependent: [...fd.dependent],
        confidence: fd.confidence,
        violationCount: fd.violationCount,
        status: fd.status,
        source: fd.source,
      };
      return fd.status === 'needs_review' ? { ...entry, note: reviewNote(fd) } : entry;
    }),
  };
}

function reviewNote(fd: FunctionalDependency): string {
  const percent = (fd.confidence * 100).toFixed(2);
  return `Holds for ${percent}% of groups (${String(fd.violationCount)} violating). Set status to "confirmed" or "rejected".`;
}
