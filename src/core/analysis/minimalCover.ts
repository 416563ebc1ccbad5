import { attributeClosure } from './closure.js';
import type { FunctionalDependency } from './dependency.js';
import { dependencyKey, sortDependencies, splitDependents, validateDependencySet, mentionedAttributes } from './dependency.js';

/**
 * Reduce a dependency set to an equivalent minimal cover.
 *
 * The three steps must run in this order:
 * 1. split every dependent into single attributes;
 * 2. left-reduce: drop a determinant attribute when the smaller determinant
 *    still reaches the dependent under the current set;
 * 3. drop every dependency its determinant reaches without it.
 *
 * Input dependencies are not modified. Output is sorted by determinant,
 * then dependent, and each entry keeps the confidence and status of the
 * dependency it came from.
 */
export function computeMinimalCover(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  validateDependencySet(mentionedAttributes(fds), fds);

  const cover = sortDependencies(splitDependents(fds));

  for (let i = 0; i < cover.length; i++) {
    const fd = cover[i];
    if (fd === undefined || fd.determinant.length < 2) {
      continue;
    }
    let determinant = fd.determinant;
    for (const attr of fd.determinant) {
      if (determinant.length < 2) {
        break;
      }
      const reduced = determinant.filter((a) => a !== attr);
      if (fd.dependent.every((dep) => attributeClosure(reduced, cover).has(dep))) {
        determinant = reduced;
        cover[i] = { ...fd, determinant };
      }
    }
  }

  const reduced = dedupe(cover);

  const result = [...reduced];
  for (const fd of reduced) {
    const others = result.filter((other) => other !== fd);
    if (fd.dependent.every((dep) => attributeClosure(fd.determinant, others).has(dep))) {
      result.splice(result.indexOf(fd), 1);
    }
  }

  return sortDependencies(result);
}

function dedupe(fds: readonly FunctionalDependency[]): FunctionalDependency[] {
  const seen = new Set<string>();
  return fds.filter((fd) => {
    const key = dependencyKey(fd);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
