import { describe, it, expect } from 'vitest';
import { attributeClosure } from '../../src/core/analysis/closure.js';
import { createDependency, formatDependency } from '../../src/core/analysis/dependency.js';
import { computeMinimalCover } from '../../src/core/analysis/minimalCover.js';

describe('computeMinimalCover', () => {
  it('leaves an already minimal set unchanged', () => {
    const fds = [
      createDependency(['dept_id'], ['dept_name']),
      createDependency(['student_id'], ['dept_id']),
      createDependency(['student_id'], ['student_name']),
    ];
    expect(computeMinimalCover(fds)).toEqual(fds);
  });

  it('splits dependents and drops transitively implied dependencies', () => {
    const cover = computeMinimalCover([createDependency(['A'], ['B', 'C']), createDependency(['B'], ['C'])]);
    expect(cover.map(formatDependency)).toEqual(['{A} → {B}', '{B} → {C}']);
  });

  it('removes extraneous determinant attributes', () => {
    const cover = computeMinimalCover([createDependency(['A', 'B'], ['C']), createDependency(['A'], ['B'])]);
    expect(cover.map(formatDependency)).toEqual(['{A} → {B}', '{A} → {C}']);
  });

  it('drops duplicates', () => {
    const cover = computeMinimalCover([createDependency(['a'], ['b']), createDependency(['a'], ['b'])]);
    expect(cover.map(formatDependency)).toEqual(['{a} → {b}']);
  });

  it('keeps the metadata of the dependency each entry came from', () => {
    const cover = computeMinimalCover([
      createDependency(['A', 'B'], ['C'], { confidence: 0.97, violationCount: 2, source: 'detected' }),
      createDependency(['A'], ['B']),
    ]);
    expect(cover[1]).toEqual({
      determinant: ['A'],
      dependent: ['C'],
      confidence: 0.97,
      violationCount: 2,
      status: 'confirmed',
      source: 'detected',
    });
  });

  it('does not modify its input', () => {
    const fds = [createDependency(['A', 'B'], ['C']), createDependency(['A'], ['B'])];
    computeMinimalCover(fds);
    expect(fds[0]?.determinant).toEqual(['A', 'B']);
    expect(fds).toHaveLength(2);
  });

  it('gives the same closures as the input', () => {
    const fds = [
      createDependency(['a'], ['b', 'c']),
      createDependency(['b'], ['c']),
      createDependency(['a', 'd'], ['e']),
      createDependency(['c', 'd'], ['e']),
    ];
    const cover = computeMinimalCover(fds);
    for (const start of [['a'], ['b'], ['a', 'd'], ['b', 'd'], ['c']]) {
      expect([...attributeClosure(start, cover)].sort()).toEqual([...attributeClosure(start, fds)].sort());
    }
  });

  it('returns an empty cover for no dependencies', () => {
    expect(computeMinimalCover([])).toEqual([]);
  });
});
