import { describe, it, expect } from 'vitest';
import { createDependency } from '../../src/core/analysis/dependency.js';
import { isLosslessSplit, verifyLosslessDecomposition } from '../../src/core/decompose/lossless.js';

describe('isLosslessSplit', () => {
  it('accepts a split whose shared columns determine one side', () => {
    const fds = [createDependency(['a'], ['b'])];
    expect(isLosslessSplit(['a', 'b'], ['a', 'c'], fds)).toBe(true);
  });

  it('rejects a split whose shared columns determine neither side', () => {
    const fds = [createDependency(['a'], ['b'])];
    expect(isLosslessSplit(['a', 'b'], ['b', 'c'], fds)).toBe(false);
  });

  it('rejects any proper split without dependencies', () => {
    expect(isLosslessSplit(['a', 'b'], ['b', 'c'], [])).toBe(false);
  });
});

describe('verifyLosslessDecomposition', () => {
  it('chases a three-way decomposition to a distinguished row', () => {
    const fds = [
      createDependency(['A'], ['B']),
      createDependency(['B'], ['C']),
      createDependency(['C'], ['D']),
    ];
    const relations = [
      ['A', 'B'],
      ['B', 'C'],
      ['C', 'D'],
    ];
    expect(verifyLosslessDecomposition(['A', 'B', 'C', 'D'], relations, fds)).toBe(true);
  });

  it('fails when the last link is not a dependency', () => {
    const fds = [createDependency(['A'], ['B']), createDependency(['B'], ['C'])];
    const relations = [
      ['A', 'B'],
      ['B', 'C'],
      ['C', 'D'],
    ];
    expect(verifyLosslessDecomposition(['A', 'B', 'C', 'D'], relations, fds)).toBe(false);
  });

  it('accepts a relation that holds every column', () => {
    expect(verifyLosslessDecomposition(['a', 'b'], [['a', 'b'], ['a']], [])).toBe(true);
  });

  it('handles the empty decomposition', () => {
    expect(verifyLosslessDecomposition([], [], [])).toBe(true);
    expect(verifyLosslessDecomposition(['a'], [], [])).toBe(false);
  });
});
