import { describe, it, expect } from 'vitest';
import {
  applyDecisions,
  createDependency,
  formatDependency,
  keyDependency,
  mentionedAttributes,
  rejectDependency,
  selectConfirmed,
  sortDependencies,
  splitDependents,
  validateDependencySet,
} from '../../src/core/analysis/dependency.js';
import { InvalidDependencySetError } from '../../src/core/errors.js';

describe('createDependency', () => {
  it('canonicalizes both sides and defaults to a declared, confirmed dependency', () => {
    expect(createDependency(['b', 'a'], ['c'])).toEqual({
      determinant: ['a', 'b'],
      dependent: ['c'],
      confidence: 1,
      violationCount: 0,
      status: 'confirmed',
      source: 'declared',
    });
  });
});

describe('keyDependency', () => {
  it('maps a key to every other attribute in one dependency', () => {
    expect(keyDependency(['id'], ['name', 'id', 'email'])).toEqual({
      determinant: ['id'],
      dependent: ['email', 'name'],
      confidence: 1,
      violationCount: 0,
      status: 'auto_confirmed',
      source: 'unique',
    });
  });
});

describe('status transitions', () => {
  const xy = createDependency(['x'], ['y'], { status: 'needs_review', confidence: 0.97, violationCount: 3 });
  const yz = createDependency(['y'], ['z'], { status: 'needs_review', confidence: 0.96, violationCount: 4 });

  it('applies decisions by canonical sides and ignores unmatched ones', () => {
    const decided = applyDecisions(
      [xy, yz],
      [
        { determinant: ['x'], dependent: ['y'], action: 'confirm' },
        { determinant: ['q'], dependent: ['y'], action: 'reject' },
      ],
    );
    expect(decided[0]?.status).toBe('confirmed');
    expect(decided[0]?.confidence).toBe(0.97);
    expect(decided[1]).toBe(yz);
  });

  it('never mutates its input', () => {
    applyDecisions([xy], [{ determinant: ['x'], dependent: ['y'], action: 'reject' }]);
    expect(xy.status).toBe('needs_review');
  });

  it('selects only confirmed and auto-confirmed dependencies', () => {
    const auto = createDependency(['a'], ['b'], { status: 'auto_confirmed' });
    const declared = createDependency(['b'], ['c']);
    expect(selectConfirmed([auto, xy, declared, rejectDependency(yz)])).toEqual([auto, declared]);
  });
});

describe('splitDependents', () => {
  it('rewrites to single dependents and drops duplicates', () => {
    const split = splitDependents([createDependency(['a'], ['b', 'c']), createDependency(['a'], ['b'])]);
    expect(split.map(formatDependency)).toEqual(['{a} → {b}', '{a} → {c}']);
  });
});

describe('sortDependencies', () => {
  it('orders by determinant, then dependent', () => {
    const sorted = sortDependencies([
      createDependency(['b'], ['a']),
      createDependency(['a', 'b'], ['c']),
      createDependency(['a'], ['d']),
      createDependency(['a'], ['c']),
    ]);
    expect(sorted.map(formatDependency)).toEqual([
      '{a} → {c}',
      '{a} → {d}',
      '{a, b} → {c}',
      '{b} → {a}',
    ]);
  });
});

describe('validateDependencySet', () => {
  it('accepts a valid set', () => {
    expect(() => validateDependencySet(['a', 'b'], [createDependency(['a'], ['b'])])).not.toThrow();
  });

  it('reports every problem at once', () => {
    let caught: unknown;
    try {
      validateDependencySet(
        ['a', 'b'],
        [createDependency(['a'], ['z']), createDependency(['a'], ['a', 'b']), createDependency([], ['a'])],
      );
    } catch (error: unknown) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidDependencySetError);
    if (caught instanceof InvalidDependencySetError) {
      expect(caught.kind).toBe('INVALID_DEPENDENCY_SET');
      expect(caught.problems).toEqual([
        '{a} → {z}: unknown column(s) z',
        '{a} → {a, b}: determinant and dependent share a',
        '{} → {a}: determinant is empty',
      ]);
    }
  });
});

describe('mentionedAttributes', () => {
  it('collects both sides', () => {
    expect(mentionedAttributes([createDependency(['b'], ['a']), createDependency(['c'], ['a'])])).toEqual([
      'a',
      'b',
      'c',
    ]);
  });
});
