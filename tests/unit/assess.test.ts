import { describe, it, expect } from 'vitest';
import { assessNormalForm } from '../../src/core/analysis/assess.js';
import { createDependency } from '../../src/core/analysis/dependency.js';
import { check1nf } from '../../src/core/analysis/normalizeChecks/check1nf.js';
import { datasetFromRecords } from '../../src/core/dataset/load.js';

describe('assessNormalForm', () => {
  it('reports a transitive dependency as 2NF', () => {
    const report = assessNormalForm(
      ['student_id', 'student_name', 'dept_id', 'dept_name'],
      [createDependency(['student_id'], ['student_name', 'dept_id']), createDependency(['dept_id'], ['dept_name'])],
      [],
    );

    expect(report.normalForm).toBe('2NF');
    expect(report.keys).toEqual([['student_id']]);
    expect(report.violations['2NF']).toEqual([]);
    expect(report.violations.BCNF).toEqual([]);
    expect(report.violations['3NF']).toHaveLength(1);
    expect(report.violations['3NF'][0]).toMatchObject({
      rule: 'NF3_TRANSITIVE_DEPENDENCY',
      severity: 'error',
      column: 'dept_name',
      determinant: ['dept_id'],
    });
    expect(report.warnings).toEqual([]);
  });

  it('reports a partial dependency as 1NF', () => {
    const report = assessNormalForm(
      ['order_id', 'product_id', 'product_name', 'quantity'],
      [
        createDependency(['order_id', 'product_id'], ['quantity']),
        createDependency(['product_id'], ['product_name']),
      ],
      [],
    );

    expect(report.normalForm).toBe('1NF');
    expect(report.keys).toEqual([['order_id', 'product_id']]);
    expect(report.violations['2NF']).toEqual([
      {
        rule: 'NF2_PARTIAL_DEPENDENCY',
        severity: 'error',
        normalForm: '2NF',
        column: 'product_name',
        determinant: ['product_id'],
        key: ['order_id', 'product_id'],
        message: 'FD {product_id} → {product_name}: "product_name" depends on part of the key {order_id, product_id}.',
        fix: 'Move "product_name" into a relation keyed by {product_id}.',
      },
    ]);
    // already reported as partial, so not repeated as transitive
    expect(report.violations['3NF']).toEqual([]);
  });

  it('reports a non-superkey determinant of a prime attribute as 3NF', () => {
    const report = assessNormalForm(
      ['student', 'course', 'instructor'],
      [createDependency(['student', 'course'], ['instructor']), createDependency(['instructor'], ['course'])],
      [],
    );

    expect(report.normalForm).toBe('3NF');
    expect(report.keys).toEqual([
      ['course', 'student'],
      ['instructor', 'student'],
    ]);
    expect(report.violations.BCNF).toHaveLength(1);
    expect(report.violations.BCNF[0]).toMatchObject({
      rule: 'BCNF_NON_SUPERKEY_DETERMINANT',
      severity: 'warning',
      column: 'course',
      determinant: ['instructor'],
    });
  });

  it('classifies a relation keyed by its only determinant as BCNF', () => {
    const report = assessNormalForm(['id', 'name'], [createDependency(['id'], ['name'])], []);
    expect(report.normalForm).toBe('BCNF');
    expect(report.violations).toEqual({ '2NF': [], '3NF': [], BCNF: [] });
  });

  it('falls back to the full row as key without dependencies', () => {
    const report = assessNormalForm(['b', 'a'], [], []);
    expect(report.normalForm).toBe('BCNF');
    expect(report.keys).toEqual([['a', 'b']]);
  });

  it('uses the given keys instead of inferring them', () => {
    const report = assessNormalForm(['a', 'b', 'c'], [createDependency(['a'], ['c'])], [['b', 'a']]);
    expect(report.keys).toEqual([['a', 'b']]);
    expect(report.normalForm).toBe('1NF');
  });

  it('ignores dependencies over unknown columns and reports them as warnings', () => {
    const report = assessNormalForm(
      ['a', 'b'],
      [createDependency(['a'], ['z']), createDependency(['a'], ['b'])],
      [],
    );
    expect(report.normalForm).toBe('BCNF');
    expect(report.keys).toEqual([['a']]);
    expect(report.warnings).toEqual([
      {
        rule: 'DEPENDENCY_IGNORED',
        severity: 'warning',
        normalForm: '1NF',
        column: null,
        determinant: ['a'],
        key: null,
        message: 'Ignored dependency {a} → {z}: unknown column(s) z',
        fix: 'Correct the dependency or remove it.',
      },
    ]);
  });

  it('returns a report when every dependency is unusable', () => {
    const report = assessNormalForm(['a', 'b'], [createDependency([], ['b']), createDependency(['a'], ['a'])], []);
    expect(report.normalForm).toBe('BCNF');
    expect(report.keys).toEqual([['a', 'b']]);
    expect(report.warnings.map((w) => w.message)).toEqual([
      'Ignored dependency {} → {b}: determinant is empty',
      'Ignored dependency {a} → {a}: determinant and dependent share a',
    ]);
  });

  it('attaches 1NF warnings when the dataset is given', () => {
    const dataset = datasetFromRecords([
      { id: 1, tags: 'a,b' },
      { id: 2, tags: 'c' },
    ]);
    const report = assessNormalForm(['id', 'tags'], [createDependency(['id'], ['tags'])], [], dataset);
    expect(report.normalForm).toBe('BCNF');
    expect(report.warnings.map((w) => w.rule)).toEqual(['NF1_LIST_IN_STRING_SUSPECTED']);
  });
});

describe('check1nf', () => {
  it('flags delimited lists and numbered column groups', () => {
    const dataset = datasetFromRecords([
      { id: 1, tags: 'a,b', phone1: '555-0101', phone2: '555-0102' },
      { id: 2, tags: 'c;d', phone1: '555-0103', phone2: null },
      { id: 3, tags: 'e', phone1: '555-0104', phone2: null },
    ]);

    expect(check1nf(dataset).map((f) => f.message)).toEqual([
      'Column "tags" may contain delimited lists (2 of 3 sampled values contain a delimiter).',
      'Columns [phone1, phone2] appear to be a repeating group for "phone".',
    ]);
  });

  it('ignores numbered columns of different types', () => {
    const dataset = datasetFromRecords([{ score1: 4, score2: 'high' }]);
    expect(check1nf(dataset)).toEqual([]);
  });
});
