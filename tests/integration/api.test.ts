import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import {
  analyze,
  applyDecisions,
  applyPlan,
  normalize,
  parseDependencyFile,
  parsePlan,
  readCsvFile,
  toJson,
} from '../../src/index.js';

const FIXTURES = resolve(import.meta.dirname, '../fixtures');
const students = readCsvFile(resolve(FIXTURES, 'csv/students.csv'));

describe('analyze → normalize → transform', () => {
  it('reports the transitive dependency and its fix', () => {
    const report = analyze(students, { noTimestamp: true });

    expect(report.metadata.timestamp).toBeNull();
    expect(report.assessment.normalForm).toBe('2NF');
    expect(report.assessment.violations['3NF'].map((f) => f.column)).toEqual(['dept_name']);
    expect(report.questions).toEqual([]);
  });

  it('normalizes with a reviewed dependency file', () => {
    const dependencies = parseDependencyFile(resolve(FIXTURES, 'dependencies/students.json'));
    const { cover, keys, plan, transform } = normalize(students, dependencies);

    expect(cover.map((fd) => [fd.determinant, fd.dependent])).toEqual([
      [['dept_id'], ['dept_name']],
      [['student_id'], ['dept_id']],
      [['student_id'], ['student_name']],
    ]);
    expect(keys).toEqual([['student_id']]);
    expect(plan.target).toBe('3NF');
    expect(plan.relations.map((r) => r.name)).toEqual(['depts', 'students']);
    expect(transform.tables.get('depts')?.rows).toEqual([
      { dept_id: 10, dept_name: 'Math' },
      { dept_id: 20, dept_name: 'Physics' },
      { dept_id: 30, dept_name: 'Physics' },
    ]);
    expect(transform.tables.get('students')?.rows).toHaveLength(7);
  });

  it('reaches the same relations with BCNF', () => {
    const detected = analyze(students).dependencies;
    const { plan } = normalize(students, detected, { target: 'BCNF' });

    expect(plan.target).toBe('BCNF');
    expect(plan.relations.map((r) => [r.name, r.attributes])).toEqual([
      ['depts', ['dept_id', 'dept_name']],
      ['students', ['dept_id', 'student_id', 'student_name']],
    ]);
    expect(plan.lostDependencies).toEqual([]);
  });

  it('ignores rejected dependencies', () => {
    const detected = analyze(students).dependencies;
    const decided = applyDecisions(detected, [{ determinant: ['dept_id'], dependent: ['dept_name'], action: 'reject' }]);
    const { plan } = normalize(students, decided);

    expect(plan.relations.map((r) => r.name)).toEqual(['students']);
  });

  it('re-applies a saved plan to new data', () => {
    const dependencies = parseDependencyFile(resolve(FIXTURES, 'dependencies/students.json'));
    const { plan } = normalize(students, dependencies, { rootName: 'enrollment' });
    const saved = parsePlan(JSON.parse(toJson(plan, true)));

    const newData = readCsvFile(resolve(FIXTURES, 'csv/students-no-dept-name.csv'));
    const result = applyPlan(saved, newData, { strict: false });

    expect(result.skipped).toEqual(['depts']);
    expect([...result.tables.keys()]).toEqual(['enrollment']);
  });
});
