import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ZodError } from 'zod/v4';
import { createDependency } from '../../src/core/analysis/dependency.js';
import { synthesize3nf } from '../../src/core/decompose/synthesize3nf.js';
import { generateDependencyFile } from '../../src/core/persist/generate.js';
import { parseDependencies, parseDependencyFile, parsePlan, parsePlanFile } from '../../src/core/persist/parse.js';
import { toJson } from '../../src/core/report/toJson.js';

const FIXTURES = resolve(import.meta.dirname, '../fixtures');

describe('parseDependencies', () => {
  it('fills in a declared, confirmed dependency from the two sides alone', () => {
    expect(parseDependencies({ dependencies: [{ determinant: ['b', 'a'], dependent: ['c'] }] })).toEqual([
      {
        determinant: ['a', 'b'],
        dependent: ['c'],
        confidence: 1,
        violationCount: 0,
        status: 'confirmed',
        source: 'declared',
      },
    ]);
  });

  it('rejects an unknown status', () => {
    expect(() => parseDependencyFile(resolve(FIXTURES, 'dependencies/invalid-status.json'))).toThrow(ZodError);
  });

  it('rejects an empty side', () => {
    expect(() => parseDependencies({ dependencies: [{ determinant: [], dependent: ['a'] }] })).toThrow(ZodError);
  });

  it('reads a hand-written file', () => {
    const fds = parseDependencyFile(resolve(FIXTURES, 'dependencies/students.json'));
    expect(fds.map((fd) => [fd.determinant, fd.dependent])).toEqual([
      [['student_id'], ['dept_id', 'student_name']],
      [['dept_id'], ['dept_name']],
    ]);
  });
});

describe('generateDependencyFile', () => {
  it('adds a review note to needs_review entries only', () => {
    const file = generateDependencyFile([
      createDependency(['zip'], ['city'], {
        confidence: 0.96875,
        violationCount: 1,
        status: 'needs_review',
        source: 'detected',
      }),
      createDependency(['id'], ['zip'], { status: 'auto_confirmed', source: 'unique' }),
    ]);

    expect(file.dependencies[0]?.note).toBe(
      'Holds for 96.88% of groups (1 violating). Set status to "confirmed" or "rejected".',
    );
    expect(file.dependencies[1]).toEqual({
      determinant: ['id'],
      dependent: ['zip'],
      confidence: 1,
      violationCount: 0,
      status: 'auto_confirmed',
      source: 'unique',
    });
  });

  it('reads back to the same dependencies', () => {
    const fds = [
      createDependency(['a'], ['b', 'c'], { confidence: 0.97, violationCount: 3, status: 'needs_review', source: 'detected' }),
      createDependency(['c'], ['d']),
    ];
    const written: unknown = JSON.parse(toJson(generateDependencyFile(fds), true));
    expect(parseDependencies(written)).toEqual(fds);
  });
});

describe('parsePlan', () => {
  it('reads back a written plan', () => {
    const plan = synthesize3nf(
      [createDependency(['dept_id'], ['dept_name']), createDependency(['student_id'], ['dept_id'])],
      [],
      ['student_id', 'dept_id', 'dept_name'],
    );
    const written: unknown = JSON.parse(toJson(plan, false));
    expect(parsePlan(written)).toEqual(plan);
  });

  it('fills defaults in a hand-written plan', () => {
    const plan = parsePlanFile(resolve(FIXTURES, 'plans/students.json'));
    expect(plan.lostDependencies).toEqual([]);
    expect(plan.relations.map((r) => [r.name, r.attributes, r.optional])).toEqual([
      ['depts', ['dept_id', 'dept_name'], true],
      ['students', ['dept_id', 'student_id', 'student_name'], false],
    ]);
    expect(plan.relations[0]?.foreignKeys).toEqual([]);
  });

  it('rejects a foreign key to a relation the plan lacks', () => {
    const raw = {
      version: 1,
      target: 'BCNF',
      sourceColumns: ['a', 'b'],
      relations: [
        {
          name: 'items',
          attributes: ['a', 'b'],
          primaryKey: ['a'],
          foreignKeys: [{ columns: ['b'], parentRelation: 'missing', parentKey: ['b'] }],
        },
      ],
    };
    expect(() => parsePlan(raw)).toThrow('Foreign keys must reference a relation of the plan');
  });

  it('rejects a primary key outside its relation', () => {
    const raw = {
      version: 1,
      target: '3NF',
      sourceColumns: ['a', 'b'],
      relations: [{ name: 'items', attributes: ['a'], primaryKey: ['b'] }],
    };
    expect(() => parsePlan(raw)).toThrow(ZodError);
  });

  it('rejects an unsupported version', () => {
    const raw = { version: 2, target: '3NF', sourceColumns: ['a'], relations: [{ name: 'x', attributes: ['a'], primaryKey: ['a'] }] };
    expect(() => parsePlan(raw)).toThrow(ZodError);
  });
});
