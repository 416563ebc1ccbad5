import { describe, it, expect } from 'vitest';
import { createDependency } from '../../src/core/analysis/dependency.js';
import type { RelationDraft, RelationSchema } from '../../src/core/decompose/plan.js';
import {
  assemblePlan,
  dropSubsumed,
  findLostDependencies,
  linkForeignKeys,
  relationName,
} from '../../src/core/decompose/plan.js';

const STUDENT_COVER = [
  createDependency(['dept_id'], ['dept_name']),
  createDependency(['student_id'], ['dept_id']),
  createDependency(['student_id'], ['student_name']),
];

function relation(name: string, attributes: string[], primaryKey: string[]): RelationSchema {
  return { name, attributes, primaryKey, foreignKeys: [], dependencies: [], optional: false };
}

function draft(attributes: string[], primaryKey: string[] = attributes): RelationDraft {
  return { attributes, primaryKey, dependencies: [] };
}

describe('relationName', () => {
  it.each([
    [['customer_id'], 'customers'],
    [['category_id'], 'categories'],
    [['box_id'], 'boxes'],
    [['address_id'], 'addresses'],
    [['cityId'], 'cities'],
    [['day'], 'days'],
    [['id'], 'ids'],
    [['ID'], 'IDs'],
    [['order_id', 'product_id'], 'order_id_product_id'],
  ])('names key %j as %s', (key, expected) => {
    expect(relationName(key)).toBe(expected);
  });
});

describe('linkForeignKeys', () => {
  it('references every relation whose key the child holds', () => {
    const linked = linkForeignKeys([
      relation('depts', ['dept_id', 'dept_name'], ['dept_id']),
      relation('students', ['dept_id', 'student_id', 'student_name'], ['student_id']),
    ]);

    expect(linked[0]?.foreignKeys).toEqual([]);
    expect(linked[1]?.foreignKeys).toEqual([
      { columns: ['dept_id'], parentRelation: 'depts', parentKey: ['dept_id'] },
    ]);
  });

  it('does not link relations with the same key', () => {
    const linked = linkForeignKeys([
      relation('codes', ['code', 'label'], ['code']),
      relation('codes_2', ['code', 'weight'], ['code']),
    ]);
    expect(linked.flatMap((r) => r.foreignKeys)).toEqual([]);
  });
});

describe('findLostDependencies', () => {
  it('reports a dependency split across relations', () => {
    const toInstructor = createDependency(['course', 'student'], ['instructor']);
    const toCourse = createDependency(['instructor'], ['course']);
    const lost = findLostDependencies(
      [toInstructor, toCourse],
      [
        ['course', 'instructor'],
        ['instructor', 'student'],
      ],
    );
    expect(lost).toEqual([toInstructor]);
  });

  it('follows dependencies through several relations', () => {
    const fds = [createDependency(['a'], ['b']), createDependency(['b'], ['c']), createDependency(['a'], ['c'])];
    expect(findLostDependencies(fds, [['a', 'b'], ['b', 'c']])).toEqual([]);
  });
});

describe('dropSubsumed', () => {
  it('drops contained drafts and later duplicates', () => {
    const kept = dropSubsumed([draft(['a', 'b'], ['a']), draft(['a']), draft(['a', 'b'], ['b']), draft(['c'])]);
    expect(kept).toEqual([draft(['a', 'b'], ['a']), draft(['c'])]);
  });
});

describe('assemblePlan', () => {
  const drafts: RelationDraft[] = [
    { attributes: ['dept_id', 'dept_name'], primaryKey: ['dept_id'], dependencies: [] },
    { attributes: ['dept_id', 'student_id', 'student_name'], primaryKey: ['student_id'], dependencies: [] },
  ];
  const source = ['student_id', 'student_name', 'dept_id', 'dept_name'];

  it('names relations from their keys and marks all but the root optional', () => {
    const plan = assemblePlan('3NF', source, drafts, STUDENT_COVER);

    expect(plan.version).toBe(1);
    expect(plan.target).toBe('3NF');
    expect(plan.sourceColumns).toEqual(source);
    expect(plan.relations.map((r) => [r.name, r.optional])).toEqual([
      ['depts', true],
      ['students', false],
    ]);
    expect(plan.lostDependencies).toEqual([]);
  });

  it('gives the root its requested name and suffixes clashes', () => {
    const plan = assemblePlan('3NF', source, drafts, STUDENT_COVER, { rootName: 'depts' });
    expect(plan.relations.map((r) => r.name)).toEqual(['depts_2', 'depts']);
    expect(plan.relations[1]?.foreignKeys).toEqual([
      { columns: ['dept_id'], parentRelation: 'depts_2', parentKey: ['dept_id'] },
    ]);
  });
});
