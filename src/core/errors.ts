import type { ScalarValue } from './dataset/types.js';

/** Error kinds raised by the normalization core. */
export type ErrorKind =
  | 'SCHEMA_MISMATCH'
  | 'ORPHAN_FOREIGN_KEY'
  | 'INVALID_DEPENDENCY_SET'
  | 'INTERNAL_INVARIANT_VIOLATION';

export class NormalizerError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'NormalizerError';
  }
}

/**
 * New data lacks columns a decomposition plan requires.
 * `relations` names the plan relations that could not be produced.
 */
export class SchemaMismatchError extends NormalizerError {
  constructor(
    public readonly missingColumns: readonly string[],
    public readonly relations: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      'SCHEMA_MISMATCH',
      `Input is missing columns required by the plan: ${missingColumns.join(', ')}`,
      options,
    );
    this.name = 'SchemaMismatchError';
  }
}

/** Child values that have no matching parent key. */
export interface OrphanReference {
  readonly relation: string;
  readonly columns: readonly string[];
  readonly parentRelation: string;
  readonly parentKey: readonly string[];
  readonly values: readonly (readonly ScalarValue[])[];
}

export class OrphanForeignKeyError extends NormalizerError {
  constructor(
    public readonly orphans: readonly OrphanReference[],
    options?: ErrorOptions,
  ) {
    const summary = orphans
      .map(
        (o) =>
          `${o.relation}(${o.columns.join(', ')}) -> ${o.parentRelation}: ${String(o.values.length)} orphan value(s) ${o.values
            .map((v) => JSON.stringify(v))
            .join(', ')}`,
      )
      .join('; ');
    super('ORPHAN_FOREIGN_KEY', `Referential integrity violated: ${summary}`, options);
    this.name = 'OrphanForeignKeyError';
  }
}

export class InvalidDependencySetError extends NormalizerError {
  constructor(
    public readonly problems: readonly string[],
    options?: ErrorOptions,
  ) {
    super('INVALID_DEPENDENCY_SET', `Invalid dependency set: ${problems.join('; ')}`, options);
    this.name = 'InvalidDependencySetError';
  }
}

/** An algorithm produced a result that breaks its own guarantee. Never a data problem. */
export class InternalInvariantViolationError extends NormalizerError {
  constructor(message: string, options?: ErrorOptions) {
    super('INTERNAL_INVARIANT_VIOLATION', message, options);
    this.name = 'InternalInvariantViolationError';
  }
}
