/** A single cell value after type inference. `null` marks a missing value. */
export type ScalarValue = string | number | boolean | null;

/** Inferred scalar type of a column. `empty` means every cell is null. */
export type ColumnType = 'integer' | 'number' | 'boolean' | 'date' | 'string' | 'empty';

/** Column metadata. Immutable once the dataset is loaded. */
export interface Column {
  readonly name: string;
  readonly type: ColumnType;
  readonly nullable: boolean;
}

/** A row maps each column name to its value. */
export type Row = Readonly<Record<string, ScalarValue>>;

/** A rectangular, typed dataset. Never mutated; derived datasets are new objects. */
export interface Dataset {
  readonly columns: readonly Column[];
  readonly rows: readonly Row[];
}

/** Heuristic semantic classification of a column's contents. */
export type SemanticType =
  | 'unique_identifier'
  | 'zip_code'
  | 'email'
  | 'date'
  | 'numeric'
  | 'text'
  | 'empty';

/** Column statistics reported by analysis. */
export interface ColumnProfile {
  readonly name: string;
  readonly type: ColumnType;
  readonly nullable: boolean;
  readonly semanticType: SemanticType;
  readonly distinctCount: number;
  readonly nullRatio: number;
  readonly uniqueRatio: number;
  readonly sampleValues: readonly ScalarValue[];
}
