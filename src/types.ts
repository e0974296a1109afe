import type { ColumnValue, FieldType } from './values/column-value.js';

/**
 * Everything the library needs to persist records of type R.
 * One contract per persisted type; readRow() helps implement fromRow().
 */
export interface RecordContract<R> {
  readonly tableName: string;
  /** Column order for CREATE TABLE, INSERT, SELECT and fromRow(). */
  readonly fields: readonly string[];
  /** Defaults to "id". */
  readonly primaryKey?: string;
  /** Native kind of the primary key column. Defaults to "integer". */
  readonly primaryKeyType?: FieldType;
  /** Must return one value per entry of `fields`, in the same order. */
  toRow(record: R): ColumnValue[];
  /** Throws DecodeError (or TypeMismatchError) when the row does not fit. */
  fromRow(row: readonly ColumnValue[]): R;
}

/** A contract after validation, with defaults filled in. */
export interface ResolvedContract {
  readonly tableName: string;
  readonly fields: readonly string[];
  readonly primaryKey: string;
  readonly primaryKeyType: FieldType;
}

export type PrimaryKeyValue = number | bigint | string;

export interface RunResult {
  changes: number;
  lastInsertRowid: bigint;
}
