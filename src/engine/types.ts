import type { RunResult } from '../types.js';
import type { ColumnValue } from '../values/column-value.js';

/**
 * Thin SQL engine abstraction.
 *
 * Executes one statement with positional parameters, synchronously.
 * Implementations own their connection handle; close() releases it.
 */
export interface Engine {
  /** Execute a write or DDL statement. Returns changes count and last insert rowid. */
  run(sql: string, params: readonly ColumnValue[]): RunResult;

  /** Execute a read statement. Returns every row as cells in column order. */
  all(sql: string, params: readonly ColumnValue[]): ColumnValue[][];

  close(): void;
}
