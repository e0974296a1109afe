import Database from 'better-sqlite3';
import type { RunResult } from '../types.js';
import { fromCell, toBindable, type ColumnValue } from '../values/column-value.js';
import type { Engine } from './types.js';

export interface SqliteEngineOptions {
  /** Path to the SQLite database file, or ':memory:' */
  path: string;
  /** Open read-only (default: false) */
  readonly?: boolean;
  /** How long to wait on a locked database before failing, in ms (default: 5000) */
  busyTimeoutMs?: number;
  /** Enable WAL journal mode (default: false) */
  walMode?: boolean;
  /** Enforce foreign key constraints (default: true) */
  foreignKeys?: boolean;
}

const DEFAULT_OPTIONS: Required<Omit<SqliteEngineOptions, 'path'>> = {
  readonly: false,
  busyTimeoutMs: 5000,
  walMode: false,
  foreignKeys: true,
};

/**
 * Engine implementation on better-sqlite3.
 *
 * Integers are read as bigint (safe integers) so that 64-bit values survive
 * the trip; REAL arrives as number and TEXT as string.
 */
export class SqliteEngine implements Engine {
  private readonly db: Database.Database;

  constructor(options: SqliteEngineOptions) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.db = new Database(resolved.path, {
      readonly: resolved.readonly,
      timeout: resolved.busyTimeoutMs,
    });
    if (resolved.walMode) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma(`foreign_keys = ${resolved.foreignKeys ? 'ON' : 'OFF'}`);
  }

  run(sql: string, params: readonly ColumnValue[]): RunResult {
    const result = this.db.prepare<unknown[]>(sql).run(...params.map(toBindable));
    return {
      changes: result.changes,
      lastInsertRowid: BigInt(result.lastInsertRowid),
    };
  }

  all(sql: string, params: readonly ColumnValue[]): ColumnValue[][] {
    const rows = this.db
      .prepare<unknown[], unknown[]>(sql)
      .raw(true)
      .safeIntegers(true)
      .all(...params.map(toBindable));
    return rows.map((row) => row.map(fromCell));
  }

  close(): void {
    this.db.close();
  }
}
