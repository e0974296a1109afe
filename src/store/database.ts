import { EngineError, OrmError } from '../errors.js';
import { SqliteEngine, type SqliteEngineOptions } from '../engine/sqlite.js';
import type { Engine } from '../engine/types.js';
import { QueryBuilder, type StatementRunner } from '../query/builder.js';
import {
  compileCreateTable,
  compileDelete,
  compileDropTable,
  compileFindById,
  compileInsert,
  compileSelect,
  compileUpdate,
} from '../query/compiler.js';
import type { Statement } from '../query/types.js';
import type { PrimaryKeyValue, RecordContract, RunResult } from '../types.js';
import type { ColumnValue } from '../values/column-value.js';
import { mapRows } from './row-mapper.js';

export interface DatabaseConfig {
  /** Engine handle; the Database takes exclusive ownership and closes it on close(). */
  engine: Engine;
  /** Called with every statement before it runs. Use it to trace SQL. */
  onStatement?: (statement: Statement) => void;
}

/**
 * Runs statements against one engine and maps rows to records.
 *
 * Every call is synchronous and is its own unit of work: no caching, no
 * retries, no transaction spanning calls. Failures are thrown as OrmError
 * subclasses; engine failures as EngineError with the engine's error as cause.
 */
export class Database implements StatementRunner {
  private readonly engine: Engine;
  private readonly onStatement: ((statement: Statement) => void) | undefined;
  private closed = false;

  constructor(config: DatabaseConfig) {
    this.engine = config.engine;
    this.onStatement = config.onStatement;
  }

  /** Opens (or creates) a SQLite database file. */
  static open(path: string, options: Omit<SqliteEngineOptions, 'path'> & Omit<DatabaseConfig, 'engine'> = {}): Database {
    const { onStatement, ...engineOptions } = options;
    return new Database({
      engine: Database.connect({ ...engineOptions, path }),
      ...(onStatement !== undefined ? { onStatement } : {}),
    });
  }

  static openInMemory(options: Omit<DatabaseConfig, 'engine'> = {}): Database {
    return new Database({ ...options, engine: Database.connect({ path: ':memory:' }) });
  }

  private static connect(options: SqliteEngineOptions): Engine {
    try {
      return new SqliteEngine(options);
    } catch (err) {
      throw new EngineError(`Failed to open database "${options.path}": ${String(err)}`, err);
    }
  }

  createTable<R>(contract: RecordContract<R>): void {
    this.execute(compileCreateTable(contract));
  }

  /** Returns the row id the engine assigned (the key itself for INTEGER keys). */
  insert<R>(contract: RecordContract<R>, record: R): bigint {
    return this.execute(compileInsert(contract, contract.toRow(record))).lastInsertRowid;
  }

  selectAll<R>(contract: RecordContract<R>): R[] {
    return this.fetchAll(contract, compileSelect(contract));
  }

  findById<R>(contract: RecordContract<R>, id: PrimaryKeyValue): R | undefined {
    const [first] = this.fetchAll(contract, compileFindById(contract, id));
    return first;
  }

  /** Updates every non-key field of the row with the record's key. Returns the number of rows changed. */
  update<R>(contract: RecordContract<R>, record: R): number {
    return this.execute(compileUpdate(contract, contract.toRow(record))).changes;
  }

  /** Returns the number of rows deleted; 0 when no row has the id. */
  delete<R>(contract: RecordContract<R>, id: PrimaryKeyValue): number {
    return this.execute(compileDelete(contract, id)).changes;
  }

  dropTable<R>(contract: RecordContract<R>): void {
    this.execute(compileDropTable(contract));
  }

  query<R>(contract: RecordContract<R>): QueryBuilder<R> {
    return new QueryBuilder(this, contract);
  }

  execute(statement: Statement): RunResult {
    return this.withEngine(statement, 'execute statement', (sql, params) => this.engine.run(sql, params));
  }

  fetchAll<R>(contract: RecordContract<R>, statement: Statement): R[] {
    const rows = this.withEngine(statement, 'fetch rows', (sql, params) => this.engine.all(sql, params));
    return mapRows(contract, rows);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.engine.close();
    } catch (err) {
      throw new EngineError(`Failed to close database: ${String(err)}`, err);
    }
  }

  private withEngine<T>(
    statement: Statement,
    action: string,
    fn: (sql: string, params: readonly ColumnValue[]) => T,
  ): T {
    if (this.closed) {
      throw new EngineError(`Cannot ${action}: database is closed`);
    }
    this.onStatement?.(statement);
    try {
      return fn(statement.sql, statement.params);
    } catch (err) {
      if (err instanceof OrmError) throw err;
      throw new EngineError(`Failed to ${action}: ${String(err)}`, err);
    }
  }
}
