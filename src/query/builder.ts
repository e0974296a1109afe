import { InvalidQueryError } from '../errors.js';
import { validateContract } from '../model/contract.js';
import type { RecordContract, ResolvedContract } from '../types.js';
import { text } from '../values/column-value.js';
import { compileSelect } from './compiler.js';
import type { FilterClause, FilterOp, OrderBy, QuerySpec, Statement } from './types.js';

/** Comparison values are bound in text form. */
export type FilterValue = string | number | bigint;

/** Runs a compiled SELECT and hydrates its rows. Implemented by Database. */
export interface StatementRunner {
  fetchAll<R>(contract: RecordContract<R>, statement: Statement): R[];
}

/**
 * Fluent, mutable builder for one read query. Every filter call appends an
 * AND-ed clause and returns the builder; orderBy() and limit() overwrite any
 * earlier call. fetch() or fetchOne() consumes the builder: a second terminal
 * call throws InvalidQueryError.
 *
 * @example
 * db.query(Users)
 *   .whereLike('email', '%@example.com')
 *   .orderBy('name')
 *   .limit(10)
 *   .fetch();
 */
export class QueryBuilder<R> {
  private readonly shape: ResolvedContract;
  private readonly filters: FilterClause[] = [];
  private order: OrderBy | undefined;
  private limitCount: number | undefined;
  private consumed = false;

  constructor(
    private readonly runner: StatementRunner,
    private readonly contract: RecordContract<R>,
  ) {
    this.shape = validateContract(contract);
  }

  whereEq(field: string, value: FilterValue): this {
    return this.addFilter('eq', field, value);
  }

  /** SQL LIKE pattern: `%` matches any run of characters, `_` a single one. */
  whereLike(field: string, pattern: string): this {
    return this.addFilter('like', field, pattern);
  }

  whereGt(field: string, value: FilterValue): this {
    return this.addFilter('gt', field, value);
  }

  whereLt(field: string, value: FilterValue): this {
    return this.addFilter('lt', field, value);
  }

  orderBy(field: string, ascending = true): this {
    this.assertUsable();
    this.assertColumn(field);
    this.order = { field, ascending };
    return this;
  }

  limit(n: number): this {
    this.assertUsable();
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new InvalidQueryError(`Limit must be a non-negative integer, got ${n}`);
    }
    this.limitCount = n;
    return this;
  }

  /** Snapshot of the accumulated state. */
  spec(): QuerySpec {
    return {
      filters: [...this.filters],
      ...(this.order !== undefined ? { order: { ...this.order } } : {}),
      ...(this.limitCount !== undefined ? { limit: this.limitCount } : {}),
    };
  }

  /** Renders the SELECT without consuming the builder. */
  toStatement(): Statement {
    return compileSelect(this.contract, this.spec());
  }

  fetch(): R[] {
    return this.consume(this.spec());
  }

  /**
   * First matching record, or undefined. Caps the query at LIMIT 1; a
   * caller's limit(0) is kept.
   */
  fetchOne(): R | undefined {
    const spec = this.spec();
    const rows = this.consume({ ...spec, limit: Math.min(spec.limit ?? 1, 1) });
    return rows[0];
  }

  private consume(spec: QuerySpec): R[] {
    this.assertUsable();
    const statement = compileSelect(this.contract, spec);
    this.consumed = true;
    return this.runner.fetchAll(this.contract, statement);
  }

  private addFilter(op: FilterOp, field: string, value: FilterValue): this {
    this.assertUsable();
    this.assertColumn(field);
    this.filters.push({ op, field, value: text(String(value)) });
    return this;
  }

  private assertColumn(field: string): void {
    if (!this.shape.fields.includes(field)) {
      throw new InvalidQueryError(`Unknown column "${field}" for "${this.shape.tableName}"`);
    }
  }

  private assertUsable(): void {
    if (this.consumed) {
      throw new InvalidQueryError('Query has already been fetched; start a new query');
    }
  }
}
