import { InvalidModelError, InvalidQueryError } from '../errors.js';
import { validateContract } from '../model/contract.js';
import type { PrimaryKeyValue, RecordContract, ResolvedContract } from '../types.js';
import { fromNative, toStoredValue, type ColumnValue, type FieldType } from '../values/column-value.js';
import type { FilterClause, FilterOp, QuerySpec, Statement } from './types.js';

const SQL_TYPES: Record<FieldType, string> = {
  integer: 'INTEGER',
  real: 'REAL',
  text: 'TEXT',
};

const OPERATORS: Record<FilterOp, string> = {
  eq: '=',
  like: 'LIKE',
  gt: '>',
  lt: '<',
};

const EMPTY_SPEC: QuerySpec = { filters: [] };

/**
 * Pairs each field with its row value in stored form.
 * Throws InvalidModelError when the row does not align with fields.
 */
function storedRow(shape: ResolvedContract, row: readonly ColumnValue[]): Array<[string, ColumnValue]> {
  if (row.length !== shape.fields.length) {
    throw new InvalidModelError(
      `toRow() for "${shape.tableName}" returned ${row.length} values, expected ${shape.fields.length}`,
    );
  }
  return shape.fields.map((field, i): [string, ColumnValue] => {
    const value = row[i];
    if (value === undefined) {
      throw new InvalidModelError(`toRow() for "${shape.tableName}" has no value for "${field}"`);
    }
    return [field, toStoredValue(value, field === shape.primaryKey)];
  });
}

function selectHead(shape: ResolvedContract): string {
  return `SELECT ${shape.fields.join(', ')} FROM ${shape.tableName}`;
}

function assertColumn(shape: ResolvedContract, field: string): void {
  if (!shape.fields.includes(field)) {
    throw new InvalidQueryError(`Unknown column "${field}" for "${shape.tableName}"`);
  }
}

function compileFilter(shape: ResolvedContract, clause: FilterClause, params: ColumnValue[]): string {
  assertColumn(shape, clause.field);
  params.push(clause.value);
  return `${clause.field} ${OPERATORS[clause.op]} ?`;
}

/**
 * Binds a primary key with its native kind, so that INTEGER keys compare
 * numerically.
 */
function keyValue(shape: ResolvedContract, id: PrimaryKeyValue): ColumnValue {
  const value = fromNative(id);
  if (shape.primaryKeyType === 'text' && value.kind !== 'text') {
    return { kind: 'text', value: String(id) };
  }
  return value;
}

export function compileCreateTable<R>(contract: RecordContract<R>): Statement {
  const shape = validateContract(contract);
  const columns = shape.fields.map((field) =>
    field === shape.primaryKey
      ? `${field} ${SQL_TYPES[shape.primaryKeyType]} PRIMARY KEY`
      : `${field} TEXT`,
  );
  return {
    sql: `CREATE TABLE IF NOT EXISTS ${shape.tableName} (${columns.join(', ')})`,
    params: [],
  };
}

export function compileInsert<R>(contract: RecordContract<R>, row: readonly ColumnValue[]): Statement {
  const shape = validateContract(contract);
  const values = storedRow(shape, row);
  const placeholders = values.map(() => '?');
  return {
    sql: `INSERT INTO ${shape.tableName} (${shape.fields.join(', ')}) VALUES (${placeholders.join(', ')})`,
    params: values.map(([, value]) => value),
  };
}

/**
 * Compiles a SELECT with optional WHERE (clauses joined by AND, in
 * accumulation order), ORDER BY and LIMIT. Ordering and limit add no params.
 */
export function compileSelect<R>(contract: RecordContract<R>, spec: QuerySpec = EMPTY_SPEC): Statement {
  const shape = validateContract(contract);
  const params: ColumnValue[] = [];
  const parts = [selectHead(shape)];

  if (spec.filters.length > 0) {
    const clauses = spec.filters.map((clause) => compileFilter(shape, clause, params));
    parts.push(`WHERE ${clauses.join(' AND ')}`);
  }

  if (spec.order !== undefined) {
    assertColumn(shape, spec.order.field);
    parts.push(`ORDER BY ${spec.order.field} ${spec.order.ascending ? 'ASC' : 'DESC'}`);
  }

  if (spec.limit !== undefined) {
    if (!Number.isSafeInteger(spec.limit) || spec.limit < 0) {
      throw new InvalidQueryError(`Limit must be a non-negative integer, got ${spec.limit}`);
    }
    parts.push(`LIMIT ${spec.limit}`);
  }

  return { sql: parts.join(' '), params };
}

export function compileFindById<R>(contract: RecordContract<R>, id: PrimaryKeyValue): Statement {
  const shape = validateContract(contract);
  return {
    sql: `${selectHead(shape)} WHERE ${shape.primaryKey} = ?`,
    params: [keyValue(shape, id)],
  };
}

/**
 * Compiles an UPDATE of every non-key field; the key is bound last and is
 * never part of SET.
 */
export function compileUpdate<R>(contract: RecordContract<R>, row: readonly ColumnValue[]): Statement {
  const shape = validateContract(contract);
  const values = storedRow(shape, row);
  const assignments = values.filter(([field]) => field !== shape.primaryKey);
  const key = values.find(([field]) => field === shape.primaryKey);

  if (assignments.length === 0) {
    throw new InvalidModelError(`Model "${shape.tableName}" has no non-key fields to update`);
  }
  if (key === undefined) {
    throw new InvalidModelError(`Primary key "${shape.primaryKey}" missing from row of "${shape.tableName}"`);
  }

  return {
    sql: `UPDATE ${shape.tableName} SET ${assignments.map(([field]) => `${field} = ?`).join(', ')} WHERE ${shape.primaryKey} = ?`,
    params: [...assignments.map(([, value]) => value), key[1]],
  };
}

export function compileDelete<R>(contract: RecordContract<R>, id: PrimaryKeyValue): Statement {
  const shape = validateContract(contract);
  return {
    sql: `DELETE FROM ${shape.tableName} WHERE ${shape.primaryKey} = ?`,
    params: [keyValue(shape, id)],
  };
}

export function compileDropTable<R>(contract: RecordContract<R>): Statement {
  const shape = validateContract(contract);
  return { sql: `DROP TABLE IF EXISTS ${shape.tableName}`, params: [] };
}
