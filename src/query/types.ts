import type { ColumnValue } from '../values/column-value.js';

export type FilterOp = 'eq' | 'like' | 'gt' | 'lt';

/** One predicate; clauses combine with AND in insertion order. */
export interface FilterClause {
  op: FilterOp;
  field: string;
  value: ColumnValue;
}

export interface OrderBy {
  field: string;
  ascending: boolean;
}

/**
 * Accumulated read-query state. Built through the QueryBuilder; consumed
 * once by fetch()/fetchOne().
 */
export interface QuerySpec {
  readonly filters: readonly FilterClause[];
  readonly order?: OrderBy;
  readonly limit?: number;
}

/**
 * SQL text with `?` placeholders and the values to bind, in placeholder
 * order. Placeholder count always equals params.length.
 */
export interface Statement {
  readonly sql: string;
  readonly params: readonly ColumnValue[];
}
