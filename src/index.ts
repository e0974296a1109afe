export { Database } from './store/database.js';
export type { DatabaseConfig } from './store/database.js';
export { SqliteEngine } from './engine/sqlite.js';
export type { SqliteEngineOptions } from './engine/sqlite.js';
export type { Engine } from './engine/types.js';
export { QueryBuilder } from './query/builder.js';
export type { FilterValue } from './query/builder.js';
export type { FilterClause, FilterOp, OrderBy, QuerySpec, Statement } from './query/types.js';
export {
  compileCreateTable,
  compileInsert,
  compileSelect,
  compileFindById,
  compileUpdate,
  compileDelete,
  compileDropTable,
} from './query/compiler.js';
export type { RecordContract, ResolvedContract, PrimaryKeyValue, RunResult } from './types.js';
export { validateContract } from './model/contract.js';
export { RowReader, readRow } from './model/row-reader.js';
export { NULL, integer, real, text, fromNative, toNative } from './values/column-value.js';
export type { ColumnValue, ColumnKind, FieldType, NativeValue } from './values/column-value.js';
export {
  OrmError,
  InvalidModelError,
  InvalidQueryError,
  TypeMismatchError,
  DecodeError,
  EngineError,
} from './errors.js';
export type { OrmErrorKind } from './errors.js';
