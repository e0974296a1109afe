import { InvalidModelError } from '../errors.js';
import type { RecordContract, ResolvedContract } from '../types.js';
import type { FieldType } from '../values/column-value.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const FIELD_TYPES: readonly FieldType[] = ['integer', 'real', 'text'];

export function isIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

/**
 * Validates a RecordContract's static shape and fills in defaults.
 * Throws InvalidModelError if the table name is not an identifier, if fields
 * is empty, holds duplicates or non-identifiers, or if the primary key is not
 * one of the fields.
 */
export function validateContract<R>(contract: RecordContract<R>): ResolvedContract {
  const { tableName, fields } = contract;
  if (!isIdentifier(tableName)) {
    throw new InvalidModelError(`Invalid table name "${tableName}": must match ${String(IDENTIFIER_PATTERN)}`);
  }
  if (fields.length === 0) {
    throw new InvalidModelError(`Model "${tableName}" has no fields`);
  }

  const seen = new Set<string>();
  for (const field of fields) {
    if (!isIdentifier(field)) {
      throw new InvalidModelError(`Invalid field name "${field}" in model "${tableName}"`);
    }
    if (seen.has(field)) {
      throw new InvalidModelError(`Duplicate field "${field}" in model "${tableName}"`);
    }
    seen.add(field);
  }

  const primaryKey = contract.primaryKey ?? 'id';
  if (!seen.has(primaryKey)) {
    throw new InvalidModelError(`Primary key "${primaryKey}" is not a field of model "${tableName}"`);
  }

  const primaryKeyType = contract.primaryKeyType ?? 'integer';
  if (!FIELD_TYPES.includes(primaryKeyType)) {
    throw new InvalidModelError(`Unknown primary key type "${String(primaryKeyType)}" in model "${tableName}"`);
  }

  return { tableName, fields, primaryKey, primaryKeyType };
}
