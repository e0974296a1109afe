import { DecodeError } from '../errors.js';
import type { RecordContract } from '../types.js';
import type { ColumnValue } from '../values/column-value.js';

/**
 * Maps every row through contract.fromRow(). A single failing row fails the
 * whole call: errors other than DecodeError are wrapped in one, with the
 * original kept as cause.
 */
export function mapRows<R>(contract: RecordContract<R>, rows: readonly ColumnValue[][]): R[] {
  return rows.map((row, index) => {
    if (row.length !== contract.fields.length) {
      throw new DecodeError(
        `Row ${index} of "${contract.tableName}" has ${row.length} cells, expected ${contract.fields.length}`,
      );
    }
    try {
      return contract.fromRow(row);
    } catch (err) {
      if (err instanceof DecodeError) throw err;
      throw new DecodeError(`Failed to decode row ${index} of "${contract.tableName}": ${String(err)}`, err);
    }
  });
}
