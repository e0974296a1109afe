import { DecodeError, TypeMismatchError } from '../errors.js';
import { toNative, type ColumnValue, type FieldType } from '../values/column-value.js';

/**
 * Typed access to the cells of one row by field name, for use inside
 * RecordContract.fromRow(). Every failure surfaces as a DecodeError naming the
 * field, with the underlying TypeMismatchError as cause.
 *
 * @example
 * fromRow(row) {
 *   const r = readRow(row, USER_FIELDS);
 *   return { id: r.integer('id'), name: r.text('name'), email: r.text('email') };
 * }
 */
export class RowReader {
  constructor(
    private readonly row: readonly ColumnValue[],
    private readonly fields: readonly string[],
  ) {
    if (row.length !== fields.length) {
      throw new DecodeError(`Row has ${row.length} cells, expected ${fields.length} (${fields.join(', ')})`);
    }
  }

  /** Raw cell of a field. */
  cell(field: string): ColumnValue {
    const index = this.fields.indexOf(field);
    const cell = this.row[index];
    if (index === -1 || cell === undefined) {
      throw new DecodeError(`Unknown field "${field}"`);
    }
    return cell;
  }

  integer(field: string): number {
    return this.read(field, 'integer');
  }

  real(field: string): number {
    return this.read(field, 'real');
  }

  text(field: string): string {
    return this.read(field, 'text');
  }

  nullableInteger(field: string): number | null {
    return this.isNull(field) ? null : this.integer(field);
  }

  nullableReal(field: string): number | null {
    return this.isNull(field) ? null : this.real(field);
  }

  nullableText(field: string): string | null {
    return this.isNull(field) ? null : this.text(field);
  }

  private isNull(field: string): boolean {
    return this.cell(field).kind === 'null';
  }

  private read(field: string, type: 'integer' | 'real'): number;
  private read(field: string, type: 'text'): string;
  private read(field: string, type: FieldType): number | string {
    try {
      return toNative(this.cell(field), type);
    } catch (err) {
      if (err instanceof TypeMismatchError) {
        throw new DecodeError(`Cannot decode field "${field}": ${err.message}`, err);
      }
      throw err;
    }
  }
}

export function readRow(row: readonly ColumnValue[], fields: readonly string[]): RowReader {
  return new RowReader(row, fields);
}
