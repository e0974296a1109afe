import { DecodeError, TypeMismatchError } from '../errors.js';

/**
 * One cell of a row. A closed set: every value the library binds or reads is
 * exactly one of these kinds.
 */
export type ColumnValue =
  | { readonly kind: 'integer'; readonly value: bigint }
  | { readonly kind: 'real';    readonly value: number }
  | { readonly kind: 'text';    readonly value: string }
  | { readonly kind: 'null' };

export type ColumnKind = ColumnValue['kind'];

/** Native kinds a record field can declare. */
export type FieldType = 'integer' | 'real' | 'text';

/** Native scalars accepted by fromNative(). */
export type NativeValue = number | bigint | string | null;

/** What the engine binds for a ColumnValue. */
export type Bindable = bigint | number | string | null;

export const NULL: ColumnValue = { kind: 'null' };

export function integer(value: number | bigint): ColumnValue {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new TypeMismatchError('integer', 'real', `Not a safe integer: ${value}`);
  }
  return { kind: 'integer', value: BigInt(value) };
}

export function real(value: number): ColumnValue {
  return { kind: 'real', value };
}

export function text(value: string): ColumnValue {
  return { kind: 'text', value };
}

/** Integral numbers become integer, except -0, which stays real to keep its sign. */
export function fromNative(value: NativeValue): ColumnValue {
  if (value === null) return NULL;
  if (typeof value === 'bigint') return { kind: 'integer', value };
  if (typeof value === 'string') return text(value);
  if (Object.is(value, -0)) return real(value);
  return Number.isSafeInteger(value) ? { kind: 'integer', value: BigInt(value) } : real(value);
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const REAL_TEXT = /^[+-]?((\d+\.?\d*|\.\d+)([eE][+-]?\d+)?|Infinity)$|^NaN$/;

function toInteger(cell: ColumnValue): number {
  switch (cell.kind) {
    case 'integer': {
      const n = Number(cell.value);
      if (!Number.isSafeInteger(n)) {
        throw new TypeMismatchError('integer', 'integer', `Integer ${cell.value} is outside the safe number range`);
      }
      return n;
    }
    case 'real':
      if (!Number.isSafeInteger(cell.value)) {
        throw new TypeMismatchError('integer', 'real', `Cannot read real ${cell.value} as integer`);
      }
      return cell.value;
    case 'text':
      if (!INTEGER_TEXT.test(cell.value)) {
        throw new TypeMismatchError('integer', 'text', `Cannot read text "${cell.value}" as integer`);
      }
      return toInteger({ kind: 'integer', value: BigInt(cell.value) });
    case 'null':
      throw new TypeMismatchError('integer', 'null');
  }
}

function toReal(cell: ColumnValue): number {
  switch (cell.kind) {
    case 'integer': {
      const n = Number(cell.value);
      if (!Number.isFinite(n) || BigInt(n) !== cell.value) {
        throw new TypeMismatchError('real', 'integer', `Integer ${cell.value} cannot be represented exactly as real`);
      }
      return n;
    }
    case 'real':
      return cell.value;
    case 'text':
      if (!REAL_TEXT.test(cell.value)) {
        throw new TypeMismatchError('real', 'text', `Cannot read text "${cell.value}" as real`);
      }
      return Number(cell.value);
    case 'null':
      throw new TypeMismatchError('real', 'null');
  }
}

function toText(cell: ColumnValue): string {
  if (cell.kind === 'null') {
    throw new TypeMismatchError('text', 'null');
  }
  return String(cell.value);
}

/**
 * Reads a cell as the native type of a field.
 * Numeric text is accepted for numeric targets since non-key columns are
 * persisted as TEXT.
 */
export function toNative(cell: ColumnValue, type: 'integer'): number;
export function toNative(cell: ColumnValue, type: 'real'): number;
export function toNative(cell: ColumnValue, type: 'text'): string;
export function toNative(cell: ColumnValue, type: FieldType): number | string;
export function toNative(cell: ColumnValue, type: FieldType): number | string {
  switch (type) {
    case 'integer':
      return toInteger(cell);
    case 'real':
      return toReal(cell);
    case 'text':
      return toText(cell);
  }
}

/**
 * Form in which a value is persisted. Key columns keep their native kind;
 * every other column is stored as text.
 */
export function toStoredValue(cell: ColumnValue, isPrimaryKey: boolean): ColumnValue {
  if (isPrimaryKey || cell.kind === 'null' || cell.kind === 'text') return cell;
  // String(-0) is "0"
  if (cell.kind === 'real' && Object.is(cell.value, -0)) return text('-0');
  return text(String(cell.value));
}

export function toBindable(cell: ColumnValue): Bindable {
  return cell.kind === 'null' ? null : cell.value;
}

/** Converts a raw engine cell. Blobs and other engine-only types are rejected. */
export function fromCell(cell: unknown): ColumnValue {
  if (cell === null) return NULL;
  if (typeof cell === 'bigint') return { kind: 'integer', value: cell };
  if (typeof cell === 'number') return real(cell);
  if (typeof cell === 'string') return text(cell);
  throw new DecodeError(`Unsupported cell type: ${cell instanceof Uint8Array ? 'blob' : typeof cell}`);
}
