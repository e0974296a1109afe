import { describe, it, expect } from 'vitest';
import { DecodeError, TypeMismatchError } from '../../src/errors.js';
import {
  NULL,
  fromCell,
  fromNative,
  integer,
  real,
  text,
  toBindable,
  toNative,
  toStoredValue,
} from '../../src/values/column-value.js';

describe('constructors', () => {
  it('integer() accepts numbers and bigints', () => {
    expect(integer(7)).toEqual({ kind: 'integer', value: 7n });
    expect(integer(9007199254740993n)).toEqual({ kind: 'integer', value: 9007199254740993n });
  });

  it('integer() rejects fractional numbers', () => {
    expect(() => integer(1.5)).toThrow(TypeMismatchError);
  });

  it('integer() rejects numbers beyond the safe range', () => {
    expect(() => integer(2 ** 53)).toThrow(TypeMismatchError);
  });

  it('real() and text() wrap their value', () => {
    expect(real(2.5)).toEqual({ kind: 'real', value: 2.5 });
    expect(text('a')).toEqual({ kind: 'text', value: 'a' });
  });
});

describe('fromNative', () => {
  it('maps an integral number to integer', () => {
    expect(fromNative(42)).toEqual({ kind: 'integer', value: 42n });
  });

  it('maps a fractional number to real', () => {
    expect(fromNative(0.25)).toEqual({ kind: 'real', value: 0.25 });
  });

  it('keeps negative zero as real so its sign survives', () => {
    const cell = fromNative(-0);
    expect(cell.kind).toBe('real');
    expect(toNative(cell, 'real')).toBe(-0);
  });

  it('maps bigint to integer', () => {
    expect(fromNative(-3n)).toEqual({ kind: 'integer', value: -3n });
  });

  it('maps string to text, keeping numeric-looking strings as text', () => {
    expect(fromNative('42')).toEqual({ kind: 'text', value: '42' });
  });

  it('maps null to NULL', () => {
    expect(fromNative(null)).toBe(NULL);
  });
});

describe('toNative', () => {
  describe('integer target', () => {
    it('reads integer cells', () => {
      expect(toNative(integer(12), 'integer')).toBe(12);
    });

    it('reads integral real cells', () => {
      expect(toNative(real(3), 'integer')).toBe(3);
    });

    it('reads numeric text cells', () => {
      expect(toNative(text('-17'), 'integer')).toBe(-17);
      expect(toNative(text('+5'), 'integer')).toBe(5);
    });

    it('rejects non-numeric text', () => {
      expect(() => toNative(text('abc'), 'integer')).toThrow(TypeMismatchError);
      expect(() => toNative(text(''), 'integer')).toThrow(TypeMismatchError);
      expect(() => toNative(text('1.5'), 'integer')).toThrow(TypeMismatchError);
    });

    it('rejects fractional real', () => {
      expect(() => toNative(real(1.5), 'integer')).toThrow(TypeMismatchError);
    });

    it('rejects integers outside the safe number range', () => {
      expect(() => toNative(integer(9007199254740993n), 'integer')).toThrow(TypeMismatchError);
    });

    it('rejects null', () => {
      expect(() => toNative(NULL, 'integer')).toThrow(TypeMismatchError);
    });
  });

  describe('real target', () => {
    it('reads real cells', () => {
      expect(toNative(real(0.1), 'real')).toBe(0.1);
    });

    it('reads integer cells', () => {
      expect(toNative(integer(4), 'real')).toBe(4);
    });

    it('reads numeric text cells including exponents', () => {
      expect(toNative(text('2.5'), 'real')).toBe(2.5);
      expect(toNative(text('1e+21'), 'real')).toBe(1e21);
      expect(toNative(text('.5'), 'real')).toBe(0.5);
      expect(toNative(text('-Infinity'), 'real')).toBe(-Infinity);
    });

    it('rejects non-numeric text', () => {
      expect(() => toNative(text('1,5'), 'real')).toThrow(TypeMismatchError);
      expect(() => toNative(text(' 1'), 'real')).toThrow(TypeMismatchError);
    });

    it('rejects integers that a number cannot hold exactly', () => {
      expect(() => toNative(integer(9007199254740993n), 'real')).toThrow(TypeMismatchError);
    });

    it('rejects integers beyond the range of a finite number', () => {
      expect(() => toNative(fromNative(10n ** 400n), 'real')).toThrow(TypeMismatchError);
    });

    it('rejects null', () => {
      const err = (() => {
        try {
          toNative(NULL, 'real');
        } catch (e) {
          return e;
        }
        return undefined;
      })();
      expect(err).toBeInstanceOf(TypeMismatchError);
      expect(err).toMatchObject({ expected: 'real', actual: 'null' });
    });
  });

  describe('text target', () => {
    it('reads text cells', () => {
      expect(toNative(text('hello'), 'text')).toBe('hello');
    });

    it('renders numeric cells', () => {
      expect(toNative(integer(10), 'text')).toBe('10');
      expect(toNative(real(1.25), 'text')).toBe('1.25');
    });

    it('rejects null', () => {
      expect(() => toNative(NULL, 'text')).toThrow(TypeMismatchError);
    });
  });
});

describe('toStoredValue', () => {
  it('keeps primary key values in their native kind', () => {
    expect(toStoredValue(integer(1), true)).toEqual({ kind: 'integer', value: 1n });
  });

  it('stores other numeric values as text', () => {
    expect(toStoredValue(integer(30), false)).toEqual({ kind: 'text', value: '30' });
    expect(toStoredValue(real(0.1 + 0.2), false)).toEqual({ kind: 'text', value: '0.30000000000000004' });
  });

  it('leaves text and null untouched', () => {
    expect(toStoredValue(text('x'), false)).toEqual({ kind: 'text', value: 'x' });
    expect(toStoredValue(NULL, false)).toBe(NULL);
  });

  it('stores negative zero as "-0" and reads it back with its sign', () => {
    const stored = toStoredValue(real(-0), false);
    expect(stored).toEqual({ kind: 'text', value: '-0' });
    expect(toNative(stored, 'real')).toBe(-0);
  });

  it('stored real text reads back to the same number', () => {
    const value = 0.1 + 0.2;
    expect(toNative(toStoredValue(real(value), false), 'real')).toBe(value);
  });
});

describe('toBindable', () => {
  it('unwraps each kind', () => {
    expect(toBindable(integer(5))).toBe(5n);
    expect(toBindable(real(1.5))).toBe(1.5);
    expect(toBindable(text('a'))).toBe('a');
    expect(toBindable(NULL)).toBeNull();
  });
});

describe('fromCell', () => {
  it('maps engine cells to column values', () => {
    expect(fromCell(5n)).toEqual({ kind: 'integer', value: 5n });
    expect(fromCell(1.5)).toEqual({ kind: 'real', value: 1.5 });
    expect(fromCell('a')).toEqual({ kind: 'text', value: 'a' });
    expect(fromCell(null)).toBe(NULL);
  });

  it('rejects blobs', () => {
    expect(() => fromCell(new Uint8Array([1, 2]))).toThrow(DecodeError);
    expect(() => fromCell(new Uint8Array([1, 2]))).toThrow('Unsupported cell type: blob');
  });
});
