import { describe, it, expect } from 'vitest';
import { formatValue, normalizeRows, toSqlValue } from './normalize.js';

describe('formatValue', () => {
  it('should render scalars as text', () => {
    expect(formatValue('abc')).toBe('abc');
    expect(formatValue(42)).toBe('42');
    expect(formatValue(3.5)).toBe('3.5');
    expect(formatValue(10n)).toBe('10');
    expect(formatValue(true)).toBe('true');
  });

  it('should keep integers beyond 2^53 exact', () => {
    expect(formatValue('9007199254740993')).toBe('9007199254740993');
    expect(formatValue(9007199254740993n)).toBe('9007199254740993');
  });

  it('should render null as NULL by default', () => {
    expect(formatValue(null)).toBe('NULL');
  });

  it('should use the configured null text', () => {
    expect(formatValue(null, { nullText: 'None' })).toBe('None');
  });

  it('should pass date text from the driver through unchanged', () => {
    expect(formatValue('2024-01-02')).toBe('2024-01-02');
  });

  it('should render Date objects as ISO-8601', () => {
    expect(formatValue(new Date('2024-01-02T03:04:05.000Z'))).toBe('2024-01-02T03:04:05.000Z');
    expect(formatValue(new Date('not a date'))).toBe('Invalid Date');
  });

  it('should decode binary values as UTF-8', () => {
    expect(formatValue(new TextEncoder().encode('héllo'))).toBe('héllo');
  });

  it('should render JSON values', () => {
    expect(formatValue({ a: 1, b: [2] })).toBe('{"a":1,"b":[2]}');
    expect(formatValue([1, 'x'])).toBe('[1,"x"]');
  });
});

describe('toSqlValue', () => {
  it('should map undefined to null', () => {
    expect(toSqlValue(undefined)).toBeNull();
    expect(toSqlValue(null)).toBeNull();
  });

  it('should keep dates and binary values', () => {
    const date = new Date(0);
    const bytes = new Uint8Array([1, 2]);

    expect(toSqlValue(date)).toBe(date);
    expect(toSqlValue(bytes)).toBe(bytes);
  });

  it('should copy plain objects', () => {
    const value = { a: 1 };

    const result = toSqlValue(value);

    expect(result).toEqual({ a: 1 });
    expect(result).not.toBe(value);
  });

  it('should stringify anything else', () => {
    expect(toSqlValue(Symbol('flag'))).toBe('Symbol(flag)');
  });
});

describe('normalizeRows', () => {
  it('should keep row and column order', () => {
    expect(
      normalizeRows([
        [1, 'abc', null],
        [2, 'xyz', 3.5],
      ])
    ).toEqual([
      ['1', 'abc', 'NULL'],
      ['2', 'xyz', '3.5'],
    ]);
  });

  it('should return no rows for an empty result', () => {
    expect(normalizeRows([])).toEqual([]);
  });
});
