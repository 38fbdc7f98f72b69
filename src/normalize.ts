import type { NormalizedRow, NormalizeOptions, SqlRow, SqlValue } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

const utf8 = new TextDecoder('utf-8');

/**
 * Narrow a value coming out of a driver library to a `SqlValue`
 */
export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    case 'object':
      if (value instanceof Date || value instanceof Uint8Array || Array.isArray(value)) {
        return value;
      }
      return { ...value };
    default:
      return String(value);
  }
}

/**
 * Render one value as text
 *
 * @example
 * ```typescript
 * formatValue(3.5);                      // '3.5'
 * formatValue(null);                     // 'NULL'
 * formatValue(new Date(0));              // '1970-01-01T00:00:00.000Z'
 * formatValue({ a: 1 });                 // '{"a":1}'
 * ```
 */
export function formatValue(value: SqlValue, options?: NormalizeOptions): string {
  if (value === null) return options?.nullText ?? DEFAULT_CONFIG.nullText;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return value.toString();
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof Uint8Array) return utf8.decode(value);
  return JSON.stringify(value);
}

/**
 * Render every value of every row as text, keeping row and column order
 */
export function normalizeRows(rows: readonly SqlRow[], options?: NormalizeOptions): NormalizedRow[] {
  return rows.map((row) => row.map((value) => formatValue(value, options)));
}
