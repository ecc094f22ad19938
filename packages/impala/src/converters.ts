/**
 * @lakehouse/impala - Value Converters
 *
 * Optional per-type stringification of decoded cells. A type with no entry
 * is passed through untouched.
 */

import type { CellValue, ColumnType } from './types.js';

export type ValueConverter = (value: CellValue) => CellValue;

export type ValueConverterTable = Readonly<Partial<Record<ColumnType, ValueConverter>>>;

/** Pass every value through as decoded */
export const IDENTITY_CONVERTERS: ValueConverterTable = Object.freeze({});

/**
 * Look up the converter for a type; undefined means no conversion
 */
export function converterFor(table: ValueConverterTable, type: ColumnType): ValueConverter | undefined {
  return table[type];
}

/**
 * Converters that render every value as text, the way a terminal shows it
 */
export function createTextConverters(): ValueConverterTable {
  const text: ValueConverter = (value) => (value instanceof Uint8Array ? Buffer.from(value).toString('utf8') : String(value));
  return {
    boolean: (value) => (value === true ? 'true' : value === false ? 'false' : text(value)),
    tinyint: text,
    smallint: text,
    int: text,
    bigint: text,
    float: text,
    double: text,
    binary: text,
  };
}
