/**
 * @lakehouse/impala - Result Decoder
 *
 * Turns wire batches into rows of display-ready cells.
 */

import { TypeId } from '@lakehouse/impala-rpc';
import type { TColumn, TColumnDesc } from '@lakehouse/impala-rpc';

import { converterFor, IDENTITY_CONVERTERS } from './converters.js';
import type { ValueConverterTable } from './converters.js';
import type { CellValue, Column, ColumnData, ColumnType, ResultBatch, Row, Schema, WireBatch } from './types.js';

export const NULL_CELL = 'NULL';

const TYPE_TAGS: Readonly<Record<TypeId, ColumnType>> = {
  [TypeId.BOOLEAN]: 'boolean',
  [TypeId.TINYINT]: 'tinyint',
  [TypeId.SMALLINT]: 'smallint',
  [TypeId.INT]: 'int',
  [TypeId.BIGINT]: 'bigint',
  [TypeId.FLOAT]: 'float',
  [TypeId.DOUBLE]: 'double',
  [TypeId.STRING]: 'string',
  [TypeId.TIMESTAMP]: 'timestamp',
  [TypeId.BINARY]: 'binary',
  [TypeId.ARRAY]: 'string',
  [TypeId.MAP]: 'string',
  [TypeId.STRUCT]: 'string',
  [TypeId.UNION]: 'string',
  [TypeId.USER_DEFINED]: 'string',
  [TypeId.DECIMAL]: 'decimal',
  [TypeId.NULL]: 'null',
  [TypeId.DATE]: 'date',
  [TypeId.VARCHAR]: 'varchar',
  [TypeId.CHAR]: 'char',
};

function isTypeId(value: number): value is TypeId {
  return value in TYPE_TAGS;
}

/**
 * Type tag for a rich-protocol type id; unknown ids render as strings
 */
export function columnTypeFromId(id: number): ColumnType {
  return isTypeId(id) ? TYPE_TAGS[id] : 'string';
}

const COLUMN_TYPE_NAMES: ReadonlySet<string> = new Set<string>([
  'boolean',
  'tinyint',
  'smallint',
  'int',
  'bigint',
  'float',
  'double',
  'string',
  'varchar',
  'char',
  'binary',
  'decimal',
  'date',
  'timestamp',
  'null',
]);

function isColumnType(value: string): value is ColumnType {
  return COLUMN_TYPE_NAMES.has(value);
}

/**
 * Type tag for a legacy type name such as "int", "decimal(10,2)" or "varchar(20)"
 */
export function columnTypeFromName(name: string): ColumnType {
  const base = name.toLowerCase().split('(', 1)[0]?.trim() ?? '';
  return isColumnType(base) ? base : 'string';
}

export function columnFromDesc(desc: TColumnDesc): Column {
  const primitive = desc.typeDesc.types[0]?.primitiveEntry;
  return {
    name: desc.columnName,
    type: primitive ? columnTypeFromId(primitive.type) : 'string',
  };
}

/**
 * Pick the populated member of a wire column
 */
export function columnValues(column: TColumn): { values: readonly CellValue[]; nulls: Uint8Array } {
  const populated =
    column.boolVal ??
    column.byteVal ??
    column.i16Val ??
    column.i32Val ??
    column.i64Val ??
    column.doubleVal ??
    column.stringVal ??
    column.binaryVal;
  return populated ?? { values: [], nulls: new Uint8Array(0) };
}

/**
 * Pair wire columns with the type tags of the result schema
 */
export function buildColumnData(columns: readonly TColumn[], schema: Schema | undefined): ColumnData[] {
  return columns.map((column, index) => ({
    type: schema?.columns[index]?.type ?? 'string',
    ...columnValues(column),
  }));
}

/**
 * True when bit `row` of the bitmap is set. Rows past the end of the bitmap
 * are not null.
 */
export function isNullAt(nulls: Uint8Array, row: number): boolean {
  const index = row >> 3;
  if (index >= nulls.length) {
    return false;
  }
  return ((nulls[index] ?? 0) & (1 << (row & 7))) !== 0;
}

/**
 * Convert column-major data into rows. The row count is the length of the
 * first column.
 */
export function transpose(columns: readonly ColumnData[], converters: ValueConverterTable = IDENTITY_CONVERTERS): Row[] {
  const first = columns[0];
  if (!first) {
    return [];
  }
  const rowCount = first.values.length;
  const rows: Row[] = Array.from({ length: rowCount }, () => []);

  for (const column of columns) {
    const convert = converterFor(converters, column.type);
    for (let r = 0; r < rowCount; r++) {
      const row = rows[r];
      if (!row) continue;
      const value = column.values[r];
      if (value === undefined || isNullAt(column.nulls, r)) {
        row.push(NULL_CELL);
      } else {
        row.push(convert ? convert(value) : value);
      }
    }
  }
  return rows;
}

/**
 * Render a 16-byte identifier as two little-endian halves: `{low}:{high}`
 */
export function formatGuid(bytes: Uint8Array): string {
  if (bytes.length !== 16) {
    throw new RangeError(`Expected a 16-byte identifier, got ${bytes.length} bytes`);
  }
  const low = Buffer.from(bytes.subarray(0, 8)).reverse().toString('hex');
  const high = Buffer.from(bytes.subarray(8, 16)).reverse().toString('hex');
  return `${low}:${high}`;
}

/**
 * Split tab-separated result lines into rows
 */
export function splitDelimitedRows(lines: readonly string[]): Row[] {
  return lines.map((line) => line.split('\t'));
}

export function decodeBatch(batch: WireBatch, converters: ValueConverterTable = IDENTITY_CONVERTERS): ResultBatch {
  switch (batch.kind) {
    case 'columnar':
      return { rows: transpose(batch.columns, converters) };
    case 'delimited':
      return { rows: splitDelimitedRows(batch.lines) };
  }
}
