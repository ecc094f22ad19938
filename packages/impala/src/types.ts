/**
 * @lakehouse/impala - Core Types
 */

/**
 * Primitive type tag of a result column. Complex types (array, map, struct)
 * are rendered as strings by the server and tagged `string`.
 */
export type ColumnType =
  | 'boolean'
  | 'tinyint'
  | 'smallint'
  | 'int'
  | 'bigint'
  | 'float'
  | 'double'
  | 'string'
  | 'varchar'
  | 'char'
  | 'binary'
  | 'decimal'
  | 'date'
  | 'timestamp'
  | 'null';

export interface Column {
  name: string;
  type: ColumnType;
}

export interface Schema {
  columns: Column[];
}

/**
 * Display-ready cell. Nulls are the literal string "NULL".
 */
export type CellValue = string | number | boolean | bigint | Uint8Array;

export type Row = CellValue[];

export interface ResultBatch {
  rows: Row[];
}

/**
 * Lifecycle of a submitted statement
 */
export type QueryState = 'CREATED' | 'RUNNING' | 'FINISHED' | 'ERROR' | 'CANCELLED' | 'CLOSED';

/** How wait() ended without raising */
export type WaitResult = 'finished' | 'cancelled';

export interface DmlStats {
  /** null when the protocol reports no statistics */
  rowsModified: number | null;
  /** null when the server did not report deletions */
  rowsDeleted: number | null;
  /** null when the server did not report row errors */
  rowErrors: number | null;
}

/**
 * An artifact of the latest query attempt, plus that of the failed attempt
 * when the server retried the query
 */
export interface QueryArtifacts<T> {
  latest: T | null;
  failedAttempt: T | null;
}

export interface PingResult {
  version: string;
  webserverAddress: string | null;
}

/**
 * A typed column as received from the server, before decoding
 */
export interface ColumnData {
  type: ColumnType;
  values: readonly CellValue[];
  /** One bit per row, least significant bit first */
  nulls: Uint8Array;
}

/**
 * One fetched batch in its wire shape: typed columns from the rich
 * protocol, tab-separated lines from the legacy protocol
 */
export type WireBatch =
  | { kind: 'columnar'; columns: ColumnData[]; hasMore: boolean }
  | { kind: 'delimited'; lines: string[]; hasMore: boolean };
