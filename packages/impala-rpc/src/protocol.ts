/**
 * @lakehouse/impala-rpc - Protocol Definitions
 *
 * Enumerations shared by both service contracts, and the method vocabulary
 * of each.
 */

// =============================================================================
// Rich Protocol (HiveServer2 + extensions)
// =============================================================================

/**
 * Negotiated protocol versions. Only V6 is spoken by this client.
 */
export enum ProtocolVersion {
  HIVE_CLI_SERVICE_PROTOCOL_V1 = 0,
  HIVE_CLI_SERVICE_PROTOCOL_V2 = 1,
  HIVE_CLI_SERVICE_PROTOCOL_V3 = 2,
  HIVE_CLI_SERVICE_PROTOCOL_V4 = 3,
  HIVE_CLI_SERVICE_PROTOCOL_V5 = 4,
  HIVE_CLI_SERVICE_PROTOCOL_V6 = 5,
}

export enum StatusCode {
  SUCCESS = 0,
  SUCCESS_WITH_INFO = 1,
  STILL_EXECUTING = 2,
  ERROR = 3,
  INVALID_HANDLE = 4,
}

export enum OperationState {
  INITIALIZED = 0,
  RUNNING = 1,
  FINISHED = 2,
  CANCELED = 3,
  CLOSED = 4,
  ERROR = 5,
  UNKNOWN = 6,
  PENDING = 7,
  TIMEDOUT = 8,
}

export enum TypeId {
  BOOLEAN = 0,
  TINYINT = 1,
  SMALLINT = 2,
  INT = 3,
  BIGINT = 4,
  FLOAT = 5,
  DOUBLE = 6,
  STRING = 7,
  TIMESTAMP = 8,
  BINARY = 9,
  ARRAY = 10,
  MAP = 11,
  STRUCT = 12,
  UNION = 13,
  USER_DEFINED = 14,
  DECIMAL = 15,
  NULL = 16,
  DATE = 17,
  VARCHAR = 18,
  CHAR = 19,
}

export enum FetchOrientation {
  FETCH_NEXT = 0,
  FETCH_PRIOR = 1,
  FETCH_RELATIVE = 2,
  FETCH_ABSOLUTE = 3,
  FETCH_FIRST = 4,
  FETCH_LAST = 5,
}

export enum RuntimeProfileFormat {
  STRING = 0,
  BASE64 = 1,
  THRIFT = 2,
  JSON = 3,
}

/**
 * Coordinator-side execution state reported inside an execution summary
 */
export enum ExecState {
  REGISTERED = 0,
  PENDING = 1,
  RUNNING = 2,
  FINISHED = 3,
  CANCELLED = 4,
  FAILED = 5,
}

/**
 * Non-error status codes: anything here counts as success
 */
export function isSuccessStatus(code: number): boolean {
  return (
    code === StatusCode.SUCCESS ||
    code === StatusCode.SUCCESS_WITH_INFO ||
    code === StatusCode.STILL_EXECUTING
  );
}

export const RichMethod = {
  OPEN_SESSION: 'OpenSession',
  CLOSE_SESSION: 'CloseSession',
  EXECUTE_STATEMENT: 'ExecuteStatement',
  GET_OPERATION_STATUS: 'GetOperationStatus',
  CANCEL_OPERATION: 'CancelOperation',
  CLOSE_OPERATION: 'CloseOperation',
  GET_RESULT_SET_METADATA: 'GetResultSetMetadata',
  FETCH_RESULTS: 'FetchResults',
  GET_LOG: 'GetLog',
  GET_EXEC_SUMMARY: 'GetExecSummary',
  GET_RUNTIME_PROFILE: 'GetRuntimeProfile',
  PING: 'PingImpalaHS2Service',
  CLOSE_IMPALA_OPERATION: 'CloseImpalaOperation',
} as const;

export type RichMethodName = (typeof RichMethod)[keyof typeof RichMethod];

// =============================================================================
// Legacy Protocol (Beeswax)
// =============================================================================

export enum QueryState {
  CREATED = 0,
  INITIALIZED = 1,
  COMPILED = 2,
  RUNNING = 3,
  FINISHED = 4,
  EXCEPTION = 5,
}

export enum ErrorCode {
  OK = 0,
}

export const LegacyMethod = {
  QUERY: 'query',
  FETCH: 'fetch',
  GET_STATE: 'get_state',
  GET_RESULTS_METADATA: 'get_results_metadata',
  GET_LOG: 'get_log',
  GET_DEFAULT_CONFIGURATION: 'get_default_configuration',
  CLOSE: 'close',
  CANCEL: 'Cancel',
  PING: 'PingImpalaService',
} as const;

export type LegacyMethodName = (typeof LegacyMethod)[keyof typeof LegacyMethod];

export const LegacyException = {
  BEESWAX: 'BeeswaxException',
  QUERY_NOT_FOUND: 'QueryNotFoundException',
} as const;

// =============================================================================
// Query Options
// =============================================================================

export enum QueryOptionLevel {
  REGULAR = 0,
  ADVANCED = 1,
  DEVELOPMENT = 2,
  DEPRECATED = 3,
  REMOVED = 4,
}

/**
 * Parse an option level name, defaulting to DEVELOPMENT for unknown names
 */
export function parseQueryOptionLevel(name: string): QueryOptionLevel {
  switch (name.toUpperCase()) {
    case 'REGULAR':
      return QueryOptionLevel.REGULAR;
    case 'ADVANCED':
      return QueryOptionLevel.ADVANCED;
    case 'DEVELOPMENT':
      return QueryOptionLevel.DEVELOPMENT;
    case 'DEPRECATED':
      return QueryOptionLevel.DEPRECATED;
    case 'REMOVED':
      return QueryOptionLevel.REMOVED;
    default:
      return QueryOptionLevel.DEVELOPMENT;
  }
}
