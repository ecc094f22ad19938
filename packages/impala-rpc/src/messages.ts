/**
 * @lakehouse/impala-rpc - Message Records
 *
 * Typed request records and zod schemas for every response the client reads.
 * Decoded replies are loosely typed WireValues; parseResponse() turns them
 * into the records below or rejects them.
 */

import { z } from 'zod';

import { FetchOrientation, ProtocolVersion, RuntimeProfileFormat } from './protocol.js';
import type { WireValue } from './serialization.js';

const bytes = z.instanceof(Uint8Array);

/**
 * Thrown when a reply decodes cleanly but lacks fields the client relies on
 */
export class MalformedResponseError extends Error {
  constructor(
    public readonly method: string,
    message: string
  ) {
    super(`Malformed ${method} response: ${message}`);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Validate a decoded reply against its record schema
 */
export function parseResponse<S extends z.ZodTypeAny>(schema: S, value: WireValue | undefined, method: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new MalformedResponseError(method, `${where}${issue ? issue.message : 'invalid'}`);
  }
  return result.data;
}

// =============================================================================
// Rich Protocol Records
// =============================================================================

export const statusSchema = z.object({
  statusCode: z.number().int(),
  infoMessages: z.array(z.string()).optional(),
  sqlState: z.string().optional(),
  errorCode: z.number().int().optional(),
  errorMessage: z.string().optional(),
});
export type TStatus = z.infer<typeof statusSchema>;

export const handleIdentifierSchema = z.object({
  guid: bytes,
  secret: bytes,
});
export type THandleIdentifier = z.infer<typeof handleIdentifierSchema>;

export const sessionHandleSchema = z.object({
  sessionId: handleIdentifierSchema,
});
export type TSessionHandle = z.infer<typeof sessionHandleSchema>;

export const operationHandleSchema = z.object({
  operationId: handleIdentifierSchema,
  operationType: z.number().int(),
  hasResultSet: z.boolean(),
  modifiedRowCount: z.number().optional(),
});
export type TOperationHandle = z.infer<typeof operationHandleSchema>;

export const statusOnlyResponseSchema = z.object({ status: statusSchema });

export const openSessionResponseSchema = z.object({
  status: statusSchema,
  serverProtocolVersion: z.number().int(),
  sessionHandle: sessionHandleSchema.optional(),
  configuration: z.map(z.string(), z.string()).optional(),
});

export const executeStatementResponseSchema = z.object({
  status: statusSchema,
  operationHandle: operationHandleSchema.optional(),
});

export const operationStatusResponseSchema = z.object({
  status: statusSchema,
  operationState: z.number().int().optional(),
  sqlState: z.string().optional(),
  errorCode: z.number().int().optional(),
  errorMessage: z.string().optional(),
});

export const columnDescSchema = z.object({
  columnName: z.string(),
  typeDesc: z.object({
    types: z
      .array(
        z.object({
          primitiveEntry: z.object({ type: z.number().int() }).optional(),
        })
      )
      .min(1),
  }),
  position: z.number().int().optional(),
  comment: z.string().optional(),
});
export type TColumnDesc = z.infer<typeof columnDescSchema>;

export const tableSchemaSchema = z.object({
  columns: z.array(columnDescSchema),
});
export type TTableSchema = z.infer<typeof tableSchemaSchema>;

export const resultSetMetadataResponseSchema = z.object({
  status: statusSchema,
  schema: tableSchemaSchema.optional(),
});

function typedColumn<T extends z.ZodTypeAny>(value: T) {
  return z.object({ values: z.array(value), nulls: bytes });
}

export const columnSchema = z.object({
  boolVal: typedColumn(z.boolean()).optional(),
  byteVal: typedColumn(z.number()).optional(),
  i16Val: typedColumn(z.number()).optional(),
  i32Val: typedColumn(z.number()).optional(),
  i64Val: typedColumn(z.bigint()).optional(),
  doubleVal: typedColumn(z.number()).optional(),
  stringVal: typedColumn(z.string()).optional(),
  binaryVal: typedColumn(bytes).optional(),
});
export type TColumn = z.infer<typeof columnSchema>;

export const rowSetSchema = z.object({
  startRowOffset: z.bigint().optional(),
  columns: z.array(columnSchema).default([]),
  columnCount: z.number().int().optional(),
});

export const fetchResultsResponseSchema = z.object({
  status: statusSchema,
  hasMoreRows: z.boolean().default(false),
  results: rowSetSchema.optional(),
});

export const getLogResponseSchema = z.object({
  status: statusSchema,
  log: z.string().default(''),
});

export const pingResponseSchema = z.object({
  status: statusSchema,
  version: z.string().optional(),
  webserver_address: z.string().optional(),
});

export const dmlResultSchema = z.object({
  rows_modified: z.map(z.string(), z.bigint()),
  num_row_errors: z.bigint().optional(),
  rows_deleted: z.map(z.string(), z.bigint()).optional(),
});
export type TDmlResult = z.infer<typeof dmlResultSchema>;

export const closeImpalaOperationResponseSchema = z.object({
  status: statusSchema,
  dml_result: dmlResultSchema.optional(),
});

export const runtimeProfileResponseSchema = z.object({
  status: statusSchema,
  profile: z.string().optional(),
  failed_profiles: z.array(z.string()).optional(),
});

const execStatsSchema = z.object({
  latency_ns: z.bigint().optional(),
  cpu_time_ns: z.bigint().optional(),
  cardinality: z.bigint().optional(),
  memory_used: z.bigint().optional(),
});

export const execSummarySchema = z.object({
  state: z.number().int(),
  error_logs: z
    .array(z.object({ status_code: z.number().int(), error_msgs: z.array(z.string()).optional() }))
    .optional(),
  nodes: z
    .array(
      z.object({
        node_id: z.number().int(),
        fragment_idx: z.number().int(),
        label: z.string(),
        label_detail: z.string().optional(),
        num_children: z.number().int(),
        estimated_stats: execStatsSchema.optional(),
        exec_stats: z.array(execStatsSchema).optional(),
        is_broadcast: z.boolean().optional(),
        num_hosts: z.number().int().optional(),
      })
    )
    .optional(),
  exch_to_sender_map: z.map(z.number(), z.number()).optional(),
  progress: z
    .object({
      total_scan_ranges: z.bigint().optional(),
      num_completed_scan_ranges: z.bigint().optional(),
    })
    .optional(),
  is_queued: z.boolean().optional(),
  queued_reason: z.string().optional(),
});
export type TExecSummary = z.infer<typeof execSummarySchema>;

export const execSummaryResponseSchema = z.object({
  status: statusSchema,
  summary: execSummarySchema.optional(),
  failed_summaries: z.array(execSummarySchema).optional(),
});

// Request records. Declared as type aliases so they are assignable to WireStruct.

export type TOpenSessionReq = {
  client_protocol: ProtocolVersion;
  username?: string;
  password?: string;
  configuration?: ReadonlyMap<string, string>;
};

export type TExecuteStatementReq = {
  sessionHandle: TSessionHandle;
  statement: string;
  confOverlay: ReadonlyMap<string, string>;
  runAsync: boolean;
};

export type TFetchResultsReq = {
  operationHandle: TOperationHandle;
  orientation: FetchOrientation;
  maxRows: bigint;
};

export type TOperationReq = {
  operationHandle: TOperationHandle;
};

export type TQueryAttemptsReq = {
  operationHandle: TOperationHandle;
  sessionHandle: TSessionHandle;
  include_query_attempts: boolean;
  format?: RuntimeProfileFormat;
};

export function createOpenSessionRequest(username: string | undefined): TOpenSessionReq {
  return {
    client_protocol: ProtocolVersion.HIVE_CLI_SERVICE_PROTOCOL_V6,
    username,
  };
}

export function createExecuteStatementRequest(
  sessionHandle: TSessionHandle,
  statement: string,
  options: Readonly<Record<string, string>>
): TExecuteStatementReq {
  return {
    sessionHandle,
    statement,
    confOverlay: new Map(Object.entries(options)),
    runAsync: true,
  };
}

export function createFetchResultsRequest(operationHandle: TOperationHandle, maxRows: number): TFetchResultsReq {
  return {
    operationHandle,
    orientation: FetchOrientation.FETCH_NEXT,
    maxRows: BigInt(maxRows),
  };
}

// =============================================================================
// Legacy Protocol Records
// =============================================================================

export const beeswaxQueryHandleSchema = z.object({
  id: z.string(),
  log_context: z.string().optional(),
});
export type BeeswaxQueryHandle = z.infer<typeof beeswaxQueryHandleSchema>;

export const beeswaxResultsSchema = z.object({
  ready: z.boolean().optional(),
  columns: z.array(z.string()).optional(),
  data: z.array(z.string()).default([]),
  start_row: z.bigint().optional(),
  has_more: z.boolean().default(false),
});

export const beeswaxResultsMetadataSchema = z.object({
  schema: z.object({
    fieldSchemas: z.array(
      z.object({
        name: z.string(),
        type: z.string(),
        comment: z.string().optional(),
      })
    ),
  }),
});

export const queryStateSchema = z.number().int();

export const logTextSchema = z.string();

export const configVariablesSchema = z.array(
  z.object({
    key: z.string(),
    value: z.string(),
    description: z.string().optional(),
    level: z.number().int().optional(),
  })
);

export const beeswaxStatusSchema = z.object({
  status_code: z.number().int(),
  error_msgs: z.array(z.string()).optional(),
});
export type BeeswaxStatus = z.infer<typeof beeswaxStatusSchema>;

export const beeswaxPingResponseSchema = z.object({
  version: z.string(),
  webserver_address: z.string(),
});

export type BeeswaxQuery = {
  query: string;
  configuration: readonly string[];
  hadoop_user?: string;
};

/**
 * Build a legacy query record; options travel as "key=value" strings
 */
export function createBeeswaxQuery(
  statement: string,
  options: Readonly<Record<string, string>>,
  user: string | undefined
): BeeswaxQuery {
  return {
    query: statement,
    configuration: Object.entries(options).map(([key, value]) => `${key}=${value}`),
    hadoop_user: user,
  };
}
