/**
 * @lakehouse/impala - Rich Protocol Adapter
 *
 * HiveServer2 with the engine's extensions: sessions, DML statistics,
 * runtime profiles and execution summaries including failed attempts.
 */

import {
  MalformedResponseError,
  OperationState,
  ProtocolVersion,
  RichMethod,
  StatusCode,
  closeImpalaOperationResponseSchema,
  createExecuteStatementRequest,
  createFetchResultsRequest,
  createOpenSessionRequest,
  execSummaryResponseSchema,
  executeStatementResponseSchema,
  fetchResultsResponseSchema,
  getLogResponseSchema,
  isSuccessStatus,
  openSessionResponseSchema,
  operationStatusResponseSchema,
  parseQueryOptionLevel,
  parseResponse,
  pingResponseSchema,
  resultSetMetadataResponseSchema,
  runtimeProfileResponseSchema,
  statusOnlyResponseSchema,
} from '@lakehouse/impala-rpc';
import type {
  RichMethodName,
  TDmlResult,
  TExecSummary,
  TOperationHandle,
  TSessionHandle,
  TStatus,
  WireStruct,
} from '@lakehouse/impala-rpc';
import type { z } from 'zod';

import { CANCELLED, completed } from '../dispatcher.js';
import type { RpcDispatcher, RpcOutcome } from '../dispatcher.js';
import { buildColumnData, columnFromDesc, formatGuid } from '../decoder.js';
import { DisconnectedError, QueryCancelledError, QueryStateError, RpcServerError } from '../errors.js';
import type { DmlStats, PingResult, QueryArtifacts, Schema, WireBatch } from '../types.js';

import { QueryHandle, resolveIdempotency } from './types.js';
import type {
  AdapterOperation,
  Idempotency,
  IdempotencyOverrides,
  ProtocolAdapter,
  QueryOption,
  ServerQueryState,
  SessionInfo,
  StatementRunner,
} from './types.js';

export const RICH_IDEMPOTENCY: Idempotency = {
  openSession: true,
  closeSession: true,
  ping: true,
  defaultOptions: true,
  execute: false,
  getResultSchema: true,
  getState: true,
  fetch: false,
  cancel: true,
  close: true,
  closeDml: false,
  getLog: true,
  getRuntimeProfile: true,
  getSummary: true,
};

/** Statement that lists every query option with its value and level */
export const LIST_OPTIONS_STATEMENT = 'set all';

/**
 * Sum per-partition DML counters
 */
export function summarizeDmlResult(result: TDmlResult): DmlStats {
  const sum = (counts: ReadonlyMap<string, bigint>): number =>
    Number([...counts.values()].reduce((total, count) => total + count, 0n));
  return {
    rowsModified: sum(result.rows_modified),
    rowsDeleted: result.rows_deleted && result.rows_deleted.size > 0 ? sum(result.rows_deleted) : null,
    rowErrors: result.num_row_errors !== undefined ? Number(result.num_row_errors) : null,
  };
}

export function mapOperationState(state: number | undefined): ServerQueryState {
  switch (state) {
    case OperationState.INITIALIZED:
    case OperationState.PENDING:
    case OperationState.RUNNING:
      return 'RUNNING';
    case OperationState.FINISHED:
      return 'FINISHED';
    case OperationState.CANCELED:
      return 'CANCELLED';
    case OperationState.CLOSED:
      return 'CLOSED';
    default:
      return 'ERROR';
  }
}

function valueOf<T>(outcome: RpcOutcome<T>): T {
  if (outcome.cancelled) {
    throw new QueryCancelledError();
  }
  return outcome.value;
}

interface CallOptions {
  handle?: QueryHandle;
  suppressOnCancel?: boolean;
}

export interface RichAdapterOptions {
  dispatcher: RpcDispatcher;
  idempotency?: IdempotencyOverrides;
}

export class RichProtocolAdapter implements ProtocolAdapter {
  readonly idempotency: Idempotency;

  private readonly dispatcher: RpcDispatcher;
  private session: TSessionHandle | undefined;
  private readonly operations = new WeakMap<QueryHandle, TOperationHandle>();

  constructor(options: RichAdapterOptions) {
    this.dispatcher = options.dispatcher;
    this.idempotency = resolveIdempotency(RICH_IDEMPOTENCY, options.idempotency);
  }

  private call<S extends z.ZodTypeAny>(
    operation: AdapterOperation,
    method: RichMethodName,
    req: WireStruct,
    schema: S,
    options: CallOptions = {}
  ): Promise<RpcOutcome<z.output<S>>> {
    const { handle } = options;
    return this.dispatcher.invoke({
      method,
      args: { req },
      decode: (value, name) => parseResponse(schema, value, name),
      idempotent: this.idempotency[operation],
      suppressOnCancel: options.suppressOnCancel ?? true,
      queryId: handle?.id ?? null,
      isCancelled: () => handle?.cancelRequested ?? false,
    });
  }

  /**
   * Raise on error statuses, or report cancellation if the query was
   * cancelled and the caller asked for suppression
   */
  private verify<T extends { status: TStatus }>(
    outcome: RpcOutcome<T>,
    options: CallOptions = {}
  ): RpcOutcome<T> {
    if (outcome.cancelled) {
      return outcome;
    }
    const { statusCode, errorMessage } = outcome.value.status;
    const suppress = (options.suppressOnCancel ?? true) && options.handle?.cancelRequested === true;
    if (statusCode === StatusCode.ERROR) {
      if (suppress) return CANCELLED;
      throw new RpcServerError(`ERROR: ${errorMessage ?? ''}`);
    }
    if (statusCode === StatusCode.INVALID_HANDLE) {
      if (suppress) return CANCELLED;
      throw new QueryStateError('Error: Stale query handle');
    }
    return outcome;
  }

  private requireSession(): TSessionHandle {
    if (!this.session) {
      throw new DisconnectedError('Not connected (use connect() to establish a connection)');
    }
    return this.session;
  }

  private operationOf(handle: QueryHandle): TOperationHandle {
    const operation = this.operations.get(handle);
    if (!operation) {
      throw new QueryStateError('Error: Stale query handle');
    }
    return operation;
  }

  async openSession(user: string | undefined): Promise<SessionInfo> {
    const method = RichMethod.OPEN_SESSION;
    const response = valueOf(
      this.verify(await this.call('openSession', method, createOpenSessionRequest(user), openSessionResponseSchema), {
        suppressOnCancel: false,
      })
    );
    if (response.serverProtocolVersion !== ProtocolVersion.HIVE_CLI_SERVICE_PROTOCOL_V6) {
      throw new RpcServerError(
        `Unexpected protocol version ${response.serverProtocolVersion}, expected ${ProtocolVersion.HIVE_CLI_SERVICE_PROTOCOL_V6}`
      );
    }
    if (!response.sessionHandle) {
      throw new MalformedResponseError(method, 'sessionHandle: Required');
    }
    this.session = response.sessionHandle;
    return { sessionId: formatGuid(response.sessionHandle.sessionId.guid) };
  }

  async defaultOptions(runStatement: StatementRunner): Promise<QueryOption[]> {
    const rows = await runStatement(LIST_OPTIONS_STATEMENT);
    const options: QueryOption[] = [];
    for (const [name, value, level] of rows) {
      if (name === undefined || value === undefined) continue;
      options.push({
        name: String(name),
        value: String(value),
        level: level === undefined ? null : parseQueryOptionLevel(String(level)),
      });
    }
    return options;
  }

  async ping(): Promise<PingResult> {
    const req: WireStruct = this.session ? { sessionHandle: this.session } : {};
    const response = valueOf(
      this.verify(await this.call('ping', RichMethod.PING, req, pingResponseSchema), { suppressOnCancel: false })
    );
    return {
      version: response.version ?? '',
      webserverAddress: response.webserver_address ?? null,
    };
  }

  async closeSession(): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    try {
      this.verify(
        await this.call('closeSession', RichMethod.CLOSE_SESSION, { sessionHandle: session }, statusOnlyResponseSchema),
        { suppressOnCancel: false }
      );
    } finally {
      this.session = undefined;
    }
  }

  async execute(statement: string, options: Readonly<Record<string, string>>): Promise<QueryHandle> {
    const method = RichMethod.EXECUTE_STATEMENT;
    const request = createExecuteStatementRequest(this.requireSession(), statement, options);
    const response = valueOf(
      await this.call('execute', method, request, executeStatementResponseSchema, { suppressOnCancel: false })
    );
    if (response.status.statusCode !== StatusCode.SUCCESS) {
      throw new QueryStateError(`ERROR: ${response.status.errorMessage ?? ''}`);
    }
    const operation = response.operationHandle;
    if (!operation) {
      throw new MalformedResponseError(method, 'operationHandle: Required');
    }
    const handle = new QueryHandle(formatGuid(operation.operationId.guid), statement, operation.hasResultSet);
    this.operations.set(handle, operation);
    return handle;
  }

  async getResultSchema(handle: QueryHandle): Promise<RpcOutcome<Schema>> {
    const method = RichMethod.GET_RESULT_SET_METADATA;
    const outcome = this.verify(
      await this.call(
        'getResultSchema',
        method,
        { operationHandle: this.operationOf(handle) },
        resultSetMetadataResponseSchema,
        { handle }
      ),
      { handle }
    );
    if (outcome.cancelled) return outcome;
    const schema = outcome.value.schema;
    if (!schema) {
      throw new MalformedResponseError(method, 'schema: Required');
    }
    return completed({ columns: schema.columns.map(columnFromDesc) });
  }

  async getState(handle: QueryHandle): Promise<RpcOutcome<ServerQueryState>> {
    const outcome = this.verify(
      await this.call(
        'getState',
        RichMethod.GET_OPERATION_STATUS,
        { operationHandle: this.operationOf(handle) },
        operationStatusResponseSchema,
        { handle }
      ),
      { handle }
    );
    if (outcome.cancelled) return outcome;
    return completed(mapOperationState(outcome.value.operationState));
  }

  async fetch(handle: QueryHandle, maxRows: number): Promise<RpcOutcome<WireBatch>> {
    const outcome = this.verify(
      await this.call(
        'fetch',
        RichMethod.FETCH_RESULTS,
        createFetchResultsRequest(this.operationOf(handle), maxRows),
        fetchResultsResponseSchema,
        { handle }
      ),
      { handle }
    );
    if (outcome.cancelled) return outcome;
    const response = outcome.value;
    return completed({
      kind: 'columnar',
      columns: buildColumnData(response.results?.columns ?? [], handle.schema),
      hasMore: response.hasMoreRows,
    });
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    const response = valueOf(
      await this.call(
        'cancel',
        RichMethod.CANCEL_OPERATION,
        { operationHandle: this.operationOf(handle) },
        statusOnlyResponseSchema,
        { handle, suppressOnCancel: false }
      )
    );
    return isSuccessStatus(response.status.statusCode);
  }

  async close(handle: QueryHandle): Promise<RpcOutcome<boolean>> {
    const outcome = await this.call(
      'close',
      RichMethod.CLOSE_IMPALA_OPERATION,
      { operationHandle: this.operationOf(handle) },
      closeImpalaOperationResponseSchema,
      { handle }
    );
    if (outcome.cancelled) return outcome;
    return completed(isSuccessStatus(outcome.value.status.statusCode));
  }

  async closeDml(handle: QueryHandle): Promise<RpcOutcome<DmlStats>> {
    const outcome = this.verify(
      await this.call(
        'closeDml',
        RichMethod.CLOSE_IMPALA_OPERATION,
        { operationHandle: this.operationOf(handle) },
        closeImpalaOperationResponseSchema,
        { handle }
      ),
      { handle }
    );
    if (outcome.cancelled) return outcome;
    const result = outcome.value.dml_result;
    if (!result) {
      throw new RpcServerError('Impala DML operation did not return DML statistics.');
    }
    return completed(summarizeDmlResult(result));
  }

  async getLog(handle: QueryHandle): Promise<string> {
    const options: CallOptions = { handle, suppressOnCancel: false };
    const response = valueOf(
      this.verify(
        await this.call(
          'getLog',
          RichMethod.GET_LOG,
          { operationHandle: this.operationOf(handle) },
          getLogResponseSchema,
          options
        ),
        options
      )
    );
    return response.log;
  }

  async getRuntimeProfile(handle: QueryHandle): Promise<QueryArtifacts<string>> {
    const options: CallOptions = { handle, suppressOnCancel: false };
    const response = valueOf(
      this.verify(
        await this.call(
          'getRuntimeProfile',
          RichMethod.GET_RUNTIME_PROFILE,
          {
            operationHandle: this.operationOf(handle),
            sessionHandle: this.requireSession(),
            include_query_attempts: true,
          },
          runtimeProfileResponseSchema,
          options
        ),
        options
      )
    );
    return {
      latest: response.profile ?? null,
      failedAttempt: response.failed_profiles?.[0] ?? null,
    };
  }

  async getSummary(handle: QueryHandle): Promise<QueryArtifacts<TExecSummary>> {
    const options: CallOptions = { handle, suppressOnCancel: false };
    const response = valueOf(
      this.verify(
        await this.call(
          'getSummary',
          RichMethod.GET_EXEC_SUMMARY,
          {
            operationHandle: this.operationOf(handle),
            sessionHandle: this.requireSession(),
            include_query_attempts: true,
          },
          execSummaryResponseSchema,
          options
        ),
        options
      )
    );
    return {
      latest: response.summary ?? null,
      failedAttempt: response.failed_summaries?.[0] ?? null,
    };
  }
}
