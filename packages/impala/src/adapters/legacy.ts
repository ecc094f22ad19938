/**
 * @lakehouse/impala - Legacy Protocol Adapter
 *
 * Beeswax: no session of its own (the connection is the session), results
 * as tab-separated lines, no DML statistics, profiles or summaries.
 */

import {
  ErrorCode,
  LegacyException,
  LegacyMethod,
  QueryState,
  beeswaxPingResponseSchema,
  beeswaxQueryHandleSchema,
  beeswaxResultsMetadataSchema,
  beeswaxResultsSchema,
  beeswaxStatusSchema,
  configVariablesSchema,
  createBeeswaxQuery,
  logTextSchema,
  parseResponse,
  queryStateSchema,
} from '@lakehouse/impala-rpc';
import type {
  BeeswaxQueryHandle,
  BeeswaxStatus,
  LegacyMethodName,
  ServiceException,
  TExecSummary,
  WireStruct,
} from '@lakehouse/impala-rpc';
import { z } from 'zod';

import { completed } from '../dispatcher.js';
import type { RpcDispatcher, RpcOutcome } from '../dispatcher.js';
import { columnTypeFromName } from '../decoder.js';
import { QueryCancelledError, QueryStateError, RpcServerError } from '../errors.js';
import type { Logger } from '../logger.js';
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
} from './types.js';

export const LEGACY_IDEMPOTENCY: Idempotency = {
  openSession: false,
  closeSession: false,
  ping: true,
  defaultOptions: false,
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

/** Statement kinds the server never returns result metadata for */
const NO_RESULT_PREFIXES = ['use'];

/**
 * Guess from the statement text whether the server will produce a result set
 */
export function expectResultMetadata(statement: string): boolean {
  const head = statement.slice(0, 3).toLowerCase();
  return !NO_RESULT_PREFIXES.some((prefix) => head.startsWith(prefix));
}

export function mapQueryState(state: number): ServerQueryState {
  switch (state) {
    case QueryState.FINISHED:
      return 'FINISHED';
    case QueryState.EXCEPTION:
      return 'ERROR';
    default:
      return 'RUNNING';
  }
}

/**
 * Map declared service exceptions to client errors
 */
export function translateLegacyException(error: ServiceException): Error {
  if (error.exceptionName === LegacyException.QUERY_NOT_FOUND) {
    return new QueryStateError('Error: Stale query handle');
  }
  return new RpcServerError(`ERROR: ${error.message}`);
}

/**
 * True for an OK status. A failed status carrying messages raises; one
 * without messages reports false.
 */
export function checkLegacyStatus(status: BeeswaxStatus): boolean {
  if (status.status_code === ErrorCode.OK) {
    return true;
  }
  if (status.error_msgs && status.error_msgs.length > 0) {
    throw new RpcServerError(`RPC Error: ${status.error_msgs.join('\n')}`);
  }
  return false;
}

function valueOf<T>(outcome: RpcOutcome<T>): T {
  if (outcome.cancelled) {
    throw new QueryCancelledError();
  }
  return outcome.value;
}

/** Reply of a method declared void */
const voidSchema = z.undefined();

export interface LegacyAdapterOptions {
  dispatcher: RpcDispatcher;
  logger: Logger;
  idempotency?: IdempotencyOverrides;
}

export class LegacyProtocolAdapter implements ProtocolAdapter {
  readonly idempotency: Idempotency;

  private readonly dispatcher: RpcDispatcher;
  private readonly logger: Logger;
  private user: string | undefined;
  private readonly queries = new WeakMap<QueryHandle, BeeswaxQueryHandle>();

  constructor(options: LegacyAdapterOptions) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.idempotency = resolveIdempotency(LEGACY_IDEMPOTENCY, options.idempotency);
  }

  private call<S extends z.ZodTypeAny>(
    operation: AdapterOperation,
    method: LegacyMethodName,
    args: WireStruct,
    schema: S,
    handle?: QueryHandle,
    suppressOnCancel = true
  ): Promise<RpcOutcome<z.output<S>>> {
    return this.dispatcher.invoke({
      method,
      args,
      decode: (value, name) => parseResponse(schema, value, name),
      idempotent: this.idempotency[operation],
      suppressOnCancel,
      queryId: handle?.id ?? null,
      isCancelled: () => handle?.cancelRequested ?? false,
      translate: translateLegacyException,
    });
  }

  private queryOf(handle: QueryHandle): BeeswaxQueryHandle {
    const query = this.queries.get(handle);
    if (!query) {
      throw new QueryStateError('Error: Stale query handle');
    }
    return query;
  }

  async openSession(user: string | undefined): Promise<SessionInfo> {
    this.user = user;
    return { sessionId: null };
  }

  async defaultOptions(): Promise<QueryOption[]> {
    try {
      const variables = valueOf(
        await this.call(
          'defaultOptions',
          LegacyMethod.GET_DEFAULT_CONFIGURATION,
          { include_hadoop: false },
          configVariablesSchema
        )
      );
      return variables.map((variable) => ({
        name: variable.key,
        value: variable.value,
        level: variable.level ?? null,
      }));
    } catch (error) {
      this.logger.logException('Warning', 'could not retrieve default query options.', error);
      return [];
    }
  }

  async ping(): Promise<PingResult> {
    const response = valueOf(await this.call('ping', LegacyMethod.PING, {}, beeswaxPingResponseSchema));
    return { version: response.version, webserverAddress: response.webserver_address };
  }

  async closeSession(): Promise<void> {
    // The session ends with the connection
  }

  async execute(statement: string, options: Readonly<Record<string, string>>): Promise<QueryHandle> {
    let query: BeeswaxQueryHandle;
    try {
      query = valueOf(
        await this.call(
          'execute',
          LegacyMethod.QUERY,
          { query: createBeeswaxQuery(statement, options, this.user) },
          beeswaxQueryHandleSchema,
          undefined,
          false
        )
      );
    } catch (error) {
      if (error instanceof RpcServerError) {
        throw new QueryStateError(error.message);
      }
      throw error;
    }
    const handle = new QueryHandle(query.id, statement, expectResultMetadata(statement));
    this.queries.set(handle, query);
    return handle;
  }

  async getResultSchema(handle: QueryHandle): Promise<RpcOutcome<Schema>> {
    const outcome = await this.call(
      'getResultSchema',
      LegacyMethod.GET_RESULTS_METADATA,
      { handle: this.queryOf(handle) },
      beeswaxResultsMetadataSchema,
      handle
    );
    if (outcome.cancelled) return outcome;
    return completed({
      columns: outcome.value.schema.fieldSchemas.map((field) => ({
        name: field.name,
        type: columnTypeFromName(field.type),
      })),
    });
  }

  async getState(handle: QueryHandle): Promise<RpcOutcome<ServerQueryState>> {
    const outcome = await this.call(
      'getState',
      LegacyMethod.GET_STATE,
      { handle: this.queryOf(handle) },
      queryStateSchema,
      handle
    );
    if (outcome.cancelled) return outcome;
    return completed(mapQueryState(outcome.value));
  }

  async fetch(handle: QueryHandle, maxRows: number): Promise<RpcOutcome<WireBatch>> {
    const outcome = await this.call(
      'fetch',
      LegacyMethod.FETCH,
      { query_id: this.queryOf(handle), start_over: false, fetch_size: maxRows },
      beeswaxResultsSchema,
      handle
    );
    if (outcome.cancelled) return outcome;
    return completed({ kind: 'delimited', lines: outcome.value.data, hasMore: outcome.value.has_more });
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    const status = valueOf(
      await this.call('cancel', LegacyMethod.CANCEL, { query_id: this.queryOf(handle) }, beeswaxStatusSchema, handle, false)
    );
    return checkLegacyStatus(status);
  }

  async close(handle: QueryHandle): Promise<RpcOutcome<boolean>> {
    const outcome = await this.call('close', LegacyMethod.CLOSE, { handle: this.queryOf(handle) }, voidSchema, handle);
    if (outcome.cancelled) return outcome;
    return completed(true);
  }

  async closeDml(handle: QueryHandle): Promise<RpcOutcome<DmlStats>> {
    const outcome = await this.call('closeDml', LegacyMethod.CLOSE, { handle: this.queryOf(handle) }, voidSchema, handle);
    if (outcome.cancelled) return outcome;
    return completed({ rowsModified: null, rowsDeleted: null, rowErrors: null });
  }

  async getLog(handle: QueryHandle): Promise<string> {
    const query = this.queryOf(handle);
    return valueOf(
      await this.call(
        'getLog',
        LegacyMethod.GET_LOG,
        { context: query.log_context ?? query.id },
        logTextSchema,
        handle,
        false
      )
    );
  }

  async getRuntimeProfile(): Promise<QueryArtifacts<string>> {
    return { latest: null, failedAttempt: null };
  }

  async getSummary(): Promise<QueryArtifacts<TExecSummary>> {
    return { latest: null, failedAttempt: null };
  }
}
