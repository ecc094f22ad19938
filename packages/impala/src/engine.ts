/**
 * @lakehouse/impala - Query Execution Engine
 *
 * Drives one statement through submit, poll, wait, fetch, cancel and
 * close. The engine sees only the ProtocolAdapter contract.
 *
 * Lifecycle: CREATED -> RUNNING -> (FINISHED | ERROR | CANCELLED) -> CLOSED
 */

import type { TExecSummary } from '@lakehouse/impala-rpc';

import { defaultSleep } from './dispatcher.js';
import type { RpcDispatcher, RpcOutcome, Sleep } from './dispatcher.js';
import { IDENTITY_CONVERTERS } from './converters.js';
import type { ValueConverterTable } from './converters.js';
import { decodeBatch } from './decoder.js';
import { DisconnectedError, QueryCancelledError, QueryStateError } from './errors.js';
import type { ProtocolAdapter, QueryHandle } from './adapters/types.js';
import type { DmlStats, QueryArtifacts, QueryState, ResultBatch, Row, WaitResult, WireBatch } from './types.js';

const PROGRESS_LINE = /Query.*Complete \([0-9]* out of [0-9]*\)\n/g;
const RETRIED_QUERY = /Query has been retried using query id: (.*)\n/;

/**
 * Seconds to sleep between status polls, as a step function of the time
 * spent waiting so far
 */
export function pollIntervalSeconds(elapsedSeconds: number): number {
  if (elapsedSeconds < 10) return 0.1;
  if (elapsedSeconds < 60) return 0.5;
  return 1;
}

/**
 * Link to the server's debug page for a query
 */
export function queryLink(webserverAddress: string, queryId: string): string {
  return `${webserverAddress}/query_plan?query_id=${queryId}`;
}

/**
 * Remove progress lines and, when the query was retried on the server, add
 * a link to the retried query
 */
export function processLog(raw: string, webserverAddress: string | null): string {
  let log = raw.replace(PROGRESS_LINE, '');
  if (webserverAddress) {
    const match = RETRIED_QUERY.exec(log);
    if (match?.[1] !== undefined) {
      log += `Retried query link: ${queryLink(webserverAddress, match[1])}`;
    }
  }
  return log;
}

/**
 * Async iterator over the batches of one result set. Each next() performs
 * one fetch; return() abandons the stream without contacting the server.
 */
export class ResultStream implements AsyncIterableIterator<ResultBatch> {
  private finished = false;
  private cancelledFlag = false;

  constructor(
    private readonly adapter: ProtocolAdapter,
    private readonly handle: QueryHandle,
    private readonly fetchSize: number,
    private readonly converters: ValueConverterTable
  ) {}

  /** True when the stream ended because the query was cancelled */
  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  get done(): boolean {
    return this.finished;
  }

  async next(): Promise<IteratorResult<ResultBatch>> {
    if (this.finished) {
      return { done: true, value: undefined };
    }
    let outcome: RpcOutcome<WireBatch>;
    try {
      outcome = await this.adapter.fetch(this.handle, this.fetchSize);
    } catch (error) {
      this.finished = true;
      throw error;
    }
    if (outcome.cancelled) {
      this.finished = true;
      this.cancelledFlag = true;
      return { done: true, value: undefined };
    }
    if (!outcome.value.hasMore) {
      this.finished = true;
    }
    return { done: false, value: decodeBatch(outcome.value, this.converters) };
  }

  async return(): Promise<IteratorResult<ResultBatch>> {
    this.finished = true;
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<ResultBatch> {
    return this;
  }
}

export interface EngineOptions {
  adapter: ProtocolAdapter;
  dispatcher: RpcDispatcher;
  fetchSize: number;
  converters?: ValueConverterTable;
  /** Address of the server's debug web UI, once known */
  webserverAddress?: () => string | null;
  /** Milliseconds since an arbitrary origin */
  now?: () => number;
  sleep?: Sleep;
}

export class QueryExecutionEngine {
  private readonly adapter: ProtocolAdapter;
  private readonly dispatcher: RpcDispatcher;
  private readonly converters: ValueConverterTable;
  private readonly webserverAddress: () => string | null;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  readonly fetchSize: number;

  constructor(options: EngineOptions) {
    this.adapter = options.adapter;
    this.dispatcher = options.dispatcher;
    this.fetchSize = options.fetchSize;
    this.converters = options.converters ?? IDENTITY_CONVERTERS;
    this.webserverAddress = options.webserverAddress ?? (() => null);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Start a statement. When it produces a result set, the schema is
   * attached to the returned handle.
   */
  async submit(statement: string, options: Readonly<Record<string, string>> = {}): Promise<QueryHandle> {
    const handle = await this.adapter.execute(statement, options);
    handle.state = 'RUNNING';
    if (handle.hasResultSet) {
      const schema = await this.adapter.getResultSchema(handle);
      if (schema.cancelled) {
        handle.state = 'CANCELLED';
      } else {
        handle.schema = schema.value;
      }
    }
    return handle;
  }

  async poll(handle: QueryHandle): Promise<QueryState> {
    const outcome = await this.adapter.getState(handle);
    const state = outcome.cancelled ? 'CANCELLED' : outcome.value;
    if (!handle.closed) {
      handle.state = state;
    }
    return state;
  }

  /**
   * Poll until the query finishes. `onTick` runs after every poll that
   * found the query still running.
   *
   * @throws QueryStateError carrying the error log when the query failed
   * @throws DisconnectedError when the connection was lost
   */
  async wait(handle: QueryHandle, onTick?: () => void | Promise<void>): Promise<WaitResult> {
    const loopStart = this.now();
    for (;;) {
      const rpcStart = this.now();
      const state = await this.poll(handle);
      const rpcSeconds = (this.now() - rpcStart) / 1000;

      if (state === 'FINISHED') {
        return 'finished';
      }
      if (state === 'ERROR' || state === 'CANCELLED' || state === 'CLOSED') {
        if (handle.cancelRequested) {
          return 'cancelled';
        }
        if (!this.dispatcher.isConnected()) {
          throw new DisconnectedError('Not connected to impalad.');
        }
        const log = await this.getErrors(handle);
        throw new QueryStateError(log, log);
      }

      await onTick?.();
      const target = pollIntervalSeconds((this.now() - loopStart) / 1000);
      if (rpcSeconds < target) {
        await this.sleep((target - rpcSeconds) * 1000);
      }
    }
  }

  /**
   * Stream the result set of a query
   */
  fetch(handle: QueryHandle): ResultStream {
    if (!handle.hasResultSet) {
      throw new QueryStateError(`Query ${handle.id} has no result set`);
    }
    if (!handle.schema) {
      throw new QueryStateError(`Query ${handle.id} has no result schema`);
    }
    return new ResultStream(this.adapter, handle, this.fetchSize, this.converters);
  }

  /**
   * Read every remaining row
   */
  async fetchAll(handle: QueryHandle): Promise<Row[]> {
    const rows: Row[] = [];
    for await (const batch of this.fetch(handle)) {
      rows.push(...batch.rows);
    }
    return rows;
  }

  /**
   * Mark the query as cancelled by the caller without contacting the server
   */
  requestCancel(handle: QueryHandle): void {
    handle.requestCancel();
  }

  async cancel(handle: QueryHandle): Promise<boolean> {
    handle.requestCancel();
    if (handle.closed) {
      return true;
    }
    const cancelled = await this.adapter.cancel(handle);
    if (cancelled) {
      handle.state = 'CANCELLED';
    }
    return cancelled;
  }

  /**
   * Close a query. Closing twice is a no-op; the handle counts as closed
   * after the first attempt whatever its outcome.
   */
  async close(handle: QueryHandle): Promise<boolean> {
    if (handle.closed) {
      return true;
    }
    try {
      const outcome = await this.adapter.close(handle);
      return outcome.cancelled ? false : outcome.value;
    } finally {
      handle.markClosed();
    }
  }

  /**
   * Close a DML statement and collect its statistics. Issued at most once.
   */
  async closeDml(handle: QueryHandle): Promise<RpcOutcome<DmlStats>> {
    const outcome = await this.adapter.closeDml(handle);
    if (!outcome.cancelled) {
      handle.markClosed();
    }
    return outcome;
  }

  async getLog(handle: QueryHandle): Promise<string> {
    return processLog(await this.adapter.getLog(handle), this.webserverAddress());
  }

  async getWarnings(handle: QueryHandle): Promise<string> {
    return prefixed('WARNINGS', await this.getLog(handle));
  }

  async getErrors(handle: QueryHandle): Promise<string> {
    return prefixed('ERROR', await this.getLog(handle));
  }

  getRuntimeProfile(handle: QueryHandle): Promise<QueryArtifacts<string>> {
    return this.adapter.getRuntimeProfile(handle);
  }

  getSummary(handle: QueryHandle): Promise<QueryArtifacts<TExecSummary>> {
    return this.adapter.getSummary(handle);
  }

  columnNames(handle: QueryHandle): string[] {
    return handle.schema?.columns.map((column) => column.name) ?? [];
  }

  queryLink(handle: QueryHandle): string | null {
    const address = this.webserverAddress();
    return address ? queryLink(address, handle.id) : null;
  }

  /**
   * Run a statement without waiting and return all of its rows, closing the
   * query afterwards
   */
  async collect(statement: string): Promise<Row[]> {
    const handle = await this.submit(statement);
    try {
      if (handle.state === 'CANCELLED') {
        throw new QueryCancelledError();
      }
      return handle.hasResultSet ? await this.fetchAll(handle) : [];
    } finally {
      await this.close(handle);
    }
  }
}

function prefixed(label: string, log: string): string {
  return log.trim() ? `${label}: ${log}` : '';
}
