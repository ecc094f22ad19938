/**
 * @lakehouse/impala - Protocol Adapter Contract
 *
 * The engine and session manager talk to the server only through this
 * interface. Each wire protocol variant implements it once.
 */

import type { QueryOptionLevel, TExecSummary } from '@lakehouse/impala-rpc';

import type { RpcOutcome } from '../dispatcher.js';
import type { DmlStats, PingResult, QueryArtifacts, QueryState, Row, Schema, WireBatch } from '../types.js';

/**
 * A submitted statement. The protocol-level handle stays with the adapter
 * that issued it.
 */
export class QueryHandle {
  private closedFlag = false;
  private cancelFlag = false;
  /** Attached by submit() whenever hasResultSet is true */
  schema: Schema | undefined;
  state: QueryState = 'CREATED';

  constructor(
    /** Rendered query id */
    readonly id: string,
    readonly statement: string,
    readonly hasResultSet: boolean
  ) {}

  get closed(): boolean {
    return this.closedFlag;
  }

  markClosed(): void {
    this.closedFlag = true;
    this.state = 'CLOSED';
  }

  get cancelRequested(): boolean {
    return this.cancelFlag;
  }

  requestCancel(): void {
    this.cancelFlag = true;
  }
}

export type AdapterOperation =
  | 'openSession'
  | 'closeSession'
  | 'ping'
  | 'defaultOptions'
  | 'execute'
  | 'getResultSchema'
  | 'getState'
  | 'fetch'
  | 'cancel'
  | 'close'
  | 'closeDml'
  | 'getLog'
  | 'getRuntimeProfile'
  | 'getSummary';

export type Idempotency = Readonly<Record<AdapterOperation, boolean>>;

export type IdempotencyOverrides = Partial<Record<AdapterOperation, boolean>>;

/** Operations that may run at most once per request */
export const NEVER_IDEMPOTENT = ['execute', 'fetch', 'closeDml'] as const;

/**
 * Apply overrides to a base classification. Mutating operations stay
 * non-idempotent whatever the overrides say.
 */
export function resolveIdempotency(base: Idempotency, overrides: IdempotencyOverrides = {}): Idempotency {
  const resolved: Record<AdapterOperation, boolean> = { ...base, ...overrides };
  for (const operation of NEVER_IDEMPOTENT) {
    resolved[operation] = false;
  }
  return resolved;
}

export interface SessionInfo {
  /** Rendered session id; null where sessions are scoped to the connection */
  sessionId: string | null;
}

export interface QueryOption {
  name: string;
  value: string;
  level: QueryOptionLevel | null;
}

/**
 * Runs a statement to completion and returns every row
 */
export type StatementRunner = (statement: string) => Promise<Row[]>;

/** Server-side state as the engine sees it */
export type ServerQueryState = Exclude<QueryState, 'CREATED'>;

export interface ProtocolAdapter {
  readonly idempotency: Idempotency;

  openSession(user: string | undefined): Promise<SessionInfo>;
  /**
   * List the server's query options, either through a protocol call or by
   * running a statement with `runStatement`
   */
  defaultOptions(runStatement: StatementRunner): Promise<QueryOption[]>;
  ping(): Promise<PingResult>;
  closeSession(): Promise<void>;

  execute(statement: string, options: Readonly<Record<string, string>>): Promise<QueryHandle>;
  getResultSchema(handle: QueryHandle): Promise<RpcOutcome<Schema>>;
  getState(handle: QueryHandle): Promise<RpcOutcome<ServerQueryState>>;
  fetch(handle: QueryHandle, maxRows: number): Promise<RpcOutcome<WireBatch>>;
  cancel(handle: QueryHandle): Promise<boolean>;
  close(handle: QueryHandle): Promise<RpcOutcome<boolean>>;
  closeDml(handle: QueryHandle): Promise<RpcOutcome<DmlStats>>;
  getLog(handle: QueryHandle): Promise<string>;
  getRuntimeProfile(handle: QueryHandle): Promise<QueryArtifacts<string>>;
  getSummary(handle: QueryHandle): Promise<QueryArtifacts<TExecSummary>>;
}
