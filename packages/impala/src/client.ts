/**
 * @lakehouse/impala - Client
 *
 * One client owns one connection: transport, dispatcher, protocol adapter,
 * session and engine are built together by connect() and torn down by
 * close().
 *
 * @example
 * ```typescript
 * const client = createClient({ host: 'coordinator.example', user: 'analyst' });
 * await client.connect();
 * const { columns, rows } = await client.query('select 1');
 * await client.close();
 * ```
 */

import { getLegacyService, getRichService } from '@lakehouse/impala-rpc';

import { LegacyProtocolAdapter } from './adapters/legacy.js';
import { RichProtocolAdapter } from './adapters/rich.js';
import type { IdempotencyOverrides, ProtocolAdapter } from './adapters/types.js';
import { parseConfig } from './config.js';
import type { ImpalaClientConfig, ImpalaClientConfigInput } from './config.js';
import type { ValueConverterTable } from './converters.js';
import { RpcDispatcher } from './dispatcher.js';
import type { Sleep } from './dispatcher.js';
import { QueryExecutionEngine } from './engine.js';
import {
  DisconnectedError,
  HttpError,
  MissingServerMethodError,
  QueryCancelledError,
  RpcApplicationError,
  RpcServerError,
  TransportError,
} from './errors.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { SessionManager } from './session.js';
import type { Session } from './session.js';
import { createTracer } from './tracer.js';
import type { RpcTracer } from './tracer.js';
import { openTransport } from './transport/factory.js';
import type { RuntimeCapabilities } from './transport/factory.js';
import type { HttpSender } from './transport/http.js';
import type { SocketConnector } from './transport/socket.js';
import type { GssapiProvider } from './transport/types.js';
import type { PingResult, Row } from './types.js';

/**
 * Collaborators that cannot live in a serialisable configuration
 */
export interface ClientDependencies {
  logger?: Logger;
  gssapi?: GssapiProvider;
  converters?: ValueConverterTable;
  /** Replaces the tracer built from `rpcTrace` */
  tracer?: RpcTracer;
  idempotency?: IdempotencyOverrides;
  connector?: SocketConnector;
  sender?: HttpSender;
  capabilities?: RuntimeCapabilities;
  sleep?: Sleep;
  now?: () => number;
  /** Correlation id prefix for RPCs */
  requestIdBase?: string;
}

export interface QueryResult {
  columns: string[];
  rows: Row[];
}

interface Connection {
  dispatcher: RpcDispatcher;
  adapter: ProtocolAdapter;
  engine: QueryExecutionEngine;
  sessions: SessionManager;
}

export class ImpalaClient {
  readonly config: ImpalaClientConfig;
  readonly logger: Logger;
  private connection: Connection | undefined;

  constructor(
    config: ImpalaClientConfig,
    private readonly deps: ClientDependencies = {}
  ) {
    this.config = config;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel });
  }

  /**
   * Connect, open a session and ping the server. An existing connection is
   * closed first; on failure the client is left disconnected.
   */
  async connect(): Promise<PingResult> {
    await this.close();
    const { config, deps, logger } = this;

    const transport = await openTransport(config, {
      logger,
      gssapi: deps.gssapi,
      connector: deps.connector,
      sender: deps.sender,
      capabilities: deps.capabilities,
    });
    const dispatcher = new RpcDispatcher({
      service: config.protocol === 'rich' ? getRichService() : getLegacyService(),
      transport,
      maxTries: config.connectMaxTries,
      minRetrySleepSeconds: config.minRetrySleepSeconds,
      logger,
      tracer: deps.tracer ?? createTracer({ stdout: config.rpcTrace.stdout, file: config.rpcTrace.file }),
      sleep: deps.sleep,
      baseId: deps.requestIdBase,
    });
    const adapter: ProtocolAdapter =
      config.protocol === 'rich'
        ? new RichProtocolAdapter({ dispatcher, idempotency: deps.idempotency })
        : new LegacyProtocolAdapter({ dispatcher, logger, idempotency: deps.idempotency });
    const engine = new QueryExecutionEngine({
      adapter,
      dispatcher,
      fetchSize: config.fetchSize,
      converters: deps.converters,
      webserverAddress: () => this.connection?.sessions.webserverAddress ?? null,
      now: deps.now,
      sleep: deps.sleep,
    });
    const sessions = new SessionManager({
      adapter,
      dispatcher,
      logger,
      runStatement: (statement) => engine.collect(statement),
    });
    this.connection = { dispatcher, adapter, engine, sessions };

    try {
      await sessions.open(config.user);
      return await sessions.ping();
    } catch (error) {
      await this.close();
      throw error;
    }
  }

  isConnected(): boolean {
    return this.connection?.dispatcher.isConnected() ?? false;
  }

  /**
   * Ping the server; on a communication failure disconnect and report false
   */
  async checkConnection(): Promise<boolean> {
    const connection = this.connection;
    if (!connection || !connection.dispatcher.isConnected()) {
      return false;
    }
    try {
      await connection.sessions.ping();
      return true;
    } catch (error) {
      if (!isCommunicationFailure(error)) {
        throw error;
      }
      this.logger.debug(`Connection check failed: ${error.message}`);
      await this.close();
      return false;
    }
  }

  /**
   * Close the session and the connection. Safe to call when disconnected.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = undefined;
    await connection?.sessions.close();
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new DisconnectedError('Not connected (use connect() to establish a connection)');
    }
    return this.connection;
  }

  get engine(): QueryExecutionEngine {
    return this.requireConnection().engine;
  }

  get session(): Session | undefined {
    return this.connection?.sessions.session;
  }

  get webserverAddress(): string | null {
    return this.connection?.sessions.webserverAddress ?? null;
  }

  /**
   * Run a statement to completion and return its rows
   *
   * @throws QueryCancelledError when the query was cancelled while running
   */
  async query(sql: string, options: Readonly<Record<string, string>> = {}): Promise<QueryResult> {
    const engine = this.engine;
    const handle = await engine.submit(sql, options);
    try {
      if ((await engine.wait(handle)) === 'cancelled') {
        throw new QueryCancelledError();
      }
      if (!handle.hasResultSet) {
        return { columns: [], rows: [] };
      }
      const rows: Row[] = [];
      const stream = engine.fetch(handle);
      for await (const batch of stream) {
        rows.push(...batch.rows);
      }
      if (stream.cancelled) {
        throw new QueryCancelledError();
      }
      return { columns: engine.columnNames(handle), rows };
    } finally {
      try {
        await engine.close(handle);
      } catch (error) {
        this.logger.logException('Warning', 'could not close query.', error);
      }
    }
  }
}

function isCommunicationFailure(error: unknown): error is Error {
  return (
    error instanceof DisconnectedError ||
    error instanceof TransportError ||
    error instanceof HttpError ||
    error instanceof RpcServerError ||
    error instanceof RpcApplicationError ||
    error instanceof MissingServerMethodError
  );
}

/**
 * Validate a configuration and build a client for it
 */
export function createClient(config: ImpalaClientConfigInput, deps: ClientDependencies = {}): ImpalaClient {
  return new ImpalaClient(parseConfig(config), deps);
}
