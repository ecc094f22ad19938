/**
 * @lakehouse/impala
 *
 * Client engine for Impala coordinators: transports, RPC dispatch with
 * retries, sessions, query execution and result decoding over the rich
 * (HiveServer2) or legacy (Beeswax) protocol.
 *
 * @example
 * ```typescript
 * import { createClient } from '@lakehouse/impala';
 *
 * const client = createClient({ host: 'localhost', transport: 'http' });
 * await client.connect();
 *
 * const handle = await client.engine.submit('select * from sales');
 * if ((await client.engine.wait(handle)) === 'finished') {
 *   for await (const batch of client.engine.fetch(handle)) {
 *     console.log(batch.rows);
 *   }
 * }
 * await client.engine.close(handle);
 * await client.close();
 * ```
 */

// Client
export { ImpalaClient, createClient } from './client.js';
export type { ClientDependencies, QueryResult } from './client.js';

// Configuration
export { clientConfigSchema, parseConfig, DEFAULT_SOCKET_PORT, DEFAULT_HTTP_PORT } from './config.js';
export type { ImpalaClientConfig, ImpalaClientConfigInput } from './config.js';

// Errors
export {
  ImpalaError,
  DisconnectedError,
  QueryCancelledError,
  MissingServerMethodError,
  RpcApplicationError,
  RpcServerError,
  QueryStateError,
  TransportError,
  HttpError,
  NotSupportedError,
  ConfigurationError,
  describeError,
} from './errors.js';
export type { ImpalaErrorCode } from './errors.js';

// Logging and tracing
export { Logger, createLogger, formatTimestamp } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
export { StreamTracer, createTracer, formatStartEvent, formatEndEvent, renderRecord } from './tracer.js';
export type { RpcTracer, RpcStartEvent, RpcEndEvent, StreamTracerOptions } from './tracer.js';

// Transports
export {
  createTransport,
  openTransport,
  selectAuthMode,
  formatHostPort,
  kerberosHostFromFqdn,
  detectCapabilities,
} from './transport/factory.js';
export type { AuthMode, RuntimeCapabilities, TransportDependencies } from './transport/factory.js';
export { SocketTransport, connectSocket } from './transport/socket.js';
export type { SocketConnector, SocketConnectOptions, SocketTransportOptions } from './transport/socket.js';
export { HttpTransport, fetchSender, httpsSender, parseRetryAfter } from './transport/http.js';
export type { HttpAuth, HttpRequest, HttpResponse, HttpSender, HttpTransportOptions } from './transport/http.js';
export { PlainMechanism } from './transport/sasl.js';
export type { Transport, RpcCallContext, SaslMechanism, GssapiProvider } from './transport/types.js';

// Dispatch
export { RpcDispatcher, completed, CANCELLED, retryDelaySeconds, defaultSleep } from './dispatcher.js';
export type { RpcOutcome, RpcInvocation, DispatcherOptions, Sleep } from './dispatcher.js';

// Protocol adapters
export { QueryHandle, resolveIdempotency, NEVER_IDEMPOTENT } from './adapters/types.js';
export type {
  ProtocolAdapter,
  AdapterOperation,
  Idempotency,
  IdempotencyOverrides,
  SessionInfo,
  QueryOption,
  StatementRunner,
  ServerQueryState,
} from './adapters/types.js';
export { RichProtocolAdapter, RICH_IDEMPOTENCY, summarizeDmlResult, mapOperationState } from './adapters/rich.js';
export {
  LegacyProtocolAdapter,
  LEGACY_IDEMPOTENCY,
  expectResultMetadata,
  mapQueryState,
  checkLegacyStatus,
} from './adapters/legacy.js';

// Sessions and queries
export { Session, SessionManager } from './session.js';
export { QueryExecutionEngine, ResultStream, pollIntervalSeconds, processLog, queryLink } from './engine.js';
export type { EngineOptions } from './engine.js';

// Results
export {
  NULL_CELL,
  decodeBatch,
  transpose,
  formatGuid,
  columnTypeFromId,
  columnTypeFromName,
  isNullAt,
} from './decoder.js';
export { IDENTITY_CONVERTERS, createTextConverters, converterFor } from './converters.js';
export type { ValueConverter, ValueConverterTable } from './converters.js';
export type {
  ColumnType,
  Column,
  Schema,
  CellValue,
  Row,
  ResultBatch,
  QueryState,
  WaitResult,
  DmlStats,
  QueryArtifacts,
  PingResult,
  WireBatch,
} from './types.js';
