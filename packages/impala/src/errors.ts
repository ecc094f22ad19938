/**
 * @lakehouse/impala - Error Types
 *
 * Every error raised by the client carries a machine-readable `code`.
 */

export type ImpalaErrorCode =
  | 'DISCONNECTED'
  | 'QUERY_CANCELLED'
  | 'MISSING_SERVER_METHOD'
  | 'RPC_APPLICATION_ERROR'
  | 'RPC_SERVER_ERROR'
  | 'QUERY_STATE_ERROR'
  | 'TRANSPORT_ERROR'
  | 'HTTP_ERROR'
  | 'NOT_SUPPORTED'
  | 'CONFIGURATION_ERROR';

/**
 * Base class for client errors
 */
export class ImpalaError extends Error {
  constructor(
    public readonly code: ImpalaErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ImpalaError';
  }
}

/**
 * The client cannot talk to the server: not connected, or the transport failed
 * on the final attempt.
 */
export class DisconnectedError extends ImpalaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DISCONNECTED', message, options);
    this.name = 'DisconnectedError';
  }
}

/**
 * A query was cancelled by the caller. Raised only by convenience helpers;
 * the engine reports cancellation as an RpcOutcome.
 */
export class QueryCancelledError extends ImpalaError {
  constructor(message = 'Query cancelled') {
    super('QUERY_CANCELLED', message);
    this.name = 'QueryCancelledError';
  }
}

/** The server does not implement the called method. */
export class MissingServerMethodError extends ImpalaError {
  constructor(message: string) {
    super('MISSING_SERVER_METHOD', message);
    this.name = 'MissingServerMethodError';
  }
}

/** Protocol-level application failure reported by the server. */
export class RpcApplicationError extends ImpalaError {
  constructor(
    message: string,
    public readonly applicationErrorType: number
  ) {
    super('RPC_APPLICATION_ERROR', message);
    this.name = 'RpcApplicationError';
  }
}

/** The server answered with an error status. */
export class RpcServerError extends ImpalaError {
  constructor(message: string) {
    super('RPC_SERVER_ERROR', message);
    this.name = 'RpcServerError';
  }
}

/**
 * The query failed or its handle is no longer known to the server. For
 * failures surfaced by wait(), `serverLog` holds the error log.
 */
export class QueryStateError extends ImpalaError {
  constructor(
    message: string,
    public readonly serverLog?: string
  ) {
    super('QUERY_STATE_ERROR', message);
    this.name = 'QueryStateError';
  }
}

/** Opening or using the byte stream failed. */
export class TransportError extends ImpalaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
    this.name = 'TransportError';
  }
}

/**
 * The HTTP endpoint answered with a non-2xx status
 */
export class HttpError extends ImpalaError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    /** Parsed Retry-After header, in seconds */
    public readonly retryAfterSeconds?: number
  ) {
    super('HTTP_ERROR', `HTTP code ${status}: ${statusText}`);
    this.name = 'HttpError';
  }
}

/** The runtime lacks a capability the configuration needs. */
export class NotSupportedError extends ImpalaError {
  constructor(message: string) {
    super('NOT_SUPPORTED', message);
    this.name = 'NotSupportedError';
  }
}

/** The configuration is invalid or self-contradictory. */
export class ConfigurationError extends ImpalaError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Render an error for log output
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
