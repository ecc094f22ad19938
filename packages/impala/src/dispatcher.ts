/**
 * @lakehouse/impala - RPC Dispatcher
 *
 * Invokes one remote call: assigns its correlation id, applies the retry
 * policy and classifies failures. Cancellation is reported as an outcome,
 * never thrown.
 */

import { randomUUID } from 'node:crypto';

import {
  ApplicationException,
  ApplicationExceptionType,
  ServiceException,
  decodeReply,
  encodeCall,
} from '@lakehouse/impala-rpc';
import type { ServiceDef, WireStruct, WireValue } from '@lakehouse/impala-rpc';

import {
  DisconnectedError,
  HttpError,
  MissingServerMethodError,
  RpcApplicationError,
  RpcServerError,
  TransportError,
  describeError,
} from './errors.js';
import type { Logger } from './logger.js';
import type { RpcTracer } from './tracer.js';
import type { RpcCallContext, Transport } from './transport/types.js';

/**
 * Result of a dispatched call: the value, or a marker that the call failed
 * after the caller asked for the query to be cancelled
 */
export type RpcOutcome<T> = { cancelled: false; value: T } | { cancelled: true };

export function completed<T>(value: T): RpcOutcome<T> {
  return { cancelled: false, value };
}

export const CANCELLED: RpcOutcome<never> = { cancelled: true };

export interface RpcInvocation<T> {
  method: string;
  args: WireStruct;
  /** Validate the decoded reply */
  decode: (value: WireValue | undefined, method: string) => T;
  idempotent: boolean;
  /** Report a failure as cancellation when the query was cancelled. Default true. */
  suppressOnCancel?: boolean;
  /** Rendered id of the query the call concerns */
  queryId?: string | null;
  isCancelled?: () => boolean;
  /** Map a declared service exception to a client error */
  translate?: (error: ServiceException) => Error;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before `attempt` (1-based): nothing before the first try, then
 * `minSleep * (attempt - 1)` seconds
 */
export function retryDelaySeconds(attempt: number, minSleepSeconds: number): number {
  return attempt <= 1 ? 0 : minSleepSeconds * (attempt - 1);
}

export interface DispatcherOptions {
  service: ServiceDef;
  transport: Transport;
  /** Attempt bound for idempotent calls on transports that support retries */
  maxTries: number;
  minRetrySleepSeconds: number;
  logger: Logger;
  tracer?: RpcTracer;
  sleep?: Sleep;
  /** Correlation id prefix; a random UUID by default */
  baseId?: string;
  /** Rendered id of the current session */
  sessionId?: () => string | null;
}

export class RpcDispatcher {
  private sequence = 0;
  private seqid = 0;
  private readonly baseId: string;
  private readonly sleep: Sleep;
  private sessionIdSource: () => string | null;

  constructor(private readonly options: DispatcherOptions) {
    this.baseId = options.baseId ?? randomUUID();
    this.sleep = options.sleep ?? defaultSleep;
    this.sessionIdSource = options.sessionId ?? (() => null);
  }

  get transport(): Transport {
    return this.options.transport;
  }

  get maxTries(): number {
    return this.options.maxTries;
  }

  /** Attempts granted to idempotent calls on this transport */
  get effectiveMaxTries(): number {
    return this.options.transport.supportsRetries ? this.options.maxTries : 1;
  }

  get minRetrySleepSeconds(): number {
    return this.options.minRetrySleepSeconds;
  }

  isConnected(): boolean {
    return this.options.transport.isOpen();
  }

  setSessionIdSource(source: () => string | null): void {
    this.sessionIdSource = source;
  }

  /** Sleep through the injected clock */
  pause(seconds: number): Promise<void> {
    return this.sleep(seconds * 1000);
  }

  /**
   * Emit a trace record. A failing trace sink is logged and otherwise
   * ignored.
   */
  private async trace(emit: (tracer: RpcTracer) => Promise<void>): Promise<void> {
    const { tracer, logger } = this.options;
    if (!tracer) {
      return;
    }
    try {
      await emit(tracer);
    } catch (error) {
      logger.logException('Warning', 'could not write RPC trace.', error);
    }
  }

  async invoke<T>(call: RpcInvocation<T>): Promise<RpcOutcome<T>> {
    this.sequence += 1;
    const requestId = `${this.baseId}-${this.sequence}`;
    if (!this.isConnected()) {
      throw new DisconnectedError('Not connected (use connect() to establish a connection)');
    }

    const { service, transport, logger } = this.options;
    const isCancelled = call.isCancelled ?? (() => false);
    const suppressOnCancel = call.suppressOnCancel ?? true;
    const maxTries = call.idempotent ? this.effectiveMaxTries : 1;
    let retryAfterSeconds: number | undefined;

    for (let attempt = 1; ; attempt++) {
      if (attempt > 1) {
        await this.pause(retryAfterSeconds ?? retryDelaySeconds(attempt, this.options.minRetrySleepSeconds));
      }
      retryAfterSeconds = undefined;

      const context: RpcCallContext = {
        method: call.method,
        requestId,
        attempt,
        sessionId: this.sessionIdSource(),
        queryId: call.queryId ?? null,
        isCancelled,
      };
      const startedAt = Date.now();
      await this.trace((tracer) =>
        tracer.start({
          time: new Date(startedAt),
          method: call.method,
          sessionId: context.sessionId,
          queryId: context.queryId,
          attempt,
          request: call.args,
        })
      );

      try {
        this.seqid += 1;
        const payload = encodeCall(service, call.method, this.seqid, call.args);
        const reply = await transport.call(
          payload,
          (bytes) => {
            const decoded = decodeReply(service, call.method, bytes);
            return { value: decoded.value, bytesRead: decoded.bytesRead };
          },
          context
        );
        const value = call.decode(reply, call.method);
        await this.trace((tracer) =>
          tracer.end({
            time: new Date(),
            method: call.method,
            durationMs: Date.now() - startedAt,
            result: 'SUCCESS',
            response: reply,
          })
        );
        return completed(value);
      } catch (error) {
        await this.trace((tracer) =>
          tracer.end({
            time: new Date(),
            method: call.method,
            durationMs: Date.now() - startedAt,
            result: `Error - ${error instanceof Error ? error.name : 'unknown'}`,
          })
        );

        if (suppressOnCancel && isCancelled()) {
          return CANCELLED;
        }
        if (error instanceof ApplicationException) {
          if (error.type === ApplicationExceptionType.UNKNOWN_METHOD) {
            throw new MissingServerMethodError(error.message);
          }
          throw new RpcApplicationError(`Application Exception : ${error.message}`, error.type);
        }
        if (error instanceof ServiceException) {
          throw call.translate ? call.translate(error) : new RpcServerError(`ERROR: ${error.message}`);
        }

        const remaining = maxTries - attempt;
        const retryNote = maxTries > 1 ? ` Num remaining tries: ${remaining}` : '';
        if (error instanceof HttpError && remaining > 0 && error.retryAfterSeconds !== undefined && error.retryAfterSeconds > 0) {
          retryAfterSeconds = error.retryAfterSeconds;
          logger.logException(
            'Exception',
            `type=${error.name} in ${call.method}.${retryNote}, retry after ${retryAfterSeconds} secs`,
            error
          );
        } else {
          logger.logException('Exception', `type=${describeKind(error)} in ${call.method}.${retryNote}`, error);
        }

        if (remaining <= 0) {
          if (error instanceof TransportError) {
            throw new DisconnectedError(`Error communicating with impalad: ${error.message}`, { cause: error });
          }
          throw error;
        }
      }
    }
  }
}

function describeKind(error: unknown): string {
  return error instanceof Error ? error.name : describeError(error);
}
