/**
 * In-process server for tests: decodes calls with the real codec, answers
 * through per-method handlers and records what it received.
 */

import {
  ApplicationException,
  ApplicationExceptionType,
  StatusCode,
  decodeCall,
  encodeApplicationException,
  encodeReply,
} from '@lakehouse/impala-rpc';
import type { ReplyBody, ServiceDef, WireStruct } from '@lakehouse/impala-rpc';

import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ReplyDecoder, RpcCallContext, Transport } from '../transport/types.js';

export type Handler = (args: WireStruct) => ReplyBody | Promise<ReplyBody>;

export interface ReceivedCall {
  method: string;
  args: WireStruct;
}

export class FakeServer {
  readonly calls: ReceivedCall[] = [];
  private readonly handlers = new Map<string, Handler>();

  constructor(readonly service: ServiceDef) {}

  on(method: string, handler: Handler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** Names of the methods called so far, in order */
  methods(): string[] {
    return this.calls.map((call) => call.method);
  }

  count(method: string): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  async respond(payload: Buffer): Promise<Buffer> {
    const call = decodeCall(this.service, payload);
    this.calls.push({ method: call.method, args: call.args });
    const handler = this.handlers.get(call.method);
    if (!handler) {
      return encodeApplicationException(
        call.method,
        call.seqid,
        ApplicationExceptionType.UNKNOWN_METHOD,
        `Invalid method name: '${call.method}'`
      );
    }
    try {
      return encodeReply(this.service, call.method, call.seqid, await handler(call.args));
    } catch (error) {
      if (error instanceof ApplicationException) {
        return encodeApplicationException(call.method, call.seqid, error.type, error.message);
      }
      throw error;
    }
  }
}

export interface FakeTransportOptions {
  kind?: 'socket' | 'http';
}

/**
 * Transport that hands every payload to a FakeServer. Errors queued with
 * failNext() are thrown before the server sees the call.
 */
export class FakeTransport implements Transport {
  readonly kind: 'socket' | 'http';
  readonly supportsRetries: boolean;
  readonly contexts: RpcCallContext[] = [];
  opens = 0;
  closes = 0;

  private opened = false;
  private readonly failures: Error[] = [];

  constructor(
    readonly server: FakeServer,
    options: FakeTransportOptions = {}
  ) {
    this.kind = options.kind ?? 'http';
    this.supportsRetries = this.kind === 'http';
  }

  failNext(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    this.opens += 1;
    this.opened = true;
  }

  async close(): Promise<void> {
    this.closes += 1;
    this.opened = false;
  }

  async call<T>(payload: Buffer, decode: ReplyDecoder<T>, context: RpcCallContext): Promise<T> {
    this.contexts.push(context);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return decode(await this.server.respond(payload)).value;
  }
}

export const OK_STATUS = { statusCode: StatusCode.SUCCESS };

export function errorStatus(message: string): WireStruct {
  return { statusCode: StatusCode.ERROR, errorMessage: message };
}

/** A 16-byte identifier holding 0x00 .. 0x0f, offset by `start` */
export function sequentialGuid(start = 0): Uint8Array {
  return Uint8Array.from({ length: 16 }, (_, index) => start + index);
}

export function silentLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = createLogger({
    level: 'debug',
    stdout: (message) => lines.push(message),
    stderr: (message) => lines.push(message),
    now: () => new Date(2024, 0, 2, 3, 4, 5),
  });
  return { logger, lines };
}

export const noSleep = async (): Promise<void> => {};
