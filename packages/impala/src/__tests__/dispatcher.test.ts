/**
 * RpcDispatcher Tests
 *
 * Retry policy, failure classification and cancellation outcomes.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ApplicationException,
  ApplicationExceptionType,
  getLegacyService,
  getRichService,
  parseResponse,
  pingResponseSchema,
  queryStateSchema,
} from '@lakehouse/impala-rpc';

import { RpcDispatcher, retryDelaySeconds } from '../dispatcher.js';
import type { RpcInvocation } from '../dispatcher.js';
import {
  DisconnectedError,
  HttpError,
  MissingServerMethodError,
  RpcApplicationError,
  RpcServerError,
  TransportError,
} from '../errors.js';
import { StreamTracer } from '../tracer.js';
import type { RpcEndEvent, RpcStartEvent, RpcTracer } from '../tracer.js';
import { FakeServer, FakeTransport, OK_STATUS, silentLogger } from './fake-server.js';

const PING = 'PingImpalaHS2Service';

function pingCall(overrides: Partial<RpcInvocation<unknown>> = {}): RpcInvocation<unknown> {
  return {
    method: PING,
    args: { req: {} },
    decode: (value, method) => parseResponse(pingResponseSchema, value, method),
    idempotent: true,
    ...overrides,
  };
}

describe('retryDelaySeconds', () => {
  it('should not wait before the first attempt', () => {
    expect(retryDelaySeconds(1, 1)).toBe(0);
  });

  it('should grow linearly with the attempt number', () => {
    expect([1, 2, 3, 4].map((attempt) => retryDelaySeconds(attempt, 1))).toEqual([0, 1, 2, 3]);
    expect(retryDelaySeconds(3, 2)).toBe(4);
  });
});

describe('RpcDispatcher', () => {
  let server: FakeServer;
  let transport: FakeTransport;
  let sleeps: number[];
  let lines: string[];
  let dispatcher: RpcDispatcher;

  function build(kind: 'socket' | 'http' = 'http', tracer?: RpcTracer): RpcDispatcher {
    transport = new FakeTransport(server, { kind });
    const logged = silentLogger();
    lines = logged.lines;
    return new RpcDispatcher({
      service: server.service,
      transport,
      maxTries: 4,
      minRetrySleepSeconds: 1,
      logger: logged.logger,
      tracer,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      baseId: 'test',
    });
  }

  beforeEach(async () => {
    server = new FakeServer(getRichService()).on(PING, () => ({
      success: { status: OK_STATUS, version: '4.4.0', webserver_address: 'http://coordinator:25000' },
    }));
    sleeps = [];
    dispatcher = build();
    await transport.open();
  });

  describe('successful calls', () => {
    it('should return the decoded reply as a completed outcome', async () => {
      const outcome = await dispatcher.invoke(pingCall());

      expect(outcome).toEqual({
        cancelled: false,
        value: { status: { statusCode: 0 }, version: '4.4.0', webserver_address: 'http://coordinator:25000' },
      });
      expect(server.methods()).toEqual([PING]);
    });

    it('should attribute calls with request, session and query ids', async () => {
      dispatcher.setSessionIdSource(() => 'session-1');

      await dispatcher.invoke(pingCall());
      await dispatcher.invoke(pingCall({ queryId: 'query-7' }));

      expect(transport.contexts.map((context) => context.requestId)).toEqual(['test-1', 'test-2']);
      expect(transport.contexts[0]?.sessionId).toBe('session-1');
      expect(transport.contexts[0]?.queryId).toBeNull();
      expect(transport.contexts[1]?.queryId).toBe('query-7');
    });
  });

  describe('retries', () => {
    it('should retry idempotent calls with a linear backoff', async () => {
      transport.failNext(new TransportError('reset'), new TransportError('reset'), new TransportError('reset'));

      const outcome = await dispatcher.invoke(pingCall());

      expect(outcome.cancelled).toBe(false);
      expect(sleeps).toEqual([1000, 2000, 3000]);
      expect(transport.contexts.map((context) => context.attempt)).toEqual([1, 2, 3, 4]);
      expect(new Set(transport.contexts.map((context) => context.requestId))).toEqual(new Set(['test-1']));
    });

    it('should raise DisconnectedError when every attempt fails', async () => {
      transport.failNext(
        new TransportError('reset'),
        new TransportError('reset'),
        new TransportError('reset'),
        new TransportError('reset')
      );

      await expect(dispatcher.invoke(pingCall())).rejects.toThrow(
        new DisconnectedError('Error communicating with impalad: reset')
      );
      expect(transport.contexts).toHaveLength(4);
      expect(sleeps).toEqual([1000, 2000, 3000]);
    });

    it('should log each failure with the remaining tries', async () => {
      transport.failNext(new TransportError('reset'));

      await dispatcher.invoke(pingCall());

      expect(lines).toEqual([
        `2024-01-02 03:04:05 [Exception] type=TransportError in ${PING}. Num remaining tries: 3 TransportError: reset`,
      ]);
    });

    it('should attempt non-idempotent calls once', async () => {
      transport.failNext(new TransportError('reset'));

      await expect(dispatcher.invoke(pingCall({ idempotent: false }))).rejects.toBeInstanceOf(DisconnectedError);
      expect(transport.contexts).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    it('should attempt calls once on transports that cannot resend', async () => {
      dispatcher = build('socket');
      await transport.open();
      transport.failNext(new TransportError('reset'));

      await expect(dispatcher.invoke(pingCall())).rejects.toBeInstanceOf(DisconnectedError);
      expect(dispatcher.effectiveMaxTries).toBe(1);
      expect(transport.contexts).toHaveLength(1);
    });

    it('should honour a Retry-After header for the next sleep', async () => {
      transport.failNext(new HttpError(503, 'Service Unavailable', 5));

      await dispatcher.invoke(pingCall());

      expect(sleeps).toEqual([5000]);
      expect(lines).toEqual([
        `2024-01-02 03:04:05 [Exception] type=HttpError in ${PING}. Num remaining tries: 3, retry after 5 secs HttpError: HTTP code 503: Service Unavailable`,
      ]);
    });

    it('should rethrow a final HTTP error as is', async () => {
      const failure = new HttpError(500, 'Internal Server Error');
      transport.failNext(failure);

      await expect(dispatcher.invoke(pingCall({ idempotent: false }))).rejects.toBe(failure);
    });
  });

  describe('failure classification', () => {
    it('should refuse to call when not connected', async () => {
      await transport.close();

      await expect(dispatcher.invoke(pingCall())).rejects.toThrow(
        new DisconnectedError('Not connected (use connect() to establish a connection)')
      );
      expect(transport.contexts).toHaveLength(0);
    });

    it('should report unknown methods as MissingServerMethodError', async () => {
      server = new FakeServer(getRichService());
      dispatcher = build();
      await transport.open();

      await expect(dispatcher.invoke(pingCall())).rejects.toThrow(
        new MissingServerMethodError(`Invalid method name: '${PING}'`)
      );
      expect(server.count(PING)).toBe(1);
    });

    it('should report other application exceptions without retrying', async () => {
      server.on(PING, () => {
        throw new ApplicationException(ApplicationExceptionType.INTERNAL_ERROR, 'boom');
      });

      const failure = dispatcher.invoke(pingCall());

      await expect(failure).rejects.toBeInstanceOf(RpcApplicationError);
      await expect(failure).rejects.toThrow('Application Exception : boom');
      expect(server.count(PING)).toBe(1);
    });

    it('should map declared service exceptions to server errors', async () => {
      server = new FakeServer(getLegacyService()).on('get_state', () => ({
        exception: 'QueryNotFoundException',
        payload: {},
      }));
      dispatcher = build();
      await transport.open();

      await expect(
        dispatcher.invoke({
          method: 'get_state',
          args: { handle: { id: 'q1' } },
          decode: (value, method) => parseResponse(queryStateSchema, value, method),
          idempotent: true,
        })
      ).rejects.toThrow(new RpcServerError('ERROR: QueryNotFoundException'));
    });
  });

  describe('cancellation', () => {
    it('should report failures after a cancel request as cancelled', async () => {
      transport.failNext(new TransportError('reset'));

      const outcome = await dispatcher.invoke(pingCall({ isCancelled: () => true }));

      expect(outcome).toEqual({ cancelled: true });
      expect(transport.contexts).toHaveLength(1);
    });

    it('should raise instead when suppression is off', async () => {
      transport.failNext(new TransportError('reset'));

      await expect(
        dispatcher.invoke(pingCall({ idempotent: false, isCancelled: () => true, suppressOnCancel: false }))
      ).rejects.toBeInstanceOf(DisconnectedError);
    });
  });

  describe('tracing', () => {
    it('should trace the start and end of every attempt', async () => {
      const starts: RpcStartEvent[] = [];
      const ends: RpcEndEvent[] = [];
      dispatcher = build('http', {
        start: async (event) => {
          starts.push(event);
        },
        end: async (event) => {
          ends.push(event);
        },
      });
      await transport.open();
      transport.failNext(new TransportError('reset'));

      await dispatcher.invoke(pingCall());

      expect(starts.map((event) => [event.method, event.attempt])).toEqual([
        [PING, 1],
        [PING, 2],
      ]);
      expect(ends.map((event) => event.result)).toEqual(['Error - TransportError', 'SUCCESS']);
    });

    it('should complete calls when the trace sink fails', async () => {
      const failing = async (): Promise<void> => {
        throw new Error('disk full');
      };
      dispatcher = build('http', { start: failing, end: failing });
      await transport.open();

      const outcome = await dispatcher.invoke(pingCall());

      expect(outcome.cancelled).toBe(false);
      expect(server.count(PING)).toBe(1);
      expect(lines).toEqual([
        '2024-01-02 03:04:05 [Warning] could not write RPC trace. Error: disk full',
        '2024-01-02 03:04:05 [Warning] could not write RPC trace. Error: disk full',
      ]);
    });

    it('should keep the call error when the trace sink fails', async () => {
      dispatcher = build('socket', {
        start: async () => {},
        end: async () => {
          throw new Error('disk full');
        },
      });
      await transport.open();
      transport.failNext(new TransportError('reset'));

      await expect(dispatcher.invoke(pingCall())).rejects.toThrow(
        new DisconnectedError('Error communicating with impalad: reset')
      );
    });

    it('should send calls when the trace file cannot be opened', async () => {
      const file = join(tmpdir(), `missing-${process.pid}-${Date.now()}`, 'trace.log');
      dispatcher = build('http', new StreamTracer({ stdout: false, file }));
      await transport.open();

      const outcome = await dispatcher.invoke(pingCall());

      expect(outcome.cancelled).toBe(false);
      expect(server.count(PING)).toBe(1);
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^2024-01-02 03:04:05 \[Warning\] could not write RPC trace\. Error: ENOENT/);
    });
  });
});
