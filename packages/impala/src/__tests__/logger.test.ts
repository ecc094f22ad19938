/**
 * Logger and Tracer Tests
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

import { TransportError } from '../errors.js';
import { createLogger, formatTimestamp } from '../logger.js';
import { StreamTracer, createTracer, formatEndEvent, formatStartEvent, renderRecord } from '../tracer.js';

const SEPARATOR = '-'.repeat(96);
const NOW = new Date(2024, 0, 2, 3, 4, 5);

function capture(level: 'debug' | 'info' | 'warn' | 'error' | 'silent') {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({
    level,
    stdout: (message) => out.push(message),
    stderr: (message) => err.push(message),
    now: () => NOW,
  });
  return { logger, out, err };
}

describe('logger.ts', () => {
  it('should format timestamps in local time', () => {
    expect(formatTimestamp(NOW)).toBe('2024-01-02 03:04:05');
  });

  it('should filter by level', () => {
    const { logger, out, err } = capture('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('careful');
    logger.error('failed');

    expect(out).toEqual([]);
    expect(err).toEqual(['Warning: careful', 'Error: failed']);
  });

  it('should stamp exceptions with time and category', () => {
    const { logger, err } = capture('debug');

    logger.logException('Exception', 'type=TransportError in GetLog.', new TransportError('reset'));

    expect(err).toEqual(['2024-01-02 03:04:05 [Exception] type=TransportError in GetLog. TransportError: reset']);
  });

  it('should log the Warning category at warn level', () => {
    const { logger, err } = capture('error');

    logger.logException('Warning', 'ignored', new Error('x'));
    logger.logException('Exception', 'kept', 'plain');

    expect(err).toEqual(['2024-01-02 03:04:05 [Exception] kept plain']);
  });
});

describe('tracer.ts', () => {
  it('should render wire values as JSON', () => {
    expect(renderRecord({ rows: 5n, guid: Uint8Array.of(0, 255), conf: new Map([['MEM_LIMIT', '1g']]) })).toBe(
      ['{', '  "rows": "5",', '  "guid": "00ff",', '  "conf": {', '    "MEM_LIMIT": "1g"', '  }', '}'].join('\n')
    );
  });

  it('should format start and end records', () => {
    const time = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

    expect(
      formatStartEvent({ time, method: 'GetLog', sessionId: 's1', queryId: null, attempt: 2, request: {} })
    ).toBe(
      [
        SEPARATOR,
        '[2024-01-02T03:04:05.000Z] RPC CALL STARTED:',
        'OPERATION: GetLog',
        'DETAILS:',
        '  * Impala Session Id: s1',
        '  * Impala Query Id:   None',
        '  * Attempt Count:     2',
        '',
        'RPC REQUEST:',
        '{}',
        SEPARATOR,
        '',
      ].join('\n')
    );
    expect(formatEndEvent({ time, method: 'GetLog', durationMs: 12, result: 'Error - TransportError' })).toBe(
      [
        SEPARATOR,
        '[2024-01-02T03:04:05.000Z] RPC CALL FINISHED:',
        'OPERATION: GetLog',
        'DETAILS:',
        '  * Time:   12ms',
        '  * Result: Error - TransportError',
        SEPARATOR,
        '',
      ].join('\n')
    );
  });

  it('should be off when no sink is configured', () => {
    expect(createTracer({ stdout: false })).toBeUndefined();
    expect(createTracer({ stdout: true })).toBeInstanceOf(StreamTracer);
  });

  it('should write to stdout and append to a file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'rpc-trace-'));
    const file = join(dir, 'trace.log');
    const written: string[] = [];
    const tracer = new StreamTracer({ stdout: true, file, write: (text) => written.push(text) });
    const event = { time: new Date(0), method: 'GetLog', durationMs: 1, result: 'SUCCESS' };

    try {
      await tracer.end(event);
      await tracer.end(event);

      expect(written).toEqual([formatEndEvent(event), formatEndEvent(event)]);
      expect(await readFile(file, 'utf8')).toBe(formatEndEvent(event).repeat(2));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
