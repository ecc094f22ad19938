/**
 * Legacy Protocol Adapter Tests
 */

import { describe, it, expect } from 'vitest';
import { QueryState, getLegacyService } from '@lakehouse/impala-rpc';

import { LegacyProtocolAdapter, checkLegacyStatus, expectResultMetadata, mapQueryState } from '../adapters/legacy.js';
import { RpcDispatcher } from '../dispatcher.js';
import { QueryExecutionEngine } from '../engine.js';
import { QueryStateError, RpcServerError } from '../errors.js';
import { FakeServer, FakeTransport, noSleep, silentLogger } from './fake-server.js';
import { WEBSERVER } from './rich-server.js';

async function setup() {
  const server = new FakeServer(getLegacyService());
  server
    .on('query', () => ({ success: { id: 'q-1', log_context: 'ctx-1' } }))
    .on('get_results_metadata', () => ({ success: { schema: { fieldSchemas: [] } } }));
  const transport = new FakeTransport(server, { kind: 'socket' });
  await transport.open();
  const { logger, lines } = silentLogger();
  const dispatcher = new RpcDispatcher({
    service: server.service,
    transport,
    maxTries: 4,
    minRetrySleepSeconds: 1,
    logger,
    sleep: noSleep,
    baseId: 'test',
  });
  const adapter = new LegacyProtocolAdapter({ dispatcher, logger });
  await adapter.openSession('analyst');
  const engine = new QueryExecutionEngine({ adapter, dispatcher, fetchSize: 100, sleep: noSleep });
  return { server, adapter, engine, lines };
}

describe('adapters/legacy.ts', () => {
  describe('helpers', () => {
    it('should expect no result metadata for use statements', () => {
      expect(expectResultMetadata('USE sales')).toBe(false);
      expect(expectResultMetadata('select 1')).toBe(true);
      expect(expectResultMetadata('show tables')).toBe(true);
    });

    it('should map query states', () => {
      expect(mapQueryState(QueryState.CREATED)).toBe('RUNNING');
      expect(mapQueryState(QueryState.COMPILED)).toBe('RUNNING');
      expect(mapQueryState(QueryState.FINISHED)).toBe('FINISHED');
      expect(mapQueryState(QueryState.EXCEPTION)).toBe('ERROR');
    });

    it('should check statuses', () => {
      expect(checkLegacyStatus({ status_code: 0 })).toBe(true);
      expect(checkLegacyStatus({ status_code: 1 })).toBe(false);
      expect(() => checkLegacyStatus({ status_code: 1, error_msgs: ['first', 'second'] })).toThrow(
        new RpcServerError('RPC Error: first\nsecond')
      );
    });
  });

  describe('sessions', () => {
    it('should treat the connection as the session', async () => {
      const { adapter, server } = await setup();

      await expect(adapter.openSession('analyst')).resolves.toEqual({ sessionId: null });
      await adapter.closeSession();

      expect(server.calls).toEqual([]);
    });

    it('should read the server version and web UI address', async () => {
      const { adapter, server } = await setup();
      server.on('PingImpalaService', () => ({ success: { version: '4.4.0', webserver_address: WEBSERVER } }));

      await expect(adapter.ping()).resolves.toEqual({ version: '4.4.0', webserverAddress: WEBSERVER });
    });

    it('should list the default query options', async () => {
      const { adapter, server } = await setup();
      server.on('get_default_configuration', () => ({
        success: [
          { key: 'MEM_LIMIT', value: '0', level: 0 },
          { key: 'DEBUG_ACTION', value: '' },
        ],
      }));

      await expect(adapter.defaultOptions()).resolves.toEqual([
        { name: 'MEM_LIMIT', value: '0', level: 0 },
        { name: 'DEBUG_ACTION', value: '', level: null },
      ]);
      expect(server.calls[0]?.args).toEqual({ include_hadoop: false });
    });

    it('should warn and carry on without default options', async () => {
      const { adapter, lines } = await setup();

      await expect(adapter.defaultOptions()).resolves.toEqual([]);
      expect(lines).toContain(
        "2024-01-02 03:04:05 [Warning] could not retrieve default query options. " +
          "MissingServerMethodError: Invalid method name: 'get_default_configuration'"
      );
    });
  });

  describe('queries', () => {
    it('should send options as key=value pairs with the user', async () => {
      const { engine, server } = await setup();

      const handle = await engine.submit('use sales', { MEM_LIMIT: '2g', SYNC_DDL: '1' });

      expect(handle.id).toBe('q-1');
      expect(handle.hasResultSet).toBe(false);
      expect(server.calls[0]?.args).toEqual({
        query: { query: 'use sales', configuration: ['MEM_LIMIT=2g', 'SYNC_DDL=1'], hadoop_user: 'analyst' },
      });
    });

    it('should raise server exceptions from submit as query errors', async () => {
      const { engine, server } = await setup();
      server.on('query', () => ({ exception: 'BeeswaxException', payload: { message: 'AnalysisException: bad' } }));

      await expect(engine.submit('select nope')).rejects.toThrow(new QueryStateError('ERROR: AnalysisException: bad'));
    });

    it('should read the schema from type names', async () => {
      const { engine, server } = await setup();
      server.on('get_results_metadata', () => ({
        success: {
          schema: {
            fieldSchemas: [
              { name: 'id', type: 'bigint' },
              { name: 'price', type: 'decimal(10,2)' },
              { name: 'tags', type: 'array<string>' },
            ],
          },
        },
      }));

      const handle = await engine.submit('select id, price, tags from items');

      expect(handle.schema).toEqual({
        columns: [
          { name: 'id', type: 'bigint' },
          { name: 'price', type: 'decimal' },
          { name: 'tags', type: 'string' },
        ],
      });
    });

    it('should split tab-separated rows', async () => {
      const { engine, server } = await setup();
      let fetches = 0;
      server.on('fetch', () => {
        fetches += 1;
        return fetches === 1
          ? { success: { data: ['1\ta', '2\tNULL'], has_more: true } }
          : { success: { data: ['3\tc'], has_more: false } };
      });
      const handle = await engine.submit('select id, name from t');

      await expect(engine.fetchAll(handle)).resolves.toEqual([
        ['1', 'a'],
        ['2', 'NULL'],
        ['3', 'c'],
      ]);
      expect(server.calls.find((call) => call.method === 'fetch')?.args).toEqual({
        query_id: { id: 'q-1', log_context: 'ctx-1' },
        start_over: false,
        fetch_size: 100,
      });
    });

    it('should poll the query state', async () => {
      const { engine, server } = await setup();
      const states = [QueryState.RUNNING, QueryState.FINISHED];
      server.on('get_state', () => ({ success: states.shift() ?? QueryState.FINISHED }));
      const handle = await engine.submit('use sales');

      await expect(engine.wait(handle)).resolves.toBe('finished');
      expect(server.count('get_state')).toBe(2);
    });

    it('should report unknown queries as stale', async () => {
      const { engine, server } = await setup();
      server.on('get_state', () => ({ exception: 'QueryNotFoundException', payload: {} }));
      const handle = await engine.submit('use sales');

      await expect(engine.poll(handle)).rejects.toThrow(new QueryStateError('Error: Stale query handle'));
    });

    it('should read the log by its context', async () => {
      const { engine, server } = await setup();
      server.on('get_log', () => ({ success: 'Disk spill\n' }));
      const handle = await engine.submit('use sales');

      await expect(engine.getWarnings(handle)).resolves.toBe('WARNINGS: Disk spill\n');
      expect(server.calls.find((call) => call.method === 'get_log')?.args).toEqual({ context: 'ctx-1' });
    });

    it('should cancel through the status reply', async () => {
      const { engine, server } = await setup();
      server.on('Cancel', () => ({ success: { status_code: 0 } }));
      const handle = await engine.submit('use sales');

      await expect(engine.cancel(handle)).resolves.toBe(true);
      expect(handle.state).toBe('CANCELLED');
    });

    it('should close without DML statistics', async () => {
      const { engine, server } = await setup();
      server.on('close', () => ({ success: undefined }));
      const handle = await engine.submit('insert into t values (1)');

      await expect(engine.closeDml(handle)).resolves.toEqual({
        cancelled: false,
        value: { rowsModified: null, rowsDeleted: null, rowErrors: null },
      });
      expect(handle.closed).toBe(true);
    });

    it('should have no profiles or summaries', async () => {
      const { engine, server } = await setup();
      const handle = await engine.submit('use sales');

      await expect(engine.getRuntimeProfile(handle)).resolves.toEqual({ latest: null, failedAttempt: null });
      await expect(engine.getSummary(handle)).resolves.toEqual({ latest: null, failedAttempt: null });
      expect(server.methods()).toEqual(['query']);
    });
  });
});
