/**
 * Scripted rich-protocol server for engine, session and client tests
 */

import { OperationState, ProtocolVersion, TypeId, getRichService, isWireStruct } from '@lakehouse/impala-rpc';
import type { WireStruct, WireValue } from '@lakehouse/impala-rpc';

import { FakeServer, OK_STATUS, sequentialGuid } from './fake-server.js';

export interface ScriptedBatch {
  columns: WireStruct[];
  hasMore: boolean;
}

export interface QueryScript {
  columns?: Array<[string, TypeId]>;
  batches?: ScriptedBatch[];
  /** Successive GetOperationStatus answers; the last one repeats */
  states?: OperationState[];
  log?: string;
  dml?: WireStruct;
  hasResultSet?: boolean;
}

export const SESSION_GUID = sequentialGuid(0);
export const WEBSERVER = 'http://coordinator:25000';

export function stringColumn(values: string[], nulls: Uint8Array = new Uint8Array(0)): WireStruct {
  return { stringVal: { values, nulls } };
}

export function bigintColumn(values: bigint[], nulls: Uint8Array = new Uint8Array(0)): WireStruct {
  return { i64Val: { values, nulls } };
}

const OPTIONS_SCRIPT: QueryScript = {
  columns: [
    ['option', TypeId.STRING],
    ['value', TypeId.STRING],
    ['level', TypeId.STRING],
  ],
  batches: [
    {
      columns: [
        stringColumn(['MEM_LIMIT', 'EXPLAIN_LEVEL']),
        stringColumn(['0', '1']),
        stringColumn(['REGULAR', 'ADVANCED']),
      ],
      hasMore: false,
    },
  ],
};

function struct(value: WireValue | undefined, name: string): WireStruct {
  if (!isWireStruct(value)) {
    throw new Error(`missing ${name}`);
  }
  return value;
}

/** Operation id byte of a request's operation handle */
function operationKey(args: WireStruct): number {
  const handle = struct(struct(args.req, 'req').operationHandle, 'operationHandle');
  const guid = struct(handle.operationId, 'operationId').guid;
  if (!(guid instanceof Uint8Array) || guid[0] === undefined) {
    throw new Error('missing guid');
  }
  return guid[0];
}

interface Operation {
  statement: string;
  script: QueryScript;
  polls: number;
  fetches: number;
}

/**
 * Build a server that runs statements according to `scripts`, keyed by
 * statement text. `set all` answers with two options unless scripted.
 */
export function createRichServer(scripts: Record<string, QueryScript> = {}): FakeServer {
  const server = new FakeServer(getRichService());
  const operations = new Map<number, Operation>();
  let executed = 0;

  const lookup = (args: WireStruct): Operation => {
    const operation = operations.get(operationKey(args));
    if (!operation) throw new Error('unknown operation');
    return operation;
  };

  server
    .on('OpenSession', () => ({
      success: {
        status: OK_STATUS,
        serverProtocolVersion: ProtocolVersion.HIVE_CLI_SERVICE_PROTOCOL_V6,
        sessionHandle: { sessionId: { guid: SESSION_GUID, secret: sequentialGuid(100) } },
      },
    }))
    .on('CloseSession', () => ({ success: { status: OK_STATUS } }))
    .on('PingImpalaHS2Service', () => ({
      success: { status: OK_STATUS, version: '4.4.0', webserver_address: WEBSERVER },
    }))
    .on('ExecuteStatement', (args) => {
      const statement = struct(args.req, 'req').statement;
      if (typeof statement !== 'string') throw new Error('missing statement');
      const script = scripts[statement] ?? (statement === 'set all' ? OPTIONS_SCRIPT : {});
      executed += 1;
      const guid = sequentialGuid(16 * executed);
      operations.set(16 * executed, { statement, script, polls: 0, fetches: 0 });
      return {
        success: {
          status: OK_STATUS,
          operationHandle: {
            operationId: { guid, secret: sequentialGuid(100) },
            operationType: 0,
            hasResultSet: script.hasResultSet ?? script.columns !== undefined,
          },
        },
      };
    })
    .on('GetOperationStatus', (args) => {
      const operation = lookup(args);
      const states = operation.script.states ?? [OperationState.FINISHED];
      const state = states[Math.min(operation.polls, states.length - 1)] ?? OperationState.FINISHED;
      operation.polls += 1;
      return { success: { status: OK_STATUS, operationState: state } };
    })
    .on('GetResultSetMetadata', (args) => {
      const columns = lookup(args).script.columns ?? [];
      return {
        success: {
          status: OK_STATUS,
          schema: {
            columns: columns.map(([columnName, type], position) => ({
              columnName,
              typeDesc: { types: [{ primitiveEntry: { type } }] },
              position,
            })),
          },
        },
      };
    })
    .on('FetchResults', (args) => {
      const operation = lookup(args);
      const batch = operation.script.batches?.[operation.fetches] ?? { columns: [], hasMore: false };
      operation.fetches += 1;
      return {
        success: {
          status: OK_STATUS,
          hasMoreRows: batch.hasMore,
          results: { startRowOffset: 0n, columns: batch.columns },
        },
      };
    })
    .on('GetLog', (args) => ({ success: { status: OK_STATUS, log: lookup(args).script.log ?? '' } }))
    .on('CancelOperation', () => ({ success: { status: OK_STATUS } }))
    .on('CloseImpalaOperation', (args) => {
      const dml = lookup(args).script.dml;
      return { success: dml ? { status: OK_STATUS, dml_result: dml } : { status: OK_STATUS } };
    });

  return server;
}
