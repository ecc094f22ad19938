/**
 * @lakehouse/impala - RPC Tracing
 *
 * Start/end records for every dispatched call, written to stdout and/or
 * appended to a file.
 */

import { appendFile } from 'node:fs/promises';

export interface RpcStartEvent {
  time: Date;
  method: string;
  sessionId: string | null;
  queryId: string | null;
  attempt: number;
  request: unknown;
}

export interface RpcEndEvent {
  time: Date;
  method: string;
  durationMs: number;
  /** "SUCCESS" or "Error - {kind}" */
  result: string;
  response?: unknown;
}

export interface RpcTracer {
  start(event: RpcStartEvent): Promise<void>;
  end(event: RpcEndEvent): Promise<void>;
}

/**
 * JSON replacer for wire values: bigint as decimal, bytes as hex, maps as objects
 */
function traceReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('hex');
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export function renderRecord(value: unknown): string {
  return JSON.stringify(value, traceReplacer, 2) ?? 'undefined';
}

const SEPARATOR = '-'.repeat(96);

export function formatStartEvent(event: RpcStartEvent): string {
  return [
    SEPARATOR,
    `[${event.time.toISOString()}] RPC CALL STARTED:`,
    `OPERATION: ${event.method}`,
    'DETAILS:',
    `  * Impala Session Id: ${event.sessionId ?? 'None'}`,
    `  * Impala Query Id:   ${event.queryId ?? 'None'}`,
    `  * Attempt Count:     ${event.attempt}`,
    '',
    'RPC REQUEST:',
    renderRecord(event.request),
    SEPARATOR,
    '',
  ].join('\n');
}

export function formatEndEvent(event: RpcEndEvent): string {
  const lines = [
    SEPARATOR,
    `[${event.time.toISOString()}] RPC CALL FINISHED:`,
    `OPERATION: ${event.method}`,
    'DETAILS:',
    `  * Time:   ${event.durationMs}ms`,
    `  * Result: ${event.result}`,
  ];
  if (event.response !== undefined) {
    lines.push('', 'RPC RESPONSE:', renderRecord(event.response));
  }
  lines.push(SEPARATOR, '');
  return lines.join('\n');
}

export interface StreamTracerOptions {
  /** Write records to stdout */
  stdout: boolean;
  /** Append records to this file */
  file?: string;
  /** stdout replacement */
  write?: (text: string) => void;
}

/**
 * Writes trace records to stdout and/or an append-only file
 */
export class StreamTracer implements RpcTracer {
  private readonly write: (text: string) => void;

  constructor(private readonly options: StreamTracerOptions) {
    this.write = options.write ?? ((text) => process.stdout.write(text));
  }

  private async emit(text: string): Promise<void> {
    if (this.options.stdout) {
      this.write(text);
    }
    if (this.options.file !== undefined) {
      await appendFile(this.options.file, text, 'utf8');
    }
  }

  start(event: RpcStartEvent): Promise<void> {
    return this.emit(formatStartEvent(event));
  }

  end(event: RpcEndEvent): Promise<void> {
    return this.emit(formatEndEvent(event));
  }
}

/**
 * Build the tracer for the given settings, or undefined when tracing is off
 */
export function createTracer(options: StreamTracerOptions): RpcTracer | undefined {
  if (!options.stdout && options.file === undefined) {
    return undefined;
  }
  return new StreamTracer(options);
}
