/**
 * @lakehouse/impala - Stream Channel
 *
 * Buffers bytes arriving on a duplex stream so callers can read exact
 * lengths or decode whole messages as they complete.
 */

import type { Duplex } from 'node:stream';

import { InputBufferUnderrunError, failedReplyLength } from '@lakehouse/impala-rpc';

import { TransportError } from '../errors.js';

import type { ReplyDecoder } from './types.js';

export class StreamChannel {
  private buffered: Buffer = Buffer.alloc(0);
  private failure: Error | undefined;
  private wake: (() => void) | undefined;

  constructor(private readonly stream: Duplex) {
    stream.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
      this.buffered = this.buffered.length === 0 ? bytes : Buffer.concat([this.buffered, bytes]);
      this.notify();
    });
    stream.on('error', (error: Error) => {
      this.failure ??= new TransportError(`Connection error: ${error.message}`, { cause: error });
      this.notify();
    });
    stream.on('end', () => {
      this.failure ??= new TransportError('Connection closed by peer');
      this.notify();
    });
    stream.on('close', () => {
      this.failure ??= new TransportError('Connection closed');
      this.notify();
    });
  }

  get closed(): boolean {
    return this.failure !== undefined;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private waitForData(signal?: AbortSignal): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        this.wake = undefined;
        reject(new TransportError('Timed out waiting for the server', { cause: signal?.reason }));
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.wake = () => {
        signal?.removeEventListener('abort', onAbort);
        if (this.failure && this.buffered.length === 0) reject(this.failure);
        else resolve();
      };
    });
  }

  write(data: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.stream.write(data, (error) => {
        if (error) reject(new TransportError(`Write failed: ${error.message}`, { cause: error }));
        else resolve();
      });
    });
  }

  /**
   * Read exactly `length` bytes
   */
  async readExactly(length: number, signal?: AbortSignal): Promise<Buffer> {
    while (this.buffered.length < length) {
      await this.waitForData(signal);
    }
    const head = this.buffered.subarray(0, length);
    this.buffered = this.buffered.subarray(length);
    return head;
  }

  /**
   * Decode one message from the buffered bytes, waiting for more while the
   * decoder reports an underrun
   */
  async readMessage<T>(decode: ReplyDecoder<T>, signal?: AbortSignal): Promise<T> {
    for (;;) {
      if (this.buffered.length > 0) {
        try {
          const { value, bytesRead } = decode(this.buffered);
          this.buffered = this.buffered.subarray(bytesRead);
          return value;
        } catch (error) {
          if (!(error instanceof InputBufferUnderrunError)) {
            // Drop the failed reply; without a known length nothing buffered can be trusted
            const consumed = failedReplyLength(error);
            this.buffered = consumed === undefined ? Buffer.alloc(0) : this.buffered.subarray(consumed);
            throw error;
          }
        }
      }
      await this.waitForData(signal);
    }
  }

  /**
   * End the stream and release the socket
   */
  close(): Promise<void> {
    this.failure ??= new TransportError('Connection closed');
    if (this.stream.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.stream.once('close', () => resolve());
      this.stream.destroy();
    });
  }
}
