/**
 * @lakehouse/impala - Socket Transport
 *
 * TCP (optionally TLS) byte stream, either buffered (no authentication) or
 * SASL-framed. The connect timeout covers the TCP/TLS handshake and SASL
 * negotiation only.
 */

import { readFile } from 'node:fs/promises';
import * as net from 'node:net';
import type { Duplex } from 'node:stream';
import * as tls from 'node:tls';

import { InputBufferUnderrunError } from '@lakehouse/impala-rpc';

import { TransportError } from '../errors.js';

import { StreamChannel } from './channel.js';
import { encodeFrame, negotiateSasl, readFrame } from './sasl.js';
import type { ReplyDecoder, RpcCallContext, SaslMechanism, Transport } from './types.js';

export interface SocketConnectOptions {
  host: string;
  port: number;
  tls: boolean;
  /** CA bundle path; when absent over TLS the certificate is not verified */
  caCert?: string;
  signal?: AbortSignal;
}

/**
 * Opens the underlying stream. Replaced in tests by an in-process pair.
 */
export type SocketConnector = (options: SocketConnectOptions) => Promise<Duplex>;

/**
 * Connect with node:net or node:tls
 */
export const connectSocket: SocketConnector = async (options) => {
  const ca = options.caCert !== undefined ? await readCaCert(options.caCert) : undefined;
  return new Promise<Duplex>((resolve, reject) => {
    const socket: net.Socket = options.tls
      ? tls.connect({
          host: options.host,
          port: options.port,
          servername: net.isIP(options.host) === 0 ? options.host : undefined,
          ca,
          rejectUnauthorized: ca !== undefined,
        })
      : net.connect({ host: options.host, port: options.port });

    const onAbort = (): void => {
      socket.destroy();
      reject(new TransportError(`Timed out connecting to ${options.host}:${options.port}`));
    };
    const onError = (error: Error): void => {
      options.signal?.removeEventListener('abort', onAbort);
      reject(
        new TransportError(`Could not connect to ${options.host}:${options.port}: ${error.message}`, {
          cause: error,
        })
      );
    };

    socket.once('error', onError);
    socket.once(options.tls ? 'secureConnect' : 'connect', () => {
      socket.off('error', onError);
      options.signal?.removeEventListener('abort', onAbort);
      resolve(socket);
    });
    if (options.signal?.aborted) onAbort();
    else options.signal?.addEventListener('abort', onAbort, { once: true });
  });
};

async function readCaCert(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new TransportError(`Could not read CA certificate ${path}`, { cause: error });
  }
}

export interface SocketTransportOptions {
  host: string;
  port: number;
  tls: boolean;
  caCert?: string;
  /** Handshake deadline; 0 disables it */
  connectTimeoutMs: number;
  /** SASL mechanism; buffered framing when absent */
  sasl?: SaslMechanism;
  connector?: SocketConnector;
}

export class SocketTransport implements Transport {
  readonly kind = 'socket';
  readonly supportsRetries = false;

  private channel: StreamChannel | undefined;
  private readonly connector: SocketConnector;

  constructor(private readonly options: SocketTransportOptions) {
    this.connector = options.connector ?? connectSocket;
  }

  isOpen(): boolean {
    return this.channel !== undefined && !this.channel.closed;
  }

  async open(): Promise<void> {
    if (this.isOpen()) {
      return;
    }
    const { host, port, connectTimeoutMs } = this.options;
    const signal = connectTimeoutMs > 0 ? AbortSignal.timeout(connectTimeoutMs) : undefined;

    let stream: Duplex;
    try {
      stream = await this.connector({
        host,
        port,
        tls: this.options.tls,
        caCert: this.options.caCert,
        signal,
      });
    } catch (error) {
      if (error instanceof TransportError) throw error;
      throw new TransportError(`Could not connect to ${host}:${port}`, { cause: error });
    }

    const channel = new StreamChannel(stream);
    if (this.options.sasl) {
      try {
        await negotiateSasl(channel, this.options.sasl, signal);
      } catch (error) {
        await channel.close();
        if (error instanceof TransportError) throw error;
        throw new TransportError(`SASL negotiation with ${host}:${port} failed`, { cause: error });
      }
    }
    // The deadline signal is not used past this point
    this.channel = channel;
  }

  async call<T>(payload: Buffer, decode: ReplyDecoder<T>, _context: RpcCallContext): Promise<T> {
    const channel = this.channel;
    if (!channel || channel.closed) {
      throw new TransportError('Transport is not open');
    }
    if (!this.options.sasl) {
      await channel.write(payload);
      return channel.readMessage(decode);
    }

    await channel.write(encodeFrame(payload));
    let message = await readFrame(channel);
    // A reply may span several frames
    for (;;) {
      try {
        return decode(message).value;
      } catch (error) {
        if (!(error instanceof InputBufferUnderrunError)) throw error;
      }
      message = Buffer.concat([message, await readFrame(channel)]);
    }
  }

  async close(): Promise<void> {
    const channel = this.channel;
    this.channel = undefined;
    await channel?.close();
  }
}
