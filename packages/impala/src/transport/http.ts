/**
 * @lakehouse/impala - HTTP Transport
 *
 * Each call is one POST of the encoded message. Authentication rides in the
 * Authorization header, or in server-issued cookies once the server has set
 * one of the configured cookie names.
 */

import { readFile } from 'node:fs/promises';
import * as https from 'node:https';

import { HttpError, TransportError } from '../errors.js';
import type { Logger } from '../logger.js';

import type { GssapiProvider, ReplyDecoder, RpcCallContext, Transport } from './types.js';

export type HttpAuth =
  | { kind: 'none' }
  | { kind: 'basic'; user: string; password: string }
  | { kind: 'jwt'; token: string }
  | { kind: 'oauth'; token: string }
  | { kind: 'kerberos'; provider: GssapiProvider; service: string; host: string };

export interface HttpRequest {
  url: string;
  headers: Record<string, string>;
  body: Buffer;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  header(name: string): string | null;
  setCookies: string[];
  body: Buffer;
}

/**
 * Sends one POST. fetch for plain HTTP; node:https when TLS settings apply.
 */
export type HttpSender = (request: HttpRequest) => Promise<HttpResponse>;

export function fetchSender(fetchImpl: typeof fetch = fetch): HttpSender {
  return async (request) => {
    const response = await fetchImpl(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });
    const body = Buffer.from(await response.arrayBuffer());
    return {
      status: response.status,
      statusText: response.statusText,
      header: (name) => response.headers.get(name),
      setCookies: response.headers.getSetCookie(),
      body,
    };
  };
}

/**
 * HTTPS sender with an explicit trust configuration. Without a CA bundle the
 * server certificate is not verified.
 */
export function httpsSender(caCert?: string): HttpSender {
  let ca: Promise<Buffer> | undefined;
  return async (request) => {
    if (caCert !== undefined) {
      ca ??= readFile(caCert);
    }
    const agentOptions: https.RequestOptions = ca
      ? { ca: await ca, rejectUnauthorized: true }
      : { rejectUnauthorized: false };

    return new Promise<HttpResponse>((resolve, reject) => {
      const req = https.request(
        request.url,
        { method: 'POST', headers: request.headers, signal: request.signal, ...agentOptions },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', reject);
          res.on('end', () => {
            const setCookie = res.headers['set-cookie'] ?? [];
            resolve({
              status: res.statusCode ?? 0,
              statusText: res.statusMessage ?? '',
              header: (name) => {
                const value = res.headers[name.toLowerCase()];
                if (value === undefined) return null;
                return Array.isArray(value) ? value.join(', ') : value;
              },
              setCookies: setCookie,
              body: Buffer.concat(chunks),
            });
          });
        }
      );
      req.on('error', reject);
      req.end(request.body);
    });
  };
}

/**
 * Parse a Retry-After header given in whole seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || !/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

export interface HttpTransportOptions {
  url: string;
  auth: HttpAuth;
  /** Cookies with these names are kept and replayed instead of re-authenticating */
  cookieNames: readonly string[];
  socketTimeoutSeconds?: number;
  /** Send session, query and request ids as headers */
  tracing: boolean;
  forwardedFor?: string;
  sender: HttpSender;
  logger: Logger;
}

export class HttpTransport implements Transport {
  readonly kind = 'http';
  readonly supportsRetries = true;

  private opened = false;
  private readonly cookies = new Map<string, string>();

  constructor(private readonly options: HttpTransportOptions) {}

  isOpen(): boolean {
    return this.opened;
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
    this.cookies.clear();
  }

  /** Cookies currently retained, as `name=value` pairs */
  retainedCookies(): string[] {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`);
  }

  async call<T>(payload: Buffer, decode: ReplyDecoder<T>, context: RpcCallContext): Promise<T> {
    if (!this.opened) {
      throw new TransportError('Transport is not open');
    }

    const usedCookies = this.cookies.size > 0;
    let response = await this.send(payload, context, usedCookies);
    if (response.status === 401 && usedCookies) {
      // Cookie expired or was rejected: fall back to the configured credentials
      this.options.logger.debug(`Cookie authentication rejected for ${context.method}, retrying with credentials`);
      this.cookies.clear();
      response = await this.send(payload, context, false);
    }

    this.retainCookies(response.setCookies);
    if (response.status < 200 || response.status >= 300) {
      throw new HttpError(response.status, response.statusText, parseRetryAfter(response.header('Retry-After')));
    }
    return decode(response.body).value;
  }

  private async send(payload: Buffer, context: RpcCallContext, withCookies: boolean): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-thrift',
      Accept: 'application/x-thrift',
      ...this.customHeaders(context),
    };
    if (withCookies) {
      headers.Cookie = this.retainedCookies().join('; ');
    } else {
      const authorization = await this.authorization();
      if (authorization !== undefined) {
        headers.Authorization = authorization;
      }
    }

    const { socketTimeoutSeconds } = this.options;
    try {
      return await this.options.sender({
        url: this.options.url,
        headers,
        body: payload,
        signal: socketTimeoutSeconds !== undefined ? AbortSignal.timeout(socketTimeoutSeconds * 1000) : undefined,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`HTTP request to ${this.options.url} failed: ${reason}`, { cause: error });
    }
  }

  private customHeaders(context: RpcCallContext): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.options.tracing) {
      if (context.sessionId !== null) headers['X-Impala-Session-Id'] = context.sessionId;
      if (context.queryId !== null) headers['X-Impala-Query-Id'] = context.queryId;
      headers['X-Request-Id'] = context.requestId;
    }
    if (this.options.forwardedFor !== undefined) {
      headers['X-Forwarded-For'] = this.options.forwardedFor;
    }
    return headers;
  }

  private async authorization(): Promise<string | undefined> {
    const auth = this.options.auth;
    switch (auth.kind) {
      case 'none':
        return undefined;
      case 'basic':
        return `Basic ${Buffer.from(`${auth.user}:${auth.password}`).toString('base64')}`;
      case 'jwt':
      case 'oauth':
        return `Bearer ${auth.token}`;
      case 'kerberos':
        return `Negotiate ${await auth.provider.negotiateToken(auth.service, auth.host)}`;
    }
  }

  private retainCookies(setCookies: readonly string[]): void {
    if (this.options.cookieNames.length === 0) {
      return;
    }
    for (const header of setCookies) {
      const pair = header.split(';', 1)[0] ?? '';
      const separator = pair.indexOf('=');
      if (separator <= 0) continue;
      const name = pair.slice(0, separator).trim();
      if (this.options.cookieNames.includes(name)) {
        this.cookies.set(name, pair.slice(separator + 1).trim());
      }
    }
  }
}
