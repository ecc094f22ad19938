/**
 * @lakehouse/impala - SASL Negotiation
 *
 * Client side of the SASL handshake used by socket transports. Each
 * negotiation message is `[status:1][length:4 BE][payload]`; once the server
 * reports COMPLETE, calls travel as `[length:4 BE][payload]` frames.
 */

import { TransportError } from '../errors.js';

import type { StreamChannel } from './channel.js';
import type { SaslMechanism } from './types.js';

export enum SaslStatus {
  START = 1,
  OK = 2,
  BAD = 3,
  ERROR = 4,
  COMPLETE = 5,
}

const MAX_FRAME_LENGTH = 256 * 1024 * 1024;

/**
 * SASL PLAIN: `\0user\0password`
 */
export class PlainMechanism implements SaslMechanism {
  readonly name = 'PLAIN';

  constructor(
    private readonly user: string,
    private readonly password: string
  ) {}

  async initialResponse(): Promise<Uint8Array> {
    return Buffer.from(`\0${this.user}\0${this.password}`, 'utf8');
  }

  async step(): Promise<Uint8Array> {
    return new Uint8Array(0);
  }
}

export function encodeSaslMessage(status: SaslStatus, payload: Uint8Array): Buffer {
  const header = Buffer.alloc(5);
  header.writeUInt8(status, 0);
  header.writeUInt32BE(payload.length, 1);
  return Buffer.concat([header, payload]);
}

async function readSaslMessage(
  channel: StreamChannel,
  signal?: AbortSignal
): Promise<{ status: number; payload: Buffer }> {
  const header = await channel.readExactly(5, signal);
  const status = header.readUInt8(0);
  const length = header.readUInt32BE(1);
  if (length > MAX_FRAME_LENGTH) {
    throw new TransportError(`SASL message too large: ${length} bytes`);
  }
  const payload = await channel.readExactly(length, signal);
  return { status, payload };
}

/**
 * Run the SASL handshake over `channel`
 *
 * @throws TransportError when the server rejects authentication
 */
export async function negotiateSasl(
  channel: StreamChannel,
  mechanism: SaslMechanism,
  signal?: AbortSignal
): Promise<void> {
  await channel.write(encodeSaslMessage(SaslStatus.START, Buffer.from(mechanism.name, 'utf8')));
  await channel.write(encodeSaslMessage(SaslStatus.OK, await mechanism.initialResponse()));

  for (;;) {
    const { status, payload } = await readSaslMessage(channel, signal);
    switch (status) {
      case SaslStatus.COMPLETE:
        return;
      case SaslStatus.OK:
        await channel.write(encodeSaslMessage(SaslStatus.OK, await mechanism.step(payload)));
        break;
      case SaslStatus.BAD:
      case SaslStatus.ERROR:
        throw new TransportError(`SASL ${mechanism.name} authentication failed: ${payload.toString('utf8')}`);
      default:
        throw new TransportError(`Bad SASL negotiation status: ${status} (${payload.toString('utf8')})`);
    }
  }
}

export function encodeFrame(payload: Uint8Array): Buffer {
  const header = Buffer.alloc(4);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Read one `[length][payload]` frame
 */
export async function readFrame(channel: StreamChannel): Promise<Buffer> {
  const header = await channel.readExactly(4);
  const length = header.readUInt32BE(0);
  if (length > MAX_FRAME_LENGTH) {
    throw new TransportError(`Frame too large: ${length} bytes`);
  }
  return channel.readExactly(length);
}
