/**
 * @lakehouse/impala-rpc - Binary Protocol
 *
 * Reader and writer for the Thrift binary protocol: big-endian integers,
 * length-prefixed strings, typed field headers and strict message envelopes.
 */

/**
 * Wire type identifiers
 */
export enum WireType {
  STOP = 0,
  VOID = 1,
  BOOL = 2,
  BYTE = 3,
  DOUBLE = 4,
  I16 = 6,
  I32 = 8,
  I64 = 10,
  STRING = 11,
  STRUCT = 12,
  MAP = 13,
  SET = 14,
  LIST = 15,
}

/**
 * Message envelope kinds
 */
export enum MessageKind {
  CALL = 1,
  REPLY = 2,
  EXCEPTION = 3,
  ONEWAY = 4,
}

const VERSION_1 = 0x80010000;
const VERSION_MASK = 0xffff0000;
const KIND_MASK = 0x000000ff;

/** Upper bound on container sizes and string lengths accepted from the wire */
const MAX_LENGTH = 256 * 1024 * 1024;

/**
 * Thrown when a reader runs past the bytes received so far.
 *
 * Stream transports catch this, wait for more data and decode again.
 */
export class InputBufferUnderrunError extends Error {
  constructor(needed: number, available: number) {
    super(`Input buffer underrun: needed ${needed} bytes, ${available} available`);
    this.name = 'InputBufferUnderrunError';
  }
}

/**
 * Thrown when bytes cannot be decoded as a protocol message
 */
export class ProtocolDecodeError extends Error {
  constructor(
    message: string,
    /** Length of the offending message, when it could be delimited */
    public readonly bytesRead?: number
  ) {
    super(message);
    this.name = 'ProtocolDecodeError';
  }
}

export interface MessageHeader {
  name: string;
  kind: MessageKind;
  seqid: number;
}

export interface FieldHeader {
  type: WireType;
  id: number;
}

export interface MapHeader {
  keyType: WireType;
  valueType: WireType;
  size: number;
}

export interface ListHeader {
  elementType: WireType;
  size: number;
}

/**
 * Accumulates encoded bytes
 */
export class BinaryWriter {
  private chunks: Buffer[] = [];
  private length = 0;

  private push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  writeByte(value: number): void {
    const buf = Buffer.alloc(1);
    buf.writeInt8(value);
    this.push(buf);
  }

  writeBool(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  writeI16(value: number): void {
    const buf = Buffer.alloc(2);
    buf.writeInt16BE(value);
    this.push(buf);
  }

  writeI32(value: number): void {
    const buf = Buffer.alloc(4);
    buf.writeInt32BE(value);
    this.push(buf);
  }

  writeI64(value: bigint | number): void {
    const buf = Buffer.alloc(8);
    buf.writeBigInt64BE(typeof value === 'bigint' ? value : BigInt(Math.trunc(value)));
    this.push(buf);
  }

  writeDouble(value: number): void {
    const buf = Buffer.alloc(8);
    buf.writeDoubleBE(value);
    this.push(buf);
  }

  writeBinary(value: Uint8Array): void {
    this.writeI32(value.length);
    this.push(Buffer.from(value.buffer, value.byteOffset, value.byteLength));
  }

  writeString(value: string): void {
    this.writeBinary(Buffer.from(value, 'utf8'));
  }

  writeMessageBegin(name: string, kind: MessageKind, seqid: number): void {
    this.writeI32((VERSION_1 | kind) | 0);
    this.writeString(name);
    this.writeI32(seqid);
  }

  writeFieldBegin(type: WireType, id: number): void {
    this.writeByte(type);
    this.writeI16(id);
  }

  writeFieldStop(): void {
    this.writeByte(WireType.STOP);
  }

  writeMapBegin(keyType: WireType, valueType: WireType, size: number): void {
    this.writeByte(keyType);
    this.writeByte(valueType);
    this.writeI32(size);
  }

  writeListBegin(elementType: WireType, size: number): void {
    this.writeByte(elementType);
    this.writeI32(size);
  }

  /**
   * Concatenate everything written so far
   */
  toBytes(): Buffer {
    return Buffer.concat(this.chunks, this.length);
  }
}

/**
 * Decodes values from a byte buffer, tracking the read offset
 */
export class BinaryReader {
  private readonly buf: Buffer;
  private pos = 0;

  constructor(bytes: Uint8Array) {
    this.buf = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Number of bytes consumed */
  get offset(): number {
    return this.pos;
  }

  private ensure(count: number): void {
    const available = this.buf.length - this.pos;
    if (available < count) {
      throw new InputBufferUnderrunError(count, available);
    }
  }

  private readLength(): number {
    const length = this.readI32();
    if (length < 0 || length > MAX_LENGTH) {
      throw new ProtocolDecodeError(`Invalid length ${length}`);
    }
    return length;
  }

  readByte(): number {
    this.ensure(1);
    const value = this.buf.readInt8(this.pos);
    this.pos += 1;
    return value;
  }

  readBool(): boolean {
    return this.readByte() !== 0;
  }

  readI16(): number {
    this.ensure(2);
    const value = this.buf.readInt16BE(this.pos);
    this.pos += 2;
    return value;
  }

  readI32(): number {
    this.ensure(4);
    const value = this.buf.readInt32BE(this.pos);
    this.pos += 4;
    return value;
  }

  readI64(): bigint {
    this.ensure(8);
    const value = this.buf.readBigInt64BE(this.pos);
    this.pos += 8;
    return value;
  }

  readDouble(): number {
    this.ensure(8);
    const value = this.buf.readDoubleBE(this.pos);
    this.pos += 8;
    return value;
  }

  readBinary(): Buffer {
    const length = this.readLength();
    this.ensure(length);
    // Copy so decoded values do not pin the receive buffer
    const value = Buffer.from(this.buf.subarray(this.pos, this.pos + length));
    this.pos += length;
    return value;
  }

  readString(): string {
    const length = this.readLength();
    this.ensure(length);
    const value = this.buf.toString('utf8', this.pos, this.pos + length);
    this.pos += length;
    return value;
  }

  readMessageBegin(): MessageHeader {
    const first = this.readI32();
    if (first < 0) {
      if (((first & VERSION_MASK) >>> 0) !== VERSION_1) {
        throw new ProtocolDecodeError(`Bad protocol version ${(first >>> 0).toString(16)}`);
      }
      const kind = first & KIND_MASK;
      const name = this.readString();
      const seqid = this.readI32();
      return { name, kind: toMessageKind(kind), seqid };
    }
    // Non-strict header: the first word is the name length
    if (first > MAX_LENGTH) {
      throw new ProtocolDecodeError(`Invalid method name length ${first}`);
    }
    this.ensure(first);
    const name = this.buf.toString('utf8', this.pos, this.pos + first);
    this.pos += first;
    const kind = this.readByte();
    const seqid = this.readI32();
    return { name, kind: toMessageKind(kind), seqid };
  }

  readFieldBegin(): FieldHeader {
    const type = toWireType(this.readByte());
    if (type === WireType.STOP) {
      return { type, id: 0 };
    }
    return { type, id: this.readI16() };
  }

  readMapBegin(): MapHeader {
    const keyType = toWireType(this.readByte());
    const valueType = toWireType(this.readByte());
    return { keyType, valueType, size: this.readLength() };
  }

  readListBegin(): ListHeader {
    const elementType = toWireType(this.readByte());
    return { elementType, size: this.readLength() };
  }

  /**
   * Skip over a value of the given type without materialising it
   */
  skip(type: WireType): void {
    switch (type) {
      case WireType.BOOL:
      case WireType.BYTE:
        this.readByte();
        return;
      case WireType.I16:
        this.readI16();
        return;
      case WireType.I32:
        this.readI32();
        return;
      case WireType.I64:
      case WireType.DOUBLE:
        this.ensure(8);
        this.pos += 8;
        return;
      case WireType.STRING: {
        const length = this.readLength();
        this.ensure(length);
        this.pos += length;
        return;
      }
      case WireType.STRUCT:
        for (;;) {
          const field = this.readFieldBegin();
          if (field.type === WireType.STOP) {
            return;
          }
          this.skip(field.type);
        }
      case WireType.MAP: {
        const header = this.readMapBegin();
        for (let i = 0; i < header.size; i++) {
          this.skip(header.keyType);
          this.skip(header.valueType);
        }
        return;
      }
      case WireType.SET:
      case WireType.LIST: {
        const header = this.readListBegin();
        for (let i = 0; i < header.size; i++) {
          this.skip(header.elementType);
        }
        return;
      }
      default:
        throw new ProtocolDecodeError(`Cannot skip wire type ${type}`);
    }
  }
}

const WIRE_TYPES: ReadonlySet<number> = new Set(
  Object.values(WireType).filter((value): value is WireType => typeof value === 'number')
);

function toWireType(value: number): WireType {
  for (const type of WIRE_TYPES) {
    if (type === value) {
      return type;
    }
  }
  throw new ProtocolDecodeError(`Unknown wire type ${value}`);
}

function toMessageKind(value: number): MessageKind {
  switch (value) {
    case MessageKind.CALL:
      return MessageKind.CALL;
    case MessageKind.REPLY:
      return MessageKind.REPLY;
    case MessageKind.EXCEPTION:
      return MessageKind.EXCEPTION;
    case MessageKind.ONEWAY:
      return MessageKind.ONEWAY;
    default:
      throw new ProtocolDecodeError(`Unknown message kind ${value}`);
  }
}
