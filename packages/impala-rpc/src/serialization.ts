/**
 * @lakehouse/impala-rpc - Serialization Module
 *
 * Schema-driven encoding and decoding of RPC messages. A service definition
 * (see idl.ts) describes every struct and method; values travel as plain
 * objects keyed by field name.
 */

import {
  BinaryReader,
  BinaryWriter,
  MessageKind,
  ProtocolDecodeError,
  WireType,
} from './binary.js';

// =============================================================================
// Schema Types
// =============================================================================

export type ScalarTypeName = 'bool' | 'byte' | 'i16' | 'i32' | 'i64' | 'double' | 'string' | 'binary';

export type TypeRef =
  | ScalarTypeName
  | { readonly struct: string }
  | { readonly list: TypeRef }
  | { readonly set: TypeRef }
  | { readonly map: readonly [TypeRef, TypeRef] };

export interface FieldDef {
  readonly id: number;
  readonly name: string;
  readonly type: TypeRef;
}

export interface StructDef {
  readonly name: string;
  readonly fields: readonly FieldDef[];
}

export interface MethodDef {
  readonly name: string;
  readonly args: readonly FieldDef[];
  /** 'void' for methods without a return value */
  readonly returns: TypeRef | 'void';
  /** Declared exceptions, carried in the reply under their own field ids */
  readonly throws: readonly FieldDef[];
}

export interface ServiceDef {
  readonly name: string;
  readonly structs: ReadonlyMap<string, StructDef>;
  readonly methods: ReadonlyMap<string, MethodDef>;
}

// =============================================================================
// Value Types
// =============================================================================

/**
 * A decoded (or to-be-encoded) value. i64 decodes to bigint, binary to
 * Uint8Array, maps to Map and structs to plain objects.
 */
export type WireValue =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | readonly WireValue[]
  | ReadonlyMap<WireValue, WireValue>
  | WireStruct;

export interface WireStruct {
  readonly [field: string]: WireValue | undefined;
}

/**
 * Server-side application failure (unknown method, internal error, ...)
 */
export enum ApplicationExceptionType {
  UNKNOWN = 0,
  UNKNOWN_METHOD = 1,
  INVALID_MESSAGE_TYPE = 2,
  WRONG_METHOD_NAME = 3,
  BAD_SEQUENCE_ID = 4,
  MISSING_RESULT = 5,
  INTERNAL_ERROR = 6,
  PROTOCOL_ERROR = 7,
}

export class ApplicationException extends Error {
  constructor(
    public readonly type: number,
    message: string,
    /** Length of the reply that carried the exception */
    public readonly bytesRead?: number
  ) {
    super(message);
    this.name = 'ApplicationException';
  }
}

/**
 * A declared exception returned by a method (e.g. BeeswaxException)
 */
export class ServiceException extends Error {
  constructor(
    public readonly exceptionName: string,
    public readonly payload: WireStruct,
    public readonly bytesRead?: number
  ) {
    super(typeof payload.message === 'string' ? payload.message : exceptionName);
    this.name = 'ServiceException';
  }
}

/**
 * Thrown when a value does not match the schema it is encoded against
 */
export class SchemaMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Bytes taken up by the reply a decode failure came from, when known.
 * Stream readers drop that many bytes so the next reply starts clean.
 */
export function failedReplyLength(error: unknown): number | undefined {
  if (error instanceof ApplicationException || error instanceof ServiceException || error instanceof ProtocolDecodeError) {
    return error.bytesRead;
  }
  return undefined;
}

export function isWireList(value: WireValue | undefined): value is readonly WireValue[] {
  return Array.isArray(value);
}

export function isWireMap(value: WireValue | undefined): value is ReadonlyMap<WireValue, WireValue> {
  return value instanceof Map;
}

export function isWireStruct(value: WireValue | undefined): value is WireStruct {
  return (
    typeof value === 'object' &&
    !(value instanceof Uint8Array) &&
    !isWireList(value) &&
    !isWireMap(value)
  );
}

// =============================================================================
// Encoding
// =============================================================================

function wireTypeOf(type: TypeRef): WireType {
  if (typeof type === 'string') {
    switch (type) {
      case 'bool':
        return WireType.BOOL;
      case 'byte':
        return WireType.BYTE;
      case 'i16':
        return WireType.I16;
      case 'i32':
        return WireType.I32;
      case 'i64':
        return WireType.I64;
      case 'double':
        return WireType.DOUBLE;
      case 'string':
      case 'binary':
        return WireType.STRING;
    }
  }
  if ('struct' in type) return WireType.STRUCT;
  if ('list' in type) return WireType.LIST;
  if ('set' in type) return WireType.SET;
  return WireType.MAP;
}

function lookupStruct(service: ServiceDef, name: string): StructDef {
  const def = service.structs.get(name);
  if (!def) {
    throw new SchemaMismatchError(`Unknown struct ${name} in service ${service.name}`);
  }
  return def;
}

function mismatch(path: string, expected: string, value: WireValue): SchemaMismatchError {
  return new SchemaMismatchError(`${path}: expected ${expected}, got ${typeof value}`);
}

function writeValue(
  service: ServiceDef,
  writer: BinaryWriter,
  type: TypeRef,
  value: WireValue,
  path: string
): void {
  if (typeof type === 'string') {
    switch (type) {
      case 'bool':
        if (typeof value !== 'boolean') throw mismatch(path, 'boolean', value);
        writer.writeBool(value);
        return;
      case 'byte':
      case 'i16':
      case 'i32':
        if (typeof value !== 'number') throw mismatch(path, 'number', value);
        if (type === 'byte') writer.writeByte(value);
        else if (type === 'i16') writer.writeI16(value);
        else writer.writeI32(value);
        return;
      case 'i64':
        if (typeof value !== 'bigint' && typeof value !== 'number') throw mismatch(path, 'bigint', value);
        writer.writeI64(value);
        return;
      case 'double':
        if (typeof value !== 'number') throw mismatch(path, 'number', value);
        writer.writeDouble(value);
        return;
      case 'string':
      case 'binary':
        if (typeof value === 'string') writer.writeString(value);
        else if (value instanceof Uint8Array) writer.writeBinary(value);
        else throw mismatch(path, 'string', value);
        return;
    }
  }

  if ('struct' in type) {
    if (!isWireStruct(value)) throw mismatch(path, `struct ${type.struct}`, value);
    writeStruct(service, writer, lookupStruct(service, type.struct).fields, value, path);
    return;
  }

  if ('list' in type || 'set' in type) {
    const elementType = 'list' in type ? type.list : type.set;
    if (!isWireList(value)) throw mismatch(path, 'array', value);
    writer.writeListBegin(wireTypeOf(elementType), value.length);
    value.forEach((element, index) => {
      writeValue(service, writer, elementType, element, `${path}[${index}]`);
    });
    return;
  }

  const [keyType, valueType] = type.map;
  if (!isWireMap(value)) throw mismatch(path, 'Map', value);
  writer.writeMapBegin(wireTypeOf(keyType), wireTypeOf(valueType), value.size);
  for (const [key, entry] of value) {
    writeValue(service, writer, keyType, key, `${path}.key`);
    writeValue(service, writer, valueType, entry, `${path}[${String(key)}]`);
  }
}

function writeStruct(
  service: ServiceDef,
  writer: BinaryWriter,
  fields: readonly FieldDef[],
  value: WireStruct,
  path: string
): void {
  for (const field of fields) {
    const fieldValue = value[field.name];
    if (fieldValue === undefined) {
      continue;
    }
    writer.writeFieldBegin(wireTypeOf(field.type), field.id);
    writeValue(service, writer, field.type, fieldValue, `${path}.${field.name}`);
  }
  writer.writeFieldStop();
}

// =============================================================================
// Decoding
// =============================================================================

function readValue(service: ServiceDef, reader: BinaryReader, type: TypeRef): WireValue {
  if (typeof type === 'string') {
    switch (type) {
      case 'bool':
        return reader.readBool();
      case 'byte':
        return reader.readByte();
      case 'i16':
        return reader.readI16();
      case 'i32':
        return reader.readI32();
      case 'i64':
        return reader.readI64();
      case 'double':
        return reader.readDouble();
      case 'string':
        return reader.readString();
      case 'binary':
        return reader.readBinary();
    }
  }

  if ('struct' in type) {
    return readStruct(service, reader, lookupStruct(service, type.struct).fields);
  }

  if ('list' in type || 'set' in type) {
    const elementType = 'list' in type ? type.list : type.set;
    const header = reader.readListBegin();
    const items: WireValue[] = [];
    for (let i = 0; i < header.size; i++) {
      items.push(readValue(service, reader, elementType));
    }
    return items;
  }

  const [keyType, valueType] = type.map;
  const header = reader.readMapBegin();
  const map = new Map<WireValue, WireValue>();
  for (let i = 0; i < header.size; i++) {
    const key = readValue(service, reader, keyType);
    map.set(key, readValue(service, reader, valueType));
  }
  return map;
}

function readStruct(service: ServiceDef, reader: BinaryReader, fields: readonly FieldDef[]): WireStruct {
  const result: Record<string, WireValue> = {};
  for (;;) {
    const header = reader.readFieldBegin();
    if (header.type === WireType.STOP) {
      return result;
    }
    const field = fields.find((candidate) => candidate.id === header.id);
    // Unknown fields and fields whose wire type disagrees with the schema are skipped
    if (!field || wireTypeOf(field.type) !== header.type) {
      reader.skip(header.type);
      continue;
    }
    result[field.name] = readValue(service, reader, field.type);
  }
}

const APPLICATION_EXCEPTION_FIELDS: readonly FieldDef[] = [
  { id: 1, name: 'message', type: 'string' },
  { id: 2, name: 'type', type: 'i32' },
];

function lookupMethod(service: ServiceDef, name: string): MethodDef {
  const method = service.methods.get(name);
  if (!method) {
    throw new SchemaMismatchError(`Unknown method ${name} in service ${service.name}`);
  }
  return method;
}

function resultFields(method: MethodDef): FieldDef[] {
  const fields: FieldDef[] = [];
  if (method.returns !== 'void') {
    fields.push({ id: 0, name: 'success', type: method.returns });
  }
  return fields.concat(method.throws);
}

// =============================================================================
// Client Side
// =============================================================================

/**
 * Encode a call message for `method` with the given arguments
 */
export function encodeCall(service: ServiceDef, method: string, seqid: number, args: WireStruct): Buffer {
  const def = lookupMethod(service, method);
  const writer = new BinaryWriter();
  writer.writeMessageBegin(method, MessageKind.CALL, seqid);
  writeStruct(service, writer, def.args, args, `${method}_args`);
  return writer.toBytes();
}

export interface DecodedReply {
  seqid: number;
  /** The success value, or undefined for void methods */
  value: WireValue | undefined;
  /** Bytes consumed from the input */
  bytesRead: number;
}

/**
 * Decode a reply to `method`.
 *
 * Throws ApplicationException for exception messages, ServiceException when a
 * declared exception is set, and InputBufferUnderrunError when `bytes` does
 * not yet hold a complete message.
 */
export function decodeReply(service: ServiceDef, method: string, bytes: Uint8Array): DecodedReply {
  const def = lookupMethod(service, method);
  const reader = new BinaryReader(bytes);
  const header = reader.readMessageBegin();

  if (header.kind === MessageKind.EXCEPTION) {
    const payload = readStruct(service, reader, APPLICATION_EXCEPTION_FIELDS);
    const type = typeof payload.type === 'number' ? payload.type : ApplicationExceptionType.UNKNOWN;
    const message = typeof payload.message === 'string' ? payload.message : '';
    throw new ApplicationException(type, message, reader.offset);
  }
  if (header.kind !== MessageKind.REPLY) {
    reader.skip(WireType.STRUCT);
    throw new ProtocolDecodeError(`Unexpected message kind ${header.kind} for ${method}`, reader.offset);
  }
  if (header.name !== method) {
    reader.skip(WireType.STRUCT);
    throw new ApplicationException(
      ApplicationExceptionType.WRONG_METHOD_NAME,
      `${method} failed: wrong method name ${header.name}`,
      reader.offset
    );
  }

  const result = readStruct(service, reader, resultFields(def));
  for (const thrown of def.throws) {
    const payload = result[thrown.name];
    if (payload !== undefined && isWireStruct(payload)) {
      const exceptionName = typeof thrown.type === 'object' && 'struct' in thrown.type ? thrown.type.struct : thrown.name;
      throw new ServiceException(exceptionName, payload, reader.offset);
    }
  }

  const value = result.success;
  if (def.returns !== 'void' && value === undefined) {
    throw new ApplicationException(
      ApplicationExceptionType.MISSING_RESULT,
      `${method} failed: unknown result`,
      reader.offset
    );
  }
  return { seqid: header.seqid, value, bytesRead: reader.offset };
}

// =============================================================================
// Server Side
// =============================================================================

export interface DecodedCall {
  method: string;
  seqid: number;
  args: WireStruct;
  bytesRead: number;
}

/**
 * Decode an incoming call message
 */
export function decodeCall(service: ServiceDef, bytes: Uint8Array): DecodedCall {
  const reader = new BinaryReader(bytes);
  const header = reader.readMessageBegin();
  if (header.kind !== MessageKind.CALL && header.kind !== MessageKind.ONEWAY) {
    throw new ProtocolDecodeError(`Expected a call message, got kind ${header.kind}`);
  }
  const method = service.methods.get(header.name);
  if (!method) {
    // Keep the envelope so the caller can answer with UNKNOWN_METHOD
    reader.skip(WireType.STRUCT);
    return { method: header.name, seqid: header.seqid, args: {}, bytesRead: reader.offset };
  }
  const args = readStruct(service, reader, method.args);
  return { method: header.name, seqid: header.seqid, args, bytesRead: reader.offset };
}

export type ReplyBody =
  | { success: WireValue | undefined }
  | { exception: string; payload: WireStruct };

/**
 * Encode a reply message carrying either a success value or a declared exception
 */
export function encodeReply(service: ServiceDef, method: string, seqid: number, body: ReplyBody): Buffer {
  const def = lookupMethod(service, method);
  const writer = new BinaryWriter();
  writer.writeMessageBegin(method, MessageKind.REPLY, seqid);

  const result: Record<string, WireValue> = {};
  if ('exception' in body) {
    const thrown = def.throws.find(
      (field) => typeof field.type === 'object' && 'struct' in field.type && field.type.struct === body.exception
    );
    if (!thrown) {
      throw new SchemaMismatchError(`${method} does not declare ${body.exception}`);
    }
    result[thrown.name] = body.payload;
  } else if (body.success !== undefined) {
    result.success = body.success;
  }

  writeStruct(service, writer, resultFields(def), result, `${method}_result`);
  return writer.toBytes();
}

/**
 * Encode an application exception message
 */
export function encodeApplicationException(
  method: string,
  seqid: number,
  type: ApplicationExceptionType,
  message: string
): Buffer {
  const writer = new BinaryWriter();
  writer.writeMessageBegin(method, MessageKind.EXCEPTION, seqid);
  writer.writeFieldBegin(WireType.STRING, 1);
  writer.writeString(message);
  writer.writeFieldBegin(WireType.I32, 2);
  writer.writeI32(type);
  writer.writeFieldStop();
  return writer.toBytes();
}
