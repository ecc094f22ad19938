/**
 * @lakehouse/impala-rpc - Binary Protocol Tests
 */

import { describe, it, expect } from 'vitest';

import {
  BinaryReader,
  BinaryWriter,
  InputBufferUnderrunError,
  MessageKind,
  ProtocolDecodeError,
  WireType,
} from '../binary.js';

function bytesOf(write: (writer: BinaryWriter) => void): number[] {
  const writer = new BinaryWriter();
  write(writer);
  return [...writer.toBytes()];
}

describe('binary.ts', () => {
  describe('BinaryWriter', () => {
    it('should write integers big-endian', () => {
      expect(bytesOf((w) => w.writeI16(258))).toEqual([1, 2]);
      expect(bytesOf((w) => w.writeI32(1))).toEqual([0, 0, 0, 1]);
      expect(bytesOf((w) => w.writeI64(-2n))).toEqual([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xfe]);
    });

    it('should length-prefix strings with their UTF-8 byte length', () => {
      expect(bytesOf((w) => w.writeString('ab'))).toEqual([0, 0, 0, 2, 0x61, 0x62]);
      expect(bytesOf((w) => w.writeString('é'))).toEqual([0, 0, 0, 2, 0xc3, 0xa9]);
    });

    it('should write a strict message header', () => {
      expect(bytesOf((w) => w.writeMessageBegin('ping', MessageKind.CALL, 7))).toEqual([
        0x80, 0x01, 0x00, 0x01, 0, 0, 0, 4, 0x70, 0x69, 0x6e, 0x67, 0, 0, 0, 7,
      ]);
    });

    it('should write field headers as type byte plus i16 id', () => {
      expect(bytesOf((w) => w.writeFieldBegin(WireType.I32, 3))).toEqual([8, 0, 3]);
      expect(bytesOf((w) => w.writeFieldStop())).toEqual([0]);
    });
  });

  describe('BinaryReader', () => {
    it('should read back what the writer wrote', () => {
      const writer = new BinaryWriter();
      writer.writeBool(true);
      writer.writeByte(-5);
      writer.writeI32(-123456);
      writer.writeI64(9007199254740993n);
      writer.writeDouble(1.5);
      writer.writeString('hello');

      const reader = new BinaryReader(writer.toBytes());
      expect(reader.readBool()).toBe(true);
      expect(reader.readByte()).toBe(-5);
      expect(reader.readI32()).toBe(-123456);
      expect(reader.readI64()).toBe(9007199254740993n);
      expect(reader.readDouble()).toBe(1.5);
      expect(reader.readString()).toBe('hello');
      expect(reader.offset).toBe(1 + 1 + 4 + 8 + 8 + 9);
    });

    it('should read strict message headers', () => {
      const writer = new BinaryWriter();
      writer.writeMessageBegin('GetLog', MessageKind.REPLY, 42);

      const header = new BinaryReader(writer.toBytes()).readMessageBegin();
      expect(header).toEqual({ name: 'GetLog', kind: MessageKind.REPLY, seqid: 42 });
    });

    it('should accept non-strict message headers', () => {
      const bytes = Uint8Array.from([0, 0, 0, 4, 0x70, 0x69, 0x6e, 0x67, 1, 0, 0, 0, 9]);
      const header = new BinaryReader(bytes).readMessageBegin();
      expect(header).toEqual({ name: 'ping', kind: MessageKind.CALL, seqid: 9 });
    });

    it('should reject an unknown protocol version', () => {
      const bytes = Uint8Array.from([0x80, 0x02, 0x00, 0x01, 0, 0, 0, 0, 0, 0, 0, 0]);
      expect(() => new BinaryReader(bytes).readMessageBegin()).toThrow(ProtocolDecodeError);
    });

    it('should raise an underrun when bytes are missing', () => {
      const reader = new BinaryReader(Uint8Array.from([0, 0]));
      expect(() => reader.readI32()).toThrow(InputBufferUnderrunError);
    });

    it('should raise an underrun for a truncated string body', () => {
      const reader = new BinaryReader(Uint8Array.from([0, 0, 0, 5, 0x61]));
      expect(() => reader.readString()).toThrow(InputBufferUnderrunError);
    });

    it('should reject negative lengths', () => {
      const reader = new BinaryReader(Uint8Array.from([0xff, 0xff, 0xff, 0xff]));
      expect(() => reader.readString()).toThrow(ProtocolDecodeError);
    });

    it('should skip whole structs including nested containers', () => {
      const writer = new BinaryWriter();
      writer.writeFieldBegin(WireType.I32, 1);
      writer.writeI32(10);
      writer.writeFieldBegin(WireType.LIST, 2);
      writer.writeListBegin(WireType.STRING, 2);
      writer.writeString('a');
      writer.writeString('bc');
      writer.writeFieldBegin(WireType.MAP, 3);
      writer.writeMapBegin(WireType.STRING, WireType.I64, 1);
      writer.writeString('k');
      writer.writeI64(1n);
      writer.writeFieldStop();
      writer.writeByte(99);

      const reader = new BinaryReader(writer.toBytes());
      reader.skip(WireType.STRUCT);
      expect(reader.readByte()).toBe(99);
    });

    it('should reject unknown wire types in field headers', () => {
      const reader = new BinaryReader(Uint8Array.from([7, 0, 1]));
      expect(() => reader.readFieldBegin()).toThrow(ProtocolDecodeError);
    });
  });
});
