import { describe, it, expect } from 'vitest';
import { DecodeError } from '../src/errors.js';
import { BinaryReader } from '../src/utils/binary-reader.js';
import { BinaryWriter } from '../src/utils/binary-writer.js';

describe('BinaryWriter', () => {
  it('should write little-endian integers', () => {
    const writer = new BinaryWriter(2);
    writer.writeU16(0x0102);
    writer.writeU32(0x03040506);
    writer.writeI16(-2);

    expect(writer.toBuffer()).toEqual(Buffer.from([0x02, 0x01, 0x06, 0x05, 0x04, 0x03, 0xfe, 0xff]));
  });

  it('should prefix StringU8 with its UTF-8 byte length', () => {
    const writer = new BinaryWriter();
    writer.writeStringU8('é');

    expect(writer.toBuffer()).toEqual(Buffer.from([0x02, 0x00, 0xc3, 0xa9]));
  });

  it('should prefix StringU16 with its code unit count', () => {
    const writer = new BinaryWriter();
    writer.writeStringU16('ab');

    expect(writer.toBuffer()).toEqual(Buffer.from([0x02, 0x00, 0x61, 0x00, 0x62, 0x00]));
  });

  it('should pad fixed ASCII fields with zeros', () => {
    const writer = new BinaryWriter();
    writer.writeFixedAscii('PFH', 5);

    expect(writer.toBuffer()).toEqual(Buffer.from([0x50, 0x46, 0x48, 0x00, 0x00]));
  });
});

describe('BinaryReader', () => {
  it('should read back what the writer wrote', () => {
    const writer = new BinaryWriter();
    writer.writeBool(true);
    writer.writeI32(-7);
    writer.writeI64(-9n);
    writer.writeF32(1.5);
    writer.writeOptionalStringU8(null);
    writer.writeOptionalStringU16('unit');
    writer.writeNullTerminated('end');
    writer.writeColourRgb('00FF80');

    const reader = new BinaryReader(writer.toBuffer());

    expect(reader.readBool()).toBe(true);
    expect(reader.readI32()).toBe(-7);
    expect(reader.readI64()).toBe(-9n);
    expect(reader.readF32()).toBe(1.5);
    expect(reader.readOptionalStringU8()).toBeNull();
    expect(reader.readOptionalStringU16()).toBe('unit');
    expect(reader.readNullTerminated()).toBe('end');
    expect(reader.readColourRgb()).toBe('00FF80');
    expect(reader.isAtEnd()).toBe(true);
  });

  it('should throw DecodeError when the buffer runs out', () => {
    const reader = new BinaryReader(Buffer.from([0x01, 0x02]));

    expect(() => reader.readU32()).toThrow(DecodeError);
    expect(reader.position).toBe(0);
  });

  it('should reject boolean bytes other than 0 and 1', () => {
    const reader = new BinaryReader(Buffer.from([0x02]));

    expect(() => reader.readBool()).toThrow('Invalid boolean value 2 at offset 0');
  });

  it('should reject invalid UTF-8', () => {
    const reader = new BinaryReader(Buffer.from([0x01, 0x00, 0xff]));

    expect(() => reader.readStringU8()).toThrow(DecodeError);
  });

  it('should reject a seek past the end', () => {
    const reader = new BinaryReader(Buffer.alloc(4));

    expect(() => reader.seek(5)).toThrow(DecodeError);
    reader.seek(4);
    expect(reader.remaining()).toBe(0);
  });
});
