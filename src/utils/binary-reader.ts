/**
 * Little-endian cursor over a byte buffer.
 *
 * Every read is bounds checked and throws {@link DecodeError} when the buffer
 * runs out, so a malformed payload never yields a partially filled value.
 */
import { DecodeError } from '../errors.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export class BinaryReader {
  private offset: number;

  constructor(private readonly buffer: Buffer, offset = 0) {
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.buffer.length;
  }

  remaining(): number {
    return this.buffer.length - this.offset;
  }

  isAtEnd(): boolean {
    return this.offset >= this.buffer.length;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.buffer.length) {
      throw new DecodeError(`Seek to ${offset} outside of buffer of ${this.buffer.length} bytes`);
    }
    this.offset = offset;
  }

  private take(size: number): number {
    if (size < 0 || this.offset + size > this.buffer.length) {
      throw new DecodeError(`Unexpected end of data: needed ${size} bytes at offset ${this.offset}, ${this.remaining()} left`);
    }
    const start = this.offset;
    this.offset += size;
    return start;
  }

  readBool(): boolean {
    const at = this.offset;
    const value = this.readU8();
    if (value > 1) {
      throw new DecodeError(`Invalid boolean value ${value} at offset ${at}`);
    }
    return value === 1;
  }

  readU8(): number {
    return this.buffer.readUInt8(this.take(1));
  }

  readU16(): number {
    return this.buffer.readUInt16LE(this.take(2));
  }

  readU32(): number {
    return this.buffer.readUInt32LE(this.take(4));
  }

  readU64(): bigint {
    return this.buffer.readBigUInt64LE(this.take(8));
  }

  readI16(): number {
    return this.buffer.readInt16LE(this.take(2));
  }

  readI32(): number {
    return this.buffer.readInt32LE(this.take(4));
  }

  readI64(): bigint {
    return this.buffer.readBigInt64LE(this.take(8));
  }

  readF32(): number {
    return this.buffer.readFloatLE(this.take(4));
  }

  readF64(): number {
    return this.buffer.readDoubleLE(this.take(8));
  }

  readBytes(size: number): Buffer {
    const start = this.take(size);
    return this.buffer.subarray(start, start + size);
  }

  /** Everything from the cursor to the end. */
  readRest(): Buffer {
    return this.readBytes(this.remaining());
  }

  readUtf8(size: number): string {
    const at = this.offset;
    const bytes = this.readBytes(size);
    try {
      return utf8Decoder.decode(bytes);
    } catch (error) {
      throw new DecodeError(`Invalid UTF-8 string at offset ${at}`, undefined, error);
    }
  }

  /** u16 byte length followed by UTF-8. */
  readStringU8(): string {
    return this.readUtf8(this.readU16());
  }

  /** u32 byte length followed by UTF-8. */
  readStringU32(): string {
    return this.readUtf8(this.readU32());
  }

  /** u16 code-unit count followed by UTF-16LE. */
  readStringU16(): string {
    const units = this.readU16();
    return this.readBytes(units * 2).toString('utf16le');
  }

  readOptionalStringU8(): string | null {
    return this.readBool() ? this.readStringU8() : null;
  }

  readOptionalStringU16(): string | null {
    return this.readBool() ? this.readStringU16() : null;
  }

  readNullTerminated(): string {
    const end = this.buffer.indexOf(0, this.offset);
    if (end === -1) {
      throw new DecodeError(`Unterminated string at offset ${this.offset}`);
    }
    const value = this.readUtf8(end - this.offset);
    this.offset += 1;
    return value;
  }

  readFixedAscii(size: number): string {
    return this.readBytes(size).toString('latin1');
  }

  /** u32 colour rendered as upper-case hex, at least six digits. */
  readColourRgb(): string {
    return this.readU32().toString(16).toUpperCase().padStart(6, '0');
  }
}
