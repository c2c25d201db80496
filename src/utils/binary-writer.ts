/**
 * Growable little-endian writer, the counterpart of {@link BinaryReader}.
 */

export class BinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialSize = 1024) {
    this.buffer = Buffer.alloc(initialSize);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  writeBool(value: boolean): void {
    this.writeU8(value ? 1 : 0);
  }

  writeU8(value: number): void {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeU16(value: number): void {
    this.ensureCapacity(2);
    this.buffer.writeUInt16LE(value, this.offset);
    this.offset += 2;
  }

  writeU32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value >>> 0, this.offset);
    this.offset += 4;
  }

  writeU64(value: bigint): void {
    this.ensureCapacity(8);
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
  }

  writeI16(value: number): void {
    this.ensureCapacity(2);
    this.buffer.writeInt16LE(value, this.offset);
    this.offset += 2;
  }

  writeI32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeInt32LE(value, this.offset);
    this.offset += 4;
  }

  writeI64(value: bigint): void {
    this.ensureCapacity(8);
    this.buffer.writeBigInt64LE(value, this.offset);
    this.offset += 8;
  }

  writeF32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeFloatLE(value, this.offset);
    this.offset += 4;
  }

  writeF64(value: number): void {
    this.ensureCapacity(8);
    this.buffer.writeDoubleLE(value, this.offset);
    this.offset += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  writeStringU8(value: string): void {
    const bytes = Buffer.from(value, 'utf8');
    this.writeU16(bytes.length);
    this.writeBytes(bytes);
  }

  writeStringU32(value: string): void {
    const bytes = Buffer.from(value, 'utf8');
    this.writeU32(bytes.length);
    this.writeBytes(bytes);
  }

  writeStringU16(value: string): void {
    this.writeU16(value.length);
    this.writeBytes(Buffer.from(value, 'utf16le'));
  }

  writeOptionalStringU8(value: string | null): void {
    this.writeBool(value !== null);
    if (value !== null) {
      this.writeStringU8(value);
    }
  }

  writeOptionalStringU16(value: string | null): void {
    this.writeBool(value !== null);
    if (value !== null) {
      this.writeStringU16(value);
    }
  }

  writeNullTerminated(value: string): void {
    this.writeBytes(Buffer.from(value, 'utf8'));
    this.writeU8(0);
  }

  /** Writes `value` as latin1, truncated or zero padded to `size` bytes. */
  writeFixedAscii(value: string, size: number): void {
    const bytes = Buffer.alloc(size);
    bytes.write(value.slice(0, size), 'latin1');
    this.writeBytes(bytes);
  }

  writeColourRgb(hex: string): void {
    this.writeU32(Number.parseInt(hex, 16));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer, 0, 0, this.offset);
      this.buffer = newBuffer;
    }
  }

  /** Copy of the bytes written so far. */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }
}
