/**
 * Formats of which only the head is understood: MatchedCombat, ESF and UIC.
 * Everything after the head is kept verbatim.
 */
import { DecodeError } from '../errors.js';
import { ESF_SIGNATURES } from '../file-type.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';

export class MatchedCombat {
  readonly type = 'MatchedCombat';

  constructor(public version: number, public entryCount: number, public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer): MatchedCombat {
    const reader = new BinaryReader(data);
    const version = reader.readU32();
    const entryCount = reader.readU32();
    return new MatchedCombat(version, entryCount, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter(8 + this.tail.length);
    writer.writeU32(this.version);
    writer.writeU32(this.entryCount);
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  clone(): MatchedCombat {
    return new MatchedCombat(this.version, this.entryCount, Buffer.from(this.tail));
  }
}

export class ESF {
  readonly type = 'ESF';

  constructor(public signature: number, public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer, path?: string): ESF {
    const reader = new BinaryReader(data);
    const signature = reader.readU32();
    if (!ESF_SIGNATURES.has(signature)) {
      throw new DecodeError(`Unknown ESF signature 0x${signature.toString(16)}`, path);
    }
    return new ESF(signature, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter(4 + this.tail.length);
    writer.writeU32(this.signature);
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  clone(): ESF {
    return new ESF(this.signature, Buffer.from(this.tail));
  }
}

const UIC_VERSION_PATTERN = /^Version(\d{3})$/;

export class UIC {
  readonly type = 'UIC';

  constructor(public version: number, public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer, path?: string): UIC {
    const reader = new BinaryReader(data);
    const match = UIC_VERSION_PATTERN.exec(reader.readFixedAscii(10));
    if (!match) {
      throw new DecodeError('Missing UI component version header', path);
    }
    return new UIC(Number(match[1]), Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter(10 + this.tail.length);
    writer.writeFixedAscii(`Version${String(this.version).padStart(3, '0')}`, 10);
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  clone(): UIC {
    return new UIC(this.version, Buffer.from(this.tail));
  }
}
