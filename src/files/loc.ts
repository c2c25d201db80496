/**
 * Localisation files: key, text and tooltip flag per row.
 */
import { DecodeError, SchemaError } from '../errors.js';
import { readRows, writeRows, type Row, type TableData } from '../table.js';
import { createField, type Definition } from '../types/schema.js';
import type { DecodeContext } from '../types/rfile.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';

export const LOC_MAGIC = Buffer.from([0xff, 0xfe, 0x4c, 0x4f, 0x43, 0x00]);
/** Schema table name consulted for loc layouts. */
export const LOC_TABLE_NAME = 'loc';

export const LOC_DEFINITION_V1: Definition = {
  version: 1,
  fields: [
    createField('key', 'StringU16', { isKey: true, caOrder: 0 }),
    createField('text', 'StringU16', { caOrder: 1 }),
    createField('tooltip', 'Boolean', { defaultValue: 'false', caOrder: 2 }),
  ],
  localisedFields: [],
};

export class Loc implements TableData {
  readonly type = 'Loc';

  constructor(public definition: Definition, public rows: Row[]) {}

  get version(): number {
    return this.definition.version;
  }

  static create(): Loc {
    return new Loc(LOC_DEFINITION_V1, []);
  }

  static decode(data: Buffer, context: DecodeContext): Loc {
    if (!data.subarray(0, LOC_MAGIC.length).equals(LOC_MAGIC)) {
      throw new DecodeError('Missing loc header', context.path);
    }
    const reader = new BinaryReader(data, LOC_MAGIC.length);
    const version = reader.readI32();
    const entryCount = reader.readU32();

    const definition = context.schema?.definitionFor(LOC_TABLE_NAME, version) ?? (version === 1 ? LOC_DEFINITION_V1 : undefined);
    if (!definition) {
      throw new SchemaError(LOC_TABLE_NAME, version, context.schema?.knownVersions(LOC_TABLE_NAME) ?? [1]);
    }

    const rows = readRows(reader, definition, entryCount);
    if (!reader.isAtEnd()) {
      throw new DecodeError(`Loc decoded with ${reader.remaining()} bytes left`, context.path);
    }
    return new Loc(definition, rows);
  }

  encode(): Buffer {
    const writer = new BinaryWriter(32 + this.rows.length * 48);
    writer.writeBytes(LOC_MAGIC);
    writer.writeI32(this.definition.version);
    writer.writeU32(this.rows.length);
    writeRows(writer, this.definition, this.rows);
    return writer.toBuffer();
  }

  clone(): Loc {
    return new Loc(this.definition, this.rows.map((row) => [...row]));
  }
}
