/**
 * DB tables: a small header followed by rows laid out per the schema definition
 * matching the version stamped in the header.
 */
import { randomUUID } from 'node:crypto';
import { DecodeError, SchemaError } from '../errors.js';
import { tableNameFromPath } from '../file-type.js';
import type { GameInfo } from '../games.js';
import { defaultRow, readRows, writeRows, type Row, type TableData } from '../table.js';
import type { Definition } from '../types/schema.js';
import type { DecodeContext } from '../types/rfile.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';

export const GUID_MARKER = Buffer.from([0xfd, 0xfe, 0xfc, 0xff]);
export const VERSION_MARKER = Buffer.from([0xfc, 0xfd, 0xfe, 0xff]);

export interface DbHeader {
  readonly guid: string | null;
  readonly version: number;
  /** Whether the version marker was written; tables of version 0 may omit it. */
  readonly hasVersionMarker: boolean;
  /** Byte between the markers and the entry count, always 1 in shipped tables. */
  readonly marker: number;
  readonly entryCount: number;
  readonly size: number;
}

export class DB implements TableData {
  readonly type = 'DB';

  constructor(
    public readonly tableName: string,
    public definition: Definition,
    public rows: Row[],
    public guid: string | null,
    public hasVersionMarker = true,
    public marker = 1,
  ) {}

  get version(): number {
    return this.definition.version;
  }

  /** Empty table for `tableName` using `definition`. */
  static create(tableName: string, definition: Definition, game?: GameInfo): DB {
    const guid = game && !game.tableGuids ? null : randomUUID();
    return new DB(tableName, definition, [], guid, definition.version > 0);
  }

  static readHeader(data: Buffer): DbHeader {
    const reader = new BinaryReader(data);
    let guid: string | null = null;
    let version = 0;
    let hasVersionMarker = false;

    if (data.subarray(0, 4).equals(GUID_MARKER)) {
      reader.seek(4);
      guid = reader.readStringU16();
    }
    if (data.subarray(reader.position, reader.position + 4).equals(VERSION_MARKER)) {
      reader.seek(reader.position + 4);
      version = reader.readI32();
      hasVersionMarker = true;
    }
    const marker = reader.readU8();
    const entryCount = reader.readU32();
    return { guid, version, hasVersionMarker, marker, entryCount, size: reader.position };
  }

  static decode(data: Buffer, context: DecodeContext): DB {
    const tableName = context.path ? tableNameFromPath(context.path) : null;
    if (!tableName) {
      throw new DecodeError(`Cannot tell the table name of ${context.path ?? 'an entry without path'}`, context.path);
    }
    const header = DB.readHeader(data);
    const schema = context.schema;
    if (!schema) {
      throw new SchemaError(tableName, header.version, [], `No schema loaded, table ${tableName} cannot be decoded.`);
    }
    const definition = schema.definitionFor(tableName, header.version);
    if (!definition) {
      throw new SchemaError(tableName, header.version, schema.knownVersions(tableName));
    }

    const reader = new BinaryReader(data, header.size);
    const rows = readRows(reader, definition, header.entryCount);
    if (!reader.isAtEnd()) {
      throw new DecodeError(`Table ${tableName} version ${header.version} decoded with ${reader.remaining()} bytes left; the definition does not match the data`, context.path);
    }
    return new DB(tableName, definition, rows, header.guid, header.hasVersionMarker, header.marker);
  }

  encode(): Buffer {
    const writer = new BinaryWriter(64 + this.rows.length * 32);
    if (this.guid !== null) {
      writer.writeBytes(GUID_MARKER);
      writer.writeStringU16(this.guid);
    }
    if (this.hasVersionMarker || this.definition.version !== 0) {
      writer.writeBytes(VERSION_MARKER);
      writer.writeI32(this.definition.version);
    }
    writer.writeU8(this.marker);
    writer.writeU32(this.rows.length);
    writeRows(writer, this.definition, this.rows);
    return writer.toBuffer();
  }

  newRow(): Row {
    return defaultRow(this.definition);
  }

  clone(): DB {
    return new DB(this.tableName, this.definition, this.rows.map((row) => [...row]), this.guid, this.hasVersionMarker, this.marker);
  }
}
