import { DecodeError } from '../errors.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';
import { collectTextFields, textFieldName, type TextField, type TextFieldHost } from './structured.js';

export interface AnimsTableFragmentRef {
  name: string;
  unknown: number;
}

export interface AnimsTableEntry {
  tableName: string;
  skeletonType: string;
  mountTableName: string;
  fragments: AnimsTableFragmentRef[];
  unknown: boolean;
}

const TEXT_FIELDS = ['tableName', 'skeletonType', 'mountTableName'] as const;

/** `animations/animation_tables/*.bin`: which fragments each animation table uses. */
export class AnimsTable implements TextFieldHost {
  readonly type = 'AnimsTable';
  static readonly VERSION = 2;

  constructor(public entries: AnimsTableEntry[], public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer, path?: string): AnimsTable {
    const reader = new BinaryReader(data);
    const version = reader.readI32();
    if (version !== AnimsTable.VERSION) {
      throw new DecodeError(`Unsupported animation table version ${version}`, path);
    }
    const count = reader.readU32();
    const entries: AnimsTableEntry[] = [];
    for (let index = 0; index < count; index++) {
      const tableName = reader.readStringU8();
      const skeletonType = reader.readStringU8();
      const mountTableName = reader.readStringU8();
      const fragmentCount = reader.readU32();
      const fragments: AnimsTableFragmentRef[] = [];
      for (let fragment = 0; fragment < fragmentCount; fragment++) {
        fragments.push({ name: reader.readStringU8(), unknown: reader.readI32() });
      }
      entries.push({ tableName, skeletonType, mountTableName, fragments, unknown: reader.readBool() });
    }
    return new AnimsTable(entries, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter();
    writer.writeI32(AnimsTable.VERSION);
    writer.writeU32(this.entries.length);
    for (const entry of this.entries) {
      writer.writeStringU8(entry.tableName);
      writer.writeStringU8(entry.skeletonType);
      writer.writeStringU8(entry.mountTableName);
      writer.writeU32(entry.fragments.length);
      for (const fragment of entry.fragments) {
        writer.writeStringU8(fragment.name);
        writer.writeI32(fragment.unknown);
      }
      writer.writeBool(entry.unknown);
    }
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  textFields(): TextField[] {
    return collectTextFields(this.entries, TEXT_FIELDS);
  }

  setTextField(entry: number, field: string, value: string): boolean {
    const target = this.entries[entry];
    const key = textFieldName(TEXT_FIELDS, field);
    if (!target || key === undefined) {
      return false;
    }
    target[key] = value;
    return true;
  }

  clone(): AnimsTable {
    return new AnimsTable(
      this.entries.map((entry) => ({ ...entry, fragments: entry.fragments.map((fragment) => ({ ...fragment })) })),
      Buffer.from(this.tail),
    );
  }
}
