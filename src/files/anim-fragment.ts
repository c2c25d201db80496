/**
 * Animation fragments. Their string fields are searchable and replaceable
 * through {@link TextFieldHost}.
 */
import { DecodeError } from '../errors.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';
import { collectTextFields, textFieldName, type TextField, type TextFieldHost } from './structured.js';

export interface AnimFragmentEntry {
  animationId: number;
  slotId: number;
  filename: string;
  metadata: string;
  metadataSound: string;
  skeletonType: string;
  blendInTime: number;
  selectionWeight: number;
  singleFrameVariant: boolean;
}

const TEXT_FIELDS = ['filename', 'metadata', 'metadataSound', 'skeletonType'] as const;

/** Animation fragment (`.frg`): slot to animation bindings of one skeleton. */
export class AnimFragment implements TextFieldHost {
  readonly type = 'AnimFragment';
  static readonly VERSION = 2;

  constructor(
    public skeleton1: string,
    public skeleton2: string,
    public minId: number,
    public maxId: number,
    public entries: AnimFragmentEntry[],
    public tail: Buffer = Buffer.alloc(0),
  ) {}

  static decode(data: Buffer, path?: string): AnimFragment {
    const reader = new BinaryReader(data);
    const version = reader.readI32();
    if (version !== AnimFragment.VERSION) {
      throw new DecodeError(`Unsupported animation fragment version ${version}`, path);
    }
    const skeleton1 = reader.readStringU8();
    const skeleton2 = reader.readStringU8();
    const minId = reader.readI32();
    const maxId = reader.readI32();
    const count = reader.readU32();
    const entries: AnimFragmentEntry[] = [];
    for (let index = 0; index < count; index++) {
      entries.push({
        animationId: reader.readI32(),
        slotId: reader.readI32(),
        filename: reader.readStringU8(),
        metadata: reader.readStringU8(),
        metadataSound: reader.readStringU8(),
        skeletonType: reader.readStringU8(),
        blendInTime: reader.readF32(),
        selectionWeight: reader.readF32(),
        singleFrameVariant: reader.readBool(),
      });
    }
    return new AnimFragment(skeleton1, skeleton2, minId, maxId, entries, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter(256 + this.entries.length * 128);
    writer.writeI32(AnimFragment.VERSION);
    writer.writeStringU8(this.skeleton1);
    writer.writeStringU8(this.skeleton2);
    writer.writeI32(this.minId);
    writer.writeI32(this.maxId);
    writer.writeU32(this.entries.length);
    for (const entry of this.entries) {
      writer.writeI32(entry.animationId);
      writer.writeI32(entry.slotId);
      writer.writeStringU8(entry.filename);
      writer.writeStringU8(entry.metadata);
      writer.writeStringU8(entry.metadataSound);
      writer.writeStringU8(entry.skeletonType);
      writer.writeF32(entry.blendInTime);
      writer.writeF32(entry.selectionWeight);
      writer.writeBool(entry.singleFrameVariant);
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

  clone(): AnimFragment {
    return new AnimFragment(this.skeleton1, this.skeleton2, this.minId, this.maxId, this.entries.map((entry) => ({ ...entry })), Buffer.from(this.tail));
  }
}
