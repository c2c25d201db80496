import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';
import { collectTextFields, readVersion, textFieldName, type TextField, type TextFieldHost } from './structured.js';

export interface PortraitCamera {
  z: number;
  y: number;
  yaw: number;
  pitch: number;
  fov: number;
  skeletonNode: number;
  distance: number;
  theta: number;
}

export interface PortraitVariant {
  filename: string;
  fileDiffuse: string;
  fileMask1: string;
  fileMask2: string;
  fileMask3: string;
  /** Version 4 only. */
  age?: number;
  politician?: boolean;
  factionLeader?: boolean;
}

export interface PortraitEntry {
  id: string;
  cameraHead: PortraitCamera;
  cameraBody: PortraitCamera | null;
  variants: PortraitVariant[];
}

const SUPPORTED_VERSIONS = [1, 4] as const;
const ENTRY_TEXT_FIELDS = ['id'] as const;
const VARIANT_TEXT_FIELDS = ['filename', 'fileDiffuse', 'fileMask1', 'fileMask2', 'fileMask3'] as const;

function readCamera(reader: BinaryReader): PortraitCamera {
  return {
    z: reader.readF32(),
    y: reader.readF32(),
    yaw: reader.readF32(),
    pitch: reader.readF32(),
    fov: reader.readF32(),
    skeletonNode: reader.readF32(),
    distance: reader.readF32(),
    theta: reader.readF32(),
  };
}

function writeCamera(writer: BinaryWriter, camera: PortraitCamera): void {
  for (const value of [camera.z, camera.y, camera.yaw, camera.pitch, camera.fov, camera.skeletonNode, camera.distance, camera.theta]) {
    writer.writeF32(value);
  }
}

/**
 * Portrait camera settings. Text fields are addressed as `id` on the entry, or
 * `variants[<n>].<field>` for a variant.
 */
export class PortraitSettings implements TextFieldHost {
  readonly type = 'PortraitSettings';

  constructor(public version: number, public entries: PortraitEntry[], public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer, path?: string): PortraitSettings {
    const reader = new BinaryReader(data);
    const version = readVersion(reader, SUPPORTED_VERSIONS, 'portrait settings', path);
    const count = reader.readU32();
    const entries: PortraitEntry[] = [];
    for (let index = 0; index < count; index++) {
      const id = reader.readStringU8();
      const cameraHead = readCamera(reader);
      const cameraBody = reader.readBool() ? readCamera(reader) : null;
      const variantCount = reader.readU32();
      const variants: PortraitVariant[] = [];
      for (let variant = 0; variant < variantCount; variant++) {
        const entry: PortraitVariant = {
          filename: reader.readStringU8(),
          fileDiffuse: reader.readStringU8(),
          fileMask1: reader.readStringU8(),
          fileMask2: reader.readStringU8(),
          fileMask3: reader.readStringU8(),
        };
        if (version === 4) {
          entry.age = reader.readU32();
          entry.politician = reader.readBool();
          entry.factionLeader = reader.readBool();
        }
        variants.push(entry);
      }
      entries.push({ id, cameraHead, cameraBody, variants });
    }
    return new PortraitSettings(version, entries, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter();
    writer.writeU32(this.version);
    writer.writeU32(this.entries.length);
    for (const entry of this.entries) {
      writer.writeStringU8(entry.id);
      writeCamera(writer, entry.cameraHead);
      writer.writeBool(entry.cameraBody !== null);
      if (entry.cameraBody !== null) {
        writeCamera(writer, entry.cameraBody);
      }
      writer.writeU32(entry.variants.length);
      for (const variant of entry.variants) {
        writer.writeStringU8(variant.filename);
        writer.writeStringU8(variant.fileDiffuse);
        writer.writeStringU8(variant.fileMask1);
        writer.writeStringU8(variant.fileMask2);
        writer.writeStringU8(variant.fileMask3);
        if (this.version === 4) {
          writer.writeU32(variant.age ?? 0);
          writer.writeBool(variant.politician ?? false);
          writer.writeBool(variant.factionLeader ?? false);
        }
      }
    }
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  textFields(): TextField[] {
    const fields = collectTextFields(this.entries, ENTRY_TEXT_FIELDS);
    this.entries.forEach((entry, index) => {
      entry.variants.forEach((variant, variantIndex) => {
        for (const field of collectTextFields([variant], VARIANT_TEXT_FIELDS)) {
          fields.push({ entry: index, field: `variants[${variantIndex}].${field.field}`, contents: field.contents });
        }
      });
    });
    return fields;
  }

  setTextField(entry: number, field: string, value: string): boolean {
    const target = this.entries[entry];
    if (!target) {
      return false;
    }
    if (field === 'id') {
      target.id = value;
      return true;
    }
    const match = /^variants\[(\d+)\]\.(\w+)$/.exec(field);
    const variant = match ? target.variants[Number(match[1])] : undefined;
    const key = match ? textFieldName(VARIANT_TEXT_FIELDS, match[2] ?? '') : undefined;
    if (!variant || key === undefined) {
      return false;
    }
    variant[key] = value;
    return true;
  }

  clone(): PortraitSettings {
    return new PortraitSettings(
      this.version,
      this.entries.map((entry) => ({
        id: entry.id,
        cameraHead: { ...entry.cameraHead },
        cameraBody: entry.cameraBody ? { ...entry.cameraBody } : null,
        variants: entry.variants.map((variant) => ({ ...variant })),
      })),
      Buffer.from(this.tail),
    );
  }
}
