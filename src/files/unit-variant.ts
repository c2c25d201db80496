import { DecodeError } from '../errors.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';
import type { TextField, TextFieldHost } from './structured.js';

export const UNIT_VARIANT_MAGIC = 'VRNT';

export interface UnitVariantMesh {
  variantFilename: string;
  unknown: boolean;
}

export interface UnitVariantCategory {
  name: string;
  id: bigint;
  meshes: UnitVariantMesh[];
}

/** `.unit_variant`: mesh variants per unit category. */
export class UnitVariant implements TextFieldHost {
  readonly type = 'UnitVariant';
  static readonly VERSION = 2;

  constructor(public unknown: number, public categories: UnitVariantCategory[], public tail: Buffer = Buffer.alloc(0)) {}

  static decode(data: Buffer, path?: string): UnitVariant {
    const reader = new BinaryReader(data);
    if (reader.readFixedAscii(4) !== UNIT_VARIANT_MAGIC) {
      throw new DecodeError('Missing VRNT header', path);
    }
    const version = reader.readU32();
    if (version !== UnitVariant.VERSION) {
      throw new DecodeError(`Unsupported unit variant version ${version}`, path);
    }
    const count = reader.readU32();
    const unknown = reader.readU32();
    const categories: UnitVariantCategory[] = [];
    for (let index = 0; index < count; index++) {
      const name = reader.readStringU8();
      const id = reader.readU64();
      const meshCount = reader.readU32();
      const meshes: UnitVariantMesh[] = [];
      for (let mesh = 0; mesh < meshCount; mesh++) {
        meshes.push({ variantFilename: reader.readStringU8(), unknown: reader.readBool() });
      }
      categories.push({ name, id, meshes });
    }
    return new UnitVariant(unknown, categories, Buffer.from(reader.readRest()));
  }

  encode(): Buffer {
    const writer = new BinaryWriter();
    writer.writeFixedAscii(UNIT_VARIANT_MAGIC, 4);
    writer.writeU32(UnitVariant.VERSION);
    writer.writeU32(this.categories.length);
    writer.writeU32(this.unknown);
    for (const category of this.categories) {
      writer.writeStringU8(category.name);
      writer.writeU64(category.id);
      writer.writeU32(category.meshes.length);
      for (const mesh of category.meshes) {
        writer.writeStringU8(mesh.variantFilename);
        writer.writeBool(mesh.unknown);
      }
    }
    writer.writeBytes(this.tail);
    return writer.toBuffer();
  }

  /** Category names as `name`, mesh files as `meshes[<n>].variantFilename`. */
  textFields(): TextField[] {
    return this.categories.flatMap((category, entry) => [
      { entry, field: 'name', contents: category.name },
      ...category.meshes.map((mesh, index) => ({ entry, field: `meshes[${index}].variantFilename`, contents: mesh.variantFilename })),
    ]);
  }

  setTextField(entry: number, field: string, value: string): boolean {
    const category = this.categories[entry];
    if (!category) {
      return false;
    }
    if (field === 'name') {
      category.name = value;
      return true;
    }
    const match = /^meshes\[(\d+)\]\.variantFilename$/.exec(field);
    const mesh = match ? category.meshes[Number(match[1])] : undefined;
    if (!mesh) {
      return false;
    }
    mesh.variantFilename = value;
    return true;
  }

  clone(): UnitVariant {
    return new UnitVariant(
      this.unknown,
      this.categories.map((category) => ({ ...category, meshes: category.meshes.map((mesh) => ({ ...mesh })) })),
      Buffer.from(this.tail),
    );
  }
}
