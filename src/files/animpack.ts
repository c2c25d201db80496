/**
 * Animation packs: a flat container nested inside a pack entry.
 */
import { Container } from '../container.js';
import { DecodeError, describeError } from '../errors.js';
import { normalizePath } from '../file-type.js';
import { RFile } from '../rfile.js';
import type { DecodeContext } from '../types/rfile.js';
import { BinaryReader } from '../utils/binary-reader.js';
import { BinaryWriter } from '../utils/binary-writer.js';
import { debug } from '../utils/logger.js';

export class AnimPack extends Container {
  readonly type = 'AnimPack';
  /** Paths as stored, for entries whose stored form differs from the normalized one. */
  private readonly storedPaths = new WeakMap<RFile, string>();

  /**
   * Reads the nested entries. Unless `context.lazyLoad` is set, every entry is
   * also decoded; entries that fail stay as raw bytes.
   */
  static decode(data: Buffer, context: DecodeContext = {}): AnimPack {
    const reader = new BinaryReader(data);
    const animPack = new AnimPack();
    const count = reader.readU32();
    for (let index = 0; index < count; index++) {
      const path = reader.readStringU8();
      const size = reader.readU32();
      const file = RFile.fromBytes(path, Buffer.from(reader.readBytes(size)));
      if (animPack.hasFile(file.path)) {
        throw new DecodeError(`Duplicate path ${file.path} in animpack`, context.path);
      }
      animPack.insert(file);
      if (path !== file.path) {
        animPack.storedPaths.set(file, path);
      }
    }
    if (!reader.isAtEnd()) {
      throw new DecodeError(`Animpack has ${reader.remaining()} trailing bytes`, context.path);
    }

    if (!context.lazyLoad) {
      for (const file of animPack.entries.values()) {
        if (file.fileType === 'Unknown') {
          continue;
        }
        try {
          file.decodeLoaded({ ...context, path: file.path });
        } catch (error) {
          debug(`${context.path ?? 'animpack'}: ${file.path} left undecoded: ${describeError(error)}`);
        }
      }
    }
    return animPack;
  }

  /** The path an entry is written under: as read, unless it has been moved since. */
  private storedPath(file: RFile): string {
    const stored = this.storedPaths.get(file);
    return stored !== undefined && normalizePath(stored) === file.path ? stored : file.path;
  }

  /** Entries are written in the order they were read or added. */
  encode(): Buffer {
    const writer = new BinaryWriter();
    writer.writeU32(this.entries.size);
    for (const file of this.entries.values()) {
      const bytes = file.encodeLoaded();
      writer.writeStringU8(this.storedPath(file));
      writer.writeU32(bytes.length);
      writer.writeBytes(bytes);
    }
    return writer.toBuffer();
  }

  clone(): AnimPack {
    const copy = new AnimPack();
    for (const file of this.entries.values()) {
      const cloned = file.clone();
      copy.insert(cloned);
      const stored = this.storedPaths.get(file);
      if (stored !== undefined) {
        copy.storedPaths.set(cloned, stored);
      }
    }
    return copy;
  }
}
