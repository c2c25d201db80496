/**
 * A single entry of a container and the decode/encode dispatch over every
 * supported format.
 */
import { ConflictError, DecodeError } from './errors.js';
import { classifyFile, normalizePath } from './file-type.js';
import { AnimFragment } from './files/anim-fragment.js';
import { AnimPack } from './files/animpack.js';
import { AnimsTable } from './files/anims-table.js';
import { DB } from './files/db.js';
import { Loc } from './files/loc.js';
import { Audio, Image, RigidModel, Video } from './files/media.js';
import { ESF, MatchedCombat, UIC } from './files/opaque-tail.js';
import { PortraitSettings } from './files/portrait-settings.js';
import { Text } from './files/text.js';
import { UnitVariant } from './files/unit-variant.js';
import { PackBinary } from './pack-binary.js';
import type { DecodedFile } from './types/decoded.js';
import type { DecodeContext, FileType, OnDiskSource, RFileInfo } from './types/rfile.js';
import { warn } from './utils/logger.js';

export type RFileState =
  | { readonly kind: 'OnDisk'; readonly source: OnDiskSource }
  | { readonly kind: 'Cached'; readonly bytes: Buffer }
  | { readonly kind: 'Decoded'; readonly decoded: DecodedFile; readonly bytes: Buffer | null };

/**
 * Stored bytes of an entry that could not be unpacked. They are written back
 * verbatim and never decoded.
 */
export interface OpaqueBlob {
  readonly uncompressedSize: number;
  /** Framing the stored bytes were written with. */
  readonly compressed: boolean;
  readonly encrypted: boolean;
}

/** Decodes raw bytes as `fileType`. */
export function decodeFile(fileType: FileType, bytes: Buffer, context: DecodeContext): DecodedFile {
  const path = context.path;
  switch (fileType) {
    case 'DB': return DB.decode(bytes, context);
    case 'Loc': return Loc.decode(bytes, context);
    case 'AnimFragment': return AnimFragment.decode(bytes, path);
    case 'AnimPack': return AnimPack.decode(bytes, context);
    case 'AnimsTable': return AnimsTable.decode(bytes, path);
    case 'PortraitSettings': return PortraitSettings.decode(bytes, path);
    case 'UnitVariant': return UnitVariant.decode(bytes, path);
    case 'ESF': return ESF.decode(bytes, path);
    case 'MatchedCombat': return MatchedCombat.decode(bytes);
    case 'UIC': return UIC.decode(bytes, path);
    case 'Image': return new Image(Buffer.from(bytes));
    case 'Audio': return new Audio(Buffer.from(bytes));
    case 'Video': return Video.decode(bytes);
    case 'RigidModel': return new RigidModel(Buffer.from(bytes));
    case 'Text': return Text.decode(bytes, path);
    case 'Unknown': throw new DecodeError(`No decoder for ${path ?? 'entry'}`, path);
    default: {
      const unreachable: never = fileType;
      throw new DecodeError(`Unknown file type ${String(unreachable)}`, path);
    }
  }
}

export function encodeFile(decoded: DecodedFile): Buffer {
  switch (decoded.type) {
    case 'DB':
    case 'Loc':
    case 'AnimFragment':
    case 'AnimPack':
    case 'AnimsTable':
    case 'PortraitSettings':
    case 'UnitVariant':
    case 'ESF':
    case 'MatchedCombat':
    case 'UIC':
    case 'Image':
    case 'Audio':
    case 'Video':
    case 'RigidModel':
    case 'Text':
      return decoded.encode();
    default: {
      const unreachable: never = decoded;
      throw new DecodeError(`Unknown decoded type ${String(unreachable)}`);
    }
  }
}

export class RFile {
  private _state: RFileState;
  private _fileType: FileType;
  private _opaque: OpaqueBlob | null;

  constructor(
    private _path: string,
    state: RFileState,
    public timestamp: number | null = null,
    options: { fileType?: FileType; opaque?: OpaqueBlob | null } = {},
  ) {
    this._path = normalizePath(_path);
    this._state = state;
    this._opaque = options.opaque ?? null;
    this._fileType = options.fileType
      ?? (state.kind === 'Decoded' ? state.decoded.type : classifyFile(this._path, state.kind === 'Cached' ? state.bytes : undefined));
  }

  static fromBytes(path: string, bytes: Buffer, timestamp: number | null = null): RFile {
    return new RFile(path, { kind: 'Cached', bytes }, timestamp);
  }

  static fromDecoded(path: string, decoded: DecodedFile, timestamp: number | null = null): RFile {
    return new RFile(path, { kind: 'Decoded', decoded, bytes: null }, timestamp);
  }

  static onDisk(path: string, source: OnDiskSource, timestamp: number | null = null): RFile {
    return new RFile(path, { kind: 'OnDisk', source }, timestamp);
  }

  /** Stored bytes that failed to unpack; see {@link OpaqueBlob}. */
  static opaque(path: string, stored: Buffer, blob: OpaqueBlob, timestamp: number | null = null): RFile {
    return new RFile(path, { kind: 'Cached', bytes: stored }, timestamp, { opaque: blob });
  }

  get path(): string {
    return this._path;
  }

  /** Only the owning container renames entries. */
  setPath(path: string): void {
    this._path = normalizePath(path);
    if (this._state.kind !== 'Decoded') {
      this._fileType = classifyFile(this._path, this._state.kind === 'Cached' ? this._state.bytes : undefined);
    }
  }

  get state(): RFileState {
    return this._state;
  }

  get fileType(): FileType {
    return this._fileType;
  }

  get opaqueBlob(): OpaqueBlob | null {
    return this._opaque;
  }

  get isLoaded(): boolean {
    return this._state.kind !== 'OnDisk';
  }

  get isDecoded(): boolean {
    return this._state.kind === 'Decoded';
  }

  /** The decoded value, if the entry has been decoded. */
  get decoded(): DecodedFile | undefined {
    return this._state.kind === 'Decoded' ? this._state.decoded : undefined;
  }

  /**
   * Materialises the raw bytes of an entry left on disk and returns them.
   * Decoded entries without raw bytes are encoded. An entry whose stored bytes
   * fail to unpack becomes opaque and its stored bytes are returned.
   */
  async load(): Promise<Buffer> {
    const state = this._state;
    switch (state.kind) {
      case 'Cached':
        return state.bytes;
      case 'Decoded':
        return state.bytes ?? encodeFile(state.decoded);
      case 'OnDisk': {
        const { source } = state;
        const stored = await PackBinary.readStored(source);
        // Another caller may have finished loading while this one waited.
        if (this._state.kind !== 'OnDisk') {
          return this.load();
        }
        let bytes: Buffer;
        try {
          bytes = await PackBinary.unpack(stored, { compressed: source.compressed, encrypted: source.encrypted, uncompressedSize: source.uncompressedSize });
        } catch (error) {
          if (!(error instanceof DecodeError)) {
            throw error;
          }
          warn(`${this._path}: ${error.message}; keeping the stored bytes`);
          this._opaque = { uncompressedSize: source.uncompressedSize, compressed: source.compressed, encrypted: source.encrypted };
          this._state = { kind: 'Cached', bytes: stored };
          return stored;
        }
        if (this._state.kind === 'OnDisk') {
          this._state = { kind: 'Cached', bytes };
          this._fileType = classifyFile(this._path, bytes);
        }
        return bytes;
      }
      default: {
        const unreachable: never = state;
        throw new DecodeError(`Unknown entry state ${String(unreachable)}`, this._path);
      }
    }
  }

  /**
   * Decodes the entry, loading it first if needed. On failure the entry keeps
   * its raw bytes and the error propagates.
   */
  async decode(context: DecodeContext = {}): Promise<DecodedFile> {
    if (this._state.kind === 'Decoded') {
      return this._state.decoded;
    }
    await this.load();
    return this.decodeLoaded(context);
  }

  /** Synchronous decode of an entry whose bytes are already in memory. */
  decodeLoaded(context: DecodeContext = {}): DecodedFile {
    const state = this._state;
    if (state.kind === 'Decoded') {
      return state.decoded;
    }
    if (state.kind === 'OnDisk') {
      throw new DecodeError(`${this._path} is not loaded`, this._path);
    }
    if (this._opaque) {
      throw new DecodeError(`${this._path} could not be unpacked and is kept as stored`, this._path);
    }
    const decoded = decodeFile(this._fileType, state.bytes, { ...context, path: this._path });
    this._state = { kind: 'Decoded', decoded, bytes: state.bytes };
    return decoded;
  }

  /**
   * Raw bytes of the entry: the cached bytes when still valid, the encoded
   * decoded value otherwise.
   */
  async encode(): Promise<Buffer> {
    return this.load();
  }

  /** Synchronous encode of an entry that is in memory. */
  encodeLoaded(): Buffer {
    const state = this._state;
    if (state.kind === 'OnDisk') {
      throw new DecodeError(`${this._path} is not loaded`, this._path);
    }
    if (state.kind === 'Cached') {
      return state.bytes;
    }
    return state.bytes ?? encodeFile(state.decoded);
  }

  /**
   * Replaces the decoded value. The raw bytes become stale and are dropped.
   * @throws {ConflictError} If the value's type differs from the entry's
   */
  setDecoded(decoded: DecodedFile): void {
    if (this._fileType !== 'Unknown' && decoded.type !== this._fileType) {
      throw new ConflictError(`${this._path} holds ${this._fileType} data, cannot store ${decoded.type}`);
    }
    this._fileType = decoded.type;
    this._opaque = null;
    this._state = { kind: 'Decoded', decoded, bytes: null };
  }

  /** Marks an in-place edit of the decoded value: the raw bytes are dropped. */
  markEdited(): void {
    if (this._state.kind === 'Decoded') {
      this._state = { kind: 'Decoded', decoded: this._state.decoded, bytes: null };
    }
  }

  /** Replaces the content with raw bytes, dropping any decoded value. */
  setBytes(bytes: Buffer): void {
    this._opaque = null;
    this._state = { kind: 'Cached', bytes };
    this._fileType = classifyFile(this._path, bytes);
  }

  /** Drops the raw bytes of a decoded entry. */
  clearCache(): void {
    if (this._state.kind === 'Decoded' && this._state.bytes !== null) {
      this._state = { kind: 'Decoded', decoded: this._state.decoded, bytes: null };
    }
  }

  /** Decoded entries fall back to raw bytes, dropping the decoded value. */
  undecode(): void {
    const state = this._state;
    if (state.kind === 'Decoded') {
      this._state = { kind: 'Cached', bytes: state.bytes ?? encodeFile(state.decoded) };
    }
  }

  clone(): RFile {
    const state = this._state;
    let copy: RFileState;
    switch (state.kind) {
      case 'OnDisk':
        copy = state;
        break;
      case 'Cached':
        copy = { kind: 'Cached', bytes: Buffer.from(state.bytes) };
        break;
      case 'Decoded':
        copy = { kind: 'Decoded', decoded: state.decoded.clone(), bytes: state.bytes ? Buffer.from(state.bytes) : null };
        break;
      default: {
        const unreachable: never = state;
        throw new DecodeError(`Unknown entry state ${String(unreachable)}`, this._path);
      }
    }
    return new RFile(this._path, copy, this.timestamp, { fileType: this._fileType, opaque: this._opaque });
  }

  info(): RFileInfo {
    const state = this._state;
    let size: number | null;
    if (state.kind === 'OnDisk') {
      size = state.source.uncompressedSize;
    } else if (state.kind === 'Cached') {
      size = this._opaque ? this._opaque.uncompressedSize : state.bytes.length;
    } else {
      size = state.bytes ? state.bytes.length : null;
    }
    return {
      path: this._path,
      fileType: this._fileType,
      size,
      timestamp: this.timestamp,
      isLoaded: this.isLoaded,
      isDecoded: this.isDecoded,
      isOpaque: this._opaque !== null,
    };
  }
}
