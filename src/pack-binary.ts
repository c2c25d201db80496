/**
 * Pack binary helpers: header, dependency index, file index and payload.
 */
import { open, readFile, writeFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { deflate, inflate } from 'node:zlib';
import {
  AUTHORING_TOOL_SIZE,
  FILE_TYPE_MASK,
  HEADER_SIZES,
  PACK_FILE_TYPES,
  PFH6_RESERVED_SIZE,
  PFH_VERSIONS,
  PackFlags,
  type PfhVersion,
} from './constants/pack-constants.js';
import { DecodeError, PackFormatError, toIoError } from './errors.js';
import type { OnDiskSource } from './types/rfile.js';
import type { PackBinaryStructure, PackHeader, PackIndexEntry, PackWriteEntry } from './types/pack-binary-structure.js';
import { BinaryReader } from './utils/binary-reader.js';
import { BinaryWriter } from './utils/binary-writer.js';
import { xorKeystream } from './utils/pack-crypto.js';

const inflateAsync = promisify(inflate);
const deflateAsync = promisify(deflate);

const MIN_HEADER_SIZE = HEADER_SIZES.PFH4;
const DEPENDENCY_COUNT_OFFSET = 8;
const DEPENDENCY_INDEX_SIZE_OFFSET = 12;
const FILE_COUNT_OFFSET = 16;
const FILE_INDEX_SIZE_OFFSET = 20;
const TIMESTAMP_OFFSET = 24;
const GAME_VERSION_OFFSET = 28;
const BUILD_NUMBER_OFFSET = 32;
const AUTHORING_TOOL_OFFSET = 36;

interface IndexMetadata {
  readonly headerSize: number;
  readonly dependencyCount: number;
  readonly dependencyIndexSize: number;
  readonly fileCount: number;
  readonly fileIndexSize: number;
}

function isPfhVersion(value: string): value is PfhVersion {
  return PFH_VERSIONS.some((version) => version === value);
}

export function hasFlag(bitmask: number, flag: number): boolean {
  return (bitmask & flag) !== 0;
}

/**
 * Parses the fixed-size header.
 * @param buffer - At least the first header bytes of the file
 * @param filePath - File path for error messages
 * @throws {PackFormatError} If the magic is unknown or the header is cut short
 */
function parseHeader(buffer: Buffer, filePath: string): { header: PackHeader; metadata: IndexMetadata } {
  if (buffer.length < MIN_HEADER_SIZE) {
    throw new PackFormatError(`File too small to be a pack (${buffer.length} bytes): ${filePath}`, filePath);
  }
  const magic: string = buffer.toString('latin1', 0, 4);
  if (!isPfhVersion(magic)) {
    throw new PackFormatError(`Unknown pack magic "${magic}" in ${filePath}`, filePath);
  }
  const headerSize: number = HEADER_SIZES[magic];
  if (buffer.length < headerSize) {
    throw new PackFormatError(`Truncated ${magic} header in ${filePath}: ${buffer.length} of ${headerSize} bytes`, filePath);
  }

  const flags: number = buffer.readUInt32LE(4);
  const fileType = PACK_FILE_TYPES[flags & FILE_TYPE_MASK];
  if (fileType === undefined) {
    throw new PackFormatError(`Unknown pack type ${flags & FILE_TYPE_MASK} in ${filePath}`, filePath);
  }

  const header: PackHeader = {
    pfhVersion: magic,
    fileType,
    bitmask: (flags & ~FILE_TYPE_MASK) >>> 0,
    timestamp: buffer.readUInt32LE(TIMESTAMP_OFFSET),
    gameVersion: magic === 'PFH4' ? 0 : buffer.readUInt32LE(GAME_VERSION_OFFSET),
    buildNumber: magic === 'PFH6' ? buffer.readUInt32LE(BUILD_NUMBER_OFFSET) : 0,
    authoringTool: magic === 'PFH6'
      ? buffer.toString('latin1', AUTHORING_TOOL_OFFSET, AUTHORING_TOOL_OFFSET + AUTHORING_TOOL_SIZE).replace(/\0+$/, '')
      : '',
  };
  const metadata: IndexMetadata = {
    headerSize,
    dependencyCount: buffer.readUInt32LE(DEPENDENCY_COUNT_OFFSET),
    dependencyIndexSize: buffer.readUInt32LE(DEPENDENCY_INDEX_SIZE_OFFSET),
    fileCount: buffer.readUInt32LE(FILE_COUNT_OFFSET),
    fileIndexSize: buffer.readUInt32LE(FILE_INDEX_SIZE_OFFSET),
  };
  return { header, metadata };
}

function parseDependencies(index: Buffer, count: number, filePath: string): string[] {
  const reader = new BinaryReader(index);
  const dependencies: string[] = [];
  try {
    for (let i = 0; i < count; i++) {
      dependencies.push(reader.readNullTerminated());
    }
  } catch (error) {
    throw new PackFormatError(`Corrupt dependency index in ${filePath}`, filePath, error);
  }
  return dependencies;
}

/**
 * Parses the file index and assigns payload offsets in index order.
 * @throws {PackFormatError} If the index or the payload it describes is truncated
 */
function parseFileIndex(index: Buffer, header: PackHeader, metadata: IndexMetadata, payloadStart: number, totalSize: number, filePath: string): PackIndexEntry[] {
  const data: Buffer = hasFlag(header.bitmask, PackFlags.INDEX_IS_ENCRYPTED) ? xorKeystream(index, metadata.fileCount) : index;
  const compressed: boolean = hasFlag(header.bitmask, PackFlags.DATA_IS_COMPRESSED);
  const timestamps: boolean = hasFlag(header.bitmask, PackFlags.INDEX_HAS_TIMESTAMPS);
  const reader = new BinaryReader(data);
  const entries: PackIndexEntry[] = [];

  let offset: number = payloadStart;
  for (let i = 0; i < metadata.fileCount; i++) {
    let entry: PackIndexEntry;
    try {
      const size: number = reader.readU32();
      const storedSize: number = compressed ? reader.readU32() : size;
      const timestamp: number | null = timestamps ? reader.readU32() : null;
      const path: string = reader.readNullTerminated();
      entry = { path, size, storedSize, timestamp, offset };
    } catch (error) {
      throw new PackFormatError(`Corrupt file index in ${filePath} at entry ${i} of ${metadata.fileCount}`, filePath, error);
    }
    if (entry.offset + entry.storedSize > totalSize) {
      throw new PackFormatError(`Entry ${entry.path} extends beyond file bounds: offset=${entry.offset}, size=${entry.storedSize}, fileSize=${totalSize}`, filePath);
    }
    entries.push(entry);
    offset += entry.storedSize;
  }
  return entries;
}

function buildStructure(head: Buffer, indexes: Buffer, totalSize: number, filePath: string, buffer: Buffer | null): PackBinaryStructure {
  const { header, metadata } = parseHeader(head, filePath);
  const indexesEnd: number = metadata.headerSize + metadata.dependencyIndexSize + metadata.fileIndexSize;
  if (indexesEnd > totalSize || indexes.length < metadata.dependencyIndexSize + metadata.fileIndexSize) {
    throw new PackFormatError(`Pack index extends beyond file bounds in ${filePath}`, filePath);
  }
  const dependencies: string[] = parseDependencies(indexes.subarray(0, metadata.dependencyIndexSize), metadata.dependencyCount, filePath);
  const fileIndex: Buffer = indexes.subarray(metadata.dependencyIndexSize, metadata.dependencyIndexSize + metadata.fileIndexSize);
  const entries: PackIndexEntry[] = parseFileIndex(fileIndex, header, metadata, indexesEnd, totalSize, filePath);
  return { filePath, header, dependencies, entries, buffer, totalSize };
}

async function readLazily(filePath: string): Promise<PackBinaryStructure> {
  const handle = await open(filePath, 'r');
  try {
    const { size: totalSize } = await handle.stat();
    const head = Buffer.alloc(Math.min(totalSize, HEADER_SIZES.PFH6));
    await handle.read(head, 0, head.length, 0);
    const { metadata } = parseHeader(head, filePath);
    const indexSize: number = Math.max(0, Math.min(metadata.dependencyIndexSize + metadata.fileIndexSize, totalSize - metadata.headerSize));
    const indexes = Buffer.alloc(indexSize);
    await handle.read(indexes, 0, indexSize, metadata.headerSize);
    return buildStructure(head, indexes, totalSize, filePath, null);
  } finally {
    await handle.close();
  }
}

function writeHeader(writer: BinaryWriter, header: PackHeader, dependencyIndexSize: number, fileIndexSize: number, dependencyCount: number, fileCount: number): void {
  writer.writeFixedAscii(header.pfhVersion, 4);
  writer.writeU32((header.bitmask & ~FILE_TYPE_MASK) | PACK_FILE_TYPES.indexOf(header.fileType));
  writer.writeU32(dependencyCount);
  writer.writeU32(dependencyIndexSize);
  writer.writeU32(fileCount);
  writer.writeU32(fileIndexSize);
  writer.writeU32(header.timestamp);
  if (header.pfhVersion !== 'PFH4') {
    writer.writeU32(header.gameVersion);
  }
  if (header.pfhVersion === 'PFH6') {
    writer.writeU32(header.buildNumber);
    writer.writeFixedAscii(header.authoringTool, AUTHORING_TOOL_SIZE);
    writer.writeBytes(Buffer.alloc(PFH6_RESERVED_SIZE));
  }
}

/**
 * Pack container binary processing utilities.
 * Reading produces the header and index; payload bytes are unpacked by the caller.
 */
export class PackBinary {
  /**
   * Reads a pack from disk and parses its header and indexes.
   *
   * @param filePath - Path to the pack file
   * @param lazy - Read only the header and indexes, leaving the payload on disk
   * @throws {PackFormatError} If the file is not a valid pack
   * @throws {PackIoError} If the file cannot be read
   */
  static async read({ filePath, lazy = false }: { readonly filePath: string; readonly lazy?: boolean }): Promise<PackBinaryStructure> {
    try {
      if (lazy) {
        return await readLazily(filePath);
      }
      const buffer: Buffer = await readFile(filePath);
      const { metadata } = parseHeader(buffer, filePath);
      return buildStructure(buffer, buffer.subarray(metadata.headerSize), buffer.length, filePath, buffer);
    } catch (error) {
      if (error instanceof PackFormatError) {
        throw error;
      }
      throw toIoError(error, filePath);
    }
  }

  /**
   * Serialises a pack. Entries are written in the order given.
   *
   * @param header - Header to write; counts and index sizes are recomputed
   * @param entries - Entries with their stored (packed) bytes
   */
  static serialize({ header, dependencies, entries }: { readonly header: PackHeader; readonly dependencies: readonly string[]; readonly entries: readonly PackWriteEntry[] }): Buffer {
    const dependencyIndex = new BinaryWriter(256);
    for (const dependency of dependencies) {
      dependencyIndex.writeNullTerminated(dependency);
    }

    const compressed: boolean = hasFlag(header.bitmask, PackFlags.DATA_IS_COMPRESSED);
    const timestamps: boolean = hasFlag(header.bitmask, PackFlags.INDEX_HAS_TIMESTAMPS);
    const fileIndex = new BinaryWriter(entries.length * 64 + 16);
    for (const entry of entries) {
      fileIndex.writeU32(entry.size);
      if (compressed) {
        fileIndex.writeU32(entry.stored.length);
      }
      if (timestamps) {
        fileIndex.writeU32(entry.timestamp ?? 0);
      }
      fileIndex.writeNullTerminated(entry.path);
    }
    const fileIndexBytes: Buffer = hasFlag(header.bitmask, PackFlags.INDEX_IS_ENCRYPTED)
      ? xorKeystream(fileIndex.toBuffer(), entries.length)
      : fileIndex.toBuffer();

    const payloadSize: number = entries.reduce((total, entry) => total + entry.stored.length, 0);
    const writer = new BinaryWriter(HEADER_SIZES[header.pfhVersion] + dependencyIndex.length + fileIndexBytes.length + payloadSize);
    writeHeader(writer, header, dependencyIndex.length, fileIndexBytes.length, dependencies.length, entries.length);
    writer.writeBytes(dependencyIndex.toBuffer());
    writer.writeBytes(fileIndexBytes);
    for (const entry of entries) {
      writer.writeBytes(entry.stored);
    }
    return writer.toBuffer();
  }

  /** Writes a serialised pack to disk. */
  static async write({ header, dependencies, entries, outputPath }: { readonly header: PackHeader; readonly dependencies: readonly string[]; readonly entries: readonly PackWriteEntry[]; readonly outputPath: string }): Promise<void> {
    const buffer: Buffer = PackBinary.serialize({ header, dependencies, entries });
    try {
      await writeFile(outputPath, buffer);
    } catch (error) {
      throw toIoError(error, outputPath);
    }
  }

  /**
   * Reads the stored bytes of one entry from its backing file.
   * @throws {PackIoError} If the backing file is gone or shorter than recorded
   */
  static async readStored(source: OnDiskSource): Promise<Buffer> {
    try {
      const handle = await open(source.filePath, 'r');
      try {
        const stored = Buffer.alloc(source.storedSize);
        const { bytesRead } = await handle.read(stored, 0, source.storedSize, source.offset);
        if (bytesRead !== source.storedSize) {
          throw new Error(`Short read: ${bytesRead} of ${source.storedSize} bytes at offset ${source.offset}`);
        }
        return stored;
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw toIoError(error, source.filePath);
    }
  }

  /**
   * Removes encryption and compression from stored bytes.
   * @throws {DecodeError} If the bytes do not inflate to the recorded size
   */
  static async unpack(stored: Buffer, { compressed, encrypted, uncompressedSize }: { readonly compressed: boolean; readonly encrypted: boolean; readonly uncompressedSize: number }): Promise<Buffer> {
    const decrypted: Buffer = encrypted ? xorKeystream(stored, stored.length) : stored;
    if (!compressed) {
      return Buffer.from(decrypted);
    }
    let raw: Buffer;
    try {
      raw = await inflateAsync(decrypted);
    } catch (error) {
      throw new DecodeError(`Entry failed to decompress: ${error instanceof Error ? error.message : String(error)}`, undefined, error);
    }
    if (raw.length !== uncompressedSize) {
      throw new DecodeError(`Entry decompressed to ${raw.length} bytes, index records ${uncompressedSize}`);
    }
    return raw;
  }

  /** Applies compression, then encryption, as the container flags require. */
  static async pack(raw: Buffer, { compressed, encrypted }: { readonly compressed: boolean; readonly encrypted: boolean }): Promise<Buffer> {
    const deflated: Buffer = compressed ? await deflateAsync(raw, { level: 6 }) : raw;
    return encrypted ? xorKeystream(deflated, deflated.length) : Buffer.from(deflated);
  }
}
