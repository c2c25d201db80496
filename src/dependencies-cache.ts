/**
 * Vanilla dependency cache: the DB and Loc entries of the game's own packs,
 * plus assembly-kit tables the game ships no binary for. Built once per game
 * install and schema, stored deflated next to the schema.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { deflate, inflate } from 'node:zlib';
import { rawTableToDefinition, type RawCell, type RawTable } from './assembly-kit.js';
import { DependencyError, PackIoError, describeError, toErrorPayload, toIoError, type BatchOutcome } from './errors.js';
import { normalizePath, tableNameFromPath } from './file-type.js';
import { DB } from './files/db.js';
import type { GameInfo } from './games.js';
import { Pack } from './pack.js';
import { RFile } from './rfile.js';
import { Schema, parseDefinition } from './schema.js';
import { defaultRow, tryParseCellText, type Row } from './table.js';
import type { Definition } from './types/schema.js';
import { BinaryReader } from './utils/binary-reader.js';
import { BinaryWriter } from './utils/binary-writer.js';
import { debug, info, warn } from './utils/logger.js';

const inflateAsync = promisify(inflate);
const deflateAsync = promisify(deflate);

export const DEPENDENCY_CACHE_MAGIC = 'PDEP';
export const DEPENDENCY_CACHE_FORMAT = 1;

export interface GenerateCacheOptions {
  readonly game: GameInfo;
  readonly gameDataPath: string;
  readonly schema: Schema;
  readonly assemblyKitTables?: readonly RawTable[];
  /** Unix seconds recorded as the build time. */
  readonly now?: number;
}

export interface GeneratedCache {
  readonly cache: DependencyCache;
  /** Vanilla entries that did not decode; they are cached anyway. */
  readonly failed: BatchOutcome['failed'];
}

function cacheKey(path: string): string {
  return normalizePath(path).toLowerCase();
}

function rawCellText(cell: RawCell): string {
  return cell === null ? '' : String(cell);
}

/** Rows of an assembly-kit dump, unparsable cells replaced by the field default. */
function rawRows(raw: RawTable, definition: Definition): Row[] {
  const defaults = defaultRow(definition);
  return raw.rows.map((cells) => definition.fields.map((field, index) => {
    const cell = cells[index];
    const parsed = cell === undefined ? undefined : tryParseCellText(rawCellText(cell), field.fieldType);
    return parsed === undefined ? defaults[index] ?? null : parsed;
  }));
}

/** Decodes a cached assembly-kit table with the definition stored beside it. */
function decodeAssKitTable(tableName: string, definition: Definition, bytes: Buffer): DB {
  const schema = new Schema();
  schema.addDefinition(tableName, definition);
  return DB.decode(bytes, { schema, path: `db/${tableName}/assembly_kit` });
}

export class DependencyCache {
  private readonly vanilla = new Map<string, RFile>();
  private readonly assKit = new Map<string, DB>();

  constructor(
    public readonly gameKey: string,
    public readonly schemaFingerprint: string,
    public readonly builtAt: number,
    vanillaFiles: readonly RFile[] = [],
    assKitTables: readonly DB[] = [],
  ) {
    for (const file of vanillaFiles) {
      this.vanilla.set(cacheKey(file.path), file);
    }
    for (const table of assKitTables) {
      this.assKit.set(table.tableName, table);
    }
  }

  /** Vanilla entries, in load order of the game packs. */
  vanillaFiles(): RFile[] {
    return [...this.vanilla.values()];
  }

  vanillaFile(path: string): RFile | undefined {
    return this.vanilla.get(cacheKey(path));
  }

  assKitTables(): DB[] {
    return [...this.assKit.values()];
  }

  assKitTable(tableName: string): DB | undefined {
    return this.assKit.get(tableName);
  }

  /**
   * Builds the cache from the packs installed in `gameDataPath`.
   *
   * Every DB and Loc entry is decoded to check it against the schema; entries
   * that fail are still cached and reported. Assembly-kit tables are added
   * only when no vanilla entry exists for them.
   *
   * @throws {DependencyError} If the game packs cannot be found or read
   */
  static async generate({ game, gameDataPath, schema, assemblyKitTables = [], now = Math.floor(Date.now() / 1000) }: GenerateCacheOptions): Promise<GeneratedCache> {
    let merged: Pack;
    try {
      ({ pack: merged } = await Pack.readAndMergeCaPacks({ game, gameDataPath, lazy: true }));
    } catch (error) {
      throw new DependencyError(`Cannot read the ${game.displayName} packs in ${gameDataPath}: ${describeError(error)}`, error);
    }

    const files = merged.filesByType(['DB', 'Loc']);
    const loaded = await Promise.allSettled(files.map((file) => file.load()));
    const failed: BatchOutcome['failed'] = [];
    const vanillaFiles: RFile[] = [];
    files.forEach((file, index) => {
      const result = loaded[index];
      if (!result || result.status === 'rejected') {
        failed.push({ path: file.path, error: toErrorPayload(result?.reason) });
        return;
      }
      try {
        file.decodeLoaded({ schema, game });
      } catch (error) {
        failed.push({ path: file.path, error: toErrorPayload(error) });
      }
      vanillaFiles.push(RFile.fromBytes(file.path, Buffer.from(result.value)));
    });

    const vanillaTables = new Set(vanillaFiles.map((file) => tableNameFromPath(file.path)).filter((name): name is string => name !== null));
    const assKitTables: DB[] = [];
    for (const raw of assemblyKitTables) {
      if (vanillaTables.has(raw.name)) {
        continue;
      }
      const definition = rawTableToDefinition(raw);
      assKitTables.push(new DB(raw.name, definition, rawRows(raw, definition), null));
    }

    if (failed.length > 0) {
      warn(`${failed.length} vanilla tables did not decode; they are cached undecoded`);
    }
    info(`✅ Dependency cache built: ${vanillaFiles.length} vanilla files, ${assKitTables.length} assembly kit tables`);
    return { cache: new DependencyCache(game.key, schema.fingerprint(), now, vanillaFiles, assKitTables), failed };
  }

  /** Raw bytes of every vanilla entry, decoded values encoded as needed. */
  async serialize(): Promise<Buffer> {
    const writer = new BinaryWriter(1 << 20);
    writer.writeFixedAscii(DEPENDENCY_CACHE_MAGIC, 4);
    writer.writeU32(DEPENDENCY_CACHE_FORMAT);
    writer.writeStringU8(this.gameKey);
    writer.writeStringU8(this.schemaFingerprint);
    writer.writeU32(this.builtAt);

    writer.writeU32(this.vanilla.size);
    for (const file of this.vanilla.values()) {
      const bytes = await file.encode();
      writer.writeStringU8(file.path);
      writer.writeU32(bytes.length);
      writer.writeBytes(bytes);
    }

    writer.writeU32(this.assKit.size);
    for (const table of this.assKit.values()) {
      const bytes = table.encode();
      writer.writeStringU8(table.tableName);
      writer.writeStringU32(JSON.stringify(table.definition));
      writer.writeU32(bytes.length);
      writer.writeBytes(bytes);
    }

    return deflateAsync(writer.toBuffer());
  }

  async save(filePath: string): Promise<void> {
    const data = await this.serialize();
    try {
      await writeFile(filePath, data);
    } catch (error) {
      throw toIoError(error, filePath);
    }
    debug(`Wrote dependency cache ${filePath} (${data.length} bytes)`);
  }

  /**
   * Parses a cache produced by {@link serialize}.
   *
   * @throws {DependencyError} If the data is not a cache, or it was built for another game or schema
   */
  static async fromBuffer(data: Buffer, { schema, game, source = 'dependency cache' }: { readonly schema: Schema; readonly game: GameInfo; readonly source?: string }): Promise<DependencyCache> {
    let raw: Buffer;
    try {
      raw = await inflateAsync(data);
    } catch (error) {
      throw new DependencyError(`${source} is not a dependency cache: ${describeError(error)}`, error);
    }

    try {
      const reader = new BinaryReader(raw);
      const magic = reader.readFixedAscii(4);
      if (magic !== DEPENDENCY_CACHE_MAGIC) {
        throw new DependencyError(`${source} is not a dependency cache (magic ${JSON.stringify(magic)})`);
      }
      const format = reader.readU32();
      if (format !== DEPENDENCY_CACHE_FORMAT) {
        throw new DependencyError(`${source} has format ${format}, expected ${DEPENDENCY_CACHE_FORMAT}; regenerate it`);
      }
      const gameKey = reader.readStringU8();
      if (gameKey !== game.key) {
        throw new DependencyError(`${source} was built for ${gameKey}, not ${game.key}; regenerate it`);
      }
      const fingerprint = reader.readStringU8();
      if (fingerprint !== schema.fingerprint()) {
        throw new DependencyError(`${source} is stale: it was built against another schema; regenerate it`);
      }
      const builtAt = reader.readU32();

      const vanillaFiles: RFile[] = [];
      const vanillaCount = reader.readU32();
      for (let index = 0; index < vanillaCount; index++) {
        const path = reader.readStringU8();
        const size = reader.readU32();
        vanillaFiles.push(RFile.fromBytes(path, Buffer.from(reader.readBytes(size))));
      }

      const assKitTables: DB[] = [];
      const assKitCount = reader.readU32();
      for (let index = 0; index < assKitCount; index++) {
        const tableName = reader.readStringU8();
        const definition = parseDefinition(JSON.parse(reader.readStringU32()), `${source}: ${tableName} definition`);
        const size = reader.readU32();
        assKitTables.push(decodeAssKitTable(tableName, definition, Buffer.from(reader.readBytes(size))));
      }
      if (!reader.isAtEnd()) {
        throw new DependencyError(`${source} has ${reader.remaining()} trailing bytes`);
      }
      return new DependencyCache(gameKey, fingerprint, builtAt, vanillaFiles, assKitTables);
    } catch (error) {
      if (error instanceof DependencyError) {
        throw error;
      }
      throw new DependencyError(`${source} is corrupted: ${describeError(error)}`, error);
    }
  }

  /**
   * @throws {DependencyError} If the file is missing, corrupted or stale
   */
  static async load(filePath: string, options: { readonly schema: Schema; readonly game: GameInfo }): Promise<DependencyCache> {
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (error) {
      const ioError: PackIoError = toIoError(error, filePath);
      throw new DependencyError(`Dependency cache ${filePath} cannot be read: ${ioError.message}`, ioError);
    }
    const cache = await DependencyCache.fromBuffer(data, { ...options, source: filePath });
    debug(`Loaded dependency cache ${filePath}: ${cache.vanilla.size} vanilla files, ${cache.assKit.size} assembly kit tables`);
    return cache;
  }
}
