/**
 * Pack: the container file that bundles every asset of a mod or of the game.
 *
 * Reading keeps the header, dependency list, notes and settings; entries are
 * loaded eagerly or left on disk. Saving rewrites the whole file.
 */
import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join, relative, resolve, sep } from 'node:path';
import { z } from 'zod';
import {
  CA_PACK_TYPES,
  PackFlags,
  RESERVED_NOTES_PATH,
  RESERVED_PATHS,
  RESERVED_SETTINGS_PATH,
  type PackFileType,
} from './constants/pack-constants.js';
import { Container } from './container.js';
import {
  ConflictError,
  PackFormatError,
  PackIoError,
  describeError,
  toErrorPayload,
  toIoError,
  type BatchOutcome,
} from './errors.js';
import { normalizePath, tableNameFromPath } from './file-type.js';
import { DB } from './files/db.js';
import type { GameInfo } from './games.js';
import { PackBinary, hasFlag } from './pack-binary.js';
import { RFile } from './rfile.js';
import type { Schema } from './schema.js';
import type { PackBinaryStructure, PackHeader, PackWriteEntry } from './types/pack-binary-structure.js';
import type { DecodeContext } from './types/rfile.js';
import { debug, info, warn } from './utils/logger.js';

const noteSchema = z.object({
  id: z.number().int().nonnegative(),
  message: z.string(),
  /** Path the note is attached to; empty for the pack itself. */
  path: z.string().default(''),
  createdAt: z.number().int().nonnegative().default(0),
});

const notesFileSchema = z.object({
  notes: z.array(noteSchema).default([]),
});

const settingsSchema = z.object({
  text: z.record(z.string(), z.string()).default({}),
  strings: z.record(z.string(), z.string()).default({}),
  bools: z.record(z.string(), z.boolean()).default({}),
  numbers: z.record(z.string(), z.number()).default({}),
});

export type PackNote = z.infer<typeof noteSchema>;
export type PackSettings = z.infer<typeof settingsSchema>;

export interface PackInfo {
  readonly name: string;
  readonly diskPath: string | null;
  readonly header: PackHeader;
  readonly dependencies: readonly string[];
  readonly fileCount: number;
  readonly compressed: boolean;
  readonly encrypted: boolean;
  readonly indexHasTimestamps: boolean;
}

export interface MergedPackResult {
  readonly pack: Pack;
  /** Sources skipped because they are not valid packs. */
  readonly skipped: Array<{ readonly filePath: string; readonly error: PackFormatError }>;
}

export interface MissingDefinition {
  readonly path: string;
  readonly tableName: string;
  readonly version: number;
}

export interface SaveOptions {
  /** Defaults to the file the pack was read from. */
  readonly destination?: string;
  readonly game: GameInfo;
  readonly allowEditingOfCaPacks?: boolean;
  /** Unix seconds stamped into the header; the current time by default. */
  readonly now?: number;
}

function emptySettings(): PackSettings {
  return { text: {}, strings: {}, bools: {}, numbers: {} };
}

function settingsAreEmpty(settings: PackSettings): boolean {
  return [settings.text, settings.strings, settings.bools, settings.numbers].every((entries) => Object.keys(entries).length === 0);
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function describeFraming(compressed: boolean, encrypted: boolean): string {
  if (compressed && encrypted) return 'compressed and encrypted';
  if (compressed) return 'compressed';
  if (encrypted) return 'encrypted';
  return 'uncompressed';
}

function parseReservedJson<T>(bytes: Buffer, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  const parsed = schema.safeParse(JSON.parse(bytes.toString('utf8')));
  if (!parsed.success) {
    throw new PackFormatError(`Invalid ${what}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`, what);
  }
  return parsed.data;
}

async function listFilesRecursive(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

export class Pack extends Container {
  header: PackHeader;
  dependencies: string[] = [];
  notes: PackNote[] = [];
  settings: PackSettings = emptySettings();
  /** Entries that could not be unpacked on read, kept as stored. */
  readonly loadWarnings: string[] = [];
  private _diskPath: string | null = null;

  constructor(header: PackHeader) {
    super();
    this.header = header;
  }

  /** An empty pack in the format `game` writes for `fileType`. */
  static create({ game, fileType = 'Mod', now = unixNow() }: { readonly game: GameInfo; readonly fileType?: PackFileType; readonly now?: number }): Pack {
    return new Pack({
      pfhVersion: game.pfhVersions[fileType],
      fileType,
      bitmask: 0,
      timestamp: now,
      gameVersion: 0,
      buildNumber: 0,
      authoringTool: '',
    });
  }

  /**
   * Reads one pack.
   *
   * @param filePath - Path to the pack file
   * @param lazy - Leave payloads on disk until first use; the file must stay in place
   * @throws {PackFormatError} If the header or index is invalid
   * @throws {PackIoError} If the file cannot be read
   */
  static async read({ filePath, lazy = false }: { readonly filePath: string; readonly lazy?: boolean }): Promise<Pack> {
    const structure: PackBinaryStructure = await PackBinary.read({ filePath, lazy });
    const pack = new Pack(structure.header);
    pack.dependencies = [...structure.dependencies];
    pack._diskPath = resolve(filePath);

    const compressed = hasFlag(structure.header.bitmask, PackFlags.DATA_IS_COMPRESSED);
    const encrypted = hasFlag(structure.header.bitmask, PackFlags.DATA_IS_ENCRYPTED);

    const files = await Promise.all(structure.entries.map(async (entry): Promise<RFile> => {
      const source = {
        filePath: pack._diskPath ?? filePath,
        offset: entry.offset,
        storedSize: entry.storedSize,
        uncompressedSize: entry.size,
        compressed,
        encrypted,
      };
      if (structure.buffer === null && !RESERVED_PATHS.has(entry.path)) {
        return RFile.onDisk(entry.path, source, entry.timestamp);
      }
      const stored = structure.buffer
        ? structure.buffer.subarray(entry.offset, entry.offset + entry.storedSize)
        : await PackBinary.readStored(source);
      try {
        const bytes = await PackBinary.unpack(stored, { compressed, encrypted, uncompressedSize: entry.size });
        return RFile.fromBytes(entry.path, bytes, entry.timestamp);
      } catch (error) {
        if (error instanceof PackIoError) {
          throw error;
        }
        pack.loadWarnings.push(`${entry.path}: ${describeError(error)}`);
        warn(`${filePath}: ${entry.path} kept as stored bytes: ${describeError(error)}`);
        return RFile.opaque(entry.path, Buffer.from(stored), { uncompressedSize: entry.size, compressed, encrypted }, entry.timestamp);
      }
    }));

    for (const file of files) {
      if (RESERVED_PATHS.has(file.path)) {
        pack.readReservedEntry(file, filePath);
      } else {
        pack.insert(file);
      }
    }
    debug(`Read ${filePath}: ${pack.size} files, ${pack.dependencies.length} dependencies${lazy ? ' (lazy)' : ''}`);
    return pack;
  }

  /**
   * Reads several packs into one. For a path in more than one source the
   * last source wins; header and name come from the first readable source.
   *
   * @throws {PackIoError} If any source cannot be read
   * @throws {PackFormatError} If no source is a valid pack
   */
  static async readAndMerge({ filePaths, lazy = false }: { readonly filePaths: readonly string[]; readonly lazy?: boolean }): Promise<MergedPackResult> {
    const skipped: Array<{ filePath: string; error: PackFormatError }> = [];
    let merged: Pack | undefined;

    for (const filePath of filePaths) {
      let pack: Pack;
      try {
        pack = await Pack.read({ filePath, lazy });
      } catch (error) {
        if (error instanceof PackFormatError) {
          warn(`Skipping ${filePath}: ${error.message}`);
          skipped.push({ filePath, error });
          continue;
        }
        throw error;
      }
      if (!merged) {
        merged = pack;
        continue;
      }
      for (const file of pack.files()) {
        merged.insert(file);
      }
      for (const dependency of pack.dependencies) {
        if (!merged.dependencies.includes(dependency)) {
          merged.dependencies.push(dependency);
        }
      }
      merged.appendNotes(pack.notes);
      merged.loadWarnings.push(...pack.loadWarnings);
    }

    if (!merged) {
      throw new PackFormatError(`None of the ${filePaths.length} packs could be read`, filePaths.join(', '));
    }
    if (filePaths.length > 1) {
      merged._diskPath = null;
    }
    return { pack: merged, skipped };
  }

  /**
   * Reads every pack the game itself loads, in the game's load order: the
   * `manifest.txt` of the data folder when present, otherwise every
   * Boot/Release/Patch pack in alphabetical order.
   */
  static async readAndMergeCaPacks({ game, gameDataPath, lazy = true }: { readonly game: GameInfo; readonly gameDataPath: string; readonly lazy?: boolean }): Promise<MergedPackResult> {
    const filePaths = await Pack.caPackPaths(gameDataPath);
    if (filePaths.length === 0) {
      throw new PackIoError(`No ${game.displayName} packs found in ${gameDataPath}`, gameDataPath);
    }
    info(`Loading ${filePaths.length} ${game.displayName} packs from ${gameDataPath}`);
    return Pack.readAndMerge({ filePaths, lazy });
  }

  /** Paths of the packs the game ships, in load order. */
  static async caPackPaths(gameDataPath: string): Promise<string[]> {
    const manifestPath = join(gameDataPath, 'manifest.txt');
    let manifest: string | null = null;
    try {
      manifest = await readFile(manifestPath, 'utf8');
    } catch (error) {
      debug(`No manifest at ${manifestPath}: ${describeError(error)}`);
    }

    if (manifest !== null) {
      const names = manifest
        .split(/\r?\n/)
        .map((line) => (line.split('\t')[0] ?? '').trim())
        .filter((name) => name.toLowerCase().endsWith('.pack'));
      const paths: string[] = [];
      for (const name of names) {
        const path = join(gameDataPath, name);
        try {
          await stat(path);
          paths.push(path);
        } catch (error) {
          warn(`Manifest lists ${name}, which is missing: ${describeError(error)}`);
        }
      }
      return paths;
    }

    let names: string[];
    try {
      names = (await readdir(gameDataPath)).filter((name) => name.toLowerCase().endsWith('.pack')).sort();
    } catch (error) {
      throw toIoError(error, gameDataPath);
    }
    const paths: string[] = [];
    for (const name of names) {
      const path = join(gameDataPath, name);
      try {
        const { header } = await PackBinary.read({ filePath: path, lazy: true });
        if (CA_PACK_TYPES.has(header.fileType)) {
          paths.push(path);
        }
      } catch (error) {
        if (!(error instanceof PackFormatError)) {
          throw error;
        }
        warn(`Skipping ${name}: ${error.message}`);
      }
    }
    return paths;
  }

  get diskPath(): string | null {
    return this._diskPath;
  }

  get name(): string {
    return this._diskPath ? basename(this._diskPath) : 'unknown.pack';
  }

  get compressed(): boolean {
    return hasFlag(this.header.bitmask, PackFlags.DATA_IS_COMPRESSED);
  }

  info(): PackInfo {
    return {
      name: this.name,
      diskPath: this._diskPath,
      header: this.header,
      dependencies: [...this.dependencies],
      fileCount: this.size,
      compressed: this.compressed,
      encrypted: hasFlag(this.header.bitmask, PackFlags.DATA_IS_ENCRYPTED),
      indexHasTimestamps: hasFlag(this.header.bitmask, PackFlags.INDEX_HAS_TIMESTAMPS),
    };
  }

  setFileType(fileType: PackFileType): void {
    this.header = { ...this.header, fileType };
  }

  private setFlag(flag: number, enabled: boolean): void {
    const bitmask = enabled ? this.header.bitmask | flag : this.header.bitmask & ~flag;
    this.header = { ...this.header, bitmask: bitmask >>> 0 };
  }

  setCompressed(enabled: boolean): void {
    this.setFlag(PackFlags.DATA_IS_COMPRESSED, enabled);
  }

  setIndexHasTimestamps(enabled: boolean): void {
    this.setFlag(PackFlags.INDEX_HAS_TIMESTAMPS, enabled);
  }

  setDependencies(dependencies: readonly string[]): void {
    this.dependencies = [...new Set(dependencies.map((dependency) => dependency.trim()).filter((dependency) => dependency !== ''))];
  }

  /**
   * Writes the pack to `destination`, or back to the file it was read from.
   *
   * @throws {ConflictError} If the pack is a game pack and editing those is not allowed,
   *   or compression is requested for a game that does not read it
   * @throws {PackIoError} If there is nowhere to save or writing fails
   */
  async save({ destination, game, allowEditingOfCaPacks = false, now = unixNow() }: SaveOptions): Promise<string> {
    if (CA_PACK_TYPES.has(this.header.fileType) && !allowEditingOfCaPacks) {
      throw new ConflictError(`Pack cannot be saved due to being of type ${this.header.fileType}. Change the pack type or allow editing of game packs.`);
    }
    if (this.compressed && !game.supportsCompression) {
      throw new ConflictError(`${game.displayName} does not support compressed packs`);
    }
    const outputPath = destination ? resolve(destination) : this._diskPath;
    if (!outputPath) {
      throw new PackIoError('The pack has never been saved; a destination is required', '');
    }

    // Payloads still on disk are read before the file is overwritten.
    const files = this.files();
    const raws = await Promise.all(files.map((file) => file.load()));

    const compressed = this.compressed;
    const encrypted = hasFlag(this.header.bitmask, PackFlags.DATA_IS_ENCRYPTED);
    // Stored bytes that never unpacked can only be written back with the framing they were read with.
    for (const file of files) {
      const opaque = file.opaqueBlob;
      if (opaque && (opaque.compressed !== compressed || opaque.encrypted !== encrypted)) {
        throw new ConflictError(`${file.path} could not be unpacked and cannot be saved ${describeFraming(compressed, encrypted)}; it was stored ${describeFraming(opaque.compressed, opaque.encrypted)}`);
      }
    }
    const entries: PackWriteEntry[] = await Promise.all(files.map(async (file, index): Promise<PackWriteEntry> => {
      const raw = raws[index] ?? Buffer.alloc(0);
      const opaque = file.opaqueBlob;
      if (opaque) {
        return { path: file.path, size: opaque.uncompressedSize, timestamp: file.timestamp ?? now, stored: raw };
      }
      return { path: file.path, size: raw.length, timestamp: file.timestamp ?? now, stored: await PackBinary.pack(raw, { compressed, encrypted }) };
    }));
    for (const reserved of this.reservedEntries()) {
      entries.push({ path: reserved.path, size: reserved.bytes.length, timestamp: now, stored: await PackBinary.pack(reserved.bytes, { compressed, encrypted }) });
    }

    entries.sort((a, b) => {
      const left = a.path.toLowerCase();
      const right = b.path.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    });

    const header: PackHeader = { ...this.header, pfhVersion: game.pfhVersions[this.header.fileType], timestamp: now };
    try {
      await mkdir(dirname(outputPath), { recursive: true });
    } catch (error) {
      throw toIoError(error, outputPath);
    }
    await PackBinary.write({ header, dependencies: this.dependencies, entries, outputPath });
    this.header = header;
    this._diskPath = outputPath;
    info(`✅ Saved ${this.name}: ${files.length} files`);
    return outputPath;
  }

  /** Loads every entry concurrently, then decodes each; failures are collected. */
  async decodeAll(context: DecodeContext = {}): Promise<BatchOutcome> {
    const files = this.files().filter((file) => file.fileType !== 'Unknown');
    const loaded = await Promise.allSettled(files.map((file) => file.load()));
    const outcome: BatchOutcome = { succeeded: [], failed: [] };
    files.forEach((file, index) => {
      const load = loaded[index];
      if (load && load.status === 'rejected') {
        outcome.failed.push({ path: file.path, error: toErrorPayload(load.reason) });
        return;
      }
      try {
        file.decodeLoaded(context);
        outcome.succeeded.push(file.path);
      } catch (error) {
        outcome.failed.push({ path: file.path, error: toErrorPayload(error) });
      }
    });
    if (outcome.failed.length > 0) {
      warn(`${outcome.failed.length} of ${files.length} files could not be decoded`);
    }
    return outcome;
  }

  /** Removes DB and Loc entries that fail to decode. Returns the removed paths. */
  async cleanUndecoded(context: DecodeContext = {}): Promise<string[]> {
    const removed: string[] = [];
    for (const file of this.filesByType(['DB', 'Loc'])) {
      try {
        await file.decode(context);
      } catch (error) {
        debug(`Removing ${file.path}: ${describeError(error)}`);
        this.remove(file.path);
        removed.push(file.path);
      }
    }
    return removed;
  }

  clearCaches(): void {
    for (const file of this.files()) {
      file.clearCache();
    }
  }

  /** Tables whose header names a version the schema has no definition for. */
  async missingDefinitions(schema: Schema): Promise<{ missing: MissingDefinition[]; failed: BatchOutcome['failed'] }> {
    const missing: MissingDefinition[] = [];
    const failed: BatchOutcome['failed'] = [];
    for (const file of this.filesByType(['DB'])) {
      const tableName = tableNameFromPath(file.path);
      if (!tableName) {
        continue;
      }
      try {
        const decoded = file.decoded;
        const version = decoded?.type === 'DB' ? decoded.version : DB.readHeader(await file.load()).version;
        if (!schema.definitionFor(tableName, version)) {
          missing.push({ path: file.path, tableName, version });
        }
      } catch (error) {
        failed.push({ path: file.path, error: toErrorPayload(error) });
      }
    }
    return { missing, failed };
  }

  /** Versions of every table present, as the schema updater needs them. */
  async tablesInUse(): Promise<Map<string, Set<number>>> {
    const inUse = new Map<string, Set<number>>();
    for (const file of this.filesByType(['DB'])) {
      const tableName = tableNameFromPath(file.path);
      if (!tableName) {
        continue;
      }
      const decoded = file.decoded;
      const version = decoded?.type === 'DB' ? decoded.version : DB.readHeader(await file.load()).version;
      const versions = inUse.get(tableName) ?? new Set<number>();
      versions.add(version);
      inUse.set(tableName, versions);
    }
    return inUse;
  }

  /**
   * Adds the files under `source` (a file or a folder) at `destination`.
   * Returns the added paths.
   */
  async addFromDisk({ source, destination = '', replace = true }: { readonly source: string; readonly destination?: string; readonly replace?: boolean }): Promise<string[]> {
    let sourceFiles: string[];
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(source)).isDirectory();
      sourceFiles = isDirectory ? await listFilesRecursive(source) : [source];
    } catch (error) {
      throw toIoError(error, source);
    }
    const added: string[] = [];
    for (const filePath of sourceFiles) {
      const inner = isDirectory ? relative(source, filePath).split(sep).join('/') : basename(filePath);
      const path = normalizePath(destination === '' ? inner : `${destination}/${inner}`);
      if (RESERVED_PATHS.has(path)) {
        continue;
      }
      let bytes: Buffer;
      try {
        bytes = await readFile(filePath);
      } catch (error) {
        throw toIoError(error, filePath);
      }
      this.insert(RFile.fromBytes(path, bytes, unixNow()), { replace });
      added.push(path);
    }
    return added;
  }

  /** Writes the named files or folders below `outputDir`. Returns the written paths. */
  async extract({ paths, outputDir }: { readonly paths: readonly string[]; readonly outputDir: string }): Promise<string[]> {
    const files = paths.length === 0 ? this.files() : this.filesByPath(paths);
    const written: string[] = [];
    for (const file of files) {
      const target = join(outputDir, ...file.path.split('/'));
      const bytes = await file.load();
      try {
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, bytes);
      } catch (error) {
        throw toIoError(error, target);
      }
      written.push(target);
    }
    return written;
  }

  addNote({ message, path = '' }: { readonly message: string; readonly path?: string }): PackNote {
    const note: PackNote = {
      id: this.notes.reduce((max, existing) => Math.max(max, existing.id), -1) + 1,
      message,
      path: normalizePath(path),
      createdAt: unixNow(),
    };
    this.notes.push(note);
    return note;
  }

  /** Returns false when no note has that id on that path. */
  deleteNote(path: string, id: number): boolean {
    const normalized = normalizePath(path);
    const before = this.notes.length;
    this.notes = this.notes.filter((note) => !(note.id === id && note.path === normalized));
    return this.notes.length !== before;
  }

  /** Notes attached to `path`, or to any file below it when it is a folder. */
  notesForPath(path: string): PackNote[] {
    const normalized = normalizePath(path).toLowerCase();
    return this.notes.filter((note) => {
      const notePath = note.path.toLowerCase();
      return notePath === normalized || normalized === '' || notePath.startsWith(`${normalized}/`);
    });
  }

  private appendNotes(notes: readonly PackNote[]): void {
    for (const note of notes) {
      this.addNote({ message: note.message, path: note.path });
    }
  }

  private readReservedEntry(file: RFile, filePath: string): void {
    const state = file.state;
    if (state.kind !== 'Cached' || file.opaqueBlob) {
      this.loadWarnings.push(`${file.path}: could not be read`);
      return;
    }
    try {
      if (file.path === RESERVED_NOTES_PATH) {
        this.notes = parseReservedJson(state.bytes, notesFileSchema, RESERVED_NOTES_PATH).notes;
      } else if (file.path === RESERVED_SETTINGS_PATH) {
        this.settings = parseReservedJson(state.bytes, settingsSchema, RESERVED_SETTINGS_PATH);
      }
    } catch (error) {
      this.loadWarnings.push(`${file.path}: ${describeError(error)}`);
      warn(`${filePath}: ignoring ${file.path}: ${describeError(error)}`);
    }
  }

  private reservedEntries(): Array<{ path: string; bytes: Buffer }> {
    const entries: Array<{ path: string; bytes: Buffer }> = [];
    if (this.notes.length > 0) {
      entries.push({ path: RESERVED_NOTES_PATH, bytes: Buffer.from(JSON.stringify({ notes: this.notes }), 'utf8') });
    }
    if (!settingsAreEmpty(this.settings)) {
      entries.push({ path: RESERVED_SETTINGS_PATH, bytes: Buffer.from(JSON.stringify(this.settings), 'utf8') });
    }
    return entries;
  }
}
