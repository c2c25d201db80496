/**
 * Pack session: owns the open pack and everything around it, and applies
 * commands one at a time through a bounded queue. Every command answers with
 * `{ ok: true, value }` or `{ ok: false, error }`.
 */
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { loadAssemblyKitDump } from './assembly-kit.js';
import {
  dependenciesCachePath,
  gameDataPath,
  gameOf,
  schemaFilePath,
  type WorkbenchConfig,
} from './config.js';
import type { PackFileType } from './constants/pack-constants.js';
import type { MovedPath } from './container.js';
import { DependencyCache } from './dependencies-cache.js';
import { Dependencies, type LookupResult, type RebuildOutcome, type ReferenceData, type UpdatedTable } from './dependencies.js';
import {
  ConfigError,
  ConflictError,
  DependencyError,
  PackIoError,
  SchemaError,
  describeError,
  toErrorPayload,
  toIoError,
  type BatchOutcome,
  type ErrorPayload,
} from './errors.js';
import type { GameInfo } from './games.js';
import { optimizePack } from './optimizer.js';
import { Pack, type MissingDefinition, type PackInfo, type PackNote, type PackSettings } from './pack.js';
import { RFile } from './rfile.js';
import { Schema } from './schema.js';
import { GlobalSearch, type GlobalSearchOptions } from './search/global-search.js';
import type { FileMatches } from './search/matches.js';
import { mergeTables } from './table-merge.js';
import { exportTsvFile, importTsvFile } from './tsv.js';
import type { DecodedFile } from './types/decoded.js';
import type { RFileInfo } from './types/rfile.js';
import type { SchemaUpdateReport, TablePatches } from './types/schema.js';
import { CommandQueue } from './utils/command-queue.js';
import { debug, info, warn } from './utils/logger.js';

export interface SessionContext {
  readonly config: WorkbenchConfig;
  readonly game: GameInfo;
  schema: Schema | null;
  pack: Pack;
  /** Packs opened read-only next to the main one, by disk path. */
  readonly extraPacks: Map<string, Pack>;
  readonly dependencies: Dependencies;
  search: GlobalSearch | null;
}

/** Payload of every command, by kind. */
export interface CommandPayloads {
  NewPack: { readonly fileType?: PackFileType };
  OpenPacks: { readonly paths: readonly string[]; readonly lazy?: boolean };
  OpenExtraPack: { readonly path: string };
  CloseExtraPack: { readonly path: string };
  LoadAllCaPacks: Record<never, never>;
  SavePack: Record<never, never>;
  SavePackAs: { readonly path: string };
  CleanAndSave: { readonly path?: string };
  ListFiles: { readonly folder?: string };
  GetFileInfo: { readonly path: string };
  AddFromDisk: { readonly source: string; readonly destination?: string; readonly replace?: boolean };
  AddFile: { readonly path: string; readonly bytes: Buffer; readonly replace?: boolean };
  DeleteFiles: { readonly paths: readonly string[] };
  MoveFile: { readonly from: string; readonly to: string };
  ExtractFiles: { readonly paths: readonly string[]; readonly outputDir: string };
  DecodeFile: { readonly path: string };
  SetDecoded: { readonly path: string; readonly decoded: DecodedFile };
  EncodeFile: { readonly path: string };
  Search: { readonly options: GlobalSearchOptions };
  ReplaceMatches: { readonly matches: readonly FileMatches[] };
  ReplaceAll: Record<never, never>;
  RebuildDependencies: { readonly searchPaths?: readonly string[] };
  GenerateDependencyCache: { readonly assemblyKitPath?: string };
  UpdateSchemaFromAssemblyKit: { readonly dumpPath?: string };
  ImportSchemaPatch: { readonly tableName: string; readonly patches: TablePatches };
  MergeTables: { readonly paths: readonly string[]; readonly destination: string; readonly deleteSources?: boolean };
  Optimize: Record<never, never>;
  ExportTsv: { readonly path: string; readonly outputPath: string };
  ImportTsv: { readonly inputPath: string; readonly destination?: string };
  SetPackType: { readonly fileType: PackFileType };
  SetIndexTimestamps: { readonly enabled: boolean };
  SetCompressed: { readonly enabled: boolean };
  SetDependencies: { readonly dependencies: readonly string[] };
  AddNote: { readonly message: string; readonly path?: string };
  DeleteNote: { readonly path: string; readonly id: number };
  GetNotes: { readonly path: string };
  GetSettings: Record<never, never>;
  SetSettings: { readonly settings: PackSettings };
  MissingDefinitions: Record<never, never>;
  UpdateTable: { readonly path: string };
  ReferenceData: { readonly tableName: string; readonly version: number };
  Lookup: { readonly tableName: string; readonly column: string; readonly value: string };
}

export interface OpenedPack {
  readonly info: PackInfo;
  /** Sources that were not valid packs. */
  readonly skipped: string[];
  readonly warnings: string[];
  readonly decodeFailures: BatchOutcome['failed'];
}

/** Value of a successful response, by command kind. */
export interface CommandResults {
  NewPack: PackInfo;
  OpenPacks: OpenedPack;
  OpenExtraPack: PackInfo;
  CloseExtraPack: boolean;
  LoadAllCaPacks: OpenedPack;
  SavePack: string;
  SavePackAs: string;
  CleanAndSave: { readonly path: string; readonly removed: string[] };
  ListFiles: RFileInfo[];
  GetFileInfo: RFileInfo | null;
  AddFromDisk: string[];
  AddFile: RFileInfo;
  DeleteFiles: string[];
  MoveFile: MovedPath[];
  ExtractFiles: string[];
  DecodeFile: DecodedFile;
  SetDecoded: RFileInfo;
  EncodeFile: Buffer;
  Search: FileMatches[];
  ReplaceMatches: string[];
  ReplaceAll: string[];
  RebuildDependencies: RebuildOutcome;
  GenerateDependencyCache: { readonly path: string; readonly failed: BatchOutcome['failed'] };
  UpdateSchemaFromAssemblyKit: SchemaUpdateReport;
  ImportSchemaPatch: string[];
  MergeTables: RFileInfo;
  Optimize: string[];
  ExportTsv: string;
  ImportTsv: RFileInfo;
  SetPackType: PackInfo;
  SetIndexTimestamps: PackInfo;
  SetCompressed: PackInfo;
  SetDependencies: PackInfo;
  AddNote: PackNote;
  DeleteNote: boolean;
  GetNotes: PackNote[];
  GetSettings: PackSettings;
  SetSettings: PackSettings;
  MissingDefinitions: { readonly missing: MissingDefinition[]; readonly failed: BatchOutcome['failed'] };
  UpdateTable: UpdatedTable;
  ReferenceData: Map<number, ReferenceData>;
  Lookup: LookupResult | null;
}

export type CommandKind = keyof CommandPayloads & keyof CommandResults;
export type CommandOf<K extends CommandKind> = { readonly kind: K } & CommandPayloads[K];
export type Command = { [K in CommandKind]: CommandOf<K> }[CommandKind];

export type CommandResponse<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ErrorPayload };

type Handlers = { readonly [K in CommandKind]: (context: SessionContext, command: CommandOf<K>) => Promise<CommandResults[K]> };

function requireFile(pack: Pack, path: string): RFile {
  const file = pack.get(path);
  if (!file) {
    throw new ConflictError(`${path} does not exist in ${pack.name}`);
  }
  return file;
}

function requireSchema(context: SessionContext): Schema {
  if (!context.schema) {
    throw new SchemaError('', 0, [], `No schema loaded for ${context.game.displayName}`);
  }
  return context.schema;
}

function requireGameDataPath(context: SessionContext): string {
  const path = gameDataPath(context.config);
  if (!path) {
    throw new DependencyError(`The install folder of ${context.game.displayName} is not configured`);
  }
  return path;
}

function decodeContext(context: SessionContext): { readonly schema?: Schema; readonly game: GameInfo } {
  return { schema: context.schema ?? undefined, game: context.game };
}

async function persistSchema(context: SessionContext, schema: Schema): Promise<void> {
  const path = schemaFilePath(context.config, context.game);
  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw toIoError(error, path);
  }
  await schema.save(path);
}

async function opened(context: SessionContext, pack: Pack, skipped: readonly string[], lazy: boolean): Promise<OpenedPack> {
  const decodeFailures = lazy ? [] : (await pack.decodeAll(decodeContext(context))).failed;
  return { info: pack.info(), skipped: [...skipped], warnings: [...pack.loadWarnings], decodeFailures };
}

function saveOptions(context: SessionContext, destination?: string): { destination?: string; game: GameInfo; allowEditingOfCaPacks: boolean } {
  return { destination, game: context.game, allowEditingOfCaPacks: context.config.allowEditingOfCaPacks };
}

function requireSearch(context: SessionContext): GlobalSearch {
  if (!context.search) {
    throw new ConflictError('No search has been run');
  }
  return context.search;
}

const HANDLERS: Handlers = {
  async NewPack(context, { fileType }) {
    context.pack = Pack.create({ game: context.game, fileType });
    context.search = null;
    return context.pack.info();
  },

  async OpenPacks(context, { paths, lazy = context.config.lazyLoading }) {
    const { pack, skipped } = await Pack.readAndMerge({ filePaths: paths, lazy });
    context.pack = pack;
    context.search = null;
    return opened(context, pack, skipped.map((entry) => entry.filePath), lazy);
  },

  async OpenExtraPack(context, { path }) {
    const pack = await Pack.read({ filePath: path, lazy: context.config.lazyLoading });
    context.extraPacks.set(pack.diskPath ?? path, pack);
    return pack.info();
  },

  async CloseExtraPack(context, { path }) {
    for (const [key, pack] of context.extraPacks) {
      if (key === path || pack.name === path) {
        return context.extraPacks.delete(key);
      }
    }
    return false;
  },

  async LoadAllCaPacks(context) {
    const { pack, skipped } = await Pack.readAndMergeCaPacks({ game: context.game, gameDataPath: requireGameDataPath(context), lazy: true });
    context.pack = pack;
    context.search = null;
    return opened(context, pack, skipped.map((entry) => entry.filePath), true);
  },

  async SavePack(context) {
    return context.pack.save(saveOptions(context));
  },

  async SavePackAs(context, { path }) {
    return context.pack.save(saveOptions(context, path));
  },

  async CleanAndSave(context, { path }) {
    const removed = await context.pack.cleanUndecoded(decodeContext(context));
    const savedTo = await context.pack.save(saveOptions(context, path));
    return { path: savedTo, removed };
  },

  async ListFiles(context, { folder = '' }) {
    return context.pack.filesInFolder(folder).map((file) => file.info());
  },

  async GetFileInfo(context, { path }) {
    return context.pack.get(path)?.info() ?? null;
  },

  async AddFromDisk(context, { source, destination, replace }) {
    return context.pack.addFromDisk({ source, destination, replace });
  },

  async AddFile(context, { path, bytes, replace = true }) {
    const file = RFile.fromBytes(path, Buffer.from(bytes));
    context.pack.insert(file, { replace });
    return file.info();
  },

  async DeleteFiles(context, { paths }) {
    return paths.flatMap((path) => context.pack.remove(path).map((file) => file.path));
  },

  async MoveFile(context, { from, to }) {
    return context.pack.move(from, to);
  },

  async ExtractFiles(context, { paths, outputDir }) {
    return context.pack.extract({ paths, outputDir });
  },

  async DecodeFile(context, { path }) {
    return requireFile(context.pack, path).decode(decodeContext(context));
  },

  async SetDecoded(context, { path, decoded }) {
    const file = requireFile(context.pack, path);
    file.setDecoded(decoded);
    return file.info();
  },

  async EncodeFile(context, { path }) {
    return requireFile(context.pack, path).encode();
  },

  async Search(context, { options }) {
    const search = new GlobalSearch(options);
    const matches = await search.search({ pack: context.pack, dependencies: context.dependencies, schema: context.schema, game: context.game });
    context.search = search;
    return matches;
  },

  async ReplaceMatches(context, { matches }) {
    return requireSearch(context).replaceMatches({ pack: context.pack, dependencies: context.dependencies, schema: context.schema, game: context.game }, matches);
  },

  async ReplaceAll(context) {
    return requireSearch(context).replaceAll({ pack: context.pack, dependencies: context.dependencies, schema: context.schema, game: context.game });
  },

  async RebuildDependencies(context, { searchPaths = [] }) {
    const schema = requireSchema(context);
    const dataPath = gameDataPath(context.config);
    return context.dependencies.rebuild({
      schema,
      game: context.game,
      parentPackNames: context.pack.dependencies,
      cachePath: dataPath ? dependenciesCachePath(context.config, context.game) : undefined,
      gameDataPath: dataPath,
      searchPaths,
    });
  },

  async GenerateDependencyCache(context, { assemblyKitPath = context.config.assemblyKitPath ?? undefined }) {
    const schema = requireSchema(context);
    const assemblyKitTables = assemblyKitPath ? await loadAssemblyKitDump(assemblyKitPath) : [];
    const { cache, failed } = await DependencyCache.generate({ game: context.game, gameDataPath: requireGameDataPath(context), schema, assemblyKitTables });
    const path = dependenciesCachePath(context.config, context.game);
    try {
      await mkdir(dirname(path), { recursive: true });
    } catch (error) {
      throw toIoError(error, path);
    }
    await cache.save(path);
    return { path, failed };
  },

  async UpdateSchemaFromAssemblyKit(context, { dumpPath = context.config.assemblyKitPath ?? undefined }) {
    if (!dumpPath) {
      throw new ConfigError('No assembly kit dump configured');
    }
    const rawTables = await loadAssemblyKitDump(dumpPath);
    const schema = context.schema ? context.schema.clone() : new Schema();
    const report = schema.updateFromAssemblyKit(rawTables, await context.pack.tablesInUse());
    await persistSchema(context, schema);
    context.schema = schema;
    info(`✅ Schema updated: ${report.added.length} added, ${report.updated.length} updated, ${report.conflicts.length} conflicts`);
    return report;
  },

  async ImportSchemaPatch(context, { tableName, patches }) {
    const schema = requireSchema(context).clone();
    schema.addPatch(tableName, patches);
    await persistSchema(context, schema);
    context.schema = schema;
    return Object.keys(schema.patchesFor(tableName));
  },

  async MergeTables(context, { paths, destination, deleteSources = false }) {
    const sources = paths.map((path) => requireFile(context.pack, path));
    const merged = await mergeTables(sources, destination, decodeContext(context));
    if (deleteSources) {
      for (const source of sources) {
        context.pack.remove(source.path);
      }
    }
    context.pack.insert(merged);
    return merged.info();
  },

  async Optimize(context) {
    return optimizePack(context.pack, context.dependencies, { optimizeNotRenamed: context.config.optimizeNotRenamed, schema: context.schema });
  },

  async ExportTsv(context, { path, outputPath }) {
    const decoded = await requireFile(context.pack, path).decode(decodeContext(context));
    if (decoded.type !== 'DB' && decoded.type !== 'Loc') {
      throw new ConflictError(`${path} is ${decoded.type}; only tables export to TSV`);
    }
    await exportTsvFile(decoded, path, outputPath);
    return outputPath;
  },

  async ImportTsv(context, { inputPath, destination }) {
    const imported = await importTsvFile(inputPath, context.schema, context.game);
    const path = destination ?? imported.path;
    if (path === '') {
      throw new ConflictError(`${inputPath} names no destination path; pass one`);
    }
    const file = RFile.fromDecoded(path, imported.table);
    context.pack.insert(file);
    return file.info();
  },

  async SetPackType(context, { fileType }) {
    context.pack.setFileType(fileType);
    return context.pack.info();
  },

  async SetIndexTimestamps(context, { enabled }) {
    context.pack.setIndexHasTimestamps(enabled);
    return context.pack.info();
  },

  async SetCompressed(context, { enabled }) {
    if (enabled && !context.game.supportsCompression) {
      throw new ConflictError(`${context.game.displayName} does not support compressed packs`);
    }
    context.pack.setCompressed(enabled);
    return context.pack.info();
  },

  async SetDependencies(context, { dependencies }) {
    context.pack.setDependencies(dependencies);
    return context.pack.info();
  },

  async AddNote(context, { message, path }) {
    return context.pack.addNote({ message, path });
  },

  async DeleteNote(context, { path, id }) {
    return context.pack.deleteNote(path, id);
  },

  async GetNotes(context, { path }) {
    return context.pack.notesForPath(path);
  },

  async GetSettings(context) {
    return context.pack.settings;
  },

  async SetSettings(context, { settings }) {
    context.pack.settings = {
      text: { ...settings.text },
      strings: { ...settings.strings },
      bools: { ...settings.bools },
      numbers: { ...settings.numbers },
    };
    return context.pack.settings;
  },

  async MissingDefinitions(context) {
    return context.pack.missingDefinitions(requireSchema(context));
  },

  async UpdateTable(context, { path }) {
    const file = requireFile(context.pack, path);
    const decoded = await file.decode(decodeContext(context));
    if (decoded.type !== 'DB') {
      throw new ConflictError(`${path} is ${decoded.type}, not a DB table`);
    }
    const copy = decoded.clone();
    const result = await context.dependencies.updateDb(copy);
    if (result.oldVersion !== result.newVersion) {
      file.setDecoded(copy);
    }
    return result;
  },

  async ReferenceData(context, { tableName, version }) {
    const definition = requireSchema(context).definitionFor(tableName, version);
    if (!definition) {
      throw new SchemaError(tableName, version, requireSchema(context).knownVersions(tableName));
    }
    return context.dependencies.resolveReferenceData(context.pack, tableName, definition, decodeContext(context));
  },

  async Lookup(context, { tableName, column, value }) {
    return context.dependencies.lookup(context.pack, tableName, column, value, decodeContext(context));
  },
};

async function execute<K extends CommandKind>(context: SessionContext, command: CommandOf<K>): Promise<CommandResponse<CommandResults[K]>> {
  const handler = HANDLERS[command.kind];
  try {
    const value = await handler(context, command);
    return { ok: true, value };
  } catch (error) {
    debug(`${command.kind} failed: ${describeError(error)}`);
    return { ok: false, error: toErrorPayload(error) };
  }
}

type SessionTask = () => Promise<void>;

export class PackSession {
  private readonly queue: CommandQueue<SessionTask, void>;

  private constructor(private readonly context: SessionContext) {
    this.queue = new CommandQueue<SessionTask, void>((task) => task(), context.config.queueCapacity);
  }

  /**
   * Starts a session with an empty pack. The schema is read from the
   * configured path; when no path was configured, a missing default schema
   * file leaves the session without one.
   *
   * @throws {ConfigError} If the schema file is invalid
   * @throws {PackIoError} If an explicitly configured schema file cannot be read
   */
  static async create(config: WorkbenchConfig): Promise<PackSession> {
    const game = gameOf(config);
    let schema: Schema | null = null;
    const schemaPath = schemaFilePath(config, game);
    try {
      schema = await Schema.load(schemaPath);
    } catch (error) {
      if (!(error instanceof PackIoError) || config.schemaPath) {
        throw error;
      }
      warn(`No schema loaded from ${schemaPath}: ${error.message}`);
    }
    return new PackSession({
      config,
      game,
      schema,
      pack: Pack.create({ game }),
      extraPacks: new Map(),
      dependencies: new Dependencies(),
      search: null,
    });
  }

  get game(): GameInfo {
    return this.context.game;
  }

  get pack(): Pack {
    return this.context.pack;
  }

  get schema(): Schema | null {
    return this.context.schema;
  }

  get dependencies(): Dependencies {
    return this.context.dependencies;
  }

  /** Queues `command`; resolves once it has run, after every command sent before it. */
  send<K extends CommandKind>(command: CommandOf<K>): Promise<CommandResponse<CommandResults[K]>> {
    return new Promise<CommandResponse<CommandResults[K]>>((resolve, reject) => {
      this.queue.send(async () => {
        resolve(await execute(this.context, command));
      }).catch(reject);
    });
  }
}
