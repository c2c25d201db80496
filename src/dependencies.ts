/**
 * Dependency resolver: answers reference and lookup queries across the open
 * pack, its parent packs, the vanilla cache and assembly-kit-only tables.
 *
 * The loaded layers are replaced as a whole on rebuild, under the write side
 * of a reader/writer lock; every query holds the read side.
 */
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import { DependencyCache } from './dependencies-cache.js';
import { DependencyError, describeError, toErrorPayload, type BatchOutcome } from './errors.js';
import { tableNameFromPath } from './file-type.js';
import type { DB } from './files/db.js';
import { LOC_TABLE_NAME, type Loc } from './files/loc.js';
import type { GameInfo } from './games.js';
import { Pack } from './pack.js';
import type { RFile } from './rfile.js';
import type { Schema } from './schema.js';
import { cellToText, columnIndex, convertRows, type Row } from './table.js';
import type { DecodeContext } from './types/rfile.js';
import type { Definition } from './types/schema.js';
import { debug, info, warn } from './utils/logger.js';
import { RwLock } from './utils/rw-lock.js';

/** Where a piece of data comes from, in lookup priority order. */
export const DATA_SOURCES = ['PackFile', 'ParentFiles', 'GameFiles', 'AssKitFiles'] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

/** A decoded table of one layer. Loc files are listed under the `loc` table. */
export interface LayerTable {
  readonly source: DataSource;
  readonly path: string;
  readonly table: DB | Loc;
}

export interface LookupHit {
  readonly path: string;
  readonly rowIndex: number;
  readonly row: Row;
}

export interface LookupResult {
  readonly layer: DataSource;
  readonly hits: LookupHit[];
}

export interface ReferenceData {
  /** Referenced value → lookup text (empty when the field has no lookup columns). */
  readonly data: Map<string, string>;
  readonly referencedTableIsAssKitOnly: boolean;
  readonly referencedColumnIsLocalised: boolean;
}

export interface RebuildOptions {
  readonly schema: Schema;
  readonly game: GameInfo;
  readonly parentPackNames: readonly string[];
  /** Vanilla cache to load; without it only parent packs are available and queries needing vanilla data fail. */
  readonly cachePath?: string;
  /** Folder of the installed game's packs, searched first for parents. */
  readonly gameDataPath?: string | null;
  readonly searchPaths?: readonly string[];
}

export interface RebuildOutcome {
  readonly success: boolean;
  readonly vanillaLoaded: boolean;
  readonly parentsLoaded: string[];
  /** Fatal errors when `success` is false; missing parents and entries that did not decode otherwise. */
  readonly failures: BatchOutcome['failed'];
}

export interface UpdatedTable {
  readonly oldVersion: number;
  readonly newVersion: number;
}

interface LayerState {
  readonly schema: Schema | null;
  readonly gameKey: string | null;
  readonly parents: readonly Pack[];
  readonly cache: DependencyCache | null;
  /** Table name → decoded tables, per lower layer. */
  readonly tables: ReadonlyMap<DataSource, ReadonlyMap<string, readonly LayerTable[]>>;
  /** The same parent tables, one index per parent in declaration order. */
  readonly parentTables: ReadonlyArray<ReadonlyMap<string, readonly LayerTable[]>>;
}

type TableGroup = readonly [DataSource, readonly LayerTable[]];

const EMPTY_STATE: LayerState = { schema: null, gameKey: null, parents: [], cache: null, tables: new Map(), parentTables: [] };

function asLayerTable(source: DataSource, file: RFile): LayerTable | null {
  const decoded = file.decoded;
  if (decoded?.type === 'DB' || decoded?.type === 'Loc') {
    return { source, path: file.path, table: decoded };
  }
  return null;
}

function indexTables(tables: readonly LayerTable[]): Map<string, LayerTable[]> {
  const index = new Map<string, LayerTable[]>();
  for (const entry of tables) {
    const name = entry.table.type === 'DB' ? entry.table.tableName : LOC_TABLE_NAME;
    const list = index.get(name) ?? [];
    list.push(entry);
    index.set(name, list);
  }
  return index;
}

/** Decodes the loaded DB and Loc entries of `files`, collecting failures. */
function decodeTables(source: DataSource, files: readonly RFile[], schema: Schema, game: GameInfo, failures: BatchOutcome['failed']): LayerTable[] {
  const tables: LayerTable[] = [];
  for (const file of files) {
    try {
      file.decodeLoaded({ schema, game });
    } catch (error) {
      failures.push({ path: file.path, error: toErrorPayload(error) });
      continue;
    }
    const table = asLayerTable(source, file);
    if (table) {
      tables.push(table);
    }
  }
  return tables;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    debug(`${path} not found: ${describeError(error)}`);
    return false;
  }
}

export class Dependencies {
  private state: LayerState = EMPTY_STATE;
  private readonly lock = new RwLock();

  /**
   * Loads the vanilla cache and the parent packs, then swaps them in at once.
   * Parent packs are looked up by file name in `gameDataPath`, then in each
   * search path. On a fatal failure the previous state stays in place.
   */
  async rebuild({ schema, game, parentPackNames, cachePath, gameDataPath = null, searchPaths = [] }: RebuildOptions): Promise<RebuildOutcome> {
    return this.lock.write(async () => {
      const failures: BatchOutcome['failed'] = [];
      const fatal = (path: string, error: unknown): RebuildOutcome => {
        warn(`Dependencies not rebuilt: ${describeError(error)}`);
        return { success: false, vanillaLoaded: this.state.cache !== null, parentsLoaded: this.state.parents.map((pack) => pack.name), failures: [{ path, error: toErrorPayload(error) }] };
      };

      let cache: DependencyCache | null = null;
      if (cachePath !== undefined) {
        try {
          cache = await DependencyCache.load(cachePath, { schema, game });
        } catch (error) {
          return fatal(cachePath, error);
        }
      } else {
        const error = new DependencyError(`No dependency cache for ${game.displayName}; vanilla data is not loaded`);
        warn(error.message);
        failures.push({ path: '', error: toErrorPayload(error) });
      }

      const folders = [gameDataPath, ...searchPaths].filter((folder): folder is string => folder !== null && folder !== '');
      const parents: Pack[] = [];
      for (const name of parentPackNames) {
        let found: string | null = null;
        for (const folder of folders) {
          const candidate = join(folder, name);
          if (await exists(candidate)) {
            found = candidate;
            break;
          }
        }
        if (found === null) {
          const error = new DependencyError(`Parent pack ${name} not found in ${folders.length > 0 ? folders.join(', ') : 'any folder'}`);
          warn(error.message);
          failures.push({ path: name, error: toErrorPayload(error) });
          continue;
        }
        try {
          parents.push(await Pack.read({ filePath: found }));
        } catch (error) {
          return fatal(found, error);
        }
      }

      const perParent = parents.map((pack) => decodeTables('ParentFiles', pack.filesByType(['DB', 'Loc']), schema, game, failures));
      const parentTables = perParent.flat();
      const vanillaTables = cache ? decodeTables('GameFiles', cache.vanillaFiles(), schema, game, failures) : [];
      const assKitTables: LayerTable[] = cache ? cache.assKitTables().map((table): LayerTable => ({ source: 'AssKitFiles', path: `db/${table.tableName}/assembly_kit`, table })) : [];

      this.state = {
        schema,
        gameKey: game.key,
        parents,
        cache,
        tables: new Map<DataSource, ReadonlyMap<string, readonly LayerTable[]>>([
          ['ParentFiles', indexTables(parentTables)],
          ['GameFiles', indexTables(vanillaTables)],
          ['AssKitFiles', indexTables(assKitTables)],
        ]),
        parentTables: perParent.map(indexTables),
      };
      info(`✅ Dependencies rebuilt: ${parents.length} parent packs, ${vanillaTables.length} vanilla tables, ${assKitTables.length} assembly kit tables`);
      return { success: true, vanillaLoaded: cache !== null, parentsLoaded: parents.map((pack) => pack.name), failures };
    });
  }

  /**
   * Tables named `tableName` in the open pack, decoded on demand with the
   * caller's schema and game, or the schema of the last rebuild. Entries that
   * fail are skipped.
   */
  private async localTables(localPack: Pack | null, tableName: string, context: DecodeContext): Promise<LayerTable[]> {
    if (!localPack) {
      return [];
    }
    const files = localPack.filesByType(tableName === LOC_TABLE_NAME ? ['Loc'] : ['DB'])
      .filter((file) => tableName === LOC_TABLE_NAME || tableNameFromPath(file.path) === tableName);
    const tables: LayerTable[] = [];
    for (const file of files) {
      try {
        await file.decode({ ...context, schema: context.schema ?? this.state.schema ?? undefined });
      } catch (error) {
        debug(`${file.path} skipped: ${describeError(error)}`);
        continue;
      }
      const table = asLayerTable('PackFile', file);
      if (table) {
        tables.push(table);
      }
    }
    return tables;
  }

  private layerTables(source: DataSource, tableName: string): readonly LayerTable[] {
    return this.state.tables.get(source)?.get(tableName) ?? [];
  }

  /** Table groups in lookup order; each parent pack is a group of its own. */
  private async tablesBySource(localPack: Pack | null, tableName: string, context: DecodeContext): Promise<TableGroup[]> {
    return [
      ['PackFile', await this.localTables(localPack, tableName, context)],
      ...this.state.parentTables.map((index): TableGroup => ['ParentFiles', index.get(tableName) ?? []]),
      ['GameFiles', this.layerTables('GameFiles', tableName)],
      ['AssKitFiles', this.layerTables('AssKitFiles', tableName)],
    ];
  }

  private requireVanilla(): void {
    if (!this.state.cache) {
      throw new DependencyError(`Vanilla data is not loaded${this.state.gameKey ? ` for ${this.state.gameKey}` : ''}; generate the dependency cache and rebuild`);
    }
  }

  /**
   * Rows whose `column` reads `value`, from the first layer holding any:
   * the open pack, then each parent in declaration order, then vanilla data,
   * then assembly-kit-only tables.
   *
   * @throws {DependencyError} If no vanilla data is loaded
   */
  async lookup(localPack: Pack | null, tableName: string, column: string, value: string, context: DecodeContext = {}): Promise<LookupResult | null> {
    return this.lock.read(async () => {
      this.requireVanilla();
      for (const [layer, tables] of await this.tablesBySource(localPack, tableName, context)) {
        const hits: LookupHit[] = [];
        for (const { path, table } of tables) {
          const index = columnIndex(table.definition, column);
          if (index < 0) {
            continue;
          }
          table.rows.forEach((row, rowIndex) => {
            const cell = row[index];
            if (cell !== undefined && cellToText(cell) === value) {
              hits.push({ path, rowIndex, row });
            }
          });
        }
        if (hits.length > 0) {
          return { layer, hits };
        }
      }
      return null;
    });
  }

  /**
   * Distinct values of every referenced column of `definition`, keyed by the
   * referencing column's index.
   *
   * @throws {DependencyError} If no vanilla data is loaded
   */
  async resolveReferenceData(localPack: Pack | null, tableName: string, definition: Definition, context: DecodeContext = {}): Promise<Map<number, ReferenceData>> {
    return this.lock.read(async () => {
      this.requireVanilla();
      const result = new Map<number, ReferenceData>();
      for (const [index, field] of definition.fields.entries()) {
        if (!field.isReference) {
          continue;
        }
        const [referencedTable, referencedColumn] = field.isReference;
        const fullName = `${referencedTable}_tables`;
        const data = new Map<string, string>();
        let localised = false;
        const layers = await this.tablesBySource(localPack, fullName, context);
        for (const [, tables] of layers) {
          for (const { table } of tables) {
            const valueIndex = columnIndex(table.definition, referencedColumn);
            if (table.definition.localisedFields.some((localisedField) => localisedField.name === referencedColumn)) {
              localised = true;
            }
            if (valueIndex < 0) {
              continue;
            }
            const lookupIndexes = (field.lookup ?? []).map((name) => columnIndex(table.definition, name)).filter((lookupIndex) => lookupIndex >= 0);
            for (const row of table.rows) {
              const cell = row[valueIndex];
              if (cell === undefined) {
                continue;
              }
              const key = cellToText(cell);
              if (!data.has(key)) {
                data.set(key, lookupIndexes.map((lookupIndex) => cellToText(row[lookupIndex] ?? null)).join(':'));
              }
            }
          }
        }
        const assKitOnly = layers.every(([source, tables]) => source === 'AssKitFiles' || tables.length === 0)
          && this.layerTables('AssKitFiles', fullName).length > 0;
        result.set(index, { data, referencedTableIsAssKitOnly: assKitOnly, referencedColumnIsLocalised: localised });
      }
      return result;
    });
  }

  /** Distinct values of `column` across the lower layers, and the open pack when given. */
  async dbValuesFromTableAndColumn(localPack: Pack | null, tableName: string, column: string, context: DecodeContext = {}): Promise<string[]> {
    return this.lock.read(async () => {
      const values = new Set<string>();
      for (const [, tables] of await this.tablesBySource(localPack, tableName, context)) {
        for (const { table } of tables) {
          const index = columnIndex(table.definition, column);
          if (index < 0) {
            continue;
          }
          for (const row of table.rows) {
            values.add(cellToText(row[index] ?? null));
          }
        }
      }
      return [...values];
    });
  }

  /** Newest version of `tableName` in the vanilla data, or null when the game has no such table. */
  async tableVersion(tableName: string): Promise<number | null> {
    return this.lock.read(() => this.vanillaVersion(tableName));
  }

  private vanillaVersion(tableName: string): number | null {
    const versions = [...this.layerTables('GameFiles', tableName), ...this.layerTables('AssKitFiles', tableName)].map(({ table }) => table.definition.version);
    return versions.length > 0 ? Math.max(...versions) : null;
  }

  async vanillaTableNames(): Promise<string[]> {
    return this.lock.read(() => {
      const names = new Set<string>([
        ...(this.state.tables.get('GameFiles')?.keys() ?? []),
        ...(this.state.tables.get('AssKitFiles')?.keys() ?? []),
      ]);
      names.delete(LOC_TABLE_NAME);
      return [...names].sort();
    });
  }

  async isVanillaDataLoaded(includeAssKit: boolean): Promise<boolean> {
    return this.lock.read(() => {
      const cache = this.state.cache;
      if (!cache || cache.vanillaFiles().length === 0) {
        return false;
      }
      return !includeAssKit || cache.assKitTables().length > 0;
    });
  }

  /**
   * Migrates `db` to the newest vanilla version of its table. Columns are
   * matched by name; new columns take their default.
   *
   * @throws {DependencyError} If no vanilla version or no definition for it is known
   */
  async updateDb(db: DB): Promise<UpdatedTable> {
    return this.lock.read(() => {
      const oldVersion = db.version;
      const newVersion = this.vanillaVersion(db.tableName);
      const schema = this.state.schema;
      if (newVersion === null || !schema) {
        throw new DependencyError(`No vanilla version of ${db.tableName} is loaded`);
      }
      if (newVersion === oldVersion) {
        return { oldVersion, newVersion };
      }
      const definition = schema.definitionFor(db.tableName, newVersion);
      if (!definition) {
        throw new DependencyError(`The schema has no definition for ${db.tableName} version ${newVersion}`);
      }

      db.rows = convertRows(db.rows, db.definition, definition, schema, db.tableName);
      db.definition = definition;
      db.hasVersionMarker = true;
      debug(`Updated ${db.tableName} from version ${oldVersion} to ${newVersion}`);
      return { oldVersion, newVersion };
    });
  }

  /**
   * Runs `task` with shared access to the loaded layers. Callers must not keep
   * the layer data beyond the task.
   */
  async read<T>(task: (layers: DependencyLayers) => Promise<T> | T): Promise<T> {
    return this.lock.read(() => task(this.layers()));
  }

  /** Like {@link read}, with exclusive access, for edits of parent packs. */
  async write<T>(task: (layers: DependencyLayers) => Promise<T> | T): Promise<T> {
    return this.lock.write(() => task(this.layers()));
  }

  private layers(): DependencyLayers {
    const state = this.state;
    return {
      schema: state.schema,
      parents: state.parents,
      vanillaFiles: state.cache ? state.cache.vanillaFiles() : [],
      assKitTables: state.cache ? state.cache.assKitTables() : [],
      tables: (source, tableName) => state.tables.get(source)?.get(tableName) ?? [],
      lowerLayerFile: (path) => {
        for (const parent of state.parents) {
          const file = parent.get(path);
          if (file) {
            return { source: 'ParentFiles', file };
          }
        }
        const file = state.cache?.vanillaFile(path);
        return file ? { source: 'GameFiles', file } : null;
      },
    };
  }
}

/** Read view of the loaded layers, handed to tasks run under the resolver lock. */
export interface DependencyLayers {
  readonly schema: Schema | null;
  readonly parents: readonly Pack[];
  readonly vanillaFiles: readonly RFile[];
  readonly assKitTables: readonly DB[];
  tables(source: Exclude<DataSource, 'PackFile'>, tableName: string): readonly LayerTable[];
  /** The entry at `path` in the first lower layer that has one. */
  lowerLayerFile(path: string): { readonly source: DataSource; readonly file: RFile } | null;
}

