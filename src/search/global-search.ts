/**
 * Global search and replace across the open pack and the dependency layers.
 */
import { DATA_SOURCES, type DataSource, type Dependencies, type DependencyLayers } from '../dependencies.js';
import { ReplaceError, describeError } from '../errors.js';
import type { GameInfo } from '../games.js';
import type { Pack } from '../pack.js';
import type { RFile } from '../rfile.js';
import type { Schema } from '../schema.js';
import type { DecodedFile } from '../types/decoded.js';
import type { FileType } from '../types/rfile.js';
import { debug, info } from '../utils/logger.js';
import { createMatchingMode, type MatchingMode } from './matching-mode.js';
import { matchCount, type FileMatches, type MatchGroup } from './matches.js';
import { asTextFieldHost, replaceStructured, searchStructured } from './structured-search.js';
import { replaceTable, searchTable } from './table-search.js';
import { replaceText, searchText } from './text-search.js';

export const SEARCHABLE_TYPES = ['DB', 'Loc', 'Text', 'AnimFragment', 'AnimsTable', 'PortraitSettings', 'UnitVariant'] as const;
export type SearchableType = (typeof SEARCHABLE_TYPES)[number];
export type SearchOn = Readonly<Record<SearchableType, boolean>>;

const VANILLA_ORIGIN = 'vanilla';
const ASSEMBLY_KIT_ORIGIN = 'assembly kit';

export interface SearchTarget {
  readonly pack: Pack;
  readonly dependencies: Dependencies;
  readonly schema: Schema | null;
  readonly game?: GameInfo;
}

export interface GlobalSearchOptions {
  readonly pattern: string;
  readonly replaceText?: string;
  readonly caseSensitive?: boolean;
  readonly useRegex?: boolean;
  /** Layers to search; the open pack only by default. */
  readonly sources?: readonly DataSource[];
  readonly searchOn?: Partial<SearchOn>;
  /** Lets replacements edit the parent packs held by the resolver. */
  readonly allowParentEdits?: boolean;
}

function isSearchableType(fileType: FileType): fileType is SearchableType {
  return SEARCHABLE_TYPES.some((type) => type === fileType);
}

function matchDecoded(decoded: DecodedFile, mode: MatchingMode): MatchGroup | null {
  switch (decoded.type) {
    case 'DB':
    case 'Loc': {
      const matches = searchTable(decoded, mode);
      return matches.length > 0 ? { kind: 'Table', matches } : null;
    }
    case 'Text': {
      const matches = searchText(decoded, mode);
      return matches.length > 0 ? { kind: 'Text', matches } : null;
    }
    default: {
      const host = asTextFieldHost(decoded);
      const matches = host ? searchStructured(host, mode) : [];
      return matches.length > 0 ? { kind: 'Structured', matches } : null;
    }
  }
}

/** Applies one file's matches to `decoded`. Returns whether it changed. */
function applyMatches(decoded: DecodedFile, fileMatches: FileMatches, mode: MatchingMode, replacement: string): boolean {
  switch (fileMatches.kind) {
    case 'Table':
      return decoded.type === 'DB' || decoded.type === 'Loc'
        ? replaceTable(decoded, fileMatches.matches, mode, replacement, fileMatches.path)
        : false;
    case 'Text':
      return decoded.type === 'Text' ? replaceText(decoded, fileMatches.matches, replacement) : false;
    case 'Structured': {
      const host = asTextFieldHost(decoded);
      return host ? replaceStructured(host, fileMatches.matches, mode, replacement) : false;
    }
    default: {
      const unreachable: never = fileMatches;
      throw new ReplaceError(`Unknown match kind ${String(unreachable)}`);
    }
  }
}

export class GlobalSearch {
  pattern: string;
  replaceText: string;
  caseSensitive: boolean;
  useRegex: boolean;
  sources: DataSource[];
  searchOn: SearchOn;
  allowParentEdits: boolean;
  /** Results of the last search, by source then path. */
  matches: FileMatches[] = [];

  constructor({ pattern, replaceText = '', caseSensitive = false, useRegex = false, sources = ['PackFile'], searchOn = {}, allowParentEdits = false }: GlobalSearchOptions) {
    this.pattern = pattern;
    this.replaceText = replaceText;
    this.caseSensitive = caseSensitive;
    this.useRegex = useRegex;
    this.sources = [...sources];
    this.allowParentEdits = allowParentEdits;
    this.searchOn = {
      DB: searchOn.DB ?? true,
      Loc: searchOn.Loc ?? true,
      Text: searchOn.Text ?? true,
      AnimFragment: searchOn.AnimFragment ?? true,
      AnimsTable: searchOn.AnimsTable ?? true,
      PortraitSettings: searchOn.PortraitSettings ?? true,
      UnitVariant: searchOn.UnitVariant ?? true,
    };
  }

  private mode(): MatchingMode {
    return createMatchingMode(this.pattern, { caseSensitive: this.caseSensitive, useRegex: this.useRegex });
  }

  private wants(fileType: FileType): boolean {
    return isSearchableType(fileType) && this.searchOn[fileType];
  }

  /** Decodes a file already in memory, or returns null when it cannot be. */
  private decodeLoaded(file: RFile, target: SearchTarget): DecodedFile | null {
    try {
      return file.decodeLoaded({ schema: target.schema ?? undefined, game: target.game });
    } catch (error) {
      debug(`Search skips ${file.path}: ${describeError(error)}`);
      return null;
    }
  }

  private searchLayers(layers: DependencyLayers, mode: MatchingMode, target: SearchTarget, source: DataSource): FileMatches[] {
    const found: FileMatches[] = [];
    const collect = (origin: string, path: string, decoded: DecodedFile | null): void => {
      const located = decoded ? matchDecoded(decoded, mode) : null;
      if (located) {
        found.push({ source, origin, path, ...located });
      }
    };
    switch (source) {
      case 'ParentFiles':
        for (const parent of layers.parents) {
          for (const file of parent.files().filter((entry) => this.wants(entry.fileType))) {
            collect(parent.name, file.path, this.decodeLoaded(file, target));
          }
        }
        break;
      case 'GameFiles':
        for (const file of layers.vanillaFiles.filter((entry) => this.wants(entry.fileType))) {
          collect(VANILLA_ORIGIN, file.path, this.decodeLoaded(file, target));
        }
        break;
      case 'AssKitFiles':
        if (this.searchOn.DB) {
          for (const table of layers.assKitTables) {
            collect(ASSEMBLY_KIT_ORIGIN, `db/${table.tableName}/assembly_kit`, table);
          }
        }
        break;
      case 'PackFile':
        break;
    }
    return found;
  }

  /** Runs the search and stores the results in {@link matches}. */
  async search(target: SearchTarget): Promise<FileMatches[]> {
    const mode = this.mode();
    const results: FileMatches[] = [];
    for (const source of DATA_SOURCES.filter((candidate) => this.sources.includes(candidate))) {
      if (source === 'PackFile') {
        for (const file of target.pack.files().filter((entry) => this.wants(entry.fileType))) {
          let decoded: DecodedFile | null;
          try {
            decoded = await file.decode({ schema: target.schema ?? undefined, game: target.game });
          } catch (error) {
            debug(`Search skips ${file.path}: ${describeError(error)}`);
            decoded = null;
          }
          const located = decoded ? matchDecoded(decoded, mode) : null;
          if (located) {
            results.push({ source, origin: target.pack.name, path: file.path, ...located });
          }
        }
        continue;
      }
      results.push(...(await target.dependencies.read((layers) => this.searchLayers(layers, mode, target, source))));
    }
    this.matches = results;
    debug(`Search for ${JSON.stringify(this.pattern)}: ${matchCount(results)} matches in ${results.length} files`);
    return results;
  }

  /**
   * Replaces the selected matches, then searches again so the stored matches
   * never hold stale offsets. Either every file is edited or none is.
   *
   * @returns Paths of the files that changed
   * @throws {ReplaceError} If a match belongs to a read-only layer or a replaced value is invalid
   */
  async replaceMatches(target: SearchTarget, selected: readonly FileMatches[]): Promise<string[]> {
    for (const fileMatches of selected) {
      if (fileMatches.source === 'GameFiles' || fileMatches.source === 'AssKitFiles') {
        throw new ReplaceError(`${fileMatches.path} belongs to ${fileMatches.source}, which is read-only`);
      }
      if (fileMatches.source === 'ParentFiles' && !this.allowParentEdits) {
        throw new ReplaceError(`${fileMatches.path} belongs to the parent pack ${fileMatches.origin}; parent edits are disabled`);
      }
    }
    const mode = this.mode();

    const edited = await target.dependencies.write(async (layers) => {
      const planned: Array<{ readonly file: RFile; readonly decoded: DecodedFile }> = [];
      for (const fileMatches of selected) {
        const file = fileMatches.source === 'PackFile'
          ? target.pack.get(fileMatches.path)
          : layers.parents.find((parent) => parent.name === fileMatches.origin)?.get(fileMatches.path);
        if (!file) {
          debug(`${fileMatches.path} is gone, its matches are skipped`);
          continue;
        }
        const current = await file.decode({ schema: target.schema ?? undefined, game: target.game });
        const copy = current.clone();
        if (applyMatches(copy, fileMatches, mode, this.replaceText)) {
          planned.push({ file, decoded: copy });
        }
      }
      for (const { file, decoded } of planned) {
        file.setDecoded(decoded);
      }
      return planned.map(({ file }) => file.path);
    });

    if (edited.length > 0) {
      info(`✅ Replaced matches in ${edited.length} files`);
    }
    await this.search(target);
    return edited;
  }

  /** Searches, then replaces every match in the layers that can be edited. */
  async replaceAll(target: SearchTarget): Promise<string[]> {
    const matches = await this.search(target);
    const writable = matches.filter((fileMatches) => fileMatches.source === 'PackFile' || (fileMatches.source === 'ParentFiles' && this.allowParentEdits));
    return this.replaceMatches(target, writable);
  }
}
