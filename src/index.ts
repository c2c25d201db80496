/**
 * Pack Workbench - Main entry point
 *
 * Reads, edits and writes Pack containers and the files inside them.
 */

// Containers
export { Pack, type PackInfo, type PackNote, type PackSettings, type MissingDefinition, type SaveOptions } from './pack.js';
export { PackBinary } from './pack-binary.js';
export { Container, type MovedPath } from './container.js';
export { RFile, decodeFile, encodeFile } from './rfile.js';
export { classifyFile } from './file-type.js';

// File formats
export { DB } from './files/db.js';
export { Loc } from './files/loc.js';
export { AnimPack } from './files/animpack.js';

// Schema and tables
export { Schema, parseDefinition } from './schema.js';
export { parseAssemblyKitDump, loadAssemblyKitDump, rawTableToDefinition, type RawTable } from './assembly-kit.js';
export { cellToText, parseCellText, convertRows, rowKey, type CellValue, type Row } from './table.js';
export { tableToTsv, tsvToTable, exportTsvFile, importTsvFile, type ImportedTable } from './tsv.js';
export { mergeTables } from './table-merge.js';

// Dependencies, search and optimization
export { Dependencies, DATA_SOURCES, type DataSource, type LookupResult, type ReferenceData, type RebuildOutcome } from './dependencies.js';
export { DependencyCache } from './dependencies-cache.js';
export { GlobalSearch, type GlobalSearchOptions } from './search/global-search.js';
export { createMatchingMode, type MatchingMode } from './search/matching-mode.js';
export { matchCount, type FileMatches } from './search/matches.js';
export { optimizePack } from './optimizer.js';

// Session and configuration
export { PackSession, type Command, type CommandKind, type CommandResponse, type CommandResults } from './session.js';
export { loadConfig, resolveConfig, type WorkbenchConfig } from './config.js';
export { SUPPORTED_GAMES, DEFAULT_GAME_KEY, findGame, gameByKey, type GameInfo } from './games.js';

// Errors
export * from './errors.js';

// Shared types
export type { DecodedFile } from './types/decoded.js';
export type { FileType, RFileInfo, DecodeContext } from './types/rfile.js';
export type { Definition, Field, FieldType, SchemaData, TablePatches } from './types/schema.js';
