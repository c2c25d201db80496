#!/usr/bin/env node
/**
 * Pack Workbench - CLI Interface
 *
 * Command-line interface for inspecting and editing Pack containers.
 */

import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'node:path';
import { loadConfig, type ConfigInput } from './config.js';
import { PACK_FILE_TYPES, type PackFileType } from './constants/pack-constants.js';
import { DATA_SOURCES, type DataSource } from './dependencies.js';
import { matchCount } from './search/matches.js';
import { PackSession, type CommandResponse } from './session.js';
import { setVerbose } from './utils/logger.js';

interface GlobalOptions {
  readonly game?: string;
  readonly config?: string;
  readonly verbose?: boolean;
}

const program = new Command();

// Version is set at build time
const version = '0.1.0';

program
  .name('pack-workbench')
  .description('Read, edit and write Pack containers and the tables inside them')
  .version(version)
  .option('--game <key>', 'Game the packs belong to')
  .option('--config <file>', 'JSON configuration file')
  .option('--verbose', 'Log debug output');

function parsePackType(value: string): PackFileType {
  const fileType = PACK_FILE_TYPES.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  if (!fileType) {
    throw new InvalidArgumentError(`Expected one of ${PACK_FILE_TYPES.join(', ')}`);
  }
  return fileType;
}

function parseSources(value: string): DataSource[] {
  const sources: DataSource[] = [];
  for (const name of value.split(',')) {
    const source = DATA_SOURCES.find((candidate) => candidate.toLowerCase() === name.trim().toLowerCase());
    if (!source) {
      throw new InvalidArgumentError(`Unknown source ${name}; expected ${DATA_SOURCES.join(', ')}`);
    }
    sources.push(source);
  }
  return sources;
}

function unwrap<T>(response: CommandResponse<T>): T {
  if (!response.ok) {
    throw new Error(`${response.error.kind}: ${response.error.message}`);
  }
  return response.value;
}

async function openSession(overrides: Partial<ConfigInput> = {}): Promise<PackSession> {
  const globals = program.opts<GlobalOptions>();
  setVerbose(globals.verbose ?? false);
  const config = await loadConfig({
    configFile: globals.config ? resolve(globals.config) : undefined,
    overrides: { game: globals.game, ...overrides },
  });
  return PackSession.create(config);
}

async function openPack(packPath: string, lazy = true): Promise<PackSession> {
  const session = await openSession();
  unwrap(await session.send({ kind: 'OpenPacks', paths: [resolve(packPath)], lazy }));
  return session;
}

/** Runs a command body, reporting failure the same way for every command. */
function run<A extends unknown[]>(label: string, body: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await body(...args);
    } catch (error) {
      console.error(`❌ ${label} failed:`, error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  };
}

const pack = program.command('pack').description('Work with pack files');

pack
  .command('list')
  .description('List the files inside a pack')
  .argument('<pack>', 'Pack file')
  .argument('[folder]', 'Only list files below this folder', '')
  .action(run('List', async (packPath: string, folder: string) => {
    const session = await openPack(packPath);
    const files = unwrap(await session.send({ kind: 'ListFiles', folder }));
    for (const file of files) {
      console.log(`${file.path}\t${file.fileType}\t${file.size ?? '-'}`);
    }
    console.log('');
    console.log(`${files.length} files`);
  }));

pack
  .command('create')
  .description('Create an empty pack')
  .argument('<output-file>', 'Path of the new pack')
  .option('--type <type>', 'Pack type', parsePackType, 'Mod')
  .action(run('Create', async (outputFile: string, options: { type: PackFileType }) => {
    const session = await openSession();
    unwrap(await session.send({ kind: 'NewPack', fileType: options.type }));
    const savedTo = unwrap(await session.send({ kind: 'SavePackAs', path: resolve(outputFile) }));
    console.log(`✅ Created ${savedTo}`);
  }));

pack
  .command('add')
  .description('Add a file or folder from disk to a pack')
  .argument('<pack>', 'Pack file')
  .argument('<source>', 'File or folder on disk')
  .option('--destination <path>', 'Folder inside the pack', '')
  .option('--no-replace', 'Keep existing files at the same paths')
  .action(run('Add', async (packPath: string, source: string, options: { destination: string; replace: boolean }) => {
    const session = await openPack(packPath);
    const added = unwrap(await session.send({ kind: 'AddFromDisk', source: resolve(source), destination: options.destination, replace: options.replace }));
    unwrap(await session.send({ kind: 'SavePack' }));
    console.log(`✅ Added ${added.length} files`);
  }));

pack
  .command('delete')
  .description('Delete files or folders from a pack')
  .argument('<pack>', 'Pack file')
  .argument('<paths...>', 'Paths inside the pack')
  .action(run('Delete', async (packPath: string, paths: string[]) => {
    const session = await openPack(packPath);
    const removed = unwrap(await session.send({ kind: 'DeleteFiles', paths }));
    unwrap(await session.send({ kind: 'SavePack' }));
    console.log(`✅ Deleted ${removed.length} files`);
  }));

pack
  .command('extract')
  .description('Extract files from a pack; everything when no path is given')
  .argument('<pack>', 'Pack file')
  .argument('<output-dir>', 'Directory to extract into')
  .argument('[paths...]', 'Files or folders inside the pack')
  .action(run('Extract', async (packPath: string, outputDir: string, paths: string[]) => {
    const session = await openPack(packPath);
    const written = unwrap(await session.send({ kind: 'ExtractFiles', paths, outputDir: resolve(outputDir) }));
    console.log(`✅ Extracted ${written.length} files`);
  }));

pack
  .command('merge')
  .description('Merge packs into one; later packs win on path clashes')
  .argument('<output-file>', 'Path where the merged pack will be written')
  .argument('<inputs...>', 'Packs to merge')
  .action(run('Merge', async (outputFile: string, inputs: string[]) => {
    const session = await openSession();
    const opened = unwrap(await session.send({ kind: 'OpenPacks', paths: inputs.map((input) => resolve(input)), lazy: true }));
    for (const skipped of opened.skipped) {
      console.log(`Skipped ${skipped}`);
    }
    const savedTo = unwrap(await session.send({ kind: 'SavePackAs', path: resolve(outputFile) }));
    console.log(`✅ Merged ${opened.info.fileCount} files into ${savedTo}`);
  }));

pack
  .command('set-type')
  .description('Change the type stored in a pack header')
  .argument('<pack>', 'Pack file')
  .argument('<type>', `One of ${PACK_FILE_TYPES.join(', ')}`, parsePackType)
  .action(run('Set type', async (packPath: string, fileType: PackFileType) => {
    const session = await openPack(packPath);
    unwrap(await session.send({ kind: 'SetPackType', fileType }));
    unwrap(await session.send({ kind: 'SavePack' }));
    console.log(`✅ Pack type set to ${fileType}`);
  }));

pack
  .command('optimize')
  .description('Remove what the pack repeats from its parent packs and the game files')
  .argument('<pack>', 'Pack file')
  .option('--search-path <dir...>', 'Extra folders to look for parent packs in', [])
  .action(run('Optimize', async (packPath: string, options: { searchPath: string[] }) => {
    const session = await openPack(packPath);
    const rebuilt = unwrap(await session.send({ kind: 'RebuildDependencies', searchPaths: options.searchPath.map((dir) => resolve(dir)) }));
    if (!rebuilt.success) {
      throw new Error(rebuilt.failures.map((failure) => failure.error.message).join('; '));
    }
    const deleted = unwrap(await session.send({ kind: 'Optimize' }));
    unwrap(await session.send({ kind: 'SavePack' }));
    console.log(`✅ Optimized: ${deleted.length} files deleted`);
  }));

const table = program.command('table').description('Move tables in and out of packs as TSV');

table
  .command('export')
  .description('Export a DB or Loc table to TSV')
  .argument('<pack>', 'Pack file')
  .argument('<path>', 'Table path inside the pack')
  .argument('<output-file>', 'TSV file to write')
  .action(run('Export', async (packPath: string, path: string, outputFile: string) => {
    const session = await openPack(packPath);
    const written = unwrap(await session.send({ kind: 'ExportTsv', path, outputPath: resolve(outputFile) }));
    console.log(`✅ Exported ${path} to ${written}`);
  }));

table
  .command('import')
  .description('Import a TSV export into a pack')
  .argument('<pack>', 'Pack file')
  .argument('<input-file>', 'TSV file to read')
  .option('--destination <path>', 'Path inside the pack; the exported path by default')
  .action(run('Import', async (packPath: string, inputFile: string, options: { destination?: string }) => {
    const session = await openPack(packPath);
    const imported = unwrap(await session.send({ kind: 'ImportTsv', inputPath: resolve(inputFile), destination: options.destination }));
    unwrap(await session.send({ kind: 'SavePack' }));
    console.log(`✅ Imported ${imported.path}`);
  }));

program
  .command('search')
  .description('Search the text of a pack, and optionally replace it')
  .argument('<pack>', 'Pack file')
  .argument('<pattern>', 'Text or regular expression to look for')
  .option('--regex', 'Treat the pattern as a regular expression', false)
  .option('--case-sensitive', 'Match case', false)
  .option('--sources <list>', `Comma separated layers: ${DATA_SOURCES.join(', ')}`, parseSources, ['PackFile'])
  .option('--replace <text>', 'Replace every match in the pack and save it')
  .action(run('Search', async (packPath: string, pattern: string, options: { regex: boolean; caseSensitive: boolean; sources: DataSource[]; replace?: string }) => {
    const session = await openPack(packPath);
    if (options.sources.some((source) => source !== 'PackFile')) {
      unwrap(await session.send({ kind: 'RebuildDependencies' }));
    }
    const searchOptions = { pattern, replaceText: options.replace, caseSensitive: options.caseSensitive, useRegex: options.regex, sources: options.sources };
    const results = unwrap(await session.send({ kind: 'Search', options: searchOptions }));
    for (const result of results) {
      console.log(`${result.source}\t${result.origin}\t${result.path}\t${result.matches.length}`);
    }
    console.log('');
    console.log(`${matchCount(results)} matches in ${results.length} files`);

    if (options.replace !== undefined) {
      const edited = unwrap(await session.send({ kind: 'ReplaceAll' }));
      unwrap(await session.send({ kind: 'SavePack' }));
      console.log(`✅ Replaced matches in ${edited.length} files`);
    }
  }));

program
  .command('schema')
  .description('Maintain the table schema')
  .command('update')
  .description('Add the table layouts of an assembly-kit dump to the schema')
  .argument('<dump-file>', 'Assembly-kit JSON dump')
  .option('--pack <file>', 'Keep the versions this pack uses')
  .action(run('Schema update', async (dumpFile: string, options: { pack?: string }) => {
    const session = options.pack ? await openPack(options.pack) : await openSession();
    const report = unwrap(await session.send({ kind: 'UpdateSchemaFromAssemblyKit', dumpPath: resolve(dumpFile) }));
    for (const conflict of report.conflicts) {
      console.log(`Conflict in ${conflict.tableName} v${conflict.version}: ${conflict.reason}`);
    }
    console.log(`✅ Schema updated: ${report.added.length} added, ${report.updated.length} updated`);
  }));

program
  .command('dependencies')
  .description('Manage the vanilla dependency cache')
  .command('generate')
  .description('Build the dependency cache from the game install')
  .option('--game-path <dir>', 'Install folder of the game')
  .option('--assembly-kit <file>', 'Assembly-kit JSON dump with tables the game packs lack')
  .action(run('Cache generation', async (options: { gamePath?: string; assemblyKit?: string }) => {
    const session = await openSession({ gamePath: options.gamePath ? resolve(options.gamePath) : undefined });
    const generated = unwrap(await session.send({
      kind: 'GenerateDependencyCache',
      assemblyKitPath: options.assemblyKit ? resolve(options.assemblyKit) : undefined,
    }));
    for (const failure of generated.failed) {
      console.log(`Not decoded: ${failure.path}: ${failure.error.message}`);
    }
    console.log(`✅ Dependency cache written to ${generated.path}`);
  }));

await program.parseAsync();
