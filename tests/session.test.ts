import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveConfig, type ConfigInput, type WorkbenchConfig } from '../src/config.js';
import { PackIoError } from '../src/errors.js';
import { DB } from '../src/files/db.js';
import { gameByKey } from '../src/games.js';
import { Pack } from '../src/pack.js';
import { RFile } from '../src/rfile.js';
import { PackSession } from '../src/session.js';
import { UNITS_TABLE, makeSchema, unitsTable, unitsV1 } from './helpers.js';

describe('PackSession', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'session-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function config(input: ConfigInput = {}): WorkbenchConfig {
    return resolveConfig({ cacheDir: join(dir, 'cache'), ...input });
  }

  async function withSchema(input: ConfigInput = {}): Promise<PackSession> {
    await makeSchema().save(join(dir, 'schema.json'));
    return PackSession.create(config({ schemaPath: join(dir, 'schema.json'), ...input }));
  }

  describe('create', () => {
    it('should start without a schema when the default file is missing', async () => {
      const session = await PackSession.create(config());

      expect(session.schema).toBeNull();
      expect(session.game.key).toBe('warhammer_3');
      expect(session.pack.size).toBe(0);
    });

    it('should fail when a configured schema file is missing', async () => {
      await expect(PackSession.create(config({ schemaPath: join(dir, 'missing.json') }))).rejects.toBeInstanceOf(PackIoError);
    });

    it('should load a configured schema', async () => {
      const session = await withSchema();

      expect(session.schema?.knownVersions(UNITS_TABLE)).toEqual([2, 1]);
    });
  });

  describe('send', () => {
    it('should run commands in the order they were sent', async () => {
      const session = await PackSession.create(config());

      const [added, listed] = await Promise.all([
        session.send({ kind: 'AddFile', path: 'text/readme.txt', bytes: Buffer.from('hello') }),
        session.send({ kind: 'ListFiles' }),
      ]);

      expect(added.ok && added.value.fileType).toBe('Text');
      expect(listed.ok ? listed.value.map((file) => file.path) : null).toEqual(['text/readme.txt']);
    });

    it('should answer failures with an error payload', async () => {
      const session = await PackSession.create(config());

      const decoded = await session.send({ kind: 'DecodeFile', path: 'missing.txt' });
      const saved = await session.send({ kind: 'SavePack' });
      const replaced = await session.send({ kind: 'ReplaceAll' });

      expect(decoded).toEqual({ ok: false, error: { kind: 'conflict', message: 'missing.txt does not exist in unknown.pack' } });
      expect(saved.ok ? null : saved.error.kind).toBe('io');
      expect(replaced).toEqual({ ok: false, error: { kind: 'conflict', message: 'No search has been run' } });
    });

    it('should refuse compression for games that do not read it', async () => {
      const session = await PackSession.create(config({ game: 'three_kingdoms' }));

      const response = await session.send({ kind: 'SetCompressed', enabled: true });

      expect(response).toEqual({ ok: false, error: { kind: 'conflict', message: 'Three Kingdoms does not support compressed packs' } });
    });

    it('should refuse schema commands without a schema', async () => {
      const session = await PackSession.create(config());

      const response = await session.send({ kind: 'MissingDefinitions' });

      expect(response.ok ? null : response.error.kind).toBe('schema');
    });
  });

  describe('pack commands', () => {
    it('should save a pack and open it again', async () => {
      const session = await PackSession.create(config());
      const path = join(dir, 'mod.pack');
      await session.send({ kind: 'AddFile', path: 'text/readme.txt', bytes: Buffer.from('hello') });
      await session.send({ kind: 'SetDependencies', dependencies: ['parent.pack'] });

      const saved = await session.send({ kind: 'SavePackAs', path });
      await session.send({ kind: 'NewPack' });
      const opened = await session.send({ kind: 'OpenPacks', paths: [path], lazy: false });

      expect(saved).toEqual({ ok: true, value: path });
      expect(opened.ok ? [opened.value.info.name, opened.value.info.fileCount, opened.value.info.dependencies] : null)
        .toEqual(['mod.pack', 1, ['parent.pack']]);
      expect(opened.ok ? opened.value.decodeFailures : null).toEqual([]);
      expect(session.pack.diskPath).toBe(path);
    });

    it('should search and replace through the queue', async () => {
      const session = await PackSession.create(config());
      await session.send({ kind: 'AddFile', path: 'text/readme.txt', bytes: Buffer.from('old text, old name') });

      const found = await session.send({ kind: 'Search', options: { pattern: 'old', replaceText: 'new' } });
      const replaced = await session.send({ kind: 'ReplaceAll' });
      const encoded = await session.send({ kind: 'EncodeFile', path: 'text/readme.txt' });

      expect(found.ok ? found.value.length : null).toBe(1);
      expect(replaced).toEqual({ ok: true, value: ['text/readme.txt'] });
      expect(encoded.ok ? encoded.value.toString('utf8') : null).toBe('new text, new name');
    });

    it('should export a table to TSV and import it back', async () => {
      const session = await withSchema();
      const table = unitsTable([['unit_a', 5, null, 1.5]]);
      await session.send({ kind: 'AddFile', path: 'db/units_tables/mod', bytes: table.encode() });
      const outputPath = join(dir, 'units.tsv');

      const exported = await session.send({ kind: 'ExportTsv', path: 'db/units_tables/mod', outputPath });
      const imported = await session.send({ kind: 'ImportTsv', inputPath: outputPath, destination: 'db/units_tables/copy' });
      const decoded = await session.send({ kind: 'DecodeFile', path: 'db/units_tables/copy' });

      expect(exported).toEqual({ ok: true, value: outputPath });
      expect((await readFile(outputPath, 'utf8')).split('\n')[1]).toBe('#units_tables;2;db/units_tables/mod');
      expect(imported.ok ? imported.value.fileType : null).toBe('DB');
      expect(decoded.ok && decoded.value.type === 'DB' ? decoded.value.rows : null).toEqual([['unit_a', 5, null, 1.5]]);
    });

    it('should keep notes and settings on the pack', async () => {
      const session = await PackSession.create(config());

      const note = await session.send({ kind: 'AddNote', message: 'check balance', path: 'db/units_tables' });
      await session.send({ kind: 'SetSettings', settings: { text: {}, strings: {}, bools: { disable_autosaves: true }, numbers: {} } });
      const notes = await session.send({ kind: 'GetNotes', path: 'db/units_tables' });
      const settings = await session.send({ kind: 'GetSettings' });

      expect(note.ok ? note.value.message : null).toBe('check balance');
      expect(notes.ok ? notes.value.map((entry) => entry.message) : null).toEqual(['check balance']);
      expect(settings.ok ? settings.value.bools : null).toEqual({ disable_autosaves: true });
    });
  });

  describe('schema commands', () => {
    it('should keep the loaded schema when it cannot be saved', async () => {
      const session = await withSchema();
      const schemaPath = join(dir, 'schema.json');
      const dumpPath = join(dir, 'dump.json');
      await writeFile(dumpPath, JSON.stringify({
        tables: [{ name: 'regions_tables', version: 1, fields: [{ name: 'key', fieldType: 'StringU8', primaryKey: true }], rows: [] }],
      }));
      await rm(schemaPath);
      await mkdir(schemaPath);

      const patched = await session.send({ kind: 'ImportSchemaPatch', tableName: UNITS_TABLE, patches: { cost: { defaultValue: '5' } } });
      const updated = await session.send({ kind: 'UpdateSchemaFromAssemblyKit', dumpPath });

      expect(patched.ok ? null : patched.error.kind).toBe('io');
      expect(updated.ok ? null : updated.error.kind).toBe('io');
      expect(session.schema?.patchesFor(UNITS_TABLE)).toEqual({});
      expect(session.schema?.tableNames()).toEqual(['unit_categories_tables', UNITS_TABLE]);
    });

    it('should apply a patch once it is saved', async () => {
      const session = await withSchema();

      const patched = await session.send({ kind: 'ImportSchemaPatch', tableName: UNITS_TABLE, patches: { cost: { defaultValue: '5' } } });

      expect(patched).toEqual({ ok: true, value: ['cost'] });
      expect(session.schema?.patchesFor(UNITS_TABLE)).toEqual({ cost: { defaultValue: '5' } });
      expect(JSON.parse(await readFile(join(dir, 'schema.json'), 'utf8')).patches).toEqual({ [UNITS_TABLE]: { cost: { defaultValue: '5' } } });
    });
  });

  describe('dependencies', () => {
    it('should generate the cache, rebuild and update an old table', async () => {
      const wh3 = gameByKey('warhammer_3');
      const gamePath = join(dir, 'game');
      const vanilla = Pack.create({ game: wh3, fileType: 'Release' });
      vanilla.insert(RFile.fromDecoded('db/units_tables/data__', unitsTable([['unit_a', 100, null, 1.5]])));
      await vanilla.save({ destination: join(gamePath, 'data', 'data.pack'), game: wh3, allowEditingOfCaPacks: true, now: 1000 });
      const session = await withSchema({ gamePath });
      await session.send({ kind: 'AddFile', path: 'db/units_tables/mod', bytes: new DB(UNITS_TABLE, unitsV1, [['unit_z', 7]], 'test-guid').encode() });

      const generated = await session.send({ kind: 'GenerateDependencyCache' });
      const rebuilt = await session.send({ kind: 'RebuildDependencies' });
      const updated = await session.send({ kind: 'UpdateTable', path: 'db/units_tables/mod' });
      const lookup = await session.send({ kind: 'Lookup', tableName: UNITS_TABLE, column: 'key', value: 'unit_a' });

      expect(generated).toEqual({ ok: true, value: { path: join(dir, 'cache', 'wh3.pdep'), failed: [] } });
      expect(rebuilt.ok && rebuilt.value.success).toBe(true);
      expect(updated).toEqual({ ok: true, value: { oldVersion: 1, newVersion: 2 } });
      expect(lookup.ok ? lookup.value?.layer : null).toBe('GameFiles');
      const migrated = session.pack.get('db/units_tables/mod')?.decoded;
      expect(migrated?.type === 'DB' ? migrated.rows : null).toEqual([['unit_z', 7, null, 1.5]]);
    });

    it('should report a missing install folder', async () => {
      const session = await withSchema();

      const response = await session.send({ kind: 'GenerateDependencyCache' });

      expect(response).toEqual({ ok: false, error: { kind: 'dependency', message: 'The install folder of Warhammer III is not configured' } });
    });
  });
});
