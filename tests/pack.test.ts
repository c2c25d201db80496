import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PackFlags } from '../src/constants/pack-constants.js';
import { ConflictError, PackFormatError } from '../src/errors.js';
import { gameByKey } from '../src/games.js';
import { Pack } from '../src/pack.js';
import { PackBinary } from '../src/pack-binary.js';
import { RFile } from '../src/rfile.js';

const wh3 = gameByKey('warhammer_3');

function textFile(path: string, text: string): RFile {
  return RFile.fromBytes(path, Buffer.from(text, 'utf8'));
}

async function savePack(pack: Pack, destination: string): Promise<string> {
  return pack.save({ destination, game: wh3, now: 1000 });
}

describe('Pack', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pack-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('save and read', () => {
    it('should round-trip files, dependencies and header', async () => {
      const pack = Pack.create({ game: wh3, now: 1 });
      pack.insert(textFile('text/readme.txt', 'hello'));
      pack.insert(textFile('script/campaign.lua', 'return 1'));
      pack.setDependencies(['parent.pack', ' ', 'parent.pack']);
      const path = await savePack(pack, join(dir, 'mod.pack'));

      const read = await Pack.read({ filePath: path });

      expect(read.header.pfhVersion).toBe('PFH5');
      expect(read.header.fileType).toBe('Mod');
      expect(read.header.timestamp).toBe(1000);
      expect(read.dependencies).toEqual(['parent.pack']);
      expect(read.paths()).toEqual(['script/campaign.lua', 'text/readme.txt']);
      expect((await read.get('text/readme.txt')?.load())?.toString('utf8')).toBe('hello');
      expect(read.name).toBe('mod.pack');
    });

    it('should keep compression and index timestamps', async () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/long.txt', 'abc'.repeat(200)));
      pack.setCompressed(true);
      pack.setIndexHasTimestamps(true);
      const path = await savePack(pack, join(dir, 'compressed.pack'));

      const read = await Pack.read({ filePath: path });
      const file = read.get('text/long.txt');

      expect(read.info().compressed).toBe(true);
      expect(read.info().indexHasTimestamps).toBe(true);
      expect(file?.timestamp).toBe(1000);
      expect(file?.info().size).toBe(600);
      expect((await file?.load())?.toString('utf8')).toBe('abc'.repeat(200));
    });

    it('should read encrypted indexes and payloads', async () => {
      const header = Pack.create({ game: wh3 }).header;
      const pack = new Pack({ ...header, bitmask: PackFlags.DATA_IS_ENCRYPTED | PackFlags.INDEX_IS_ENCRYPTED });
      pack.insert(textFile('text/secret.txt', 'test-secret'));
      const path = await savePack(pack, join(dir, 'encrypted.pack'));

      const raw = await readFile(path);
      expect(raw.includes(Buffer.from('test-secret'))).toBe(false);

      const read = await Pack.read({ filePath: path });
      expect(read.info().encrypted).toBe(true);
      expect((await read.get('text/secret.txt')?.load())?.toString('utf8')).toBe('test-secret');
    });

    it('should write the header version the game uses', async () => {
      const troy = gameByKey('troy');
      const pack = Pack.create({ game: troy });
      pack.insert(textFile('text/a.txt', 'a'));
      const path = await pack.save({ destination: join(dir, 'troy.pack'), game: troy, now: 5 });

      const raw = await readFile(path);
      const read = await Pack.read({ filePath: path });

      expect(raw.toString('latin1', 0, 4)).toBe('PFH6');
      expect(read.header.pfhVersion).toBe('PFH6');
      expect((await read.get('text/a.txt')?.load())?.toString('utf8')).toBe('a');
    });

    it('should leave payloads on disk when read lazily', async () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/lazy.txt', 'later'));
      const path = await savePack(pack, join(dir, 'lazy.pack'));

      const read = await Pack.read({ filePath: path, lazy: true });
      const file = read.get('text/lazy.txt');

      expect(file?.isLoaded).toBe(false);
      expect(file?.info().size).toBe(5);
      expect((await file?.load())?.toString('utf8')).toBe('later');
      expect(file?.isLoaded).toBe(true);
    });
  });

  describe('invalid input', () => {
    it('should reject an unknown magic', async () => {
      const path = join(dir, 'bad.pack');
      await writeFile(path, Buffer.alloc(40, 0x41));

      await expect(Pack.read({ filePath: path })).rejects.toThrow('Unknown pack magic "AAAA"');
    });

    it('should reject a truncated header', async () => {
      const path = join(dir, 'short.pack');
      await writeFile(path, Buffer.concat([Buffer.from('PFH5', 'latin1'), Buffer.alloc(26)]));

      await expect(Pack.read({ filePath: path })).rejects.toThrow(PackFormatError);
      await expect(Pack.read({ filePath: path })).rejects.toThrow('Truncated PFH5 header');
    });

    it('should reject an index pointing past the end of the file', async () => {
      const header = Pack.create({ game: wh3 }).header;
      const buffer = PackBinary.serialize({ header, dependencies: [], entries: [{ path: 'text/a.txt', size: 4, timestamp: null, stored: Buffer.from('abcd') }] });
      const path = join(dir, 'cut.pack');
      await writeFile(path, buffer.subarray(0, buffer.length - 2));

      await expect(Pack.read({ filePath: path })).rejects.toThrow('extends beyond file bounds');
    });

    it('should keep an entry that fails to decompress as stored bytes', async () => {
      const header = { ...Pack.create({ game: wh3 }).header, bitmask: PackFlags.DATA_IS_COMPRESSED };
      const stored = Buffer.from('not deflate data');
      const path = join(dir, 'opaque.pack');
      await writeFile(path, PackBinary.serialize({ header, dependencies: [], entries: [{ path: 'text/broken.txt', size: 20, timestamp: null, stored }] }));

      const read = await Pack.read({ filePath: path });
      const file = read.get('text/broken.txt');

      expect(read.loadWarnings).toHaveLength(1);
      expect(file?.info().isOpaque).toBe(true);
      expect(file?.info().size).toBe(20);
      await expect(file?.decode()).rejects.toThrow('could not be unpacked');

      const resaved = await savePack(read, join(dir, 'opaque-copy.pack'));
      const again = await Pack.read({ filePath: resaved });
      expect(again.get('text/broken.txt')?.info().isOpaque).toBe(true);
      expect(await again.get('text/broken.txt')?.load()).toEqual(stored);
    });

    it('should refuse to save stored bytes under a framing they were not written with', async () => {
      const header = { ...Pack.create({ game: wh3 }).header, bitmask: PackFlags.DATA_IS_COMPRESSED };
      const path = join(dir, 'opaque.pack');
      await writeFile(path, PackBinary.serialize({ header, dependencies: [], entries: [{ path: 'text/a_broken.txt', size: 200, timestamp: null, stored: Buffer.from('not deflate data') }] }));
      const read = await Pack.read({ filePath: path });
      read.insert(textFile('text/z.txt', 'fine'));
      read.setCompressed(false);
      const destination = join(dir, 'uncompressed.pack');

      const saving = savePack(read, destination);

      await expect(saving).rejects.toBeInstanceOf(ConflictError);
      await expect(saving).rejects.toThrow('text/a_broken.txt could not be unpacked and cannot be saved uncompressed; it was stored compressed');
      await expect(readFile(destination)).rejects.toThrow();
      read.setCompressed(true);
      const again = await Pack.read({ filePath: await savePack(read, destination) });
      expect(again.paths()).toEqual(['text/a_broken.txt', 'text/z.txt']);
      expect((await again.get('text/z.txt')?.load())?.toString('utf8')).toBe('fine');
    });
  });

  describe('readAndMerge', () => {
    it('should let later packs win and skip invalid sources', async () => {
      const first = Pack.create({ game: wh3 });
      first.insert(textFile('text/a.txt', 'one'));
      first.insert(textFile('text/shared.txt', 'from first'));
      first.setDependencies(['base.pack']);
      const second = Pack.create({ game: wh3 });
      second.insert(textFile('text/shared.txt', 'from second'));
      second.setDependencies(['base.pack', 'extra.pack']);
      const invalid = join(dir, 'invalid.pack');
      await writeFile(invalid, Buffer.alloc(40));

      const { pack, skipped } = await Pack.readAndMerge({
        filePaths: [await savePack(first, join(dir, 'first.pack')), invalid, await savePack(second, join(dir, 'second.pack'))],
      });

      expect(skipped.map((entry) => entry.filePath)).toEqual([invalid]);
      expect(pack.paths()).toEqual(['text/a.txt', 'text/shared.txt']);
      expect((await pack.get('text/shared.txt')?.load())?.toString('utf8')).toBe('from second');
      expect(pack.dependencies).toEqual(['base.pack', 'extra.pack']);
      expect(pack.diskPath).toBeNull();
    });
  });

  describe('notes and settings', () => {
    it('should persist notes and settings in reserved entries', async () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/a.txt', 'a'));
      pack.addNote({ message: 'check balance', path: 'db/units_tables' });
      pack.addNote({ message: 'pack level' });
      pack.settings.bools.diagnostics_ignored = true;
      const path = await savePack(pack, join(dir, 'notes.pack'));

      const read = await Pack.read({ filePath: path });

      expect(read.paths()).toEqual(['text/a.txt']);
      expect(read.notesForPath('db/units_tables').map((note) => note.message)).toEqual(['check balance']);
      expect(read.notesForPath('').map((note) => note.id)).toEqual([0, 1]);
      expect(read.settings.bools).toEqual({ diagnostics_ignored: true });
    });

    it('should delete a note by path and id', () => {
      const pack = Pack.create({ game: wh3 });
      const note = pack.addNote({ message: 'temporary', path: 'text/a.txt' });

      expect(pack.deleteNote('text/a.txt', note.id + 1)).toBe(false);
      expect(pack.deleteNote('text/a.txt', note.id)).toBe(true);
      expect(pack.notes).toEqual([]);
    });
  });

  describe('editing', () => {
    it('should move a folder with everything under it', () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/old/a.txt', 'a'));
      pack.insert(textFile('text/old/sub/b.txt', 'b'));

      const moved = pack.move('text/old', 'text/new');

      expect(moved).toEqual([
        { from: 'text/old/a.txt', to: 'text/new/a.txt' },
        { from: 'text/old/sub/b.txt', to: 'text/new/sub/b.txt' },
      ]);
      expect(pack.paths()).toEqual(['text/new/a.txt', 'text/new/sub/b.txt']);
    });

    it('should refuse a move onto an existing file and change nothing', () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/a.txt', 'a'));
      pack.insert(textFile('text/b.txt', 'b'));

      expect(() => pack.move('text/a.txt', 'TEXT/B.txt')).toThrow(ConflictError);
      expect(pack.paths()).toEqual(['text/a.txt', 'text/b.txt']);
    });

    it('should refuse to insert over an existing path without replace', () => {
      const pack = Pack.create({ game: wh3 });
      pack.insert(textFile('text/a.txt', 'a'));

      expect(() => pack.insert(textFile('Text/A.txt', 'b'), { replace: false })).toThrow(ConflictError);
    });

    it('should add a folder from disk and extract it again', async () => {
      const source = join(dir, 'source');
      await writeFile(join(dir, 'single.txt'), 'single');
      const pack = Pack.create({ game: wh3 });
      await mkdir(join(source, 'nested'), { recursive: true });
      await writeFile(join(source, 'nested', 'b.txt'), 'b');

      const added = await pack.addFromDisk({ source, destination: 'text' });
      const single = await pack.addFromDisk({ source: join(dir, 'single.txt') });
      const written = await pack.extract({ paths: ['text'], outputDir: join(dir, 'out') });

      expect(added).toEqual(['text/nested/b.txt']);
      expect(single).toEqual(['single.txt']);
      expect(written).toEqual([join(dir, 'out', 'text', 'nested', 'b.txt')]);
      expect(await readFile(join(dir, 'out', 'text', 'nested', 'b.txt'), 'utf8')).toBe('b');
    });
  });

  describe('saving rules', () => {
    it('should refuse to save a game pack unless allowed', async () => {
      const pack = Pack.create({ game: wh3, fileType: 'Release' });

      await expect(pack.save({ destination: join(dir, 'release.pack'), game: wh3 })).rejects.toThrow(ConflictError);
      await expect(pack.save({ destination: join(dir, 'release.pack'), game: wh3, allowEditingOfCaPacks: true })).resolves.toBe(join(dir, 'release.pack'));
    });

    it('should refuse compression for a game that cannot read it', async () => {
      const game = gameByKey('three_kingdoms');
      const pack = Pack.create({ game });
      pack.setCompressed(true);

      await expect(pack.save({ destination: join(dir, '3k.pack'), game })).rejects.toThrow('does not support compressed packs');
    });

    it('should refuse to save a pack that has no path yet', async () => {
      const pack = Pack.create({ game: wh3 });

      await expect(pack.save({ game: wh3 })).rejects.toThrow('a destination is required');
    });
  });
});
