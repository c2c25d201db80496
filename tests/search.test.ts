import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Dependencies } from '../src/dependencies.js';
import { ConfigError, ReplaceError } from '../src/errors.js';
import { AnimFragment } from '../src/files/anim-fragment.js';
import { gameByKey } from '../src/games.js';
import { Pack } from '../src/pack.js';
import { RFile } from '../src/rfile.js';
import { GlobalSearch, type SearchTarget } from '../src/search/global-search.js';
import { createMatchingMode, findInLine, findInText, replaceAt, replaceAllInText, replaceInLine } from '../src/search/matching-mode.js';
import { matchCount } from '../src/search/matches.js';
import { makeSchema, unitsTable } from './helpers.js';

const wh3 = gameByKey('warhammer_3');

function textFile(path: string, text: string): RFile {
  return RFile.fromBytes(path, Buffer.from(text, 'utf8'));
}

async function textOf(file: RFile | undefined): Promise<string | null> {
  const decoded = await file?.decode();
  return decoded?.type === 'Text' ? decoded.contents : null;
}

describe('matching', () => {
  it('should find every case-insensitive occurrence', () => {
    const mode = createMatchingMode('foo', { caseSensitive: false, useRegex: false });

    expect(findInLine(mode, 'FooBar foo')).toEqual([{ column: 0, length: 3 }, { column: 7, length: 3 }]);
  });

  it('should respect case when asked to', () => {
    const mode = createMatchingMode('foo', { caseSensitive: true, useRegex: false });

    expect(findInLine(mode, 'FooBar foo')).toEqual([{ column: 7, length: 3 }]);
  });

  it('should not overlap matches', () => {
    const mode = createMatchingMode('aa', { caseSensitive: true, useRegex: false });

    expect(findInLine(mode, 'aaaa a')).toEqual([{ column: 0, length: 2 }, { column: 2, length: 2 }]);
  });

  it('should skip empty regex matches', () => {
    const mode = createMatchingMode('a*', { caseSensitive: true, useRegex: true });

    expect(findInLine(mode, 'bab')).toEqual([{ column: 1, length: 1 }]);
  });

  it('should raise ConfigError for an invalid regex', () => {
    expect(() => createMatchingMode('(unclosed', { caseSensitive: false, useRegex: true })).toThrow(ConfigError);
  });

  it('should report rows and columns per line', () => {
    const mode = createMatchingMode('o\\w', { caseSensitive: false, useRegex: true });

    expect(findInText(mode, 'one\ntwo\nfour')).toEqual([
      { row: 0, column: 0, length: 2 },
      { row: 2, column: 1, length: 2 },
    ]);
  });

  it('should replace from the highest column down', () => {
    const matches = [{ column: 0, length: 3 }, { column: 7, length: 3 }];

    expect(replaceInLine('fooBar foo', matches, 'X')).toBe('XBar X');
    // Applied left to right, the second offset no longer points at a match.
    expect(replaceAt(replaceAt('fooBar foo', 0, 3, 'X'), 7, 3, 'X')).toBe('XBar foX');
  });

  it('should replace every line of a text', () => {
    const mode = createMatchingMode('foo', { caseSensitive: false, useRegex: false });

    expect(replaceAllInText(mode, 'Foo\nbar\nfoo foo', 'baz')).toBe('baz\nbar\nbaz baz');
  });
});

describe('GlobalSearch', () => {
  let pack: Pack;
  let target: SearchTarget;

  beforeEach(() => {
    pack = Pack.create({ game: wh3 });
    pack.insert(textFile('a/notes.txt', 'Foo one\nsecond foo, cost 1'));
    pack.insert(RFile.fromDecoded('db/units_tables/mod', unitsTable([['unit_foo', 1, null, 1.5], ['unit_b', 2, 'foot', 1.5]])));
    pack.insert(textFile('script/main.lua', 'return nil'));
    target = { pack, dependencies: new Dependencies(), schema: makeSchema(), game: wh3 };
  });

  it('should group matches per file and kind', async () => {
    const search = new GlobalSearch({ pattern: 'foo' });

    const results = await search.search(target);

    expect(results).toEqual([
      {
        source: 'PackFile',
        origin: pack.name,
        path: 'a/notes.txt',
        kind: 'Text',
        matches: [
          { row: 0, column: 0, length: 3, text: 'Foo one' },
          { row: 1, column: 7, length: 3, text: 'second foo, cost 1' },
        ],
      },
      {
        source: 'PackFile',
        origin: pack.name,
        path: 'db/units_tables/mod',
        kind: 'Table',
        matches: [
          { columnName: 'key', columnIndex: 0, row: 0, contents: 'unit_foo' },
          { columnName: 'category', columnIndex: 2, row: 1, contents: 'foot' },
        ],
      },
    ]);
    expect(matchCount(results)).toBe(4);
    expect(search.matches).toBe(results);
  });

  it('should only search the enabled formats', async () => {
    const search = new GlobalSearch({ pattern: 'foo', searchOn: { Text: false } });

    const results = await search.search(target);

    expect(results.map((file) => file.path)).toEqual(['db/units_tables/mod']);
  });

  it('should search the text fields of structured files', async () => {
    pack.insert(RFile.fromDecoded('animations/hu1.frg', new AnimFragment('humanoid01', 'humanoid01', 0, 1, [{
      animationId: 1,
      slotId: 1,
      filename: 'animations/foo_idle.anim',
      metadata: '',
      metadataSound: '',
      skeletonType: 'humanoid01',
      blendInTime: 0,
      selectionWeight: 1,
      singleFrameVariant: false,
    }])));
    const search = new GlobalSearch({ pattern: 'foo_idle' });

    const results = await search.search(target);

    expect(results).toEqual([{
      source: 'PackFile',
      origin: pack.name,
      path: 'animations/hu1.frg',
      kind: 'Structured',
      matches: [{ entry: 0, field: 'filename', contents: 'animations/foo_idle.anim' }],
    }]);
  });

  it('should replace every match and search again', async () => {
    const search = new GlobalSearch({ pattern: 'foo', replaceText: 'bar' });

    const edited = await search.replaceAll(target);

    expect(edited).toEqual(['a/notes.txt', 'db/units_tables/mod']);
    expect(await textOf(pack.get('a/notes.txt'))).toBe('bar one\nsecond bar, cost 1');
    const table = pack.get('db/units_tables/mod')?.decoded;
    expect(table?.type === 'DB' ? table.rows : null).toEqual([['unit_bar', 1, null, 1.5], ['unit_b', 2, 'bart', 1.5]]);
    expect(search.matches).toEqual([]);
  });

  it('should leave every file untouched when one replacement is invalid', async () => {
    const search = new GlobalSearch({ pattern: '1', replaceText: 'x' });
    await search.search(target);

    await expect(search.replaceMatches(target, search.matches)).rejects.toBeInstanceOf(ReplaceError);
    expect(await textOf(pack.get('a/notes.txt'))).toBe('Foo one\nsecond foo, cost 1');
    const table = pack.get('db/units_tables/mod')?.decoded;
    expect(table?.type === 'DB' ? table.rows[0] : null).toEqual(['unit_foo', 1, null, 1.5]);
  });

  it('should refuse to edit read-only layers', async () => {
    const search = new GlobalSearch({ pattern: 'foo', replaceText: 'bar' });

    await expect(search.replaceMatches(target, [
      { source: 'GameFiles', origin: 'vanilla', path: 'db/units_tables/data__', kind: 'Table', matches: [] },
    ])).rejects.toThrow('db/units_tables/data__ belongs to GameFiles, which is read-only');
    await expect(search.replaceMatches(target, [
      { source: 'ParentFiles', origin: 'parent.pack', path: 'text/a.txt', kind: 'Text', matches: [] },
    ])).rejects.toThrow('parent edits are disabled');
  });

  describe('with a parent pack', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'search-test-'));
      const parent = Pack.create({ game: wh3 });
      parent.insert(textFile('text/parent.txt', 'foo from the parent'));
      await parent.save({ destination: join(dir, 'parent.pack'), game: wh3, now: 1000 });
      await target.dependencies.rebuild({ schema: makeSchema(), game: wh3, parentPackNames: ['parent.pack'], searchPaths: [dir] });
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    async function parentText(): Promise<string | null> {
      return target.dependencies.read((layers) => textOf(layers.parents[0]?.get('text/parent.txt')));
    }

    it('should search parents when asked to', async () => {
      const search = new GlobalSearch({ pattern: 'from the', sources: ['PackFile', 'ParentFiles'] });

      const results = await search.search(target);

      expect(results.map((file) => [file.source, file.origin, file.path])).toEqual([['ParentFiles', 'parent.pack', 'text/parent.txt']]);
    });

    it('should skip parent matches in replaceAll unless parent edits are allowed', async () => {
      const search = new GlobalSearch({ pattern: 'foo', replaceText: 'bar', sources: ['PackFile', 'ParentFiles'] });

      await search.replaceAll(target);

      expect(await parentText()).toBe('foo from the parent');
      expect(search.matches.map((file) => file.path)).toEqual(['text/parent.txt']);

      search.allowParentEdits = true;
      expect(await search.replaceAll(target)).toEqual(['text/parent.txt']);
      expect(await parentText()).toBe('bar from the parent');
    });
  });
});
