import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConflictError, DecodeError, SchemaError } from '../src/errors.js';
import { DB } from '../src/files/db.js';
import { Loc } from '../src/files/loc.js';
import { RFile } from '../src/rfile.js';
import { mergeTables } from '../src/table-merge.js';
import { escapeTsvValue, exportTsvFile, importTsvFile, tableToTsv, tsvToTable, unescapeTsvValue } from '../src/tsv.js';
import { UNITS_TABLE, categoriesV1, makeSchema, unitsTable, unitsV1 } from './helpers.js';

describe('TSV', () => {
  it('should write a column line, a table line and one line per row', () => {
    const tsv = tableToTsv(unitsTable([['unit_a', 250, null, 1.5]]), 'db/units_tables/mod');

    expect(tsv).toBe('key\tcost\tcategory\tspeed\n#units_tables;2;db/units_tables/mod\nunit_a\t250\t\t1.5\n');
  });

  it('should escape separators inside values', () => {
    expect(escapeTsvValue('a\tb\nc\\d')).toBe('a\\tb\\nc\\\\d');
    expect(unescapeTsvValue('a\\tb\\nc\\\\d')).toBe('a\tb\nc\\d');
    expect(unescapeTsvValue('keep \\x')).toBe('keep \\x');
  });

  it('should read back a loc export without a schema', () => {
    const loc = new Loc(Loc.create().definition, [['units_name_a', 'Line one\nLine\ttwo', true]]);

    const imported = tsvToTable(tableToTsv(loc, 'text/db/units.loc'), null);

    expect(imported.tableName).toBe('loc');
    expect(imported.path).toBe('text/db/units.loc');
    expect(imported.table.type).toBe('Loc');
    expect(imported.table.rows).toEqual([['units_name_a', 'Line one\nLine\ttwo', true]]);
  });

  it('should match columns by name and fill in missing ones', () => {
    const text = 'speed\tkey\tunused\n#units_tables;2;db/units_tables/mod\n2.5\tunit_z\tx\n';

    const imported = tsvToTable(text, makeSchema());

    expect(imported.version).toBe(2);
    expect(imported.table.rows).toEqual([['unit_z', 100, null, 2.5]]);
  });

  it('should report the row and column of a bad value', () => {
    const text = 'key\tcost\n#units_tables;1;db/units_tables/mod\nunit_a\t5\nunit_b\tabc\n';

    expect(() => tsvToTable(text, makeSchema())).toThrow('Row 2, column cost: invalid value "abc"');
  });

  it('should reject files that are not table exports', () => {
    expect(() => tsvToTable('key\tcost\nunit_a\t5\n', makeSchema())).toThrow(DecodeError);
    expect(() => tsvToTable('key\n#units_tables;x;db/units_tables/mod\n', makeSchema())).toThrow('Invalid table line');
    expect(() => tsvToTable('key\n#units_tables;9;db/units_tables/mod\n', makeSchema())).toThrow(SchemaError);
  });

  describe('files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'tsv-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should import what it exported', async () => {
      const table = unitsTable([['unit_a', 250, 'infantry', 0.5], ['unit_b', -1, null, 1.5]]);
      const outputPath = join(dir, 'units.tsv');

      await exportTsvFile(table, 'db/units_tables/mod', outputPath);
      const imported = await importTsvFile(outputPath, makeSchema());

      expect(imported.path).toBe('db/units_tables/mod');
      expect(imported.table.rows).toEqual(table.rows);
    });
  });
});

describe('mergeTables', () => {
  const schema = makeSchema();

  it('should convert older versions and drop duplicate rows', async () => {
    const older = RFile.fromDecoded('db/units_tables/a', new DB(UNITS_TABLE, unitsV1, [['unit_a', 5]], null));
    const newer = RFile.fromDecoded('db/units_tables/b', unitsTable([['unit_a', 5, null, 1.5], ['unit_b', 6, 'cavalry', 1.5]]));

    const merged = await mergeTables([older, newer], 'db/units_tables/merged', { schema });
    const table = merged.decoded;

    expect(merged.path).toBe('db/units_tables/merged');
    expect(table?.type === 'DB' ? [table.tableName, table.version, table.guid] : null).toEqual([UNITS_TABLE, 2, 'test-guid']);
    expect(table?.type === 'DB' ? table.rows : null).toEqual([['unit_a', 5, null, 1.5], ['unit_b', 6, 'cavalry', 1.5]]);
  });

  it('should merge loc files', async () => {
    const first = RFile.fromDecoded('text/a.loc', new Loc(Loc.create().definition, [['k1', 'One', false]]));
    const second = RFile.fromDecoded('text/b.loc', new Loc(Loc.create().definition, [['k2', 'Two', false], ['k1', 'One', false]]));

    const merged = await mergeTables([first, second], 'text/merged.loc');
    const table = merged.decoded;

    expect(table?.type === 'Loc' ? table.rows : null).toEqual([['k1', 'One', false], ['k2', 'Two', false]]);
  });

  it('should refuse to merge different tables', async () => {
    const units = RFile.fromDecoded('db/units_tables/a', unitsTable([]));
    const categories = RFile.fromDecoded('db/unit_categories_tables/a', new DB('unit_categories_tables', categoriesV1, [], null));

    await expect(mergeTables([units, categories], 'db/units_tables/merged', { schema }))
      .rejects.toThrow('Cannot merge table units_tables with table unit_categories_tables');
  });

  it('should refuse anything but tables', async () => {
    const units = RFile.fromDecoded('db/units_tables/a', unitsTable([]));
    const text = RFile.fromBytes('text/readme.txt', Buffer.from('hello'));

    await expect(mergeTables([units, text], 'db/units_tables/merged', { schema })).rejects.toThrow('text/readme.txt is Text, only DB and Loc tables can be merged');
    await expect(mergeTables([units], 'db/units_tables/merged', { schema })).rejects.toBeInstanceOf(ConflictError);
  });
});
