/**
 * Merges several DB tables of the same table, or several Loc files, into one.
 */
import { ConflictError } from './errors.js';
import { DB } from './files/db.js';
import { Loc } from './files/loc.js';
import { RFile } from './rfile.js';
import { convertRows, rowKey, type Row } from './table.js';
import type { DecodeContext } from './types/rfile.js';
import { debug } from './utils/logger.js';

/**
 * Builds a new entry at `path` holding the rows of every source, in order,
 * without duplicate rows. Tables of older versions are converted to the
 * newest version among the sources.
 *
 * @throws {ConflictError} If the sources mix types or DB tables
 */
export async function mergeTables(files: readonly RFile[], path: string, context: DecodeContext = {}): Promise<RFile> {
  if (files.length < 2) {
    throw new ConflictError(`Merging needs at least two tables, got ${files.length}`);
  }
  const decoded = await Promise.all(files.map((file) => file.decode(context)));
  const tables: Array<DB | Loc> = [];
  for (const [index, table] of decoded.entries()) {
    if (table.type !== 'DB' && table.type !== 'Loc') {
      throw new ConflictError(`${files[index]?.path ?? 'entry'} is ${table.type}, only DB and Loc tables can be merged`);
    }
    tables.push(table);
  }

  const [first] = tables;
  if (!first) {
    throw new ConflictError('Nothing to merge');
  }
  for (const table of tables) {
    if (table.type !== first.type || (table.type === 'DB' && first.type === 'DB' && table.tableName !== first.tableName)) {
      throw new ConflictError(`Cannot merge ${describeTable(first)} with ${describeTable(table)}`);
    }
  }

  const newest = tables.reduce((latest, table) => (table.definition.version > latest.definition.version ? table : latest), first);
  const definition = newest.definition;
  const tableName = newest.type === 'DB' ? newest.tableName : undefined;
  const seen = new Set<string>();
  const rows: Row[] = [];
  for (const table of tables) {
    const converted = table.definition === definition ? table.rows : convertRows(table.rows, table.definition, definition, context.schema, tableName);
    for (const row of converted) {
      const key = rowKey(row);
      if (!seen.has(key)) {
        seen.add(key);
        rows.push([...row]);
      }
    }
  }
  debug(`Merged ${tables.length} tables into ${path}: ${rows.length} rows`);

  const merged = newest.type === 'DB'
    ? new DB(newest.tableName, definition, rows, newest.guid, newest.hasVersionMarker, newest.marker)
    : new Loc(definition, rows);
  return RFile.fromDecoded(path, merged);
}

function describeTable(table: DB | Loc): string {
  return table.type === 'DB' ? `table ${table.tableName}` : 'a loc file';
}
