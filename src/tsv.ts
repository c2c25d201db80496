/**
 * TSV export and import of DB and Loc tables.
 *
 * Layout: a line with the column names, a `#table;version;path` line, then
 * one line per row. Tabs, line breaks and backslashes inside values are
 * escaped.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { DecodeError, SchemaError, toIoError } from './errors.js';
import { DB } from './files/db.js';
import { LOC_DEFINITION_V1, LOC_TABLE_NAME, Loc } from './files/loc.js';
import type { GameInfo } from './games.js';
import type { Schema } from './schema.js';
import { cellToText, defaultRow, parseCellText, type Row } from './table.js';
import type { Definition } from './types/schema.js';

export interface ImportedTable {
  readonly tableName: string;
  readonly version: number;
  /** Path the table was exported from. */
  readonly path: string;
  readonly table: DB | Loc;
}

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['\\', '\\\\'],
  ['\t', '\\t'],
  ['\n', '\\n'],
  ['\r', '\\r'],
]);
const UNESCAPES: ReadonlyMap<string, string> = new Map([...ESCAPES].map(([raw, escaped]) => [escaped.slice(1), raw]));

export function escapeTsvValue(value: string): string {
  return value.replace(/[\\\t\n\r]/g, (character) => ESCAPES.get(character) ?? character);
}

export function unescapeTsvValue(value: string): string {
  return value.replace(/\\(.)/g, (sequence, character: string) => UNESCAPES.get(character) ?? sequence);
}

export function tableToTsv(table: DB | Loc, path: string): string {
  const tableName = table.type === 'DB' ? table.tableName : LOC_TABLE_NAME;
  const lines = [
    table.definition.fields.map((field) => field.name).join('\t'),
    `#${tableName};${table.definition.version};${path}`,
    ...table.rows.map((row) => row.map((cell) => escapeTsvValue(cellToText(cell))).join('\t')),
  ];
  return `${lines.join('\n')}\n`;
}

function definitionFor(schema: Schema | null, tableName: string, version: number): Definition {
  const definition = schema?.definitionFor(tableName, version)
    ?? (tableName === LOC_TABLE_NAME && version === LOC_DEFINITION_V1.version ? LOC_DEFINITION_V1 : undefined);
  if (!definition) {
    throw new SchemaError(tableName, version, schema?.knownVersions(tableName) ?? []);
  }
  return definition;
}

/**
 * Parses a TSV export. Columns are matched by name, so they may come in any
 * order; columns the definition lacks are ignored and missing ones take
 * their default.
 *
 * @throws {DecodeError} If the text is not a table export or a value does not parse
 * @throws {SchemaError} If the schema has no definition for the exported version
 */
export function tsvToTable(text: string, schema: Schema | null, game?: GameInfo): ImportedTable {
  const lines = text.split(/\r?\n/);
  if (lines.at(-1) === '') {
    lines.pop();
  }
  const [headerLine, metaLine, ...rowLines] = lines;
  if (headerLine === undefined || metaLine === undefined || !metaLine.startsWith('#')) {
    throw new DecodeError('Not a table export: expected a column line and a #table;version;path line');
  }
  const [tableName = '', versionText = '', ...pathParts] = metaLine.slice(1).split('\t')[0]?.split(';') ?? [];
  const version = Number(versionText);
  if (tableName === '' || !Number.isInteger(version)) {
    throw new DecodeError(`Invalid table line ${JSON.stringify(metaLine)}`);
  }
  const path = pathParts.join(';');
  const definition = definitionFor(schema, tableName, version);

  const columns = headerLine.split('\t');
  const positions = definition.fields.map((field) => columns.indexOf(field.name));
  const defaults = defaultRow(definition, schema ?? undefined, tableName);
  const rows: Row[] = rowLines.map((line, lineIndex) => {
    const cells = line.split('\t');
    return definition.fields.map((field, index) => {
      const position = positions[index] ?? -1;
      const raw = position >= 0 ? cells[position] : undefined;
      if (raw === undefined) {
        return defaults[index] ?? null;
      }
      try {
        return parseCellText(unescapeTsvValue(raw), field.fieldType);
      } catch (error) {
        throw new DecodeError(`Row ${lineIndex + 1}, column ${field.name}: invalid value ${JSON.stringify(raw)}`, path, error);
      }
    });
  });

  if (tableName === LOC_TABLE_NAME) {
    return { tableName, version, path, table: new Loc(definition, rows) };
  }
  const table = DB.create(tableName, definition, game);
  table.rows = rows;
  return { tableName, version, path, table };
}

export async function exportTsvFile(table: DB | Loc, path: string, outputPath: string): Promise<void> {
  try {
    await writeFile(outputPath, tableToTsv(table, path), 'utf8');
  } catch (error) {
    throw toIoError(error, outputPath);
  }
}

export async function importTsvFile(inputPath: string, schema: Schema | null, game?: GameInfo): Promise<ImportedTable> {
  let text: string;
  try {
    text = await readFile(inputPath, 'utf8');
  } catch (error) {
    throw toIoError(error, inputPath);
  }
  return tsvToTable(text, schema, game);
}
