/**
 * Search and replace over table cells, DB and Loc alike.
 */
import { ReplaceError } from '../errors.js';
import { cellToText, parseCellText, type TableData } from '../table.js';
import { isSequence } from '../types/schema.js';
import { hasMatch, replaceAllInText, type MatchingMode } from './matching-mode.js';
import type { TableMatch } from './matches.js';

/** One match per cell whose text form contains the pattern. Nested tables are skipped. */
export function searchTable(table: TableData, mode: MatchingMode): TableMatch[] {
  const matches: TableMatch[] = [];
  table.rows.forEach((row, rowIndex) => {
    table.definition.fields.forEach((field, columnIndex) => {
      const cell = row[columnIndex];
      if (cell === undefined || isSequence(field.fieldType)) {
        return;
      }
      const contents = cellToText(cell);
      if (hasMatch(mode, contents)) {
        matches.push({ columnName: field.name, columnIndex, row: rowIndex, contents });
      }
    });
  });
  return matches;
}

/**
 * Replaces every occurrence of the pattern in the matched cells. Returns
 * whether any cell changed.
 *
 * @throws {ReplaceError} If a replaced value is not valid for its column
 */
export function replaceTable(table: TableData, matches: readonly TableMatch[], mode: MatchingMode, replacement: string, path: string): boolean {
  let edited = false;
  for (const match of matches) {
    const row = table.rows[match.row];
    const field = table.definition.fields[match.columnIndex];
    const cell = row?.[match.columnIndex];
    if (!row || !field || cell === undefined) {
      continue;
    }
    const before = cellToText(cell);
    const after = replaceAllInText(mode, before, replacement);
    if (after === before) {
      continue;
    }
    try {
      row[match.columnIndex] = parseCellText(after, field.fieldType);
    } catch (error) {
      throw new ReplaceError(`${path}: "${after}" is not a valid value for column ${field.name}`, error);
    }
    edited = true;
  }
  return edited;
}
