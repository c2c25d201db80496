/**
 * Search and replace over plain-text entries.
 */
import type { Text } from '../files/text.js';
import { findInText, replaceInLine, type MatchingMode } from './matching-mode.js';
import type { TextMatch } from './matches.js';

export function searchText(text: Text, mode: MatchingMode): TextMatch[] {
  const lines = text.contents.split('\n');
  return findInText(mode, text.contents).map((match) => ({ ...match, text: lines[match.row] ?? '' }));
}

/**
 * Applies `matches` to `text`. Lines are edited independently, each from its
 * highest column down. Returns whether the contents changed.
 */
export function replaceText(text: Text, matches: readonly TextMatch[], replacement: string): boolean {
  const byRow = new Map<number, TextMatch[]>();
  for (const match of matches) {
    byRow.set(match.row, [...(byRow.get(match.row) ?? []), match]);
  }
  const lines = text.contents.split('\n');
  const replaced = lines.map((line, row) => {
    const rowMatches = byRow.get(row);
    return rowMatches ? replaceInLine(line, rowMatches.filter((match) => match.column + match.length <= line.length), replacement) : line;
  }).join('\n');
  if (replaced === text.contents) {
    return false;
  }
  text.contents = replaced;
  return true;
}
