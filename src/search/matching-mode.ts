/**
 * Line-oriented matching shared by every searchable format.
 */
import { ConfigError } from '../errors.js';

export type MatchingMode =
  | { readonly kind: 'Regex'; readonly regex: RegExp }
  | { readonly kind: 'Pattern'; readonly pattern: string; readonly caseSensitive: boolean };

export interface LineMatch {
  readonly column: number;
  readonly length: number;
}

/**
 * @throws {ConfigError} If `useRegex` is set and the pattern is not a valid regular expression
 */
export function createMatchingMode(pattern: string, { caseSensitive, useRegex }: { readonly caseSensitive: boolean; readonly useRegex: boolean }): MatchingMode {
  if (!useRegex) {
    return { kind: 'Pattern', pattern: caseSensitive ? pattern : pattern.toLowerCase(), caseSensitive };
  }
  try {
    return { kind: 'Regex', regex: new RegExp(pattern, caseSensitive ? 'g' : 'gi') };
  } catch (error) {
    throw new ConfigError(`Invalid regular expression ${JSON.stringify(pattern)}`, error);
  }
}

/**
 * Matches inside a single line, left to right. The cursor moves past each
 * match, so matches never overlap. Empty matches are not reported.
 */
export function findInLine(mode: MatchingMode, line: string): LineMatch[] {
  const matches: LineMatch[] = [];
  if (mode.kind === 'Regex') {
    const regex = new RegExp(mode.regex.source, mode.regex.flags);
    let found = regex.exec(line);
    while (found) {
      if (found[0].length === 0) {
        regex.lastIndex += 1;
      } else {
        matches.push({ column: found.index, length: found[0].length });
      }
      found = regex.exec(line);
    }
    return matches;
  }

  if (mode.pattern === '') {
    return matches;
  }
  const haystack = mode.caseSensitive ? line : line.toLowerCase();
  let column = haystack.indexOf(mode.pattern);
  while (column >= 0) {
    matches.push({ column, length: mode.pattern.length });
    column = haystack.indexOf(mode.pattern, column + mode.pattern.length);
  }
  return matches;
}

/** Matches of every line of `text`, lines split on `\n`. */
export function findInText(mode: MatchingMode, text: string): Array<LineMatch & { readonly row: number }> {
  return text.split('\n').flatMap((line, row) => findInLine(mode, line).map((match) => ({ row, ...match })));
}

export function hasMatch(mode: MatchingMode, text: string): boolean {
  return findInText(mode, text).length > 0;
}

/** Replaces `length` characters at `column`. */
export function replaceAt(line: string, column: number, length: number, replacement: string): string {
  return line.slice(0, column) + replacement + line.slice(column + length);
}

/** Applies matches of one line highest column first, so earlier offsets stay valid. */
export function replaceInLine(line: string, matches: readonly LineMatch[], replacement: string): string {
  return [...matches]
    .sort((a, b) => b.column - a.column)
    .reduce((current, match) => replaceAt(current, match.column, match.length, replacement), line);
}

/** Replaces every match of every line of `text`. */
export function replaceAllInText(mode: MatchingMode, text: string, replacement: string): string {
  return text.split('\n').map((line) => replaceInLine(line, findInLine(mode, line), replacement)).join('\n');
}
