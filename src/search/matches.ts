/**
 * Search results, grouped per file.
 */
import type { DataSource } from '../dependencies.js';

/** A match inside a text file. `text` is the whole line. */
export interface TextMatch {
  readonly row: number;
  readonly column: number;
  readonly length: number;
  readonly text: string;
}

/** A table cell whose text contains the pattern. */
export interface TableMatch {
  readonly columnName: string;
  readonly columnIndex: number;
  readonly row: number;
  readonly contents: string;
}

/** A text field of a structured file that contains the pattern. */
export interface StructuredMatch {
  readonly entry: number;
  readonly field: string;
  readonly contents: string;
}

interface FileMatchesBase {
  readonly source: DataSource;
  /** Pack the file belongs to; the cache name for vanilla data. */
  readonly origin: string;
  readonly path: string;
}

/** Matches of one file, tagged by the kind of data they point into. */
export type MatchGroup =
  | { readonly kind: 'Table'; readonly matches: readonly TableMatch[] }
  | { readonly kind: 'Text'; readonly matches: readonly TextMatch[] }
  | { readonly kind: 'Structured'; readonly matches: readonly StructuredMatch[] };

export type FileMatches = FileMatchesBase & MatchGroup;

export function matchCount(files: readonly FileMatches[]): number {
  return files.reduce((total, file) => total + file.matches.length, 0);
}
