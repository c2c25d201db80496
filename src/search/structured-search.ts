/**
 * Search and replace over the text fields of structured formats.
 */
import type { TextFieldHost } from '../files/structured.js';
import type { DecodedFile } from '../types/decoded.js';
import { hasMatch, replaceAllInText, type MatchingMode } from './matching-mode.js';
import type { StructuredMatch } from './matches.js';

/** The decoded value as a text field host, for the formats that are one. */
export function asTextFieldHost(decoded: DecodedFile): TextFieldHost | null {
  switch (decoded.type) {
    case 'AnimFragment':
    case 'AnimsTable':
    case 'PortraitSettings':
    case 'UnitVariant':
      return decoded;
    default:
      return null;
  }
}

export function searchStructured(host: TextFieldHost, mode: MatchingMode): StructuredMatch[] {
  return host.textFields().filter((field) => hasMatch(mode, field.contents));
}

/** Returns whether any field changed. */
export function replaceStructured(host: TextFieldHost, matches: readonly StructuredMatch[], mode: MatchingMode, replacement: string): boolean {
  const current = new Map(host.textFields().map((field) => [`${field.entry}\u0000${field.field}`, field.contents]));
  let edited = false;
  for (const match of matches) {
    const before = current.get(`${match.entry}\u0000${match.field}`);
    if (before === undefined) {
      continue;
    }
    const after = replaceAllInText(mode, before, replacement);
    if (after !== before && host.setTextField(match.entry, match.field, after)) {
      current.set(`${match.entry}\u0000${match.field}`, after);
      edited = true;
    }
  }
  return edited;
}
