/**
 * Text fields exposed by structured formats so search can reach inside them.
 */
import { DecodeError } from '../errors.js';
import type { BinaryReader } from '../utils/binary-reader.js';

export interface TextField {
  /** Index of the entry inside the file. */
  readonly entry: number;
  readonly field: string;
  readonly contents: string;
}

export interface TextFieldHost {
  textFields(): TextField[];
  /** Returns false when the entry or field does not exist. */
  setTextField(entry: number, field: string, value: string): boolean;
}

/**
 * Reads `version` from a reader and rejects any value outside `supported`.
 */
export function readVersion(reader: BinaryReader, supported: readonly number[], what: string, path?: string): number {
  const version = reader.readU32();
  if (!supported.includes(version)) {
    throw new DecodeError(`Unsupported ${what} version ${version}`, path);
  }
  return version;
}

/** Every string property named in `fields`, entry by entry. */
export function collectTextFields<T extends Readonly<Record<K, string>>, K extends string>(entries: readonly T[], fields: readonly K[]): TextField[] {
  return entries.flatMap((entry, index) => fields.map((field) => ({ entry: index, field, contents: entry[field] })));
}

/** Narrows a field name to one of `fields`. */
export function textFieldName<K extends string>(fields: readonly K[], field: string): K | undefined {
  return fields.find((candidate) => candidate === field);
}
