/**
 * Rows of a table, read and written strictly in definition field order.
 */
import { DecodeError, EncodeError } from './errors.js';
import type { Schema } from './schema.js';
import { isSequence, type Definition, type Field, type FieldType } from './types/schema.js';
import type { BinaryReader } from './utils/binary-reader.js';
import type { BinaryWriter } from './utils/binary-writer.js';

export interface TableData {
  readonly definition: Definition;
  readonly rows: Row[];
}

export type CellValue = boolean | number | bigint | string | null | TableData;
export type Row = CellValue[];

function isTableData(value: CellValue): value is TableData {
  return typeof value === 'object' && value !== null;
}

function readCell(reader: BinaryReader, fieldType: FieldType): CellValue {
  if (isSequence(fieldType)) {
    const count = fieldType.sequence === 'U16' ? reader.readU16() : reader.readU32();
    return { definition: fieldType.definition, rows: readRows(reader, fieldType.definition, count) };
  }
  switch (fieldType) {
    case 'Boolean': return reader.readBool();
    case 'F32': return reader.readF32();
    case 'F64': return reader.readF64();
    case 'I16': return reader.readI16();
    case 'I32': return reader.readI32();
    case 'I64': return reader.readI64();
    case 'OptionalI16': return reader.readBool() ? reader.readI16() : null;
    case 'OptionalI32': return reader.readBool() ? reader.readI32() : null;
    case 'OptionalI64': return reader.readBool() ? reader.readI64() : null;
    case 'ColourRGB': return reader.readColourRgb();
    case 'StringU8': return reader.readStringU8();
    case 'StringU16': return reader.readStringU16();
    case 'OptionalStringU8': return reader.readOptionalStringU8();
    case 'OptionalStringU16': return reader.readOptionalStringU16();
    default: {
      const unreachable: never = fieldType;
      throw new DecodeError(`Unknown field type ${String(unreachable)}`);
    }
  }
}

export function readRows(reader: BinaryReader, definition: Definition, count: number): Row[] {
  const rows: Row[] = [];
  for (let index = 0; index < count; index++) {
    const row: Row = [];
    for (const field of definition.fields) {
      try {
        row.push(readCell(reader, field.fieldType));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new DecodeError(`Row ${index + 1}/${count}, field "${field.name}": ${message}`, undefined, error);
      }
    }
    rows.push(row);
  }
  return rows;
}

function expectNumber(value: CellValue, field: Field): number {
  if (typeof value !== 'number') {
    throw new EncodeError(`Field "${field.name}" expects a number, got ${typeof value}`);
  }
  return value;
}

function expectBigInt(value: CellValue, field: Field): bigint {
  if (typeof value !== 'bigint') {
    throw new EncodeError(`Field "${field.name}" expects a 64-bit integer, got ${typeof value}`);
  }
  return value;
}

function expectString(value: CellValue, field: Field): string {
  if (typeof value !== 'string') {
    throw new EncodeError(`Field "${field.name}" expects a string, got ${typeof value}`);
  }
  return value;
}

function writeCell(writer: BinaryWriter, field: Field, value: CellValue): void {
  const fieldType = field.fieldType;
  if (isSequence(fieldType)) {
    if (!isTableData(value)) {
      throw new EncodeError(`Field "${field.name}" expects a nested table`);
    }
    if (fieldType.sequence === 'U16') {
      writer.writeU16(value.rows.length);
    } else {
      writer.writeU32(value.rows.length);
    }
    writeRows(writer, fieldType.definition, value.rows);
    return;
  }
  switch (fieldType) {
    case 'Boolean':
      if (typeof value !== 'boolean') {
        throw new EncodeError(`Field "${field.name}" expects a boolean, got ${typeof value}`);
      }
      writer.writeBool(value);
      return;
    case 'F32': writer.writeF32(expectNumber(value, field)); return;
    case 'F64': writer.writeF64(expectNumber(value, field)); return;
    case 'I16': writer.writeI16(expectNumber(value, field)); return;
    case 'I32': writer.writeI32(expectNumber(value, field)); return;
    case 'I64': writer.writeI64(expectBigInt(value, field)); return;
    case 'OptionalI16':
    case 'OptionalI32':
    case 'OptionalI64':
      writer.writeBool(value !== null);
      if (value !== null) {
        if (fieldType === 'OptionalI64') {
          writer.writeI64(expectBigInt(value, field));
        } else if (fieldType === 'OptionalI32') {
          writer.writeI32(expectNumber(value, field));
        } else {
          writer.writeI16(expectNumber(value, field));
        }
      }
      return;
    case 'ColourRGB': writer.writeColourRgb(expectString(value, field)); return;
    case 'StringU8': writer.writeStringU8(expectString(value, field)); return;
    case 'StringU16': writer.writeStringU16(expectString(value, field)); return;
    case 'OptionalStringU8': writer.writeOptionalStringU8(value === null ? null : expectString(value, field)); return;
    case 'OptionalStringU16': writer.writeOptionalStringU16(value === null ? null : expectString(value, field)); return;
    default: {
      const unreachable: never = fieldType;
      throw new EncodeError(`Unknown field type ${String(unreachable)}`);
    }
  }
}

export function writeRows(writer: BinaryWriter, definition: Definition, rows: readonly Row[]): void {
  rows.forEach((row, index) => {
    if (row.length !== definition.fields.length) {
      throw new EncodeError(`Row ${index + 1} has ${row.length} cells, definition version ${definition.version} has ${definition.fields.length} fields`);
    }
    definition.fields.forEach((field, column) => writeCell(writer, field, row[column] ?? null));
  });
}

/** Text form of a cell, as shown in TSV exports and matched by search. */
export function cellToText(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (isTableData(value)) {
    return JSON.stringify(value.rows.map((row) => row.map(cellToText)));
  }
  return String(value);
}

const INTEGER_RANGES: Readonly<Record<'I16' | 'I32', readonly [number, number]>> = {
  I16: [-0x8000, 0x7fff],
  I32: [-0x80000000, 0x7fffffff],
};

function parseInteger(text: string, kind: 'I16' | 'I32'): number {
  const value = Number(text.trim());
  const [min, max] = INTEGER_RANGES[kind];
  if (text.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
    throw new DecodeError(`"${text}" is not a valid ${kind}`);
  }
  return value;
}

function parseBigInt(text: string): bigint {
  if (text.trim() === '') {
    throw new DecodeError('An empty value is not a valid I64');
  }
  try {
    const value = BigInt(text.trim());
    if (value < -(2n ** 63n) || value >= 2n ** 63n) {
      throw new RangeError('out of range');
    }
    return value;
  } catch (error) {
    throw new DecodeError(`"${text}" is not a valid I64`, undefined, error);
  }
}

function parseFloatText(text: string): number {
  const value = Number(text.trim());
  if (text.trim() === '' || Number.isNaN(value)) {
    throw new DecodeError(`"${text}" is not a valid number`);
  }
  return value;
}

function isStringArrayMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
}

/**
 * Parses the text form back into a cell. Optional fields read an empty text
 * as absent.
 */
export function parseCellText(text: string, fieldType: FieldType): CellValue {
  if (isSequence(fieldType)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text === '' ? '[]' : text);
    } catch (error) {
      throw new DecodeError(`Nested table value is not valid JSON: ${text}`, undefined, error);
    }
    if (!isStringArrayMatrix(parsed)) {
      throw new DecodeError('Nested table value must be an array of arrays of strings');
    }
    const definition = fieldType.definition;
    return {
      definition,
      rows: parsed.map((cells) => definition.fields.map((field, index) => parseCellText(cells[index] ?? '', field.fieldType))),
    };
  }
  switch (fieldType) {
    case 'Boolean': {
      const normalised = text.trim().toLowerCase();
      if (normalised === 'true' || normalised === '1') return true;
      if (normalised === 'false' || normalised === '0') return false;
      throw new DecodeError(`"${text}" is not a valid boolean`);
    }
    case 'F32': return Math.fround(parseFloatText(text));
    case 'F64': return parseFloatText(text);
    case 'I16': return parseInteger(text, 'I16');
    case 'I32': return parseInteger(text, 'I32');
    case 'I64': return parseBigInt(text);
    case 'OptionalI16': return text === '' ? null : parseInteger(text, 'I16');
    case 'OptionalI32': return text === '' ? null : parseInteger(text, 'I32');
    case 'OptionalI64': return text === '' ? null : parseBigInt(text);
    case 'ColourRGB': {
      const hex = text.trim().replace(/^#/, '').toUpperCase();
      if (!/^[0-9A-F]{1,8}$/.test(hex)) {
        throw new DecodeError(`"${text}" is not a valid colour`);
      }
      return hex.padStart(6, '0');
    }
    case 'StringU8':
    case 'StringU16':
      return text;
    case 'OptionalStringU8':
    case 'OptionalStringU16':
      return text === '' ? null : text;
    default: {
      const unreachable: never = fieldType;
      throw new DecodeError(`Unknown field type ${String(unreachable)}`);
    }
  }
}

export function cellsEqual(a: CellValue, b: CellValue): boolean {
  if (isTableData(a) || isTableData(b)) {
    return isTableData(a) && isTableData(b) && a.rows.length === b.rows.length && a.rows.every((row, index) => {
      const other = b.rows[index];
      return other !== undefined && rowsEqual(row, other);
    });
  }
  return a === b;
}

export function rowsEqual(a: readonly CellValue[], b: readonly CellValue[]): boolean {
  return a.length === b.length && a.every((cell, index) => {
    const other = b[index];
    return other !== undefined && cellsEqual(cell, other);
  });
}

/** Stable text key of a whole row, for set membership. */
export function rowKey(row: readonly CellValue[]): string {
  return JSON.stringify(row.map(cellToText));
}

/**
 * A new row filled with each field's default, patches applied when a schema
 * and table name are given.
 */
export function defaultRow(definition: Definition, schema?: Schema, tableName?: string): Row {
  return definition.fields.map((field) => {
    const text = schema && tableName ? schema.fieldDefault(tableName, field) : field.defaultValue;
    const parsed = text === null ? undefined : tryParseCellText(text, field.fieldType);
    return parsed === undefined ? zeroValue(field.fieldType) : parsed;
  });
}

/** Like {@link parseCellText}, but an unparsable text yields `undefined`. */
export function tryParseCellText(text: string, fieldType: FieldType): CellValue | undefined {
  try {
    return parseCellText(text, fieldType);
  } catch (error) {
    if (error instanceof DecodeError) {
      return undefined;
    }
    throw error;
  }
}

function zeroValue(fieldType: FieldType): CellValue {
  if (isSequence(fieldType)) {
    return { definition: fieldType.definition, rows: [] };
  }
  switch (fieldType) {
    case 'Boolean': return false;
    case 'F32':
    case 'F64':
    case 'I16':
    case 'I32':
      return 0;
    case 'I64': return 0n;
    case 'OptionalI16':
    case 'OptionalI32':
    case 'OptionalI64':
    case 'OptionalStringU8':
    case 'OptionalStringU16':
      return null;
    case 'ColourRGB': return '000000';
    case 'StringU8':
    case 'StringU16':
      return '';
    default: {
      const unreachable: never = fieldType;
      throw new EncodeError(`Unknown field type ${String(unreachable)}`);
    }
  }
}

export function columnIndex(definition: Definition, column: string): number {
  return definition.fields.findIndex((field) => field.name === column);
}

/**
 * Rewrites rows laid out per `from` into the layout of `to`. Columns are
 * matched by name; a value that does not fit its new field type, and every
 * new column, takes the default of `to`.
 */
export function convertRows(rows: readonly Row[], from: Definition, to: Definition, schema?: Schema, tableName?: string): Row[] {
  const defaults = defaultRow(to, schema, tableName);
  const sources = to.fields.map((field) => from.fields.findIndex((old) => old.name === field.name));
  return rows.map((row) => to.fields.map((field, index) => {
    const fallback = defaults[index] ?? null;
    const sourceIndex = sources[index] ?? -1;
    const oldField = from.fields[sourceIndex];
    const value = row[sourceIndex];
    if (!oldField || value === undefined) {
      return fallback;
    }
    if (JSON.stringify(oldField.fieldType) === JSON.stringify(field.fieldType)) {
      return value;
    }
    const parsed = tryParseCellText(cellToText(value), field.fieldType);
    return parsed === undefined ? fallback : parsed;
  }));
}
