/**
 * Assembly-kit table dumps: raw table layouts (and optionally their rows) exported
 * from the game development kit as JSON.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, toIoError } from './errors.js';
import { createField, type Definition, type Field, type PrimitiveFieldType } from './types/schema.js';

const PRIMITIVE_FIELD_TYPES = [
  'Boolean', 'F32', 'F64', 'I16', 'I32', 'I64', 'OptionalI16', 'OptionalI32', 'OptionalI64',
  'ColourRGB', 'StringU8', 'StringU16', 'OptionalStringU8', 'OptionalStringU16',
] as const satisfies readonly PrimitiveFieldType[];

export const primitiveFieldTypeSchema = z.enum(PRIMITIVE_FIELD_TYPES);

const rawFieldSchema = z.object({
  name: z.string().min(1),
  fieldType: primitiveFieldTypeSchema,
  primaryKey: z.boolean().default(false),
  defaultValue: z.string().nullable().default(null),
  description: z.string().default(''),
  columnSourceTable: z.string().nullable().default(null),
  columnSourceColumn: z.string().nullable().default(null),
});

const rawCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const rawTableSchema = z.object({
  /** Full table name, `_tables` suffix included. */
  name: z.string().min(1),
  version: z.number().int().nonnegative(),
  fields: z.array(rawFieldSchema),
  rows: z.array(z.array(rawCellSchema)).default([]),
});

const assemblyKitDumpSchema = z.object({
  tables: z.array(rawTableSchema),
});

export type RawField = z.infer<typeof rawFieldSchema>;
export type RawCell = z.infer<typeof rawCellSchema>;
export type RawTable = z.infer<typeof rawTableSchema>;

export function parseAssemblyKitDump(input: unknown, source = 'assembly kit dump'): RawTable[] {
  const result = assemblyKitDumpSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
  }
  return result.data.tables;
}

export async function loadAssemblyKitDump(filePath: string): Promise<RawTable[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw toIoError(error, filePath);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Assembly kit dump ${filePath} is not valid JSON`, error);
  }
  return parseAssemblyKitDump(json, filePath);
}

function rawFieldToField(raw: RawField, index: number): Field {
  const reference: readonly [string, string] | null = raw.columnSourceTable && raw.columnSourceColumn
    ? [raw.columnSourceTable.replace(/_tables$/, ''), raw.columnSourceColumn]
    : null;
  return createField(raw.name, raw.fieldType, {
    isKey: raw.primaryKey,
    defaultValue: raw.defaultValue,
    description: raw.description,
    isReference: reference,
    caOrder: index,
  });
}

export function rawTableToDefinition(raw: RawTable): Definition {
  return {
    version: raw.version,
    fields: raw.fields.map(rawFieldToField),
    localisedFields: [],
  };
}
