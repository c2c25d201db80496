/**
 * Schema registry: every known binary layout of every table, plus late-bound
 * field patches.
 */
import { readFile, writeFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { primitiveFieldTypeSchema, rawTableToDefinition, type RawTable } from './assembly-kit.js';
import { ConfigError, toIoError } from './errors.js';
import { debug } from './utils/logger.js';
import type {
  Definition,
  Field,
  FieldPatch,
  FieldType,
  SchemaConflict,
  SchemaData,
  SchemaUpdateReport,
  TablePatches,
} from './types/schema.js';

/** Version of the persisted schema layout. */
export const SCHEMA_FORMAT_VERSION = 5;

const fieldTypeSchema: z.ZodType<FieldType, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    primitiveFieldTypeSchema,
    z.object({ sequence: z.enum(['U16', 'U32']), definition: definitionSchema }),
  ]),
);

const fieldSchema = z.object({
  name: z.string().min(1),
  fieldType: fieldTypeSchema,
  isKey: z.boolean().default(false),
  defaultValue: z.string().nullable().default(null),
  isFilename: z.boolean().default(false),
  isReference: z.tuple([z.string(), z.string()]).nullable().default(null),
  lookup: z.array(z.string()).nullable().default(null),
  description: z.string().default(''),
  caOrder: z.number().int().default(-1),
  enumValues: z.record(z.string(), z.string()).default({}),
});

const definitionSchema: z.ZodType<Definition, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int(),
  fields: z.array(fieldSchema),
  localisedFields: z.array(fieldSchema).default([]),
});

const fieldPatchSchema = z.object({
  defaultValue: z.string().optional(),
  isKey: z.boolean().optional(),
  description: z.string().optional(),
});

const schemaDataSchema = z.object({
  version: z.number().int(),
  definitions: z.record(z.string(), z.array(definitionSchema)),
  patches: z.record(z.string(), z.record(z.string(), fieldPatchSchema)).default({}),
});

/** Validates a single definition, as stored next to cached table data. */
export function parseDefinition(input: unknown, source = 'definition'): Definition {
  const result = definitionSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
  }
  return result.data;
}

/** JSON with object keys sorted, so equal structures hash equally. */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

function layoutKey(fields: readonly Field[]): string {
  return canonicalJson(fields.map((field) => ({ name: field.name, fieldType: field.fieldType })));
}

export class Schema {
  private readonly definitions = new Map<string, Definition[]>();
  private readonly patches = new Map<string, TablePatches>();

  constructor(data?: SchemaData) {
    if (data) {
      for (const [tableName, definitions] of Object.entries(data.definitions)) {
        for (const definition of definitions) {
          this.addDefinition(tableName, definition);
        }
      }
      for (const [tableName, patches] of Object.entries(data.patches)) {
        this.addPatch(tableName, patches);
      }
    }
  }

  static fromJSON(input: unknown, source = 'schema'): Schema {
    const result = schemaDataSchema.safeParse(input);
    if (!result.success) {
      throw new ConfigError(`Invalid ${source}: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    }
    if (result.data.version !== SCHEMA_FORMAT_VERSION) {
      throw new ConfigError(`Unsupported schema format version ${result.data.version} in ${source}, expected ${SCHEMA_FORMAT_VERSION}`);
    }
    return new Schema(result.data);
  }

  static async load(filePath: string): Promise<Schema> {
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
      throw new ConfigError(`Schema file ${filePath} is not valid JSON`, error);
    }
    const schema = Schema.fromJSON(json, filePath);
    debug(`Loaded schema ${filePath}: ${schema.tableNames().length} tables`);
    return schema;
  }

  async save(filePath: string): Promise<void> {
    try {
      await writeFile(filePath, JSON.stringify(this.toJSON(), null, 2), 'utf8');
    } catch (error) {
      throw toIoError(error, filePath);
    }
  }

  /** A deep copy, for edits that must not show until they are saved. */
  clone(): Schema {
    return new Schema(structuredClone(this.toJSON()));
  }

  toJSON(): SchemaData {
    return {
      version: SCHEMA_FORMAT_VERSION,
      definitions: Object.fromEntries(this.definitions),
      patches: Object.fromEntries(this.patches),
    };
  }

  tableNames(): string[] {
    return [...this.definitions.keys()].sort();
  }

  /** Definitions of a table, newest version first. */
  definitionsFor(tableName: string): readonly Definition[] {
    return this.definitions.get(tableName) ?? [];
  }

  definitionFor(tableName: string, version: number): Definition | undefined {
    return this.definitionsFor(tableName).find((definition) => definition.version === version);
  }

  latestDefinition(tableName: string): Definition | undefined {
    return this.definitionsFor(tableName)[0];
  }

  knownVersions(tableName: string): number[] {
    return this.definitionsFor(tableName).map((definition) => definition.version);
  }

  /** Adds a definition, replacing the one with the same version if any. */
  addDefinition(tableName: string, definition: Definition): void {
    const list = (this.definitions.get(tableName) ?? []).filter((existing) => existing.version !== definition.version);
    list.push(definition);
    list.sort((a, b) => b.version - a.version);
    this.definitions.set(tableName, list);
  }

  patchesFor(tableName: string): TablePatches {
    return this.patches.get(tableName) ?? {};
  }

  addPatch(tableName: string, patches: TablePatches): void {
    const merged: Record<string, FieldPatch> = { ...this.patchesFor(tableName) };
    for (const [fieldName, patch] of Object.entries(patches)) {
      merged[fieldName] = { ...merged[fieldName], ...patch };
    }
    this.patches.set(tableName, merged);
  }

  fieldDefault(tableName: string, field: Field): string | null {
    return this.patchesFor(tableName)[field.name]?.defaultValue ?? field.defaultValue;
  }

  fieldIsKey(tableName: string, field: Field): boolean {
    return this.patchesFor(tableName)[field.name]?.isKey ?? field.isKey;
  }

  fieldDescription(tableName: string, field: Field): string {
    return this.patchesFor(tableName)[field.name]?.description ?? field.description;
  }

  /**
   * Hash of the table layouts. Patches are left out: they never change how a
   * payload is read.
   */
  fingerprint(): string {
    const tables = Object.fromEntries(this.tableNames().map((name) => [name, this.definitionsFor(name)]));
    return createHash('sha256').update(canonicalJson(tables)).digest('hex');
  }

  /**
   * Merges table layouts exported by the assembly kit.
   *
   * `tablesInUse` maps a table name to the definition versions of tables
   * currently decoded somewhere; a differing layout for one of those versions
   * is reported and left alone.
   */
  updateFromAssemblyKit(rawTables: readonly RawTable[], tablesInUse: ReadonlyMap<string, ReadonlySet<number>> = new Map()): SchemaUpdateReport {
    const added: string[] = [];
    const updated: string[] = [];
    const conflicts: SchemaConflict[] = [];

    for (const raw of rawTables) {
      const incoming = rawTableToDefinition(raw);
      const existing = this.definitionFor(raw.name, raw.version);
      const id = `${raw.name}:${raw.version}`;

      if (!existing) {
        this.addDefinition(raw.name, incoming);
        added.push(id);
        continue;
      }

      if (layoutKey(existing.fields) === layoutKey(incoming.fields)) {
        const refreshed: Definition = {
          ...existing,
          fields: existing.fields.map((field, index) => {
            const source = incoming.fields[index];
            return source
              ? { ...field, isKey: source.isKey, description: source.description || field.description, isReference: source.isReference ?? field.isReference }
              : field;
          }),
        };
        if (canonicalJson(refreshed) !== canonicalJson(existing)) {
          this.addDefinition(raw.name, refreshed);
          updated.push(id);
        }
        continue;
      }

      if (tablesInUse.get(raw.name)?.has(raw.version)) {
        conflicts.push({ tableName: raw.name, version: raw.version, reason: 'field layout differs from the definition used by loaded tables' });
        continue;
      }

      this.addDefinition(raw.name, { ...incoming, localisedFields: existing.localisedFields });
      updated.push(id);
    }

    return { added, updated, conflicts };
  }
}
