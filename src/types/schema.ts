/**
 * Versioned table definitions.
 */

export type PrimitiveFieldType =
  | 'Boolean'
  | 'F32'
  | 'F64'
  | 'I16'
  | 'I32'
  | 'I64'
  | 'OptionalI16'
  | 'OptionalI32'
  | 'OptionalI64'
  | 'ColourRGB'
  | 'StringU8'
  | 'StringU16'
  | 'OptionalStringU8'
  | 'OptionalStringU16';

/** A column holding a nested table, prefixed by a u16 or u32 row count. */
export interface SequenceFieldType {
  readonly sequence: 'U16' | 'U32';
  readonly definition: Definition;
}

export type FieldType = PrimitiveFieldType | SequenceFieldType;

export interface Field {
  readonly name: string;
  readonly fieldType: FieldType;
  readonly isKey: boolean;
  /** Default for new rows, in its TSV text form. */
  readonly defaultValue: string | null;
  readonly isFilename: boolean;
  /** Foreign key as `[table without the _tables suffix, column]`. */
  readonly isReference: readonly [string, string] | null;
  /** Columns of the referenced table shown next to a reference value. */
  readonly lookup: readonly string[] | null;
  readonly description: string;
  /** Display order hint. -1 when unknown. */
  readonly caOrder: number;
  readonly enumValues: Readonly<Record<string, string>>;
}

export interface Definition {
  readonly version: number;
  /** Binary order of the row fields. */
  readonly fields: readonly Field[];
  /** Columns stored in loc files rather than in the table itself. */
  readonly localisedFields: readonly Field[];
}

/** Field level override, consulted when the value is needed. */
export interface FieldPatch {
  readonly defaultValue?: string;
  readonly isKey?: boolean;
  readonly description?: string;
}

export type TablePatches = Readonly<Record<string, FieldPatch>>;

export interface SchemaData {
  readonly version: number;
  readonly definitions: Readonly<Record<string, readonly Definition[]>>;
  readonly patches: Readonly<Record<string, TablePatches>>;
}

export interface SchemaConflict {
  readonly tableName: string;
  readonly version: number;
  readonly reason: string;
}

export interface SchemaUpdateReport {
  /** `table:version` pairs that were not known before. */
  readonly added: readonly string[];
  /** `table:version` pairs whose metadata was refreshed or layout replaced. */
  readonly updated: readonly string[];
  readonly conflicts: readonly SchemaConflict[];
}

export function isSequence(fieldType: FieldType): fieldType is SequenceFieldType {
  return typeof fieldType !== 'string';
}

export function createField(name: string, fieldType: FieldType, options: Partial<Omit<Field, 'name' | 'fieldType'>> = {}): Field {
  return {
    name,
    fieldType,
    isKey: options.isKey ?? false,
    defaultValue: options.defaultValue ?? null,
    isFilename: options.isFilename ?? false,
    isReference: options.isReference ?? null,
    lookup: options.lookup ?? null,
    description: options.description ?? '',
    caOrder: options.caOrder ?? -1,
    enumValues: options.enumValues ?? {},
  };
}
