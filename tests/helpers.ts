import { DB } from '../src/files/db.js';
import { Schema } from '../src/schema.js';
import { createField, type Definition } from '../src/types/schema.js';

export const UNITS_TABLE = 'units_tables';

export const unitsV1: Definition = {
  version: 1,
  fields: [
    createField('key', 'StringU8', { isKey: true }),
    createField('cost', 'I32', { defaultValue: '100' }),
  ],
  localisedFields: [],
};

export const unitsV2: Definition = {
  version: 2,
  fields: [
    createField('key', 'StringU8', { isKey: true }),
    createField('cost', 'I32', { defaultValue: '100' }),
    createField('category', 'OptionalStringU8', { isReference: ['unit_categories', 'key'] }),
    createField('speed', 'F32', { defaultValue: '1.5' }),
  ],
  localisedFields: [createField('onscreen_name', 'StringU16')],
};

export const categoriesV1: Definition = {
  version: 1,
  fields: [
    createField('key', 'StringU8', { isKey: true }),
    createField('label', 'StringU8'),
  ],
  localisedFields: [],
};

export function makeSchema(): Schema {
  const schema = new Schema();
  schema.addDefinition(UNITS_TABLE, unitsV1);
  schema.addDefinition(UNITS_TABLE, unitsV2);
  schema.addDefinition('unit_categories_tables', categoriesV1);
  return schema;
}

export function unitsTable(rows: Array<[string, number, string | null, number]>): DB {
  return new DB(UNITS_TABLE, unitsV2, rows.map((row) => [...row]), 'test-guid');
}
