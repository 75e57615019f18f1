import fs from 'fs-extra';
import { fileURLToPath } from 'node:url';
import { InformationSchemaCatalog } from '../src/catalog/catalog.js';
import type { DatabaseDialect } from '../src/catalog/dialect.js';
import type { CatalogValue } from '../src/catalog/values.js';
import { loadSchemaSnapshot } from '../src/schema/snapshot.js';

export type CatalogRecord = Record<string, CatalogValue>;

export function readFixture(name: string): unknown {
  return fs.readJsonSync(fileURLToPath(new URL(`./fixtures/${name}.json`, import.meta.url)));
}

export function buildCatalog(fixture: string, dialect: DatabaseDialect = 'native'): InformationSchemaCatalog {
  return new InformationSchemaCatalog(loadSchemaSnapshot(readFixture(fixture)), { dialect });
}

/** Records of one table whose `column` equals `value`. */
export function recordsWhere(
  catalog: InformationSchemaCatalog,
  table: string,
  column: string,
  value: CatalogValue,
): CatalogRecord[] {
  return catalog.toRecords(table).filter((r) => r[column] === value);
}

/** Native-dialect records that describe user objects (schema ""). */
export function userRecords(catalog: InformationSchemaCatalog, table: string, schemaColumn = 'TABLE_SCHEMA'): CatalogRecord[] {
  return recordsWhere(catalog, table, schemaColumn, '');
}
