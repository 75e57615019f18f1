/**
 * Column-metadata registry: the static description of every introspection
 * table's own columns and primary keys. Loaded once per process from the
 * JSON files under data/ and never mutated afterwards.
 */

import fs from 'fs-extra';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { invariant } from '../errors.js';
import type { CatalogType } from './values.js';

const YesNo = z.enum(['YES', 'NO']);

const ColumnsMetaEntrySchema = z.object({
  table_name: z.string().min(1),
  column_name: z.string().min(1),
  ordinal_position: z.number().int().positive(),
  spanner_type: z.string().min(1),
  is_nullable: YesNo,
});

const IndexColumnsMetaEntrySchema = z.object({
  table_name: z.string().min(1),
  column_name: z.string().min(1),
  // 0 means "take the next running ordinal"
  primary_key_ordinal: z.number().int().nonnegative(),
  column_ordering: z.enum(['ASC', 'DESC']),
  is_nullable: YesNo,
  spanner_type: z.string().min(1),
});

export type ColumnsMetaEntry = Readonly<z.infer<typeof ColumnsMetaEntrySchema>>;
export type IndexColumnsMetaEntry = Readonly<z.infer<typeof IndexColumnsMetaEntrySchema>>;

export interface ColumnRegistry {
  readonly columns: readonly ColumnsMetaEntry[];
  readonly keyColumns: readonly IndexColumnsMetaEntry[];
}

const COLUMNS_METADATA_FILE = new URL('../../data/columns-metadata.json', import.meta.url);
const INDEX_COLUMNS_METADATA_FILE = new URL('../../data/index-columns-metadata.json', import.meta.url);

function readEntries<T>(file: URL, schema: z.ZodType<T>): T[] {
  const raw: unknown = fs.readJsonSync(fileURLToPath(file));
  const parsed = z.array(schema).safeParse(raw);
  invariant(parsed.success, () => `Malformed column metadata in ${fileURLToPath(file)}`);
  return parsed.data;
}

/** Builds a registry from explicit entries; entries are frozen in place. */
export function createColumnRegistry(
  columns: readonly ColumnsMetaEntry[],
  keyColumns: readonly IndexColumnsMetaEntry[],
): ColumnRegistry {
  return Object.freeze({
    columns: Object.freeze(columns.map((e) => Object.freeze({ ...e }))),
    keyColumns: Object.freeze(keyColumns.map((e) => Object.freeze({ ...e }))),
  });
}

let defaultRegistry: ColumnRegistry | undefined;

export function loadColumnRegistry(): ColumnRegistry {
  if (!defaultRegistry) {
    defaultRegistry = createColumnRegistry(
      readEntries(COLUMNS_METADATA_FILE, ColumnsMetaEntrySchema),
      readEntries(INDEX_COLUMNS_METADATA_FILE, IndexColumnsMetaEntrySchema),
    );
  }
  return defaultRegistry;
}

const canonical = (name: string) => name.toUpperCase();

/** Registry entries for one table, in registry order. */
export function entriesForTable(registry: ColumnRegistry, tableName: string): ColumnsMetaEntry[] {
  const wanted = canonical(tableName);
  return registry.columns.filter((e) => e.table_name === wanted);
}

/**
 * Metadata of one introspection-table column. A miss means the registry and
 * the catalog code disagree, which aborts the build.
 */
export function lookupColumnMetadata(registry: ColumnRegistry, tableName: string, columnName: string): ColumnsMetaEntry {
  const table = canonical(tableName);
  const column = canonical(columnName);
  const entry = registry.columns.find((e) => e.table_name === table && e.column_name === column);
  invariant(entry, () => `Missing metadata for column ${tableName}.${columnName}`);
  return entry;
}

/** Key metadata for a column, or undefined when it is not a primary key column. */
export function findKeyColumnMetadata(
  registry: ColumnRegistry,
  tableName: string,
  columnName: string,
): IndexColumnsMetaEntry | undefined {
  const table = canonical(tableName);
  const column = canonical(columnName);
  return registry.keyColumns.find((e) => e.table_name === table && e.column_name === column);
}

export function isNullableEntry(entry: ColumnsMetaEntry | IndexColumnsMetaEntry): boolean {
  return entry.is_nullable === 'YES';
}

const SPANNER_TYPE_TO_CATALOG_TYPE: Readonly<Record<string, CatalogType>> = {
  'STRING(MAX)': 'STRING',
  INT64: 'INT64',
  BOOL: 'BOOL',
  TIMESTAMP: 'TIMESTAMP',
};

export function catalogTypeForSpannerType(spannerType: string): CatalogType {
  const type = SPANNER_TYPE_TO_CATALOG_TYPE[spannerType];
  invariant(type, () => `No catalog type for registry type ${spannerType}`);
  return type;
}
