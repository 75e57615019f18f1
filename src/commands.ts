/**
 * Handlers behind the `infoschema` commands. Each returns the text the
 * command prints so it can run without a terminal.
 */

import fs from 'fs-extra';
import { InformationSchemaCatalog } from './catalog/catalog.js';
import type { DatabaseDialect } from './catalog/dialect.js';
import { DialectSchema } from './config.js';
import { loadSchemaSnapshot } from './schema/snapshot.js';
import { Database } from './sqlite/db.js';
import { cliLogger } from './utils/logger.js';

export interface CatalogArgs {
  schema: string;
  dialect: string;
}

export async function loadCatalog(args: CatalogArgs): Promise<InformationSchemaCatalog> {
  const dialect: DatabaseDialect = DialectSchema.parse(args.dialect);
  const document: unknown = await fs.readJson(args.schema);
  const catalog = new InformationSchemaCatalog(loadSchemaSnapshot(document), { dialect });
  cliLogger.debug('Catalog loaded', { schema: args.schema, dialect });
  return catalog;
}

/** One `NAME<TAB>rows` line per introspection table. */
export function listTables(catalog: InformationSchemaCatalog): string {
  return catalog.tables().map((table) => `${table.name}\t${table.rows.length}`).join('\n');
}

export function dumpTable(catalog: InformationSchemaCatalog, name: string): string {
  return JSON.stringify(catalog.toRecords(name), null, 2);
}

export async function runQuery(catalog: InformationSchemaCatalog, sql: string): Promise<string> {
  const db = new Database();
  await db.init();
  try {
    db.loadCatalog(catalog);
    return JSON.stringify(db.exec(sql), null, 2);
  } finally {
    db.close();
  }
}
