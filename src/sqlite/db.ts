import sqlJs from 'sql.js';
import type { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import { createRequire } from 'module';
import type { InformationSchemaCatalog } from '../catalog/catalog.js';
import type { InformationSchemaTable } from '../catalog/table.js';
import type { CatalogType, CatalogValue } from '../catalog/values.js';
import { databaseLogger } from '../utils/logger.js';

const require = createRequire(import.meta.url);

export type Row = Record<string, SqlValue>;

export const CATALOG_SCHEMA = 'information_schema';

const SQLITE_TYPES: Record<CatalogType, string> = {
  STRING: 'TEXT',
  INT64: 'INTEGER',
  BOOL: 'INTEGER',
  TIMESTAMP: 'TEXT',
};

const quote = (identifier: string) => JSON.stringify(identifier);

export function toSqlValue(value: CatalogValue): SqlValue {
  if (value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

/**
 * In-process SQLite (sql.js) that a catalog can be copied into, so the
 * introspection tables can be queried with ordinary SQL.
 */
export class Database {
  private db: SqlJsDatabase | undefined;

  async init(): Promise<void> {
    const SQL = await sqlJs.default({
      locateFile: () => require.resolve('sql.js/dist/sql-wasm.wasm'),
    });
    this.db = new SQL.Database();
  }

  private get handle(): SqlJsDatabase {
    if (!this.db) throw new Error('Database used before init()');
    return this.db;
  }

  exec(sql: string, params?: SqlValue[]): Row[] {
    const stmt = this.handle.prepare(sql);
    try {
      if (params) stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  run(sql: string): void {
    this.handle.run(sql);
  }

  /** Copies every table of the catalog into an attached `information_schema` database. */
  loadCatalog(catalog: InformationSchemaCatalog): void {
    this.run(`ATTACH DATABASE ':memory:' AS ${CATALOG_SCHEMA}`);
    let rows = 0;
    for (const table of catalog.tables()) {
      this.loadTable(table);
      rows += table.rows.length;
    }
    databaseLogger.debug('Catalog loaded into SQLite', { dialect: catalog.dialect, tables: catalog.tables().length, rows });
  }

  close(): void {
    this.db?.close();
    this.db = undefined;
  }

  private loadTable(table: InformationSchemaTable): void {
    const target = `${CATALOG_SCHEMA}.${quote(table.name)}`;
    const colDefs = table.columns.map((c) => `${quote(c.name)} ${SQLITE_TYPES[c.type]}`).join(', ');
    this.run(`CREATE TABLE ${target} (${colDefs});`);
    if (table.rows.length === 0) return;

    const placeholders = table.columns.map(() => '?').join(',');
    const insert = this.handle.prepare(
      `INSERT INTO ${target} (${table.columns.map((c) => quote(c.name)).join(',')}) VALUES (${placeholders})`,
    );
    try {
      this.handle.run('BEGIN');
      for (const row of table.rows) {
        insert.bind(row.map(toSqlValue));
        insert.step();
        insert.reset();
      }
      this.handle.run('COMMIT');
    } finally {
      insert.free();
    }
  }
}
