import NodeCache from 'node-cache';
import { InformationSchemaCatalog } from '../catalog/catalog.js';
import type { DatabaseDialect } from '../catalog/dialect.js';
import type { ColumnRegistry } from '../catalog/registry.js';
import { loadSchemaSnapshot, schemaVersion } from '../schema/snapshot.js';
import { Database, type Row } from '../sqlite/db.js';
import { catalogLogger } from '../utils/logger.js';

export interface BuiltCatalog {
  version: string;
  dialect: DatabaseDialect;
  catalog: InformationSchemaCatalog;
  /** False when the catalog came out of the cache. */
  built: boolean;
}

export interface CatalogServiceOptions {
  /** Seconds a catalog stays cached; 0 keeps it until evicted. */
  ttlSeconds: number;
  registry?: ColumnRegistry;
}

export interface CatalogServiceStats {
  catalogs: number;
  hits: number;
  misses: number;
  builds: number;
}

export class CatalogNotFoundError extends Error {
  constructor(readonly version: string, readonly dialect: DatabaseDialect) {
    super(`No catalog for schema version ${version} (${dialect})`);
    this.name = 'CatalogNotFoundError';
  }
}

/** SQL that sql.js rejected or failed to run. */
export class CatalogQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogQueryError';
  }
}

const cacheKey = (version: string, dialect: DatabaseDialect) => `catalog:${dialect}:${version}`;

/**
 * Keeps one catalog per (dialect, schema version). A changed schema document
 * has a new version and therefore gets a freshly built catalog.
 */
export class CatalogService {
  private readonly cache: NodeCache;
  private readonly registry: ColumnRegistry | undefined;
  private builds = 0;

  constructor(options: CatalogServiceOptions) {
    // catalogs are immutable class instances; cloning would strip their methods
    this.cache = new NodeCache({ stdTTL: options.ttlSeconds, useClones: false });
    this.registry = options.registry;
  }

  build(document: unknown, dialect: DatabaseDialect): BuiltCatalog {
    const version = schemaVersion(document);
    const cached = this.cache.get<InformationSchemaCatalog>(cacheKey(version, dialect));
    if (cached) {
      return { version, dialect, catalog: cached, built: false };
    }

    const snapshot = loadSchemaSnapshot(document);
    const catalog = new InformationSchemaCatalog(snapshot, { dialect, registry: this.registry });
    this.cache.set(cacheKey(version, dialect), catalog);
    this.builds += 1;
    catalogLogger.info('Catalog cached', { version, dialect, tables: snapshot.tables.length });
    return { version, dialect, catalog, built: true };
  }

  get(version: string, dialect: DatabaseDialect): InformationSchemaCatalog {
    const catalog = this.cache.get<InformationSchemaCatalog>(cacheKey(version, dialect));
    if (!catalog) throw new CatalogNotFoundError(version, dialect);
    return catalog;
  }

  async query(version: string, dialect: DatabaseDialect, sql: string): Promise<Row[]> {
    const catalog = this.get(version, dialect);
    const db = new Database();
    await db.init();
    try {
      db.loadCatalog(catalog);
      try {
        return db.exec(sql);
      } catch (error) {
        throw new CatalogQueryError(error instanceof Error ? error.message : String(error));
      }
    } finally {
      db.close();
    }
  }

  stats(): CatalogServiceStats {
    const { keys, hits, misses } = this.cache.getStats();
    return { catalogs: keys, hits, misses, builds: this.builds };
  }

  close(): void {
    this.cache.close();
  }
}
