/**
 * Express API server for catalog builds and queries.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { config as defaultConfig, DialectSchema, type AppConfig } from '../config.js';
import type { DatabaseDialect } from '../catalog/dialect.js';
import { CatalogInvariantError, SchemaSnapshotError, UnknownTableError } from '../errors.js';
import { CatalogNotFoundError, CatalogQueryError, CatalogService } from '../service/catalog-service.js';
import { apiLogger } from '../utils/logger.js';

// Request validation schemas
const CreateCatalogSchema = z.object({
  schema: z.unknown(),
  dialect: DialectSchema.optional(),
});

const DialectQuerySchema = z.object({
  dialect: DialectSchema.optional(),
});

const QueryRequestSchema = z.object({
  sql: z.string().min(1).max(10000),
  dialect: DialectSchema.optional(),
});

export interface AppOptions {
  service?: CatalogService;
  config?: AppConfig;
  /** Runs once the 500 for an invariant violation has been sent. Defaults to exiting. */
  onFatal?: (error: CatalogInvariantError) => void;
}

export function createApp(options: AppOptions = {}): Express {
  const config = options.config ?? defaultConfig;
  const service = options.service ?? new CatalogService({ ttlSeconds: config.CACHE_TTL });
  const onFatal = options.onFatal ?? (() => process.exit(1));
  const dialectOf = (requested: DatabaseDialect | undefined): DatabaseDialect => requested ?? config.CATALOG_DIALECT;

  const app: Express = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Rate limiting
  app.use('/api/', rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    max: config.RATE_LIMIT_REQUESTS,
    message: 'Too many requests from this IP, please try again later.',
  }));

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      catalogs: service.stats(),
    });
  });

  // Build (or fetch the cached) catalog for a schema document
  app.post('/api/catalogs', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = CreateCatalogSchema.parse(req.body);
      const { version, dialect, catalog, built } = service.build(body.schema, dialectOf(body.dialect));
      res.status(built ? 201 : 200).json({
        version,
        dialect,
        cached: !built,
        tables: catalog.tableNames(),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/catalogs/:version/tables', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { dialect } = DialectQuerySchema.parse(req.query);
      const catalog = service.get(req.params.version, dialectOf(dialect));
      res.json({
        version: req.params.version,
        dialect: catalog.dialect,
        tables: catalog.tables().map((table) => ({
          name: table.name,
          columns: table.columns,
          rowCount: table.rows.length,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/catalogs/:version/tables/:name', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { dialect } = DialectQuerySchema.parse(req.query);
      const catalog = service.get(req.params.version, dialectOf(dialect));
      const rows = catalog.toRecords(req.params.name);
      res.json({ version: req.params.version, dialect: catalog.dialect, table: req.params.name, rows });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/catalogs/:version/query', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = QueryRequestSchema.parse(req.body);
      const rows = await service.query(req.params.version, dialectOf(body.dialect), body.sql);
      res.json({ version: req.params.version, rowCount: rows.length, rows });
    } catch (error) {
      next(error);
    }
  });

  // Error handling middleware
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({ error: 'Validation error', details: error.errors });
      return;
    }
    if (error instanceof SchemaSnapshotError) {
      res.status(422).json({ error: 'Invalid schema document', details: error.issues });
      return;
    }
    if (error instanceof CatalogNotFoundError || error instanceof UnknownTableError) {
      res.status(404).json({ error: error.message });
      return;
    }
    if (error instanceof CatalogQueryError) {
      res.status(400).json({ error: 'Query failed', message: error.message });
      return;
    }

    if (error instanceof CatalogInvariantError) {
      const fatal = error;
      res.once('finish', () => onFatal(fatal));
    }
    apiLogger.error('Request failed', {
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    res.status(500).json({
      error: 'Internal server error',
      message: config.NODE_ENV === 'development' && error instanceof Error ? error.message : 'Something went wrong',
    });
  });

  return app;
}

export function startServer(config: AppConfig = defaultConfig): void {
  const app = createApp({ config });
  app.listen(config.PORT, () => {
    apiLogger.info(`Catalog server running on http://localhost:${config.PORT}`, { dialect: config.CATALOG_DIALECT });
  });
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer();
}
