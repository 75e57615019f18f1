export { InformationSchemaCatalog, TABLE_DECLARATIONS, TABLE_POPULATORS } from './catalog/catalog.js';
export type { CatalogOptions } from './catalog/catalog.js';
export { createDialectAdapter, isDatabaseDialect, DATABASE_DIALECTS } from './catalog/dialect.js';
export type { DatabaseDialect, DialectAdapter } from './catalog/dialect.js';
export { Cols, Tables, Values, INFORMATION_SCHEMA } from './catalog/names.js';
export { BuildPhase, CatalogBuildPipeline } from './catalog/pipeline.js';
export {
  createColumnRegistry,
  loadColumnRegistry,
  lookupColumnMetadata,
  findKeyColumnMetadata,
} from './catalog/registry.js';
export type { ColumnRegistry, ColumnsMetaEntry, IndexColumnsMetaEntry } from './catalog/registry.js';
export { rowFromOverrides, rowFromRecord } from './catalog/rows.js';
export { InformationSchemaTable, buildTableFromMetadata, declareTable } from './catalog/table.js';
export type { CatalogType, CatalogValue, Row } from './catalog/values.js';
export { CatalogInvariantError, SchemaSnapshotError, UnknownTableError } from './errors.js';
export { loadSchemaSnapshot, schemaVersion, SchemaDocumentSchema } from './schema/snapshot.js';
export type { SchemaDocument } from './schema/snapshot.js';
export { parseSchemaType, printSchemaType } from './schema/type-printer.js';
export type * from './schema/types.js';
export { Database } from './sqlite/db.js';
export { CatalogService, CatalogNotFoundError, CatalogQueryError } from './service/catalog-service.js';
