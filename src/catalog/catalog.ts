import { UnknownTableError } from '../errors.js';
import type { SchemaSnapshot } from '../schema/types.js';
import { catalogLogger } from '../utils/logger.js';
import { createDialectAdapter, type DatabaseDialect, type DialectAdapter } from './dialect.js';
import { Tables } from './names.js';
import {
  CatalogBuildPipeline,
  type DeclareContext,
  type TableDeclaration,
  type TablePopulator,
} from './pipeline.js';
import { entriesForTable, loadColumnRegistry, type ColumnRegistry } from './registry.js';
import {
  declareCheckConstraints,
  declareConstraintColumnUsage,
  declareConstraintTableUsage,
  declareKeyColumnUsage,
  declareReferentialConstraints,
  declareTableConstraints,
  populateCheckConstraints,
  populateConstraintColumnUsage,
  populateConstraintTableUsage,
  populateKeyColumnUsage,
  populateReferentialConstraints,
  populateTableConstraints,
} from './synthesizers/constraint-tables.js';
import {
  declareColumnOptions,
  declareIndexColumns,
  declareIndexes,
  populateColumnOptions,
  populateIndexColumns,
  populateIndexes,
} from './synthesizers/index-tables.js';
import {
  populateColumnColumnUsage,
  populateColumns,
  populateDatabaseOptions,
  populateSchemata,
  populateSpannerStatistics,
  populateTables,
  populateViews,
} from './synthesizers/metadata-tables.js';
import { buildTableFromMetadata, type InformationSchemaTable } from './table.js';
import type { CatalogValue } from './values.js';

const fromMetadata = (name: TableDeclaration['name']): TableDeclaration => ({
  name,
  declare: ({ adapter, registry }: DeclareContext) =>
    buildTableFromMetadata(name, entriesForTable(registry, name), adapter),
});

/** Declare order: registry-driven tables first, then the hand-declared ones. */
export const TABLE_DECLARATIONS: readonly TableDeclaration[] = [
  fromMetadata(Tables.SCHEMATA),
  fromMetadata(Tables.DATABASE_OPTIONS),
  fromMetadata(Tables.TABLES),
  fromMetadata(Tables.COLUMNS),
  fromMetadata(Tables.COLUMN_COLUMN_USAGE),
  fromMetadata(Tables.VIEWS),
  fromMetadata(Tables.SPANNER_STATISTICS),
  { name: Tables.INDEXES, declare: declareIndexes },
  { name: Tables.INDEX_COLUMNS, declare: declareIndexColumns },
  { name: Tables.COLUMN_OPTIONS, declare: declareColumnOptions },
  { name: Tables.CHECK_CONSTRAINTS, declare: declareCheckConstraints },
  { name: Tables.TABLE_CONSTRAINTS, declare: declareTableConstraints },
  { name: Tables.CONSTRAINT_TABLE_USAGE, declare: declareConstraintTableUsage },
  { name: Tables.REFERENTIAL_CONSTRAINTS, declare: declareReferentialConstraints },
  { name: Tables.KEY_COLUMN_USAGE, declare: declareKeyColumnUsage },
  { name: Tables.CONSTRAINT_COLUMN_USAGE, declare: declareConstraintColumnUsage },
];

/**
 * Populate order. Tables that list the introspection tables themselves are
 * marked self-descriptive and run after the simple ones.
 */
export const TABLE_POPULATORS: readonly TablePopulator[] = [
  { name: Tables.SCHEMATA, selfDescriptive: false, populate: populateSchemata },
  { name: Tables.DATABASE_OPTIONS, selfDescriptive: false, populate: populateDatabaseOptions },
  { name: Tables.COLUMN_OPTIONS, selfDescriptive: false, populate: populateColumnOptions },
  { name: Tables.TABLES, selfDescriptive: true, populate: populateTables },
  { name: Tables.COLUMNS, selfDescriptive: true, populate: populateColumns },
  { name: Tables.COLUMN_COLUMN_USAGE, selfDescriptive: false, populate: populateColumnColumnUsage },
  { name: Tables.VIEWS, selfDescriptive: false, populate: populateViews },
  { name: Tables.SPANNER_STATISTICS, selfDescriptive: false, populate: populateSpannerStatistics },
  { name: Tables.INDEXES, selfDescriptive: true, populate: populateIndexes },
  { name: Tables.INDEX_COLUMNS, selfDescriptive: true, populate: populateIndexColumns },
  { name: Tables.CHECK_CONSTRAINTS, selfDescriptive: true, populate: populateCheckConstraints },
  { name: Tables.TABLE_CONSTRAINTS, selfDescriptive: true, populate: populateTableConstraints },
  { name: Tables.CONSTRAINT_TABLE_USAGE, selfDescriptive: true, populate: populateConstraintTableUsage },
  { name: Tables.REFERENTIAL_CONSTRAINTS, selfDescriptive: true, populate: populateReferentialConstraints },
  { name: Tables.KEY_COLUMN_USAGE, selfDescriptive: true, populate: populateKeyColumnUsage },
  { name: Tables.CONSTRAINT_COLUMN_USAGE, selfDescriptive: true, populate: populateConstraintColumnUsage },
];

export interface CatalogOptions {
  dialect: DatabaseDialect;
  /** Defaults to the process-wide registry under data/. */
  registry?: ColumnRegistry;
}

/**
 * Read-only INFORMATION_SCHEMA for one schema snapshot in one dialect. All
 * tables are built in the constructor; a schema change means a new catalog.
 */
export class InformationSchemaCatalog {
  readonly dialect: DatabaseDialect;
  private readonly adapter: DialectAdapter;
  private readonly byName = new Map<string, InformationSchemaTable>();
  private readonly ordered: readonly InformationSchemaTable[];

  constructor(schema: SchemaSnapshot, options: CatalogOptions) {
    this.dialect = options.dialect;
    this.adapter = createDialectAdapter(options.dialect);
    const started = Date.now();

    const pipeline = new CatalogBuildPipeline(schema, this.adapter, options.registry ?? loadColumnRegistry());
    this.ordered = Object.freeze(pipeline.run(TABLE_DECLARATIONS, TABLE_POPULATORS));
    for (const table of this.ordered) {
      this.byName.set(table.name, table);
    }

    const report = pipeline.report();
    catalogLogger.debug('Catalog built', {
      dialect: this.dialect,
      userTables: schema.tables.length,
      views: schema.views.length,
      tables: report.tables,
      rows: report.rows,
      durationMs: Date.now() - started,
    });
  }

  tables(): readonly InformationSchemaTable[] {
    return this.ordered;
  }

  tableNames(): string[] {
    return this.ordered.map((t) => t.name);
  }

  /** Table by its exact dialect-cased name. */
  getTable(name: string): InformationSchemaTable | undefined {
    return this.byName.get(name);
  }

  findTable(name: string): InformationSchemaTable | undefined {
    return this.byName.get(this.adapter.nameForDialect(name));
  }

  toRecords(name: string): Record<string, CatalogValue>[] {
    const table = this.findTable(name);
    if (!table) throw new UnknownTableError(name);
    return table.toRecords();
  }
}
