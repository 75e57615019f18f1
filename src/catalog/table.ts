import { invariant } from '../errors.js';
import type { DialectAdapter } from './dialect.js';
import { catalogTypeForSpannerType, type ColumnsMetaEntry } from './registry.js';
import { valueMatchesType, type CatalogType, type CatalogValue, type ColumnDefinition, type Row } from './values.js';

/**
 * One introspection table: a fixed, ordered column list and a row set that
 * is installed exactly once.
 */
export class InformationSchemaTable {
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  private contents: readonly Row[] | undefined;

  constructor(name: string, columns: readonly ColumnDefinition[]) {
    invariant(columns.length > 0, () => `Table ${name} declared without columns`);
    const seen = new Set<string>();
    for (const column of columns) {
      const key = column.name.toUpperCase();
      invariant(!seen.has(key), () => `Duplicate column ${name}.${column.name}`);
      seen.add(key);
    }
    this.name = name;
    this.columns = Object.freeze(columns.map((c) => Object.freeze({ ...c })));
  }

  get populated(): boolean {
    return this.contents !== undefined;
  }

  get rows(): readonly Row[] {
    invariant(this.contents, () => `Table ${this.name} read before it was populated`);
    return this.contents;
  }

  columnIndex(name: string): number {
    const wanted = name.toUpperCase();
    return this.columns.findIndex((c) => c.name.toUpperCase() === wanted);
  }

  /** Installs the full row set. Every row must match the declared shape. */
  setContents(rows: readonly Row[]): void {
    invariant(!this.contents, () => `Table ${this.name} populated twice`);
    rows.forEach((row, r) => {
      invariant(row.length === this.columns.length, () =>
        `Row ${r} of ${this.name} has ${row.length} values, expected ${this.columns.length}`);
      row.forEach((value, i) => {
        const column = this.columns[i];
        invariant(column && valueMatchesType(value, column.type), () =>
          `Row ${r} of ${this.name}: value for ${column?.name ?? i} does not match its declared type`);
      });
    });
    this.contents = Object.freeze(rows.map((row) => Object.freeze([...row])));
  }

  /** Rows as records keyed by the table's (dialect-cased) column names. */
  toRecords(): Record<string, CatalogValue>[] {
    return this.rows.map((row) => {
      const record: Record<string, CatalogValue> = {};
      this.columns.forEach((column, i) => {
        record[column.name] = row[i] ?? null;
      });
      return record;
    });
  }
}

/**
 * Builds a table whose columns are exactly the registry entries for it, in
 * registry order.
 */
export function buildTableFromMetadata(
  tableName: string,
  entries: readonly ColumnsMetaEntry[],
  adapter: DialectAdapter,
): InformationSchemaTable {
  invariant(entries.length > 0, () => `No column metadata for table ${tableName}`);
  const wanted = tableName.toUpperCase();
  const columns = entries.map((entry): ColumnDefinition => {
    invariant(entry.table_name === wanted, () =>
      `Metadata for ${entry.table_name}.${entry.column_name} passed while building ${tableName}`);
    return {
      name: adapter.nameForDialect(entry.column_name),
      type: catalogTypeForSpannerType(entry.spanner_type),
    };
  });
  return new InformationSchemaTable(adapter.nameForDialect(tableName), columns);
}

export type ColumnDeclaration = readonly [name: string, type: CatalogType];

/** Builds a hand-declared table from an explicit column list. */
export function declareTable(
  tableName: string,
  columns: readonly ColumnDeclaration[],
  adapter: DialectAdapter,
): InformationSchemaTable {
  return new InformationSchemaTable(
    adapter.nameForDialect(tableName),
    columns.map(([name, type]) => ({ name: adapter.nameForDialect(name), type })),
  );
}
