import { printSchemaType } from '../../schema/type-printer.js';
import type { Column, Index, Table } from '../../schema/types.js';
import type { DeclareContext, SynthesisContext } from '../pipeline.js';
import { Cols, DEFAULT_CATALOG, INFORMATION_SCHEMA, Tables, Values } from '../names.js';
import { rowFromRecord } from '../rows.js';
import { declareTable, type ColumnDeclaration, type InformationSchemaTable } from '../table.js';
import type { Row } from '../values.js';
import { introspectionKeyColumns } from './constraints.js';

export const INDEXES_COLUMNS: readonly ColumnDeclaration[] = [
  [Cols.TABLE_CATALOG, 'STRING'],
  [Cols.TABLE_SCHEMA, 'STRING'],
  [Cols.TABLE_NAME, 'STRING'],
  [Cols.INDEX_NAME, 'STRING'],
  [Cols.INDEX_TYPE, 'STRING'],
  [Cols.PARENT_TABLE_NAME, 'STRING'],
  [Cols.IS_UNIQUE, 'BOOL'],
  [Cols.IS_NULL_FILTERED, 'BOOL'],
  [Cols.INDEX_STATE, 'STRING'],
  [Cols.SPANNER_IS_MANAGED, 'BOOL'],
];

export const INDEX_COLUMNS_COLUMNS: readonly ColumnDeclaration[] = [
  [Cols.TABLE_CATALOG, 'STRING'],
  [Cols.TABLE_SCHEMA, 'STRING'],
  [Cols.TABLE_NAME, 'STRING'],
  [Cols.INDEX_NAME, 'STRING'],
  [Cols.INDEX_TYPE, 'STRING'],
  [Cols.COLUMN_NAME, 'STRING'],
  [Cols.ORDINAL_POSITION, 'INT64'],
  [Cols.COLUMN_ORDERING, 'STRING'],
  [Cols.IS_NULLABLE, 'STRING'],
  [Cols.SPANNER_TYPE, 'STRING'],
];

export const COLUMN_OPTIONS_COLUMNS: readonly ColumnDeclaration[] = [
  [Cols.TABLE_CATALOG, 'STRING'],
  [Cols.TABLE_SCHEMA, 'STRING'],
  [Cols.TABLE_NAME, 'STRING'],
  [Cols.COLUMN_NAME, 'STRING'],
  [Cols.OPTION_NAME, 'STRING'],
  [Cols.OPTION_TYPE, 'STRING'],
  [Cols.OPTION_VALUE, 'STRING'],
];

export const declareIndexes = ({ adapter }: DeclareContext) => declareTable(Tables.INDEXES, INDEXES_COLUMNS, adapter);
export const declareIndexColumns = ({ adapter }: DeclareContext) =>
  declareTable(Tables.INDEX_COLUMNS, INDEX_COLUMNS_COLUMNS, adapter);
export const declareColumnOptions = ({ adapter }: DeclareContext) =>
  declareTable(Tables.COLUMN_OPTIONS, COLUMN_OPTIONS_COLUMNS, adapter);

const yesNo = (flag: boolean) => (flag ? Values.YES : Values.NO);

function primaryKeyIndexRow(table: InformationSchemaTable, schema: string, tableName: string): Row {
  return rowFromRecord(table, {
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: schema,
    [Cols.TABLE_NAME]: tableName,
    [Cols.INDEX_NAME]: Values.PRIMARY_KEY_INDEX,
    [Cols.INDEX_TYPE]: Values.PRIMARY_KEY_INDEX,
    [Cols.PARENT_TABLE_NAME]: '',
    [Cols.IS_UNIQUE]: true,
    [Cols.IS_NULL_FILTERED]: false,
    [Cols.INDEX_STATE]: null,
    [Cols.SPANNER_IS_MANAGED]: false,
  });
}

function userIndexRow(table: InformationSchemaTable, schema: string, index: Index): Row {
  return rowFromRecord(table, {
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: schema,
    [Cols.TABLE_NAME]: index.table.name,
    [Cols.INDEX_NAME]: index.name,
    [Cols.INDEX_TYPE]: Values.INDEX,
    [Cols.PARENT_TABLE_NAME]: index.parent?.name ?? '',
    [Cols.IS_UNIQUE]: index.unique,
    [Cols.IS_NULL_FILTERED]: index.nullFiltered,
    [Cols.INDEX_STATE]: Values.READ_WRITE,
    [Cols.SPANNER_IS_MANAGED]: index.managed,
  });
}

export function populateIndexes(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  const rows: Row[] = [];
  for (const userTable of ctx.schema.tables) {
    rows.push(primaryKeyIndexRow(table, adapter.userSchemaName, userTable.name));
    for (const index of userTable.indexes) {
      rows.push(userIndexRow(table, adapter.userSchemaName, index));
    }
  }
  const infoSchema = adapter.nameForDialect(INFORMATION_SCHEMA);
  for (const introspection of ctx.introspectionTables()) {
    rows.push(primaryKeyIndexRow(table, infoSchema, introspection.name));
  }
  return rows;
}

interface IndexColumnFields {
  schema: string;
  tableName: string;
  indexName: string;
  indexType: string;
  columnName: string;
  ordinal: number | null;
  ordering: string | null;
  nullable: boolean;
  spannerType: string;
}

function indexColumnRow(table: InformationSchemaTable, fields: IndexColumnFields): Row {
  return rowFromRecord(table, {
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: fields.schema,
    [Cols.TABLE_NAME]: fields.tableName,
    [Cols.INDEX_NAME]: fields.indexName,
    [Cols.INDEX_TYPE]: fields.indexType,
    [Cols.COLUMN_NAME]: fields.columnName,
    [Cols.ORDINAL_POSITION]: fields.ordinal,
    [Cols.COLUMN_ORDERING]: fields.ordering,
    [Cols.IS_NULLABLE]: yesNo(fields.nullable),
    [Cols.SPANNER_TYPE]: fields.spannerType,
  });
}

const spannerTypeOf = (column: Column) => printSchemaType(column.type, column.declaredMaxLength);

function userIndexColumnRows(table: InformationSchemaTable, schema: string, userTable: Table): Row[] {
  const rows: Row[] = userTable.primaryKey.map((key, i) => indexColumnRow(table, {
    schema,
    tableName: userTable.name,
    indexName: Values.PRIMARY_KEY_INDEX,
    indexType: Values.PRIMARY_KEY_INDEX,
    columnName: key.column.name,
    ordinal: i + 1,
    ordering: key.order,
    nullable: key.column.nullable,
    spannerType: spannerTypeOf(key.column),
  }));

  for (const index of userTable.indexes) {
    index.keyColumns.forEach((key, i) => rows.push(indexColumnRow(table, {
      schema,
      tableName: userTable.name,
      indexName: index.name,
      indexType: Values.INDEX,
      columnName: key.column.name,
      ordinal: i + 1,
      ordering: key.order,
      // a null-filtered index holds no NULL keys
      nullable: key.column.nullable && !index.nullFiltered,
      spannerType: spannerTypeOf(key.column),
    })));
    for (const stored of index.storedColumns) {
      rows.push(indexColumnRow(table, {
        schema,
        tableName: userTable.name,
        indexName: index.name,
        indexType: Values.INDEX,
        columnName: stored.name,
        ordinal: null,
        ordering: null,
        nullable: stored.nullable,
        spannerType: spannerTypeOf(stored),
      }));
    }
  }
  return rows;
}

export function populateIndexColumns(ctx: SynthesisContext): Row[] {
  const { adapter, registry, table } = ctx;
  const rows: Row[] = [];
  for (const userTable of ctx.schema.tables) {
    rows.push(...userIndexColumnRows(table, adapter.userSchemaName, userTable));
  }
  const infoSchema = adapter.nameForDialect(INFORMATION_SCHEMA);
  for (const introspection of ctx.introspectionTables()) {
    for (const key of introspectionKeyColumns(registry, introspection)) {
      rows.push(indexColumnRow(table, {
        schema: infoSchema,
        tableName: introspection.name,
        indexName: Values.PRIMARY_KEY_INDEX,
        indexType: Values.PRIMARY_KEY_INDEX,
        columnName: key.column,
        ordinal: key.ordinal,
        ordering: key.ordering,
        nullable: key.nullable,
        spannerType: key.spannerType,
      }));
    }
  }
  return rows;
}

export function populateColumnOptions(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  const rows: Row[] = [];
  for (const userTable of ctx.schema.tables) {
    for (const column of userTable.columns) {
      if (!column.allowsCommitTimestamp) continue;
      rows.push(rowFromRecord(table, {
        [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
        [Cols.TABLE_SCHEMA]: adapter.userSchemaName,
        [Cols.TABLE_NAME]: userTable.name,
        [Cols.COLUMN_NAME]: column.name,
        [Cols.OPTION_NAME]: Values.ALLOW_COMMIT_TIMESTAMP,
        [Cols.OPTION_TYPE]: Values.BOOL,
        [Cols.OPTION_VALUE]: Values.TRUE,
      }));
    }
  }
  return rows;
}
