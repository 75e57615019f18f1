import type { DeclareContext, SynthesisContext } from '../pipeline.js';
import { Cols, DEFAULT_CATALOG, Tables, Values } from '../names.js';
import { rowFromRecord } from '../rows.js';
import { declareTable, type ColumnDeclaration } from '../table.js';
import type { Row } from '../values.js';

const str = (name: string): ColumnDeclaration => [name, 'STRING'];

export const CHECK_CONSTRAINTS_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
  str(Cols.CHECK_CLAUSE),
  str(Cols.SPANNER_STATE),
];

export const TABLE_CONSTRAINTS_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
  str(Cols.TABLE_CATALOG),
  str(Cols.TABLE_SCHEMA),
  str(Cols.TABLE_NAME),
  str(Cols.CONSTRAINT_TYPE),
  str(Cols.IS_DEFERRABLE),
  str(Cols.INITIALLY_DEFERRED),
  str(Cols.ENFORCED),
];

export const CONSTRAINT_TABLE_USAGE_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.TABLE_CATALOG),
  str(Cols.TABLE_SCHEMA),
  str(Cols.TABLE_NAME),
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
];

export const REFERENTIAL_CONSTRAINTS_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
  str(Cols.UNIQUE_CONSTRAINT_CATALOG),
  str(Cols.UNIQUE_CONSTRAINT_SCHEMA),
  str(Cols.UNIQUE_CONSTRAINT_NAME),
  str(Cols.MATCH_OPTION),
  str(Cols.UPDATE_RULE),
  str(Cols.DELETE_RULE),
  str(Cols.SPANNER_STATE),
];

export const KEY_COLUMN_USAGE_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
  str(Cols.TABLE_CATALOG),
  str(Cols.TABLE_SCHEMA),
  str(Cols.TABLE_NAME),
  str(Cols.COLUMN_NAME),
  [Cols.ORDINAL_POSITION, 'INT64'],
  [Cols.POSITION_IN_UNIQUE_CONSTRAINT, 'INT64'],
];

export const CONSTRAINT_COLUMN_USAGE_COLUMNS: readonly ColumnDeclaration[] = [
  str(Cols.TABLE_CATALOG),
  str(Cols.TABLE_SCHEMA),
  str(Cols.TABLE_NAME),
  str(Cols.COLUMN_NAME),
  str(Cols.CONSTRAINT_CATALOG),
  str(Cols.CONSTRAINT_SCHEMA),
  str(Cols.CONSTRAINT_NAME),
];

export const declareCheckConstraints = ({ adapter }: DeclareContext) =>
  declareTable(Tables.CHECK_CONSTRAINTS, CHECK_CONSTRAINTS_COLUMNS, adapter);
export const declareTableConstraints = ({ adapter }: DeclareContext) =>
  declareTable(Tables.TABLE_CONSTRAINTS, TABLE_CONSTRAINTS_COLUMNS, adapter);
export const declareConstraintTableUsage = ({ adapter }: DeclareContext) =>
  declareTable(Tables.CONSTRAINT_TABLE_USAGE, CONSTRAINT_TABLE_USAGE_COLUMNS, adapter);
export const declareReferentialConstraints = ({ adapter }: DeclareContext) =>
  declareTable(Tables.REFERENTIAL_CONSTRAINTS, REFERENTIAL_CONSTRAINTS_COLUMNS, adapter);
export const declareKeyColumnUsage = ({ adapter }: DeclareContext) =>
  declareTable(Tables.KEY_COLUMN_USAGE, KEY_COLUMN_USAGE_COLUMNS, adapter);
export const declareConstraintColumnUsage = ({ adapter }: DeclareContext) =>
  declareTable(Tables.CONSTRAINT_COLUMN_USAGE, CONSTRAINT_COLUMN_USAGE_COLUMNS, adapter);

export function populateCheckConstraints(ctx: SynthesisContext): Row[] {
  const rows: Row[] = [];
  for (const constraint of ctx.constraints()) {
    if (constraint.type !== Values.CHECK) continue;
    rows.push(rowFromRecord(ctx.table, {
      [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
      [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
      [Cols.CONSTRAINT_NAME]: constraint.name,
      [Cols.CHECK_CLAUSE]: constraint.checkClause ?? '',
      [Cols.SPANNER_STATE]: Values.COMMITTED,
    }));
  }
  return rows;
}

export function populateTableConstraints(ctx: SynthesisContext): Row[] {
  return ctx.constraints().map((constraint) => rowFromRecord(ctx.table, {
    [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
    [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
    [Cols.CONSTRAINT_NAME]: constraint.name,
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: constraint.schema,
    [Cols.TABLE_NAME]: constraint.table,
    [Cols.CONSTRAINT_TYPE]: constraint.type,
    [Cols.IS_DEFERRABLE]: Values.NO,
    [Cols.INITIALLY_DEFERRED]: Values.NO,
    [Cols.ENFORCED]: Values.YES,
  }));
}

export function populateConstraintTableUsage(ctx: SynthesisContext): Row[] {
  return ctx.constraints().map((constraint) => rowFromRecord(ctx.table, {
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: constraint.schema,
    [Cols.TABLE_NAME]: constraint.usedTable,
    [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
    [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
    [Cols.CONSTRAINT_NAME]: constraint.name,
  }));
}

export function populateReferentialConstraints(ctx: SynthesisContext): Row[] {
  const rows: Row[] = [];
  for (const constraint of ctx.constraints()) {
    if (constraint.type !== Values.FOREIGN_KEY) continue;
    rows.push(rowFromRecord(ctx.table, {
      [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
      [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
      [Cols.CONSTRAINT_NAME]: constraint.name,
      [Cols.UNIQUE_CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
      [Cols.UNIQUE_CONSTRAINT_SCHEMA]: constraint.schema,
      [Cols.UNIQUE_CONSTRAINT_NAME]: constraint.uniqueConstraintName ?? null,
      [Cols.MATCH_OPTION]: Values.SIMPLE,
      [Cols.UPDATE_RULE]: Values.NO_ACTION,
      [Cols.DELETE_RULE]: Values.NO_ACTION,
      [Cols.SPANNER_STATE]: Values.COMMITTED,
    }));
  }
  return rows;
}

export function populateKeyColumnUsage(ctx: SynthesisContext): Row[] {
  return ctx.constraints().flatMap((constraint) => constraint.keyColumns.map((key) => rowFromRecord(ctx.table, {
    [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
    [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
    [Cols.CONSTRAINT_NAME]: constraint.name,
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: constraint.schema,
    [Cols.TABLE_NAME]: constraint.table,
    [Cols.COLUMN_NAME]: key.column,
    [Cols.ORDINAL_POSITION]: key.ordinal,
    [Cols.POSITION_IN_UNIQUE_CONSTRAINT]: key.positionInUniqueConstraint,
  })));
}

export function populateConstraintColumnUsage(ctx: SynthesisContext): Row[] {
  return ctx.constraints().flatMap((constraint) => constraint.usedColumns.map((column) => rowFromRecord(ctx.table, {
    [Cols.TABLE_CATALOG]: DEFAULT_CATALOG,
    [Cols.TABLE_SCHEMA]: constraint.schema,
    [Cols.TABLE_NAME]: constraint.usedTable,
    [Cols.COLUMN_NAME]: column,
    [Cols.CONSTRAINT_CATALOG]: DEFAULT_CATALOG,
    [Cols.CONSTRAINT_SCHEMA]: constraint.schema,
    [Cols.CONSTRAINT_NAME]: constraint.name,
  })));
}
