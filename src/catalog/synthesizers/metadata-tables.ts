import { invariant } from '../../errors.js';
import { parseSchemaType, printSchemaType } from '../../schema/type-printer.js';
import type { Column, RowDeletionPolicy, Table, View } from '../../schema/types.js';
import type { SynthesisContext } from '../pipeline.js';
import { Cols, INFORMATION_SCHEMA, Values } from '../names.js';
import { catalogTypeForSpannerType, lookupColumnMetadata } from '../registry.js';
import { rowFromOverrides } from '../rows.js';
import type { InformationSchemaTable } from '../table.js';
import type { Row } from '../values.js';

/**
 * Drops the first and last character when they are `(` and `)`. Only those
 * two characters are looked at, so `(a) + (b)` becomes `a) + (b`, and
 * surrounding whitespace is kept.
 */
export function stripOuterParentheses(expression: string): string {
  if (expression.startsWith('(') && expression.endsWith(')')) return expression.slice(1, -1);
  return expression;
}

export function rowDeletionPolicyExpression(policy: RowDeletionPolicy): string {
  return `OLDER_THAN(${policy.column.name}, INTERVAL ${policy.olderThanDays} DAY)`;
}

export function populateSchemata(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  return [
    rowFromOverrides(table, { [Cols.SCHEMA_NAME]: adapter.userSchemaName }),
    rowFromOverrides(table, { [Cols.SCHEMA_NAME]: adapter.nameForDialect(INFORMATION_SCHEMA) }),
  ];
}

export function populateDatabaseOptions(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  return [
    rowFromOverrides(table, {
      [Cols.SCHEMA_NAME]: adapter.userSchemaName,
      [Cols.OPTION_NAME]: Values.DATABASE_DIALECT_OPTION,
      [Cols.OPTION_TYPE]: adapter.stringOptionType,
      [Cols.OPTION_VALUE]: adapter.dialectOptionValue,
    }),
  ];
}

export function populateTables(ctx: SynthesisContext): Row[] {
  const { adapter, schema, table } = ctx;
  const userSchema = adapter.userSchemaName;
  const rows: Row[] = [];

  for (const userTable of schema.tables) {
    const parent = userTable.parent;
    rows.push(rowFromOverrides(table, {
      [Cols.TABLE_SCHEMA]: userSchema,
      [Cols.TABLE_NAME]: userTable.name,
      [Cols.TABLE_TYPE]: Values.BASE_TABLE,
      [Cols.PARENT_TABLE_NAME]: parent ? parent.name : null,
      [Cols.ON_DELETE_ACTION]: parent ? userTable.onDeleteAction ?? Values.NO_ACTION : null,
      [Cols.SPANNER_STATE]: Values.COMMITTED,
      [Cols.INTERLEAVE_TYPE]: parent ? Values.IN_PARENT : null,
      [Cols.ROW_DELETION_POLICY_EXPRESSION]: userTable.rowDeletionPolicy
        ? rowDeletionPolicyExpression(userTable.rowDeletionPolicy)
        : null,
    }));
  }

  for (const view of schema.views) {
    rows.push(rowFromOverrides(table, {
      [Cols.TABLE_SCHEMA]: userSchema,
      [Cols.TABLE_NAME]: view.name,
      [Cols.TABLE_TYPE]: Values.VIEW,
      [Cols.PARENT_TABLE_NAME]: null,
      [Cols.ON_DELETE_ACTION]: null,
      [Cols.SPANNER_STATE]: Values.COMMITTED,
      [Cols.INTERLEAVE_TYPE]: null,
      [Cols.ROW_DELETION_POLICY_EXPRESSION]: null,
    }));
  }

  const infoSchema = adapter.nameForDialect(INFORMATION_SCHEMA);
  for (const introspection of ctx.introspectionTables()) {
    rows.push(rowFromOverrides(table, {
      [Cols.TABLE_SCHEMA]: infoSchema,
      [Cols.TABLE_NAME]: introspection.name,
      [Cols.TABLE_TYPE]: Values.VIEW,
      [Cols.PARENT_TABLE_NAME]: null,
      [Cols.ON_DELETE_ACTION]: null,
      [Cols.SPANNER_STATE]: null,
      [Cols.INTERLEAVE_TYPE]: null,
      [Cols.ROW_DELETION_POLICY_EXPRESSION]: null,
    }));
  }

  return rows;
}

function userColumnRow(ctx: SynthesisContext, userTable: Table, column: Column, ordinal: number): Row {
  const { adapter, table } = ctx;
  const generated = column.generated;
  return rowFromOverrides(table, {
    [Cols.TABLE_SCHEMA]: adapter.userSchemaName,
    [Cols.TABLE_NAME]: userTable.name,
    [Cols.COLUMN_NAME]: column.name,
    [Cols.ORDINAL_POSITION]: ordinal,
    [Cols.COLUMN_DEFAULT]: column.defaultExpression ?? null,
    [Cols.DATA_TYPE]: null,
    [Cols.IS_NULLABLE]: column.nullable ? Values.YES : Values.NO,
    [Cols.SPANNER_TYPE]: printSchemaType(column.type, column.declaredMaxLength),
    [Cols.CHARACTER_MAXIMUM_LENGTH]: column.type.kind === 'ARRAY' ? null : column.declaredMaxLength ?? null,
    [Cols.NUMERIC_PRECISION]: adapter.numericPrecision(column.type),
    [Cols.NUMERIC_PRECISION_RADIX]: adapter.numericPrecisionRadix(column.type),
    [Cols.NUMERIC_SCALE]: adapter.numericScale(column.type),
    [Cols.IS_GENERATED]: generated ? Values.ALWAYS : Values.NEVER,
    [Cols.GENERATION_EXPRESSION]: generated ? stripOuterParentheses(generated.expression) : null,
    [Cols.IS_STORED]: generated ? (generated.stored ? Values.YES : Values.NO) : null,
    [Cols.SPANNER_STATE]: Values.COMMITTED,
  });
}

function viewColumnRows(ctx: SynthesisContext, view: View): Row[] {
  const { adapter, table } = ctx;
  return view.columns.map((column, i) => rowFromOverrides(table, {
    [Cols.TABLE_SCHEMA]: adapter.userSchemaName,
    [Cols.TABLE_NAME]: view.name,
    [Cols.COLUMN_NAME]: column.name,
    [Cols.ORDINAL_POSITION]: i + 1,
    [Cols.COLUMN_DEFAULT]: null,
    [Cols.DATA_TYPE]: null,
    [Cols.IS_NULLABLE]: Values.YES,
    [Cols.SPANNER_TYPE]: printSchemaType(column.type),
    [Cols.CHARACTER_MAXIMUM_LENGTH]: null,
    [Cols.NUMERIC_PRECISION]: adapter.numericPrecision(column.type),
    [Cols.NUMERIC_PRECISION_RADIX]: adapter.numericPrecisionRadix(column.type),
    [Cols.NUMERIC_SCALE]: adapter.numericScale(column.type),
    [Cols.IS_GENERATED]: Values.NEVER,
    [Cols.GENERATION_EXPRESSION]: null,
    [Cols.IS_STORED]: null,
    [Cols.SPANNER_STATE]: Values.COMMITTED,
  }));
}

function introspectionColumnRows(ctx: SynthesisContext, introspection: InformationSchemaTable): Row[] {
  const { adapter, registry, table } = ctx;
  const infoSchema = adapter.nameForDialect(INFORMATION_SCHEMA);
  return introspection.columns.map((column, i) => {
    const entry = lookupColumnMetadata(registry, introspection.name, column.name);
    invariant(catalogTypeForSpannerType(entry.spanner_type) === column.type, () =>
      `Declared type of ${introspection.name}.${column.name} disagrees with its metadata ${entry.spanner_type}`);
    const parsed = parseSchemaType(entry.spanner_type);
    invariant(parsed, () => `Unparseable metadata type ${entry.spanner_type}`);
    return rowFromOverrides(table, {
      [Cols.TABLE_SCHEMA]: infoSchema,
      [Cols.TABLE_NAME]: introspection.name,
      [Cols.COLUMN_NAME]: column.name,
      [Cols.ORDINAL_POSITION]: i + 1,
      [Cols.COLUMN_DEFAULT]: null,
      [Cols.DATA_TYPE]: null,
      [Cols.IS_NULLABLE]: entry.is_nullable,
      [Cols.SPANNER_TYPE]: entry.spanner_type,
      [Cols.CHARACTER_MAXIMUM_LENGTH]: null,
      [Cols.NUMERIC_PRECISION]: adapter.numericPrecision(parsed.type),
      [Cols.NUMERIC_PRECISION_RADIX]: adapter.numericPrecisionRadix(parsed.type),
      [Cols.NUMERIC_SCALE]: adapter.numericScale(parsed.type),
      [Cols.IS_GENERATED]: Values.NEVER,
      [Cols.GENERATION_EXPRESSION]: null,
      [Cols.IS_STORED]: null,
      [Cols.SPANNER_STATE]: null,
    });
  });
}

export function populateColumns(ctx: SynthesisContext): Row[] {
  const rows: Row[] = [];
  for (const userTable of ctx.schema.tables) {
    userTable.columns.forEach((column, i) => rows.push(userColumnRow(ctx, userTable, column, i + 1)));
  }
  for (const view of ctx.schema.views) {
    rows.push(...viewColumnRows(ctx, view));
  }
  for (const introspection of ctx.introspectionTables()) {
    rows.push(...introspectionColumnRows(ctx, introspection));
  }
  return rows;
}

export function populateColumnColumnUsage(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  const rows: Row[] = [];
  for (const userTable of ctx.schema.tables) {
    for (const column of userTable.columns) {
      for (const used of column.generated?.dependentColumns ?? []) {
        rows.push(rowFromOverrides(table, {
          [Cols.TABLE_SCHEMA]: adapter.userSchemaName,
          [Cols.TABLE_NAME]: userTable.name,
          [Cols.COLUMN_NAME]: used.name,
          [Cols.DEPENDENT_COLUMN]: column.name,
        }));
      }
    }
  }
  return rows;
}

export function populateViews(ctx: SynthesisContext): Row[] {
  const { adapter, table } = ctx;
  return ctx.schema.views.map((view) => rowFromOverrides(table, {
    [Cols.TABLE_SCHEMA]: adapter.userSchemaName,
    [Cols.TABLE_NAME]: view.name,
    [Cols.VIEW_DEFINITION]: view.definition,
  }));
}

export function populateSpannerStatistics(): Row[] {
  return [];
}
