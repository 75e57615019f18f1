/**
 * One pass over the schema that lists every constraint the catalog reports.
 * TABLE_CONSTRAINTS, CHECK_CONSTRAINTS, CONSTRAINT_TABLE_USAGE,
 * REFERENTIAL_CONSTRAINTS, KEY_COLUMN_USAGE and CONSTRAINT_COLUMN_USAGE are
 * all projections of this list, so their constraint names always agree.
 */

import { invariant } from '../../errors.js';
import type { Index, SchemaSnapshot, Table } from '../../schema/types.js';
import type { DialectAdapter } from '../dialect.js';
import {
  INFORMATION_SCHEMA,
  Values,
  checkNotNullClause,
  checkNotNullName,
  primaryKeyName,
} from '../names.js';
import { findKeyColumnMetadata, lookupColumnMetadata, isNullableEntry, type ColumnRegistry } from '../registry.js';
import type { InformationSchemaTable } from '../table.js';

export type ConstraintType =
  | typeof Values.PRIMARY_KEY
  | typeof Values.CHECK
  | typeof Values.FOREIGN_KEY
  | typeof Values.UNIQUE;

export interface ConstraintKeyColumn {
  column: string;
  ordinal: number;
  positionInUniqueConstraint: number | null;
}

export interface DerivedConstraint {
  /** CONSTRAINT_SCHEMA and TABLE_SCHEMA of every row about this constraint. */
  schema: string;
  name: string;
  type: ConstraintType;
  /** Table the constraint is declared on. */
  table: string;
  /** Table whose columns the constraint uses; the referenced table for a foreign key. */
  usedTable: string;
  usedColumns: readonly string[];
  /** Key columns on `table`, for KEY_COLUMN_USAGE. */
  keyColumns: readonly ConstraintKeyColumn[];
  checkClause?: string;
  /** Name of the unique constraint a foreign key references. */
  uniqueConstraintName?: string;
}

export interface IntrospectionKeyColumn {
  column: string;
  ordinal: number;
  ordering: string;
  nullable: boolean;
  spannerType: string;
}

/**
 * Primary-key columns of an introspection table in key order. A registry
 * ordinal of 0 takes the next running ordinal; the counter only advances
 * for those entries.
 */
export function introspectionKeyColumns(
  registry: ColumnRegistry,
  table: InformationSchemaTable,
): IntrospectionKeyColumn[] {
  let running = 0;
  const keyColumns: IntrospectionKeyColumn[] = [];
  for (const column of table.columns) {
    const entry = findKeyColumnMetadata(registry, table.name, column.name);
    if (!entry) continue;
    let ordinal = entry.primary_key_ordinal;
    if (ordinal === 0) {
      running += 1;
      ordinal = running;
    }
    keyColumns.push({
      column: column.name,
      ordinal,
      ordering: entry.column_ordering,
      nullable: isNullableEntry(entry),
      spannerType: entry.spanner_type,
    });
  }
  invariant(keyColumns.length > 0, () => `Introspection table ${table.name} has no primary key metadata`);
  // Array.prototype.sort is stable, so equal ordinals keep column order.
  return keyColumns.sort((a, b) => a.ordinal - b.ordinal);
}

function primaryKeyConstraint(schema: string, table: Table): DerivedConstraint {
  const columns = table.primaryKey.map((k) => k.column.name);
  return {
    schema,
    name: primaryKeyName(table.name),
    type: Values.PRIMARY_KEY,
    table: table.name,
    usedTable: table.name,
    usedColumns: columns,
    keyColumns: columns.map((column, i) => ({ column, ordinal: i + 1, positionInUniqueConstraint: null })),
  };
}

function notNullConstraint(schema: string, table: string, column: string): DerivedConstraint {
  return {
    schema,
    name: checkNotNullName(table, column),
    type: Values.CHECK,
    table,
    usedTable: table,
    usedColumns: [column],
    keyColumns: [],
    checkClause: checkNotNullClause(column),
  };
}

function uniqueIndexConstraint(schema: string, index: Index): DerivedConstraint {
  const columns = index.keyColumns.map((k) => k.column.name);
  return {
    schema,
    name: index.name,
    type: Values.UNIQUE,
    table: index.table.name,
    usedTable: index.table.name,
    usedColumns: columns,
    keyColumns: columns.map((column, i) => ({ column, ordinal: i + 1, positionInUniqueConstraint: null })),
  };
}

function userTableConstraints(schema: string, table: Table, emittedUnique: Set<string>): DerivedConstraint[] {
  const constraints: DerivedConstraint[] = [primaryKeyConstraint(schema, table)];

  for (const column of table.columns) {
    if (!column.nullable) constraints.push(notNullConstraint(schema, table.name, column.name));
  }

  for (const check of table.checkConstraints) {
    constraints.push({
      schema,
      name: check.name,
      type: Values.CHECK,
      table: table.name,
      usedTable: table.name,
      usedColumns: check.dependentColumns.map((c) => c.name),
      keyColumns: [],
      checkClause: check.expression,
    });
  }

  for (const fk of table.foreignKeys) {
    invariant(fk.referencingColumns.length === fk.referencedColumns.length, () =>
      `Foreign key ${fk.name} pairs ${fk.referencingColumns.length} columns with ${fk.referencedColumns.length}`);
    const index = fk.referencedIndex;
    constraints.push({
      schema,
      name: fk.name,
      type: Values.FOREIGN_KEY,
      table: table.name,
      usedTable: fk.referencedTable.name,
      usedColumns: fk.referencedColumns.map((c) => c.name),
      keyColumns: fk.referencingColumns.map((c, i) => ({
        column: c.name,
        ordinal: i + 1,
        positionInUniqueConstraint: i + 1,
      })),
      uniqueConstraintName: index ? index.name : primaryKeyName(fk.referencedTable.name),
    });

    if (index) {
      const key = `${index.table.name}\u0000${index.name}`;
      if (!emittedUnique.has(key)) {
        emittedUnique.add(key);
        constraints.push(uniqueIndexConstraint(schema, index));
      }
    }
  }

  return constraints;
}

function introspectionTableConstraints(
  schema: string,
  registry: ColumnRegistry,
  table: InformationSchemaTable,
): DerivedConstraint[] {
  const keyColumns = introspectionKeyColumns(registry, table);
  const constraints: DerivedConstraint[] = [{
    schema,
    name: primaryKeyName(table.name),
    type: Values.PRIMARY_KEY,
    table: table.name,
    usedTable: table.name,
    usedColumns: keyColumns.map((k) => k.column),
    keyColumns: keyColumns.map((k) => ({ column: k.column, ordinal: k.ordinal, positionInUniqueConstraint: null })),
  }];

  for (const column of table.columns) {
    const entry = lookupColumnMetadata(registry, table.name, column.name);
    if (!isNullableEntry(entry)) constraints.push(notNullConstraint(schema, table.name, column.name));
  }
  return constraints;
}

export function deriveConstraints(
  schema: SchemaSnapshot,
  adapter: DialectAdapter,
  registry: ColumnRegistry,
  introspectionTables: readonly InformationSchemaTable[],
): DerivedConstraint[] {
  const emittedUnique = new Set<string>();
  const constraints = schema.tables.flatMap((table) =>
    userTableConstraints(adapter.userSchemaName, table, emittedUnique));

  const infoSchema = adapter.nameForDialect(INFORMATION_SCHEMA);
  for (const table of introspectionTables) {
    constraints.push(...introspectionTableConstraints(infoSchema, registry, table));
  }
  return constraints;
}
