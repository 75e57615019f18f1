/**
 * Schema snapshot loader: validates a JSON schema document and links the
 * name references in it into the object graph the catalog walks.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { checkNotNullName, primaryKeyName, Values } from '../catalog/names.js';
import { SchemaSnapshotError, type SnapshotIssue } from '../errors.js';
import { parseSchemaType } from './type-printer.js';
import type {
  CheckConstraint,
  Column,
  ForeignKey,
  Index,
  KeyColumn,
  SchemaSnapshot,
  Table,
  View,
  ViewColumn,
} from './types.js';

const Identifier = z.string().min(1).max(128);

const KeyColumnDoc = z.union([
  Identifier,
  z.object({
    column: Identifier,
    order: z.enum(['ASC', 'DESC']).default('ASC'),
  }),
]);

const ColumnDoc = z.object({
  name: Identifier,
  type: z.string().min(1),
  nullable: z.boolean().default(true),
  default: z.string().optional(),
  generated: z
    .object({
      expression: z.string().min(1),
      stored: z.boolean().default(true),
      dependsOn: z.array(Identifier).default([]),
    })
    .optional(),
  allowCommitTimestamp: z.boolean().default(false),
});

const IndexDoc = z.object({
  name: Identifier,
  keyColumns: z.array(KeyColumnDoc).min(1),
  storedColumns: z.array(Identifier).default([]),
  unique: z.boolean().default(false),
  nullFiltered: z.boolean().default(false),
  managed: z.boolean().default(false),
  interleaveIn: Identifier.optional(),
});

const ForeignKeyDoc = z.object({
  name: Identifier,
  columns: z.array(Identifier).min(1),
  referencedTable: Identifier,
  referencedColumns: z.array(Identifier).min(1),
  referencedIndex: Identifier.optional(),
});

const CheckConstraintDoc = z.object({
  name: Identifier,
  expression: z.string().min(1),
  columns: z.array(Identifier).default([]),
});

const TableDoc = z.object({
  name: Identifier,
  columns: z.array(ColumnDoc).min(1),
  primaryKey: z.array(KeyColumnDoc).default([]),
  indexes: z.array(IndexDoc).default([]),
  foreignKeys: z.array(ForeignKeyDoc).default([]),
  checkConstraints: z.array(CheckConstraintDoc).default([]),
  interleaveIn: z
    .object({
      parent: Identifier,
      onDelete: z.enum(['CASCADE', 'NO ACTION']).default('NO ACTION'),
    })
    .optional(),
  rowDeletionPolicy: z
    .object({
      column: Identifier,
      olderThanDays: z.number().int().nonnegative(),
    })
    .optional(),
});

const ViewDoc = z.object({
  name: Identifier,
  definition: z.string().min(1),
  columns: z
    .array(
      z.object({
        name: Identifier,
        type: z.string().min(1),
      }),
    )
    .default([]),
});

export const SchemaDocumentSchema = z.object({
  tables: z.array(TableDoc).default([]),
  views: z.array(ViewDoc).default([]),
});

/** Shape accepted from callers (defaults not yet applied). */
export type SchemaDocument = z.input<typeof SchemaDocumentSchema>;
type ParsedDocument = z.output<typeof SchemaDocumentSchema>;
type ParsedKeyColumn = z.output<typeof KeyColumnDoc>;

function parseDocument(document: unknown): ParsedDocument {
  const result = SchemaDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new SchemaSnapshotError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/**
 * Stable identifier of a schema document. Two documents that parse to the
 * same normalized shape share a version.
 */
export function schemaVersion(document: unknown): string {
  const parsed = parseDocument(document);
  return createHash('sha256').update(JSON.stringify(parsed)).digest('hex').slice(0, 16);
}

/**
 * Resolves names and collects issues. Tables, views, indexes and constraints
 * (including the synthesized PK_ and CK_IS_NOT_NULL_ ones) share one name space.
 */
class Linker {
  readonly issues: SnapshotIssue[] = [];
  private readonly tablesByName = new Map<string, Table>();
  private readonly owners = new Map<string, string>();

  report(path: string, message: string): void {
    this.issues.push({ path, message });
  }

  /** Records `name` as taken by `owner`; false when something already holds it. */
  claim(name: string, owner: string, path: string): boolean {
    const holder = this.owners.get(name);
    if (holder === undefined) {
      this.owners.set(name, owner);
      return true;
    }
    this.report(path, holder === owner ? `duplicate ${owner}` : `${owner} conflicts with ${holder}`);
    return false;
  }

  addTable(table: Table, path: string): boolean {
    if (!this.claim(table.name, `table "${table.name}"`, path)) return false;
    this.tablesByName.set(table.name, table);
    return true;
  }

  table(name: string, path: string): Table | undefined {
    const table = this.tablesByName.get(name);
    if (!table) this.report(path, `unknown table "${name}"`);
    return table;
  }

  column(table: Table, name: string, path: string): Column | undefined {
    const column = table.columns.find((c) => c.name === name);
    if (!column) this.report(path, `unknown column "${name}" in table "${table.name}"`);
    return column;
  }

  columns(table: Table, names: readonly string[], path: string): Column[] {
    const resolved: Column[] = [];
    names.forEach((name, i) => {
      const column = this.column(table, name, `${path}[${i}]`);
      if (column) resolved.push(column);
    });
    return resolved;
  }

  keyColumns(table: Table, keys: readonly ParsedKeyColumn[], path: string): KeyColumn[] {
    const resolved: KeyColumn[] = [];
    keys.forEach((key, i) => {
      const name = typeof key === 'string' ? key : key.column;
      const order = typeof key === 'string' ? 'ASC' : key.order;
      const column = this.column(table, name, `${path}[${i}]`);
      if (column) resolved.push({ column, order });
    });
    return resolved;
  }
}

function sameColumnSet(left: readonly string[], right: readonly string[]): boolean {
  const names = new Set(left);
  return names.size === right.length && right.every((name) => names.has(name));
}

function buildColumn(doc: ParsedDocument['tables'][number]['columns'][number], path: string, linker: Linker): Column {
  const parsed = parseSchemaType(doc.type);
  if (!parsed) linker.report(`${path}.type`, `unknown column type "${doc.type}"`);
  const column: Column = {
    name: doc.name,
    type: parsed?.type ?? { kind: 'STRING' },
    nullable: doc.nullable,
    allowsCommitTimestamp: doc.allowCommitTimestamp,
  };
  if (parsed?.maxLength !== undefined) column.declaredMaxLength = parsed.maxLength;
  if (doc.default !== undefined) column.defaultExpression = doc.default;
  return column;
}

function buildView(doc: ParsedDocument['views'][number], path: string, linker: Linker): View {
  const columns: ViewColumn[] = doc.columns.map((c, i) => {
    const parsed = parseSchemaType(c.type);
    if (!parsed) linker.report(`${path}.columns[${i}].type`, `unknown column type "${c.type}"`);
    return { name: c.name, type: parsed?.type ?? { kind: 'STRING' } };
  });
  return { name: doc.name, definition: doc.definition, columns };
}

/**
 * Validates a schema document and returns the linked snapshot.
 * Throws SchemaSnapshotError listing every problem found.
 */
export function loadSchemaSnapshot(document: unknown): SchemaSnapshot {
  const parsed = parseDocument(document);
  const linker = new Linker();

  // Pass 1: tables and their columns, so later passes can resolve any name.
  const tables: Table[] = parsed.tables.map((doc, t) => {
    const path = `tables[${t}]`;
    const columns = doc.columns.map((c, i) => buildColumn(c, `${path}.columns[${i}]`, linker));
    const table: Table = {
      name: doc.name,
      columns,
      primaryKey: [],
      indexes: [],
      foreignKeys: [],
      checkConstraints: [],
    };
    if (linker.addTable(table, path)) {
      linker.claim(primaryKeyName(table.name), `primary key "${primaryKeyName(table.name)}"`, path);
      const seen = new Set<string>();
      columns.forEach((column, i) => {
        const columnPath = `${path}.columns[${i}]`;
        if (seen.has(column.name)) {
          linker.report(columnPath, `duplicate column "${column.name}" in table "${table.name}"`);
          return;
        }
        seen.add(column.name);
        if (!column.nullable) {
          const name = checkNotNullName(table.name, column.name);
          linker.claim(name, `not-null check "${name}"`, columnPath);
        }
      });
    }
    return table;
  });

  // Pass 2: everything that stays inside a table or points at its parent.
  parsed.tables.forEach((doc, t) => {
    const path = `tables[${t}]`;
    const table = tables[t];
    if (!table) return;

    doc.columns.forEach((c, i) => {
      const column = table.columns[i];
      if (!c.generated || !column) return;
      column.generated = {
        expression: c.generated.expression,
        stored: c.generated.stored,
        dependentColumns: linker.columns(table, c.generated.dependsOn, `${path}.columns[${i}].generated.dependsOn`),
      };
    });

    table.primaryKey = linker.keyColumns(table, doc.primaryKey, `${path}.primaryKey`);

    if (doc.interleaveIn) {
      const parent = linker.table(doc.interleaveIn.parent, `${path}.interleaveIn.parent`);
      if (parent) {
        table.parent = parent;
        table.onDeleteAction = doc.interleaveIn.onDelete;
      }
    }

    if (doc.rowDeletionPolicy) {
      const column = linker.column(table, doc.rowDeletionPolicy.column, `${path}.rowDeletionPolicy.column`);
      if (column) table.rowDeletionPolicy = { column, olderThanDays: doc.rowDeletionPolicy.olderThanDays };
    }

    table.indexes = doc.indexes.map((ix, i): Index => {
      const ixPath = `${path}.indexes[${i}]`;
      if (ix.name === Values.PRIMARY_KEY_INDEX) {
        linker.report(ixPath, `index name "${ix.name}" is reserved for the primary key`);
      } else {
        linker.claim(ix.name, `index "${ix.name}"`, ixPath);
      }
      const index: Index = {
        name: ix.name,
        table,
        keyColumns: linker.keyColumns(table, ix.keyColumns, `${ixPath}.keyColumns`),
        storedColumns: linker.columns(table, ix.storedColumns, `${ixPath}.storedColumns`),
        unique: ix.unique,
        nullFiltered: ix.nullFiltered,
        managed: ix.managed,
      };
      if (ix.interleaveIn) {
        const parent = linker.table(ix.interleaveIn, `${ixPath}.interleaveIn`);
        if (parent) index.parent = parent;
      }
      return index;
    });

    table.checkConstraints = doc.checkConstraints.map((ck, i): CheckConstraint => {
      const ckPath = `${path}.checkConstraints[${i}]`;
      linker.claim(ck.name, `check constraint "${ck.name}"`, ckPath);
      return {
        name: ck.name,
        expression: ck.expression,
        dependentColumns: linker.columns(table, ck.columns, `${ckPath}.columns`),
      };
    });
  });

  // Pass 3: foreign keys, which need the referenced table's indexes.
  parsed.tables.forEach((doc, t) => {
    const path = `tables[${t}]`;
    const table = tables[t];
    if (!table) return;

    const foreignKeys: ForeignKey[] = [];
    doc.foreignKeys.forEach((fk, i) => {
      const fkPath = `${path}.foreignKeys[${i}]`;
      linker.claim(fk.name, `foreign key "${fk.name}"`, fkPath);
      if (fk.columns.length !== fk.referencedColumns.length) {
        linker.report(fkPath, `foreign key "${fk.name}" has ${fk.columns.length} referencing and ${fk.referencedColumns.length} referenced columns`);
        return;
      }
      const referencedTable = linker.table(fk.referencedTable, `${fkPath}.referencedTable`);
      if (!referencedTable) return;

      const foreignKey: ForeignKey = {
        name: fk.name,
        referencingColumns: linker.columns(table, fk.columns, `${fkPath}.columns`),
        referencedTable,
        referencedColumns: linker.columns(referencedTable, fk.referencedColumns, `${fkPath}.referencedColumns`),
      };

      if (fk.referencedIndex !== undefined) {
        const index = referencedTable.indexes.find((ix) => ix.name === fk.referencedIndex);
        if (!index) {
          linker.report(`${fkPath}.referencedIndex`, `unknown index "${fk.referencedIndex}" on table "${referencedTable.name}"`);
        } else if (!index.unique) {
          linker.report(`${fkPath}.referencedIndex`, `index "${index.name}" is not unique`);
        } else if (index.keyColumns.length !== fk.referencedColumns.length) {
          linker.report(`${fkPath}.referencedIndex`, `index "${index.name}" has ${index.keyColumns.length} key columns, expected ${fk.referencedColumns.length}`);
        } else if (!sameColumnSet(index.keyColumns.map((k) => k.column.name), fk.referencedColumns)) {
          // key order may differ from the foreign key's column order
          linker.report(`${fkPath}.referencedIndex`, `index "${index.name}" is keyed on (${index.keyColumns.map((k) => k.column.name).join(', ')}), not the referenced columns (${fk.referencedColumns.join(', ')})`);
        } else {
          foreignKey.referencedIndex = index;
        }
      }
      foreignKeys.push(foreignKey);
    });
    table.foreignKeys = foreignKeys;
  });

  const views = parsed.views.map((doc, v) => {
    linker.claim(doc.name, `view "${doc.name}"`, `views[${v}]`);
    return buildView(doc, `views[${v}]`, linker);
  });

  if (linker.issues.length) {
    throw new SchemaSnapshotError(linker.issues);
  }
  return { tables, views };
}
