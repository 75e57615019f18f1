/**
 * Read-only object model of a user schema. The catalog consumes these
 * interfaces and never mutates them; lists are ordered as declared.
 */

export type ScalarTypeKind =
  | 'BOOL'
  | 'INT64'
  | 'FLOAT64'
  | 'NUMERIC'
  | 'STRING'
  | 'BYTES'
  | 'JSON'
  | 'DATE'
  | 'TIMESTAMP';

export type SchemaType =
  | { kind: ScalarTypeKind }
  | { kind: 'ARRAY'; element: ScalarTypeKind };

export interface GeneratedColumn {
  expression: string;
  stored: boolean;
  dependentColumns: readonly Column[];
}

export interface Column {
  name: string;
  type: SchemaType;
  nullable: boolean;
  /** Declared length for STRING/BYTES; absent for MAX and other types. */
  declaredMaxLength?: number;
  generated?: GeneratedColumn;
  defaultExpression?: string;
  allowsCommitTimestamp: boolean;
}

export type SortOrder = 'ASC' | 'DESC';

export interface KeyColumn {
  column: Column;
  order: SortOrder;
}

export interface Index {
  name: string;
  table: Table;
  keyColumns: readonly KeyColumn[];
  storedColumns: readonly Column[];
  unique: boolean;
  nullFiltered: boolean;
  managed: boolean;
  /** Table the index is interleaved in, if any. */
  parent?: Table;
}

export interface ForeignKey {
  name: string;
  referencingColumns: readonly Column[];
  referencedTable: Table;
  referencedColumns: readonly Column[];
  /** Unique index backing the referenced columns; absent when it is the primary key. */
  referencedIndex?: Index;
}

export interface CheckConstraint {
  name: string;
  expression: string;
  dependentColumns: readonly Column[];
}

export type OnDeleteAction = 'CASCADE' | 'NO ACTION';

export interface RowDeletionPolicy {
  column: Column;
  olderThanDays: number;
}

export interface Table {
  name: string;
  columns: readonly Column[];
  primaryKey: readonly KeyColumn[];
  indexes: readonly Index[];
  foreignKeys: readonly ForeignKey[];
  checkConstraints: readonly CheckConstraint[];
  parent?: Table;
  onDeleteAction?: OnDeleteAction;
  rowDeletionPolicy?: RowDeletionPolicy;
}

export interface ViewColumn {
  name: string;
  type: SchemaType;
}

export interface View {
  name: string;
  definition: string;
  columns: readonly ViewColumn[];
}

export interface SchemaSnapshot {
  tables: readonly Table[];
  views: readonly View[];
}
