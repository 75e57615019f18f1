/**
 * Canonical (upper-case) names of the introspection tables and their
 * columns. Row overrides are keyed by these constants only; the dialect
 * adapter decides how they are cased on output.
 */

export const INFORMATION_SCHEMA = 'INFORMATION_SCHEMA';

// Every *_CATALOG column is the empty string.
export const DEFAULT_CATALOG = '';

export const Tables = {
  SCHEMATA: 'SCHEMATA',
  DATABASE_OPTIONS: 'DATABASE_OPTIONS',
  TABLES: 'TABLES',
  COLUMNS: 'COLUMNS',
  COLUMN_COLUMN_USAGE: 'COLUMN_COLUMN_USAGE',
  VIEWS: 'VIEWS',
  SPANNER_STATISTICS: 'SPANNER_STATISTICS',
  INDEXES: 'INDEXES',
  INDEX_COLUMNS: 'INDEX_COLUMNS',
  COLUMN_OPTIONS: 'COLUMN_OPTIONS',
  CHECK_CONSTRAINTS: 'CHECK_CONSTRAINTS',
  TABLE_CONSTRAINTS: 'TABLE_CONSTRAINTS',
  CONSTRAINT_TABLE_USAGE: 'CONSTRAINT_TABLE_USAGE',
  REFERENTIAL_CONSTRAINTS: 'REFERENTIAL_CONSTRAINTS',
  KEY_COLUMN_USAGE: 'KEY_COLUMN_USAGE',
  CONSTRAINT_COLUMN_USAGE: 'CONSTRAINT_COLUMN_USAGE',
} as const;

export type IntrospectionTableName = (typeof Tables)[keyof typeof Tables];

export const Cols = {
  CATALOG_NAME: 'CATALOG_NAME',
  SCHEMA_NAME: 'SCHEMA_NAME',
  EFFECTIVE_TIMESTAMP: 'EFFECTIVE_TIMESTAMP',
  OPTION_NAME: 'OPTION_NAME',
  OPTION_TYPE: 'OPTION_TYPE',
  OPTION_VALUE: 'OPTION_VALUE',
  TABLE_CATALOG: 'TABLE_CATALOG',
  TABLE_SCHEMA: 'TABLE_SCHEMA',
  TABLE_NAME: 'TABLE_NAME',
  TABLE_TYPE: 'TABLE_TYPE',
  PARENT_TABLE_NAME: 'PARENT_TABLE_NAME',
  ON_DELETE_ACTION: 'ON_DELETE_ACTION',
  SPANNER_STATE: 'SPANNER_STATE',
  INTERLEAVE_TYPE: 'INTERLEAVE_TYPE',
  ROW_DELETION_POLICY_EXPRESSION: 'ROW_DELETION_POLICY_EXPRESSION',
  COLUMN_NAME: 'COLUMN_NAME',
  ORDINAL_POSITION: 'ORDINAL_POSITION',
  COLUMN_DEFAULT: 'COLUMN_DEFAULT',
  DATA_TYPE: 'DATA_TYPE',
  IS_NULLABLE: 'IS_NULLABLE',
  SPANNER_TYPE: 'SPANNER_TYPE',
  IS_GENERATED: 'IS_GENERATED',
  GENERATION_EXPRESSION: 'GENERATION_EXPRESSION',
  IS_STORED: 'IS_STORED',
  CHARACTER_MAXIMUM_LENGTH: 'CHARACTER_MAXIMUM_LENGTH',
  NUMERIC_PRECISION: 'NUMERIC_PRECISION',
  NUMERIC_PRECISION_RADIX: 'NUMERIC_PRECISION_RADIX',
  NUMERIC_SCALE: 'NUMERIC_SCALE',
  DEPENDENT_COLUMN: 'DEPENDENT_COLUMN',
  VIEW_DEFINITION: 'VIEW_DEFINITION',
  PACKAGE_NAME: 'PACKAGE_NAME',
  ALLOW_GC: 'ALLOW_GC',
  INDEX_NAME: 'INDEX_NAME',
  INDEX_TYPE: 'INDEX_TYPE',
  IS_UNIQUE: 'IS_UNIQUE',
  IS_NULL_FILTERED: 'IS_NULL_FILTERED',
  INDEX_STATE: 'INDEX_STATE',
  SPANNER_IS_MANAGED: 'SPANNER_IS_MANAGED',
  COLUMN_ORDERING: 'COLUMN_ORDERING',
  CONSTRAINT_CATALOG: 'CONSTRAINT_CATALOG',
  CONSTRAINT_SCHEMA: 'CONSTRAINT_SCHEMA',
  CONSTRAINT_NAME: 'CONSTRAINT_NAME',
  CONSTRAINT_TYPE: 'CONSTRAINT_TYPE',
  IS_DEFERRABLE: 'IS_DEFERRABLE',
  INITIALLY_DEFERRED: 'INITIALLY_DEFERRED',
  ENFORCED: 'ENFORCED',
  CHECK_CLAUSE: 'CHECK_CLAUSE',
  UNIQUE_CONSTRAINT_CATALOG: 'UNIQUE_CONSTRAINT_CATALOG',
  UNIQUE_CONSTRAINT_SCHEMA: 'UNIQUE_CONSTRAINT_SCHEMA',
  UNIQUE_CONSTRAINT_NAME: 'UNIQUE_CONSTRAINT_NAME',
  MATCH_OPTION: 'MATCH_OPTION',
  UPDATE_RULE: 'UPDATE_RULE',
  DELETE_RULE: 'DELETE_RULE',
  POSITION_IN_UNIQUE_CONSTRAINT: 'POSITION_IN_UNIQUE_CONSTRAINT',
} as const;

export type CanonicalColumnName = (typeof Cols)[keyof typeof Cols];

// Values written into rows.
export const Values = {
  BASE_TABLE: 'BASE TABLE',
  VIEW: 'VIEW',
  COMMITTED: 'COMMITTED',
  IN_PARENT: 'IN PARENT',
  YES: 'YES',
  NO: 'NO',
  ALWAYS: 'ALWAYS',
  NEVER: 'NEVER',
  INDEX: 'INDEX',
  PRIMARY_KEY_INDEX: 'PRIMARY_KEY',
  READ_WRITE: 'READ_WRITE',
  ASC: 'ASC',
  DESC: 'DESC',
  PRIMARY_KEY: 'PRIMARY KEY',
  CHECK: 'CHECK',
  UNIQUE: 'UNIQUE',
  FOREIGN_KEY: 'FOREIGN KEY',
  SIMPLE: 'SIMPLE',
  NO_ACTION: 'NO ACTION',
  DATABASE_DIALECT_OPTION: 'database_dialect',
  ALLOW_COMMIT_TIMESTAMP: 'allow_commit_timestamp',
  BOOL: 'BOOL',
  TRUE: 'TRUE',
} as const;

export function primaryKeyName(tableName: string): string {
  return `PK_${tableName}`;
}

export function checkNotNullName(tableName: string, columnName: string): string {
  return `CK_IS_NOT_NULL_${tableName}_${columnName}`;
}

export function checkNotNullClause(columnName: string): string {
  return `${columnName} IS NOT NULL`;
}
