import { catalogLogger } from './utils/logger.js';

/**
 * Raised when the catalog's own registries and the code that consumes them
 * disagree. This is a defect in the build, never a problem with user input,
 * so nothing inside the library catches it.
 */
export class CatalogInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogInvariantError';
  }
}

export function invariant(condition: unknown, message: string | (() => string)): asserts condition {
  if (condition) return;
  const text = typeof message === 'string' ? message : message();
  catalogLogger.error('Catalog invariant violated', { detail: text });
  throw new CatalogInvariantError(text);
}

export interface SnapshotIssue {
  path: string;
  message: string;
}

/**
 * A schema document that cannot be turned into a schema snapshot.
 */
export class SchemaSnapshotError extends Error {
  readonly issues: SnapshotIssue[];

  constructor(issues: SnapshotIssue[]) {
    super(`Invalid schema snapshot: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'SchemaSnapshotError';
    this.issues = issues;
  }
}

export class UnknownTableError extends Error {
  readonly tableName: string;

  constructor(tableName: string) {
    super(`No introspection table named ${tableName}`);
    this.name = 'UnknownTableError';
    this.tableName = tableName;
  }
}
