import { describe, it, expect } from 'vitest';
import {
  catalogTypeForSpannerType,
  createColumnRegistry,
  entriesForTable,
  findKeyColumnMetadata,
  loadColumnRegistry,
  lookupColumnMetadata,
} from '../src/catalog/registry.js';
import { Tables } from '../src/catalog/names.js';
import { CatalogInvariantError } from '../src/errors.js';

describe('column metadata registry', () => {
  const registry = loadColumnRegistry();

  it('is loaded once per process', () => {
    expect(loadColumnRegistry()).toBe(registry);
    expect(Object.isFrozen(registry.columns)).toBe(true);
  });

  it('describes every introspection table', () => {
    for (const table of Object.values(Tables)) {
      expect(entriesForTable(registry, table).length, table).toBeGreaterThan(0);
    }
    expect(registry.columns).toHaveLength(121);
    expect(registry.keyColumns).toHaveLength(65);
  });

  it('keeps registry order within a table', () => {
    expect(entriesForTable(registry, 'schemata').map((e) => e.column_name)).toEqual([
      'CATALOG_NAME',
      'SCHEMA_NAME',
      'EFFECTIVE_TIMESTAMP',
    ]);
  });

  it('looks up columns case-insensitively', () => {
    const entry = lookupColumnMetadata(registry, 'key_column_usage', 'position_in_unique_constraint');
    expect(entry).toEqual({
      table_name: 'KEY_COLUMN_USAGE',
      column_name: 'POSITION_IN_UNIQUE_CONSTRAINT',
      ordinal_position: 9,
      spanner_type: 'INT64',
      is_nullable: 'YES',
    });
  });

  it('treats a lookup miss as an invariant violation naming the pair', () => {
    expect(() => lookupColumnMetadata(registry, 'TABLES', 'NO_SUCH_COLUMN')).toThrowError(
      new CatalogInvariantError('Missing metadata for column TABLES.NO_SUCH_COLUMN'),
    );
  });

  it('reports primary key membership', () => {
    expect(findKeyColumnMetadata(registry, 'COLUMNS', 'COLUMN_NAME')?.primary_key_ordinal).toBe(4);
    expect(findKeyColumnMetadata(registry, 'COLUMNS', 'DATA_TYPE')).toBeUndefined();
  });

  it('maps registry types to catalog types', () => {
    expect(catalogTypeForSpannerType('STRING(MAX)')).toBe('STRING');
    expect(catalogTypeForSpannerType('INT64')).toBe('INT64');
    expect(catalogTypeForSpannerType('BOOL')).toBe('BOOL');
    expect(catalogTypeForSpannerType('TIMESTAMP')).toBe('TIMESTAMP');
    expect(() => catalogTypeForSpannerType('FLOAT64')).toThrow(CatalogInvariantError);
  });

  it('builds ad hoc registries from explicit entries', () => {
    const custom = createColumnRegistry(
      [{ table_name: 'T', column_name: 'A', ordinal_position: 1, spanner_type: 'INT64', is_nullable: 'NO' }],
      [],
    );
    expect(entriesForTable(custom, 't')).toHaveLength(1);
    expect(Object.isFrozen(custom.columns[0])).toBe(true);
  });
});
