import { describe, it, expect } from 'vitest';
import { createDialectAdapter } from '../src/catalog/dialect.js';
import { Cols, Tables } from '../src/catalog/names.js';
import { entriesForTable, loadColumnRegistry } from '../src/catalog/registry.js';
import { rowFromOverrides, rowFromRecord, type RowOverrides } from '../src/catalog/rows.js';
import { buildTableFromMetadata, declareTable, InformationSchemaTable } from '../src/catalog/table.js';
import { CatalogInvariantError } from '../src/errors.js';

const registry = loadColumnRegistry();
const native = createDialectAdapter('native');
const postgres = createDialectAdapter('postgresql');

const schemata = (adapter = native) =>
  buildTableFromMetadata(Tables.SCHEMATA, entriesForTable(registry, Tables.SCHEMATA), adapter);

describe('table factory', () => {
  it('builds columns from registry entries in order', () => {
    expect(schemata().columns).toEqual([
      { name: 'CATALOG_NAME', type: 'STRING' },
      { name: 'SCHEMA_NAME', type: 'STRING' },
      { name: 'EFFECTIVE_TIMESTAMP', type: 'INT64' },
    ]);
  });

  it('cases names for the dialect', () => {
    const table = schemata(postgres);
    expect(table.name).toBe('schemata');
    expect(table.columns.map((c) => c.name)).toEqual(['catalog_name', 'schema_name', 'effective_timestamp']);
  });

  it('rejects an empty entry list', () => {
    expect(() => buildTableFromMetadata('NOPE', [], native)).toThrow(CatalogInvariantError);
  });

  it('rejects duplicate columns', () => {
    expect(() => declareTable('T', [['A', 'STRING'], ['a', 'INT64']], native)).toThrow(CatalogInvariantError);
  });

  it('installs contents exactly once', () => {
    const table = schemata();
    expect(table.populated).toBe(false);
    expect(() => table.rows).toThrow(CatalogInvariantError);
    table.setContents([['', 'X', 0]]);
    expect(table.rows).toEqual([['', 'X', 0]]);
    expect(() => table.setContents([])).toThrow(CatalogInvariantError);
  });

  it('checks arity and value types of every row', () => {
    expect(() => schemata().setContents([['', 'X']])).toThrow(CatalogInvariantError);
    expect(() => schemata().setContents([['', 'X', 'not a number']])).toThrow(CatalogInvariantError);
    expect(() => schemata().setContents([['', null, null]])).not.toThrow();
  });

  it('exposes rows as records keyed by column name', () => {
    const table = schemata(postgres);
    table.setContents([['', 'public', 0]]);
    expect(table.toRecords()).toEqual([{ catalog_name: '', schema_name: 'public', effective_timestamp: 0 }]);
  });
});

describe('default-row builder', () => {
  const mixed = new InformationSchemaTable('MIXED', [
    { name: 'TABLE_NAME', type: 'STRING' },
    { name: 'ORDINAL_POSITION', type: 'INT64' },
    { name: 'IS_UNIQUE', type: 'BOOL' },
    { name: 'EFFECTIVE_TIMESTAMP', type: 'TIMESTAMP' },
  ]);

  it('fills unset columns with type defaults', () => {
    expect(rowFromOverrides(mixed, {})).toEqual(['', 0, false, new Date(0)]);
  });

  it('uses overrides in declared column order', () => {
    const row = rowFromOverrides(mixed, { [Cols.IS_UNIQUE]: true, [Cols.TABLE_NAME]: 'Users' });
    expect(row).toEqual(['Users', 0, true, new Date(0)]);
  });

  it('emits NULL only when explicitly set', () => {
    expect(rowFromOverrides(mixed, { [Cols.ORDINAL_POSITION]: null })).toEqual(['', null, false, new Date(0)]);
  });

  it('matches lower-case output columns through canonical keys', () => {
    const table = schemata(postgres);
    expect(rowFromOverrides(table, { [Cols.SCHEMA_NAME]: 'public' })).toEqual(['', 'public', 0]);
  });

  it('rejects a non-canonical override key', () => {
    const lowerCase: RowOverrides = JSON.parse('{"table_name": "Users"}');
    expect(() => rowFromOverrides(mixed, lowerCase)).toThrow(CatalogInvariantError);
  });

  it('rejects a key that names no column', () => {
    expect(() => rowFromOverrides(mixed, { [Cols.VIEW_DEFINITION]: 'x' })).toThrow(CatalogInvariantError);
  });

  it('does not carry values from one row into the next', () => {
    const first = rowFromOverrides(mixed, { [Cols.TABLE_NAME]: 'A', [Cols.IS_UNIQUE]: true });
    const second = rowFromOverrides(mixed, { [Cols.TABLE_NAME]: 'B' });
    expect(first).toEqual(['A', 0, true, new Date(0)]);
    expect(second).toEqual(['B', 0, false, new Date(0)]);
  });

  it('requires every column in strict mode', () => {
    expect(() => rowFromRecord(mixed, { [Cols.TABLE_NAME]: 'A' })).toThrowError(
      new CatalogInvariantError('No value for MIXED.ORDINAL_POSITION'),
    );
    const full = rowFromRecord(mixed, {
      [Cols.TABLE_NAME]: 'A',
      [Cols.ORDINAL_POSITION]: 1,
      [Cols.IS_UNIQUE]: null,
      [Cols.EFFECTIVE_TIMESTAMP]: null,
    });
    expect(full).toEqual(['A', 1, null, null]);
  });
});
