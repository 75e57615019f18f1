import { describe, it, expect } from 'vitest';
import { createColumnRegistry } from '../src/catalog/registry.js';
import { introspectionKeyColumns } from '../src/catalog/synthesizers/constraints.js';
import { InformationSchemaTable } from '../src/catalog/table.js';
import { buildCatalog, recordsWhere, userRecords } from './helpers.js';

describe('constraint tables', () => {
  const catalog = buildCatalog('shop');

  it('lists every user constraint in declaration order', () => {
    expect(userRecords(catalog, 'TABLE_CONSTRAINTS').map((r) => [r.TABLE_NAME, r.CONSTRAINT_NAME, r.CONSTRAINT_TYPE]))
      .toEqual([
        ['Customers', 'PK_Customers', 'PRIMARY KEY'],
        ['Customers', 'CK_IS_NOT_NULL_Customers_CustomerId', 'CHECK'],
        ['Customers', 'CK_IS_NOT_NULL_Customers_Email', 'CHECK'],
        ['Customers', 'CK_IS_NOT_NULL_Customers_CreatedAt', 'CHECK'],
        ['Orders', 'PK_Orders', 'PRIMARY KEY'],
        ['Orders', 'CK_IS_NOT_NULL_Orders_CustomerId', 'CHECK'],
        ['Orders', 'CK_IS_NOT_NULL_Orders_OrderId', 'CHECK'],
        ['Orders', 'CK_Amount_Positive', 'CHECK'],
        ['Orders', 'FK_Orders_Customers', 'FOREIGN KEY'],
        ['Orders', 'FK_Orders_Email', 'FOREIGN KEY'],
        ['Customers', 'CustomersByEmail', 'UNIQUE'],
        ['Invoices', 'PK_Invoices', 'PRIMARY KEY'],
        ['Invoices', 'CK_IS_NOT_NULL_Invoices_InvoiceId', 'CHECK'],
        ['Invoices', 'FK_Invoices_Email', 'FOREIGN KEY'],
      ]);
    const first = userRecords(catalog, 'TABLE_CONSTRAINTS')[0];
    expect(first).toEqual({
      CONSTRAINT_CATALOG: '',
      CONSTRAINT_SCHEMA: '',
      CONSTRAINT_NAME: 'PK_Customers',
      TABLE_CATALOG: '',
      TABLE_SCHEMA: '',
      TABLE_NAME: 'Customers',
      CONSTRAINT_TYPE: 'PRIMARY KEY',
      IS_DEFERRABLE: 'NO',
      INITIALLY_DEFERRED: 'NO',
      ENFORCED: 'YES',
    });
  });

  it('emits a shared backing unique index once', () => {
    expect(recordsWhere(catalog, 'TABLE_CONSTRAINTS', 'CONSTRAINT_TYPE', 'UNIQUE')).toHaveLength(1);
  });

  it('has a CHECK_CONSTRAINTS row for every NOT NULL column and declared check', () => {
    expect(userRecords(catalog, 'CHECK_CONSTRAINTS', 'CONSTRAINT_SCHEMA').map((r) => [r.CONSTRAINT_NAME, r.CHECK_CLAUSE]))
      .toEqual([
        ['CK_IS_NOT_NULL_Customers_CustomerId', 'CustomerId IS NOT NULL'],
        ['CK_IS_NOT_NULL_Customers_Email', 'Email IS NOT NULL'],
        ['CK_IS_NOT_NULL_Customers_CreatedAt', 'CreatedAt IS NOT NULL'],
        ['CK_IS_NOT_NULL_Orders_CustomerId', 'CustomerId IS NOT NULL'],
        ['CK_IS_NOT_NULL_Orders_OrderId', 'OrderId IS NOT NULL'],
        ['CK_Amount_Positive', 'Amount > 0'],
        ['CK_IS_NOT_NULL_Invoices_InvoiceId', 'InvoiceId IS NOT NULL'],
      ]);
  });

  it('resolves foreign keys to the primary key or the backing index', () => {
    expect(userRecords(catalog, 'REFERENTIAL_CONSTRAINTS', 'CONSTRAINT_SCHEMA')).toEqual([
      {
        CONSTRAINT_CATALOG: '',
        CONSTRAINT_SCHEMA: '',
        CONSTRAINT_NAME: 'FK_Orders_Customers',
        UNIQUE_CONSTRAINT_CATALOG: '',
        UNIQUE_CONSTRAINT_SCHEMA: '',
        UNIQUE_CONSTRAINT_NAME: 'PK_Customers',
        MATCH_OPTION: 'SIMPLE',
        UPDATE_RULE: 'NO ACTION',
        DELETE_RULE: 'NO ACTION',
        SPANNER_STATE: 'COMMITTED',
      },
      expect.objectContaining({ CONSTRAINT_NAME: 'FK_Orders_Email', UNIQUE_CONSTRAINT_NAME: 'CustomersByEmail' }),
      expect.objectContaining({ CONSTRAINT_NAME: 'FK_Invoices_Email', UNIQUE_CONSTRAINT_NAME: 'CustomersByEmail' }),
    ]);
  });

  it('orders key columns by declared position', () => {
    const keyUsage = (name: string) =>
      recordsWhere(catalog, 'KEY_COLUMN_USAGE', 'CONSTRAINT_NAME', name)
        .map((r) => [r.TABLE_NAME, r.COLUMN_NAME, r.ORDINAL_POSITION, r.POSITION_IN_UNIQUE_CONSTRAINT]);

    expect(keyUsage('PK_Orders')).toEqual([
      ['Orders', 'CustomerId', 1, null],
      ['Orders', 'OrderId', 2, null],
    ]);
    expect(keyUsage('FK_Orders_Email')).toEqual([['Orders', 'CustomerEmail', 1, 1]]);
    expect(keyUsage('FK_Orders_Customers')).toEqual([['Orders', 'CustomerId', 1, 1]]);
    expect(keyUsage('CustomersByEmail')).toEqual([['Customers', 'Email', 1, null]]);
  });

  it('has no key usage for checks', () => {
    expect(recordsWhere(catalog, 'KEY_COLUMN_USAGE', 'CONSTRAINT_NAME', 'CK_Amount_Positive')).toEqual([]);
  });

  it('points foreign key usage at the referenced table', () => {
    expect(recordsWhere(catalog, 'CONSTRAINT_TABLE_USAGE', 'CONSTRAINT_NAME', 'FK_Invoices_Email')).toEqual([
      {
        TABLE_CATALOG: '',
        TABLE_SCHEMA: '',
        TABLE_NAME: 'Customers',
        CONSTRAINT_CATALOG: '',
        CONSTRAINT_SCHEMA: '',
        CONSTRAINT_NAME: 'FK_Invoices_Email',
      },
    ]);
    expect(recordsWhere(catalog, 'CONSTRAINT_COLUMN_USAGE', 'CONSTRAINT_NAME', 'FK_Invoices_Email')
      .map((r) => [r.TABLE_NAME, r.COLUMN_NAME])).toEqual([['Customers', 'Email']]);
    expect(recordsWhere(catalog, 'CONSTRAINT_COLUMN_USAGE', 'CONSTRAINT_NAME', 'CK_IS_NOT_NULL_Orders_OrderId')
      .map((r) => [r.TABLE_NAME, r.COLUMN_NAME])).toEqual([['Orders', 'OrderId']]);
  });

  it('derives primary keys and NOT NULL checks for the introspection tables', () => {
    const infoConstraints = recordsWhere(catalog, 'TABLE_CONSTRAINTS', 'TABLE_SCHEMA', 'INFORMATION_SCHEMA');
    expect(infoConstraints.filter((r) => r.CONSTRAINT_TYPE === 'PRIMARY KEY')).toHaveLength(16);
    expect(infoConstraints.filter((r) => r.CONSTRAINT_TYPE === 'CHECK')).toHaveLength(95);

    expect(recordsWhere(catalog, 'KEY_COLUMN_USAGE', 'CONSTRAINT_NAME', 'PK_INDEX_COLUMNS')
      .map((r) => [r.COLUMN_NAME, r.ORDINAL_POSITION])).toEqual([
      ['TABLE_CATALOG', 1],
      ['TABLE_SCHEMA', 2],
      ['TABLE_NAME', 3],
      ['INDEX_NAME', 4],
      ['INDEX_TYPE', 5],
      ['COLUMN_NAME', 6],
    ]);
    expect(recordsWhere(catalog, 'CHECK_CONSTRAINTS', 'CONSTRAINT_NAME', 'CK_IS_NOT_NULL_SCHEMATA_SCHEMA_NAME'))
      .toEqual([{
        CONSTRAINT_CATALOG: '',
        CONSTRAINT_SCHEMA: 'INFORMATION_SCHEMA',
        CONSTRAINT_NAME: 'CK_IS_NOT_NULL_SCHEMATA_SCHEMA_NAME',
        CHECK_CLAUSE: 'SCHEMA_NAME IS NOT NULL',
        SPANNER_STATE: 'COMMITTED',
      }]);
  });

  it('keeps constraint names consistent across tables', () => {
    for (const dialect of ['native', 'postgresql'] as const) {
      const built = buildCatalog('shop', dialect);
      const key = (r: Record<string, unknown>) =>
        `${String(r.TABLE_NAME ?? r.table_name)}\u0000${String(r.CONSTRAINT_NAME ?? r.constraint_name)}`;
      const keyUsage = new Set(built.toRecords('KEY_COLUMN_USAGE').map(key));
      const columnUsage = new Set(built.toRecords('CONSTRAINT_COLUMN_USAGE').map(key));
      const tableUsage = new Set(built.toRecords('CONSTRAINT_TABLE_USAGE')
        .map((r) => String(r.CONSTRAINT_NAME ?? r.constraint_name)));
      const checkClauses = new Map(built.toRecords('CHECK_CONSTRAINTS')
        .map((r) => [String(r.CONSTRAINT_NAME ?? r.constraint_name), r]));

      for (const constraint of built.toRecords('TABLE_CONSTRAINTS')) {
        const name = String(constraint.CONSTRAINT_NAME ?? constraint.constraint_name);
        const type = constraint.CONSTRAINT_TYPE ?? constraint.constraint_type;
        expect(keyUsage.has(key(constraint)) || columnUsage.has(key(constraint)), `${dialect} ${name}`).toBe(true);
        expect(tableUsage.has(name), name).toBe(true);
        expect(checkClauses.has(name), name).toBe(type === 'CHECK');
      }
    }
  });
});

describe('introspectionKeyColumns', () => {
  const keyEntry = (column_name: string, primary_key_ordinal: number) => ({
    table_name: 'KEYED',
    column_name,
    primary_key_ordinal,
    column_ordering: 'ASC' as const,
    is_nullable: 'NO' as const,
    spanner_type: 'STRING(MAX)',
  });

  it('numbers unordered key columns with their own running counter', () => {
    const table = new InformationSchemaTable('KEYED', [
      { name: 'A', type: 'STRING' },
      { name: 'B', type: 'STRING' },
      { name: 'C', type: 'STRING' },
      { name: 'D', type: 'STRING' },
    ]);
    const registry = createColumnRegistry([], [keyEntry('A', 3), keyEntry('B', 0), keyEntry('C', 0)]);

    expect(introspectionKeyColumns(registry, table).map((k) => [k.column, k.ordinal])).toEqual([
      ['B', 1],
      ['C', 2],
      ['A', 3],
    ]);
  });
});
