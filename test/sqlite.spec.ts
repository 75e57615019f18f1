import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Database, toSqlValue } from '../src/sqlite/db.js';
import { buildCatalog } from './helpers.js';

describe('catalog query surface', () => {
  const db = new Database();

  beforeAll(async () => {
    await db.init();
    db.loadCatalog(buildCatalog('shop'));
  });

  afterAll(() => {
    db.close();
  });

  it('converts catalog values to SQLite values', () => {
    expect(toSqlValue(true)).toBe(1);
    expect(toSqlValue(false)).toBe(0);
    expect(toSqlValue(new Date(0))).toBe('1970-01-01T00:00:00.000Z');
    expect(toSqlValue(null)).toBeNull();
    expect(toSqlValue('x')).toBe('x');
  });

  it('answers SQL over the introspection tables', () => {
    const rows = db.exec(
      "SELECT TABLE_NAME AS name FROM information_schema.TABLES WHERE TABLE_TYPE = 'BASE TABLE' ORDER BY name",
    );
    expect(rows).toEqual([{ name: 'Customers' }, { name: 'Invoices' }, { name: 'Orders' }]);
  });

  it('stores booleans as integers and keeps NULLs', () => {
    expect(db.exec(
      "SELECT IS_UNIQUE AS is_unique, INDEX_STATE AS state FROM information_schema.INDEXES WHERE INDEX_NAME = ?",
      ['CustomersByEmail'],
    )).toEqual([{ is_unique: 1, state: 'READ_WRITE' }]);
    expect(db.exec(
      "SELECT INDEX_STATE AS state FROM information_schema.INDEXES WHERE TABLE_NAME = 'Users' OR (TABLE_NAME = 'Invoices' AND INDEX_TYPE = 'PRIMARY_KEY')",
    )).toEqual([{ state: null }]);
  });

  it('joins constraint tables', () => {
    const rows = db.exec(`
      SELECT rc.CONSTRAINT_NAME AS fk, tc.TABLE_NAME AS referenced
      FROM information_schema.REFERENTIAL_CONSTRAINTS rc
      JOIN information_schema.TABLE_CONSTRAINTS tc ON tc.CONSTRAINT_NAME = rc.UNIQUE_CONSTRAINT_NAME
      WHERE rc.CONSTRAINT_SCHEMA = ''
      ORDER BY fk
    `);
    expect(rows).toEqual([
      { fk: 'FK_Invoices_Email', referenced: 'Customers' },
      { fk: 'FK_Orders_Customers', referenced: 'Customers' },
      { fk: 'FK_Orders_Email', referenced: 'Customers' },
    ]);
  });

  it('loads empty tables', () => {
    expect(db.exec('SELECT COUNT(*) AS n FROM information_schema.SPANNER_STATISTICS')).toEqual([{ n: 0 }]);
  });

  it('throws on SQL errors', () => {
    expect(() => db.exec('SELECT * FROM information_schema.NOPE')).toThrow();
  });

  it('refuses use before init', () => {
    expect(() => new Database().exec('SELECT 1')).toThrow('Database used before init()');
  });
});

describe('postgres catalogs in SQLite', () => {
  it('creates lower-case tables that SQL can still address in any case', async () => {
    const db = new Database();
    await db.init();
    try {
      db.loadCatalog(buildCatalog('users', 'postgresql'));
      expect(db.exec(
        "SELECT table_schema AS schema_name, column_name AS name FROM information_schema.columns WHERE table_name = 'Users' ORDER BY ordinal_position",
      )).toEqual([
        { schema_name: 'public', name: 'id' },
        { schema_name: 'public', name: 'name' },
      ]);
    } finally {
      db.close();
    }
  });
});
