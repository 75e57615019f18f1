import { invariant } from '../errors.js';
import type { CanonicalColumnName } from './names.js';
import type { InformationSchemaTable } from './table.js';
import { defaultValueFor, type CatalogValue, type Row } from './values.js';

/**
 * Values for some columns of one row, keyed by canonical (upper-case)
 * column name. Build a new object for every row.
 */
export type RowOverrides = { readonly [K in CanonicalColumnName]?: CatalogValue };

function overrideMap(table: InformationSchemaTable, values: RowOverrides): Map<string, CatalogValue> {
  const map = new Map<string, CatalogValue>();
  for (const [key, value] of Object.entries(values)) {
    invariant(key === key.toUpperCase(), () =>
      `Override key "${key}" for ${table.name} is not a canonical upper-case column name`);
    invariant(table.columnIndex(key) >= 0, () => `Override key "${key}" names no column of ${table.name}`);
    map.set(key, value ?? null);
  }
  return map;
}

/**
 * Returns a row for `table` where every declared column, in order, takes its
 * override when one is given and the default for its type otherwise.
 *
 * Override keys must be canonical upper-case names; a lower-case key is a
 * caller defect and aborts.
 */
export function rowFromOverrides(table: InformationSchemaTable, overrides: RowOverrides): Row {
  const given = overrideMap(table, overrides);
  return table.columns.map((column) => {
    const key = column.name.toUpperCase();
    return given.has(key) ? given.get(key) ?? null : defaultValueFor(column.type);
  });
}

/**
 * Strict variant for tables whose rows are spelled out in full: every
 * declared column must be given.
 */
export function rowFromRecord(table: InformationSchemaTable, values: RowOverrides): Row {
  const given = overrideMap(table, values);
  return table.columns.map((column) => {
    const key = column.name.toUpperCase();
    invariant(given.has(key), () => `No value for ${table.name}.${column.name}`);
    return given.get(key) ?? null;
  });
}
