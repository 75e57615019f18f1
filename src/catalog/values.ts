/** Value types an introspection table column can hold. */
export type CatalogType = 'STRING' | 'INT64' | 'BOOL' | 'TIMESTAMP';

export type CatalogValue = string | number | boolean | Date | null;

export type Row = readonly CatalogValue[];

export interface ColumnDefinition {
  name: string;
  type: CatalogType;
}

const UNIX_EPOCH = 0;

/** Fresh default for a column type; timestamps get a new Date each call. */
export function defaultValueFor(type: CatalogType): CatalogValue {
  switch (type) {
    case 'STRING':
      return '';
    case 'INT64':
      return 0;
    case 'BOOL':
      return false;
    case 'TIMESTAMP':
      return new Date(UNIX_EPOCH);
  }
}

export function valueMatchesType(value: CatalogValue, type: CatalogType): boolean {
  if (value === null) return true;
  switch (type) {
    case 'STRING':
      return typeof value === 'string';
    case 'INT64':
      return typeof value === 'number' && Number.isInteger(value);
    case 'BOOL':
      return typeof value === 'boolean';
    case 'TIMESTAMP':
      return value instanceof Date;
  }
}
