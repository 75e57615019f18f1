import { isFloat64, isInt64 } from '../schema/type-printer.js';
import type { SchemaType } from '../schema/types.js';

export type DatabaseDialect = 'native' | 'postgresql';

export const DATABASE_DIALECTS: readonly DatabaseDialect[] = ['native', 'postgresql'];

const DOUBLE_NUMERIC_PRECISION = 53;
const BIGINT_NUMERIC_PRECISION = 64;
const BINARY_RADIX = 2;

/**
 * Everything that differs between the two output conventions. Row
 * synthesizers ask this object instead of branching on the dialect.
 */
export interface DialectAdapter {
  readonly dialect: DatabaseDialect;
  /** Value of the `database_dialect` option. */
  readonly dialectOptionValue: string;
  /** Name of the schema user tables live in. */
  readonly userSchemaName: string;
  /** OPTION_TYPE reported for string-valued database options. */
  readonly stringOptionType: string;
  /** Casing for introspection table, column and schema names. Idempotent. */
  nameForDialect(identifier: string): string;
  numericPrecision(type: SchemaType): number | null;
  numericPrecisionRadix(type: SchemaType): number | null;
  numericScale(type: SchemaType): number | null;
}

const nativeAdapter: DialectAdapter = Object.freeze({
  dialect: 'native',
  dialectOptionValue: 'GOOGLE_STANDARD_SQL',
  userSchemaName: '',
  stringOptionType: 'STRING',
  nameForDialect: (identifier: string) => identifier.toUpperCase(),
  numericPrecision: () => null,
  numericPrecisionRadix: () => null,
  numericScale: () => null,
} satisfies DialectAdapter);

const postgresAdapter: DialectAdapter = Object.freeze({
  dialect: 'postgresql',
  dialectOptionValue: 'POSTGRESQL',
  userSchemaName: 'public',
  stringOptionType: 'character varying',
  nameForDialect: (identifier: string) => identifier.toLowerCase(),
  numericPrecision: (type: SchemaType) => {
    if (isFloat64(type)) return DOUBLE_NUMERIC_PRECISION;
    if (isInt64(type)) return BIGINT_NUMERIC_PRECISION;
    return null;
  },
  numericPrecisionRadix: (type: SchemaType) => (isFloat64(type) || isInt64(type) ? BINARY_RADIX : null),
  numericScale: (type: SchemaType) => (isInt64(type) ? 0 : null),
} satisfies DialectAdapter);

export function createDialectAdapter(dialect: DatabaseDialect): DialectAdapter {
  return dialect === 'postgresql' ? postgresAdapter : nativeAdapter;
}

export function isDatabaseDialect(value: string): value is DatabaseDialect {
  return DATABASE_DIALECTS.some((d) => d === value);
}
