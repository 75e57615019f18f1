import type { ScalarTypeKind, SchemaType } from './types.js';

const SCALAR_KINDS: readonly ScalarTypeKind[] = [
  'BOOL', 'INT64', 'FLOAT64', 'NUMERIC', 'STRING', 'BYTES', 'JSON', 'DATE', 'TIMESTAMP',
];

function isScalarKind(value: string): value is ScalarTypeKind {
  return SCALAR_KINDS.some((k) => k === value);
}

function hasLength(kind: ScalarTypeKind): boolean {
  return kind === 'STRING' || kind === 'BYTES';
}

function printScalar(kind: ScalarTypeKind, maxLength: number | undefined): string {
  if (!hasLength(kind)) return kind;
  return `${kind}(${maxLength === undefined ? 'MAX' : maxLength})`;
}

/**
 * Renders a column type the way DDL declares it, e.g. `STRING(64)`,
 * `BYTES(MAX)` or `ARRAY<STRING(MAX)>`.
 */
export function printSchemaType(type: SchemaType, maxLength?: number): string {
  if (type.kind === 'ARRAY') return `ARRAY<${printScalar(type.element, maxLength)}>`;
  return printScalar(type.kind, maxLength);
}

export interface ParsedSchemaType {
  type: SchemaType;
  maxLength?: number;
}

const TYPE_PATTERN = /^(?:ARRAY\s*<\s*([A-Z0-9]+)(?:\s*\(\s*(MAX|\d+)\s*\))?\s*>|([A-Z0-9]+)(?:\s*\(\s*(MAX|\d+)\s*\))?)$/;

/**
 * Parses a DDL type name. Returns undefined for anything it does not
 * recognise so the caller can report where the bad type was found.
 */
export function parseSchemaType(text: string): ParsedSchemaType | undefined {
  const match = TYPE_PATTERN.exec(text.trim().toUpperCase());
  if (!match) return undefined;
  const isArray = match[1] !== undefined;
  const kind = isArray ? match[1] : match[3];
  const length = isArray ? match[2] : match[4];
  if (kind === undefined || !isScalarKind(kind)) return undefined;
  if (length !== undefined && !hasLength(kind)) return undefined;

  const maxLength = length === undefined || length === 'MAX' ? undefined : Number.parseInt(length, 10);
  const type: SchemaType = isArray ? { kind: 'ARRAY', element: kind } : { kind };
  return maxLength === undefined ? { type } : { type, maxLength };
}

export function isInt64(type: SchemaType): boolean {
  return type.kind === 'INT64';
}

export function isFloat64(type: SchemaType): boolean {
  return type.kind === 'FLOAT64';
}
