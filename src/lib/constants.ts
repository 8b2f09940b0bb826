/**
 * Avro type-name tokens.
 */
export const AvroTypeNames = {
  NULL: 'null',
  BOOLEAN: 'boolean',
  INT: 'int',
  LONG: 'long',
  FLOAT: 'float',
  DOUBLE: 'double',
  BYTES: 'bytes',
  STRING: 'string',
  RECORD: 'record',
  ENUM: 'enum',
  ARRAY: 'array',
  MAP: 'map',
  UNION: 'union',
  FIXED: 'fixed',
} as const;

export type AvroTypeName = (typeof AvroTypeNames)[keyof typeof AvroTypeNames];

/**
 * Built-in type names that a record, enum or fixed type may not take as its
 * short name. `record`, `enum` and `fixed` are not in the set.
 */
export const RESERVED_TYPE_NAMES: ReadonlySet<string> = new Set<string>([
  AvroTypeNames.NULL,
  AvroTypeNames.BOOLEAN,
  AvroTypeNames.INT,
  AvroTypeNames.LONG,
  AvroTypeNames.FLOAT,
  AvroTypeNames.DOUBLE,
  AvroTypeNames.BYTES,
  AvroTypeNames.STRING,
  AvroTypeNames.ARRAY,
  AvroTypeNames.MAP,
  AvroTypeNames.UNION,
]);

export function isReservedTypeName(name: string): boolean {
  return RESERVED_TYPE_NAMES.has(name);
}
