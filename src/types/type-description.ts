import { z } from 'zod';

export const PRIMITIVE_TYPE_NAMES = [
  'null',
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'bytes',
  'string',
] as const;

export type PrimitiveTypeName = (typeof PRIMITIVE_TYPE_NAMES)[number];

// Type description (recursive via record fields, array items, map values, union members)
export const TypeDescriptionSchema: z.ZodType<TypeDescription, z.ZodTypeDef, TypeDescriptionInput> = z.lazy(() =>
  z.union([
    PrimitiveTypeSchema,
    RecordTypeSchema,
    EnumTypeSchema,
    FixedTypeSchema,
    ArrayTypeSchema,
    MapTypeSchema,
    UnionTypeSchema,
  ])
);

export const PrimitiveTypeSchema = z.object({
  kind: z.literal('primitive'),
  name: z.enum(PRIMITIVE_TYPE_NAMES),
});

export const RecordFieldSchema = z.object({
  name: z.string(),
  type: TypeDescriptionSchema,
  doc: z.string().optional(),
});

// Named kinds: fullname stays empty until resolved
const namedTypeShape = {
  name: z.string(),
  namespace: z.string().optional().default(''),
  fullname: z.string().optional().default(''),
};

export const RecordTypeSchema = z.object({
  kind: z.literal('record'),
  ...namedTypeShape,
  fields: z.array(RecordFieldSchema),
});

export const EnumTypeSchema = z.object({
  kind: z.literal('enum'),
  ...namedTypeShape,
  symbols: z.array(z.string()),
});

export const FixedTypeSchema = z.object({
  kind: z.literal('fixed'),
  ...namedTypeShape,
  size: z.number().int().nonnegative(),
});

export const ArrayTypeSchema = z.object({
  kind: z.literal('array'),
  items: TypeDescriptionSchema,
});

export const MapTypeSchema = z.object({
  kind: z.literal('map'),
  values: TypeDescriptionSchema,
});

export const UnionTypeSchema = z.object({
  kind: z.literal('union'),
  types: z.array(TypeDescriptionSchema),
});

export type PrimitiveType = {
  kind: 'primitive';
  name: PrimitiveTypeName;
};

export type RecordField = {
  name: string;
  type: TypeDescription;
  doc?: string | undefined;
};

export type RecordType = {
  kind: 'record';
  name: string;
  namespace: string;
  fullname: string;
  fields: RecordField[];
};

export type EnumType = {
  kind: 'enum';
  name: string;
  namespace: string;
  fullname: string;
  symbols: string[];
};

export type FixedType = {
  kind: 'fixed';
  name: string;
  namespace: string;
  fullname: string;
  size: number;
};

export type ArrayType = {
  kind: 'array';
  items: TypeDescription;
};

export type MapType = {
  kind: 'map';
  values: TypeDescription;
};

export type UnionType = {
  kind: 'union';
  types: TypeDescription[];
};

export type NamedType = RecordType | EnumType | FixedType;

export type TypeDescription =
  | PrimitiveType
  | NamedType
  | ArrayType
  | MapType
  | UnionType;

// Input types (namespace and fullname may be omitted and get defaulted)
export type RecordFieldInput = {
  name: string;
  type: TypeDescriptionInput;
  doc?: string | undefined;
};

type NamedTypeInput = {
  name: string;
  namespace?: string | undefined;
  fullname?: string | undefined;
};

export type TypeDescriptionInput =
  | PrimitiveType
  | (NamedTypeInput & { kind: 'record'; fields: RecordFieldInput[] })
  | (NamedTypeInput & { kind: 'enum'; symbols: string[] })
  | (NamedTypeInput & { kind: 'fixed'; size: number })
  | { kind: 'array'; items: TypeDescriptionInput }
  | { kind: 'map'; values: TypeDescriptionInput }
  | { kind: 'union'; types: TypeDescriptionInput[] };

/**
 * Validate the structure of an untyped value as a type description.
 * Missing `namespace` and `fullname` default to the empty string.
 * Only the shape is checked here; naming rules are left to verifyType.
 *
 * @throws {z.ZodError} when the value does not match any type kind
 */
export function parseTypeDescription(value: unknown): TypeDescription {
  return TypeDescriptionSchema.parse(value);
}

/**
 * Non-throwing variant of parseTypeDescription.
 */
export function safeParseTypeDescription(
  value: unknown
): z.SafeParseReturnType<TypeDescriptionInput, TypeDescription> {
  return TypeDescriptionSchema.safeParse(value);
}
