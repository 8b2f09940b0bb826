/**
 * Accessors for the name fields of a type description.
 *
 * Every function switches on `kind` exhaustively, so adding a type kind
 * fails to compile until each accessor handles it.
 */

import type { NamedType, TypeDescription } from '../types/type-description.js';
import { AvroTypeNames } from './constants.js';

function unreachable(type: never): never {
  throw new Error(`Unknown type kind: ${JSON.stringify(type)}`);
}

/**
 * True for the kinds that carry a user-assigned name (record, enum, fixed).
 */
export function isNamedType(type: TypeDescription): type is NamedType {
  switch (type.kind) {
    case 'record':
    case 'enum':
    case 'fixed':
      return true;
    case 'primitive':
    case 'array':
    case 'map':
    case 'union':
      return false;
    default:
      return unreachable(type);
  }
}

/**
 * Name as stored in the type. For named kinds this is either a short name or
 * a dotted full name, depending on how the type was written. Unnamed kinds
 * return their Avro type name.
 */
export function getTypeName(type: TypeDescription): string {
  switch (type.kind) {
    case 'primitive':
    case 'record':
    case 'enum':
    case 'fixed':
      return type.name;
    case 'array':
      return AvroTypeNames.ARRAY;
    case 'map':
      return AvroTypeNames.MAP;
    case 'union':
      return AvroTypeNames.UNION;
    default:
      return unreachable(type);
  }
}

/**
 * Namespace exactly as stored. Empty when the type cannot have one, or when
 * a named type carries its namespace inside a dotted name.
 */
export function getTypeNamespace(type: TypeDescription): string {
  switch (type.kind) {
    case 'record':
    case 'enum':
    case 'fixed':
      return type.namespace;
    case 'primitive':
    case 'array':
    case 'map':
    case 'union':
      return '';
    default:
      return unreachable(type);
  }
}

/**
 * Stored fullname. Not recomputed: named types must have been resolved
 * (see canonicalizeType) for this to be meaningful.
 */
export function getTypeFullname(type: TypeDescription): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'record':
    case 'enum':
    case 'fixed':
      return type.fullname;
    case 'array':
      return AvroTypeNames.ARRAY;
    case 'map':
      return AvroTypeNames.MAP;
    case 'union':
      return AvroTypeNames.UNION;
    default:
      return unreachable(type);
  }
}
