/**
 * Canonicalization of type trees.
 *
 * Named types get their fullname filled in, and their resolved namespace
 * becomes the enclosing namespace of everything nested inside them.
 * Stored names and namespaces are left as written.
 */

import type {
  NamedType,
  RecordField,
  TypeDescription,
} from '../types/type-description.js';
import { buildTypeFullname, splitTypeName } from './names.js';

/**
 * Return a copy of `type` with the fullname of every named type resolved
 * against `enclosingNamespace`. Does not validate: run verifyType (or
 * verifyTypes over collectNamedTypes) on the result.
 */
export function canonicalizeType(
  type: TypeDescription,
  enclosingNamespace = ''
): TypeDescription {
  switch (type.kind) {
    case 'primitive':
      return type;
    case 'record': {
      const { namespace } = splitTypeName(type, enclosingNamespace);
      return {
        ...type,
        fullname: buildTypeFullname(type, enclosingNamespace),
        fields: type.fields.map((field): RecordField => ({
          ...field,
          type: canonicalizeType(field.type, namespace),
        })),
      };
    }
    case 'enum':
    case 'fixed':
      return { ...type, fullname: buildTypeFullname(type, enclosingNamespace) };
    case 'array':
      return { ...type, items: canonicalizeType(type.items, enclosingNamespace) };
    case 'map':
      return { ...type, values: canonicalizeType(type.values, enclosingNamespace) };
    case 'union':
      return {
        ...type,
        types: type.types.map(member => canonicalizeType(member, enclosingNamespace)),
      };
  }
}

/**
 * Every named type in the tree, depth-first, parents before children.
 */
export function collectNamedTypes(type: TypeDescription): NamedType[] {
  const found: NamedType[] = [];
  visit(type, found);
  return found;
}

function visit(type: TypeDescription, found: NamedType[]): void {
  switch (type.kind) {
    case 'primitive':
      return;
    case 'record':
      found.push(type);
      for (const field of type.fields) {
        visit(field.type, found);
      }
      return;
    case 'enum':
    case 'fixed':
      found.push(type);
      return;
    case 'array':
      visit(type.items, found);
      return;
    case 'map':
      visit(type.values, found);
      return;
    case 'union':
      for (const member of type.types) {
        visit(member, found);
      }
      return;
  }
}
