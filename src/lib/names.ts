import type { TypeDescription } from '../types/type-description.js';
import { getTypeName, getTypeNamespace } from './accessors.js';

/**
 * A short name paired with the namespace it resolves in.
 */
export interface SplitName {
  name: string;
  namespace: string;
}

/**
 * Split a dotted name at its last dot.
 * Returns null when the name contains no dot.
 *
 * Only the rightmost dot counts, so `a..b` splits into name `b` and
 * namespace `a.`; the grammar checks reject the empty segment later.
 */
export function splitFullname(fullname: string): SplitName | null {
  const dot = fullname.lastIndexOf('.');
  if (dot === -1) return null;

  return {
    name: fullname.slice(dot + 1),
    namespace: fullname.slice(0, dot),
  };
}

/**
 * Join a short name with its namespace.
 */
export function makeFullname(name: string, namespace: string): string {
  return namespace === '' ? name : `${namespace}.${name}`;
}

/**
 * Resolve a type's canonical short name and namespace.
 *
 * A dotted name carries its own namespace and wins outright. Otherwise the
 * explicit namespace is used, falling back to the enclosing one.
 */
export function splitTypeName(
  typeName: string,
  namespace: string,
  enclosingNamespace: string
): SplitName;
export function splitTypeName(
  type: TypeDescription,
  enclosingNamespace: string
): SplitName;
export function splitTypeName(
  typeOrName: TypeDescription | string,
  namespaceOrEnclosing: string,
  enclosingNamespace = ''
): SplitName {
  if (typeof typeOrName !== 'string') {
    return resolveName(
      getTypeName(typeOrName),
      getTypeNamespace(typeOrName),
      namespaceOrEnclosing
    );
  }
  return resolveName(typeOrName, namespaceOrEnclosing, enclosingNamespace);
}

/**
 * Build a type's canonical fullname from its name parts.
 */
export function buildTypeFullname(
  typeName: string,
  namespace: string,
  enclosingNamespace: string
): string;
export function buildTypeFullname(
  type: TypeDescription,
  enclosingNamespace: string
): string;
export function buildTypeFullname(
  typeOrName: TypeDescription | string,
  namespaceOrEnclosing: string,
  enclosingNamespace = ''
): string {
  const { name, namespace } = typeof typeOrName === 'string'
    ? resolveName(typeOrName, namespaceOrEnclosing, enclosingNamespace)
    : splitTypeName(typeOrName, namespaceOrEnclosing);
  return makeFullname(name, namespace);
}

function resolveName(
  typeName: string,
  namespace: string,
  enclosingNamespace: string
): SplitName {
  const split = splitFullname(typeName);
  if (split) return split;

  return {
    name: typeName,
    namespace: namespace === '' ? enclosingNamespace : namespace,
  };
}
