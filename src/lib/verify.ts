import type { TypeDescription } from '../types/type-description.js';
import {
  getTypeFullname,
  getTypeName,
  getTypeNamespace,
  isNamedType,
} from './accessors.js';
import { isReservedTypeName } from './constants.js';
import { invalidName, NameValidationError, reservedName } from './errors.js';
import type { NameError } from './errors.js';
import { isCorrectDottedName } from './grammar.js';
import { splitTypeName } from './names.js';

/**
 * Result of verifying a single type description.
 */
export type VerifyResult =
  | { valid: true }
  | { valid: false; error: NameError };

/**
 * A name error tagged with the position of the type it came from.
 */
export type IndexedNameError = NameError & { index: number };

/**
 * Result of verifying several type descriptions.
 */
export interface VerifyTypesResult {
  valid: boolean;
  errors: IndexedNameError[];
}

/**
 * Verify the names of a type description.
 *
 * Unnamed kinds always pass. For record, enum and fixed types the name,
 * namespace and fullname are checked against the grammar first, in that
 * order, and only then is the short name resolved and checked against the
 * reserved type names. Resolution assumes well-formed segments, so the
 * order matters. Stops at the first defect.
 */
export function verifyType(type: TypeDescription): VerifyResult {
  if (!isNamedType(type)) return { valid: true };

  const name = getTypeName(type);
  const namespace = getTypeNamespace(type);
  const fullname = getTypeFullname(type);

  if (!isCorrectDottedName(name)) {
    return { valid: false, error: invalidName(name) };
  }
  if (namespace !== '' && !isCorrectDottedName(namespace)) {
    return { valid: false, error: invalidName(namespace) };
  }
  if (!isCorrectDottedName(fullname)) {
    return { valid: false, error: invalidName(fullname) };
  }

  // The enclosing namespace cannot change the short name, only the namespace.
  const { name: shortName } = splitTypeName(name, namespace, '');
  if (isReservedTypeName(shortName)) {
    return { valid: false, error: reservedName(shortName) };
  }

  return { valid: true };
}

/**
 * Same as verifyType, but throws instead of returning the failure.
 *
 * @throws {NameValidationError}
 */
export function assertValidType(type: TypeDescription): void {
  const result = verifyType(type);
  if (!result.valid) {
    throw new NameValidationError(result.error);
  }
}

/**
 * Verify each type description independently and collect one error per
 * failing type.
 */
export function verifyTypes(types: readonly TypeDescription[]): VerifyTypesResult {
  const errors: IndexedNameError[] = [];

  types.forEach((type, index) => {
    const result = verifyType(type);
    if (!result.valid) {
      errors.push({ ...result.error, index });
    }
  });

  return {
    valid: errors.length === 0,
    errors,
  };
}
