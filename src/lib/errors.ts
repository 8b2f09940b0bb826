/**
 * Error types for name resolution and verification.
 */

/**
 * Kinds of naming defect a type description can have.
 */
export type NameErrorType =
  | 'invalid_name'
  | 'reserved_name_is_used_for_type_name';

/**
 * A name, namespace or fullname that does not follow the naming grammar.
 * `name` is the offending string exactly as found in the type.
 */
export interface InvalidNameError {
  type: 'invalid_name';
  name: string;
  message: string;
}

/**
 * A named type whose canonical short name is a built-in type name.
 */
export interface ReservedNameError {
  type: 'reserved_name_is_used_for_type_name';
  name: string;
  message: string;
}

export type NameError = InvalidNameError | ReservedNameError;

export function invalidName(name: string): InvalidNameError {
  return {
    type: 'invalid_name',
    name,
    message: `Invalid name: "${name}"`,
  };
}

export function reservedName(name: string): ReservedNameError {
  return {
    type: 'reserved_name_is_used_for_type_name',
    name,
    message: `Reserved type name cannot be used for a named type: "${name}"`,
  };
}

/**
 * Thrown by assertValidType when a type description fails verification.
 *
 * Callers that would rather branch on a value use verifyType, which returns
 * the same NameError in its result.
 *
 * @example
 * ```ts
 * try {
 *   assertValidType(type);
 * } catch (err) {
 *   if (err instanceof NameValidationError) report(err.error);
 *   else throw err;
 * }
 * ```
 */
export class NameValidationError extends Error {
  readonly error: NameError;

  constructor(error: NameError) {
    super(error.message);
    this.name = 'NameValidationError';
    this.error = error;
  }
}
