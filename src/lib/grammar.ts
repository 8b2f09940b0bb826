import { splitFullname } from './names.js';

const SIMPLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Check a single name segment: a type name part, a record field name or an
 * enum symbol. Dots are not allowed.
 */
export function isCorrectName(name: string): boolean {
  return SIMPLE_NAME.test(name);
}

/**
 * Check a type name or namespace whose segments are joined by dots.
 * Every segment must pass isCorrectName, so empty segments fail.
 */
export function isCorrectDottedName(name: string): boolean {
  const split = splitFullname(name);
  if (!split) return isCorrectName(name);

  return isCorrectName(split.name) && isCorrectDottedName(split.namespace);
}
