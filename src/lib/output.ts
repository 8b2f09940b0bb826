import chalk from 'chalk';
import type { NameError } from './errors.js';
import type { IndexedNameError, VerifyTypesResult } from './verify.js';

/**
 * Options for formatting name errors.
 */
export interface FormatOptions {
  /** Wrap each error line in red. Default: false */
  color?: boolean;
}

/**
 * JSON-friendly form of a name error.
 */
export interface JsonNameError {
  type: NameError['type'];
  name: string;
  message: string;
  index?: number;
}

/**
 * JSON-friendly form of a batch verification result.
 */
export interface JsonNameErrors {
  success: boolean;
  errors: JsonNameError[];
}

function hasIndex(error: NameError | IndexedNameError): error is IndexedNameError {
  return 'index' in error;
}

/**
 * Render name errors as a block of text for the schema author.
 * Returns an empty string when there are no errors.
 */
export function formatNameErrors(
  errors: ReadonlyArray<NameError | IndexedNameError>,
  options: FormatOptions = {}
): string {
  if (errors.length === 0) return '';

  const lines: string[] = ['Name errors:'];
  for (const error of errors) {
    const prefix = hasIndex(error) ? `[${error.index}] ` : '';
    const line = `  - ${prefix}${error.message}`;
    lines.push(options.color ? chalk.red(line) : line);
  }

  return lines.join('\n');
}

/**
 * Convert a batch verification result to JSON-friendly format.
 */
export function nameErrorsToJson(result: VerifyTypesResult): JsonNameErrors {
  return {
    success: result.valid,
    errors: result.errors.map(e => ({
      type: e.type,
      name: e.name,
      message: e.message,
      index: e.index,
    })),
  };
}

/**
 * Print name errors to stderr.
 */
export function printNameErrors(errors: ReadonlyArray<NameError | IndexedNameError>): void {
  if (errors.length === 0) return;
  console.error(formatNameErrors(errors, { color: true }));
}

/**
 * Strip ANSI color codes from a string.
 */
export function stripColors(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
