/**
 * Line loader: reads a text file into an ordered list of lines or integers.
 *
 * @module line_loader
 */

import { InvalidInputError } from '../errors';
import { readTextFile } from '../file_access';
import { getPatterns } from '../filter_spec';
import type { FilterSpec } from '../filter_spec';
import { createLogger } from '../logger';

const logger = createLogger('[LineLoader] ');

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Splits `content` on `separator`. A trailing separator does not open a new
 * line, so "a\nb\n" and "a\nb" both give ["a", "b"], and "" gives [].
 */
export function splitLines(content: string, separator: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(separator);
  if (content.endsWith(separator)) {
    lines.pop();
  }
  return lines;
}

/**
 * Tells whether a line survives the empty check and the line filters of `filterSpec`.
 */
export function keepLine(line: string, filterSpec: FilterSpec, skipEmpty: boolean): boolean {
  if (skipEmpty && line.length === 0) {
    return false;
  }
  for (const prefix of getPatterns(filterSpec, 'skip if starts with')) {
    if (line.startsWith(prefix)) {
      return false;
    }
  }
  for (const fragment of getPatterns(filterSpec, 'skip if contains')) {
    if (line.includes(fragment)) {
      return false;
    }
  }
  return true;
}

/**
 * Loads a file as an ordered list of lines.
 *
 * @param filterSpec - "skip if starts with" and "skip if contains" drop matching lines
 * @param separator - Line separator. Default: "\n"
 * @param skipEmpty - Drop empty lines. Default: true
 * @throws InvalidInputError if the path is not an existing, readable file
 */
export function loadLines(
  filePath: string,
  filterSpec: FilterSpec = {},
  separator: string = '\n',
  skipEmpty: boolean = true
): string[] {
  if (separator.length === 0) {
    throw new InvalidInputError('Separator must not be empty', 'INVALID_ARGUMENT', filePath);
  }

  const content = readTextFile(filePath);
  const lines = splitLines(content, separator).filter((line) =>
    keepLine(line, filterSpec, skipEmpty)
  );

  logger.debug(`Loaded ${lines.length} lines from ${filePath}`);
  return lines;
}

/**
 * Parses a base-10 integer token.
 * @throws InvalidInputError (PARSE_ERROR) naming the token when it is not an integer
 */
export function parseInteger(token: string, filePath?: string): number {
  if (!INTEGER_TOKEN.test(token)) {
    throw new InvalidInputError(`Invalid integer token: "${token}"`, 'PARSE_ERROR', filePath);
  }
  const value = Number.parseInt(token, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidInputError(`Integer out of range: "${token}"`, 'PARSE_ERROR', filePath);
  }
  // "-0" parses to negative zero
  return value === 0 ? 0 : value;
}

/**
 * Loads whitespace or newline separated integers from a file.
 *
 * @example
 * ```typescript
 * // file content: "-5 -10 15\n-20\n"
 * loadInts('numbers.txt'); // [-5, -10, 15, -20]
 * ```
 * @throws InvalidInputError if the file is missing or a token is not an integer
 */
export function loadInts(filePath: string): number[] {
  const content = readTextFile(filePath);
  const numbers = content
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => parseInteger(token, filePath));

  logger.debug(`Loaded ${numbers.length} integers from ${filePath}`);
  return numbers;
}
