/**
 * Appends text to a file, optionally creating it.
 *
 * @module file_appender
 */

import * as fs from 'fs';
import { InvalidInputError } from '../errors';
import { openOutputFile, statPath, toFileOpsError } from '../file_access';
import { createLogger } from '../logger';

const logger = createLogger('[FileAppender] ');

/**
 * Appends `text` verbatim to the end of `filePath`. No separator is added.
 *
 * @param createIfMissing - Create the file when it does not exist. Default: true
 * @throws InvalidInputError FILE_NOT_FOUND when the file is missing and
 * createIfMissing is false, NOT_A_FILE when the path is a directory
 */
export function appendToFile(filePath: string, text: string, createIfMissing: boolean = true): void {
  const stats = statPath(filePath);
  if (!stats && !createIfMissing) {
    throw new InvalidInputError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
  }

  const fd = openOutputFile(filePath, { mode: 'append' });
  try {
    fs.appendFileSync(fd, text, 'utf-8');
  } catch (error: unknown) {
    throw toFileOpsError(error, filePath, 'WRITE_ERROR');
  } finally {
    fs.closeSync(fd);
  }

  logger.debug(`Appended ${text.length} characters to ${filePath}${stats ? '' : ' (created)'}`);
}
