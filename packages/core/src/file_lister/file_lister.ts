/**
 * File lister: direct file entries of a directory, filtered by extension and name.
 *
 * Uses fast-glob for enumeration. Directories are never returned and
 * there is no recursion.
 *
 * @module file_lister
 */

import fg from 'fast-glob';
import * as path from 'path';
import { assertDirectory, toFileOpsError } from '../file_access';
import { getPatterns } from '../filter_spec';
import type { FilterSpec } from '../filter_spec';
import { createLogger } from '../logger';

const logger = createLogger('[FileLister] ');

/**
 * Tells whether a file base name survives the directory filters of `filterSpec`.
 * Extensions compare exactly, leading dot included (".txt").
 */
export function keepFile(fileName: string, filterSpec: FilterSpec): boolean {
  const extension = path.extname(fileName);

  const targetExtensions = getPatterns(filterSpec, 'targetFileExtensions');
  if (targetExtensions.size > 0 && !targetExtensions.has(extension)) {
    return false;
  }
  if (getPatterns(filterSpec, 'excludeFileExtensions').has(extension)) {
    return false;
  }
  return !getPatterns(filterSpec, 'excludeFiles').has(fileName);
}

/**
 * Lists the base names of regular files directly inside `directoryPath`.
 *
 * @example
 * ```typescript
 * const spec = createFilterSpec({ targetFileExtensions: '.txt', excludeFiles: 'excluded.txt' });
 * listFiles('notes', spec); // ['a.txt', 'b.txt']
 * ```
 * @throws InvalidInputError if the directory does not exist
 */
export function listFiles(directoryPath: string, filterSpec: FilterSpec = {}): string[] {
  assertDirectory(directoryPath);

  let entries: string[];
  try {
    entries = fg.sync('*', {
      cwd: directoryPath,
      onlyFiles: true,
      dot: true,
      deep: 1,
    });
  } catch (error: unknown) {
    throw toFileOpsError(error, directoryPath, 'READ_ERROR');
  }

  const files = entries.filter((fileName) => keepFile(fileName, filterSpec));
  logger.debug(`Listed ${files.length} of ${entries.length} files in ${directoryPath}`);
  return files;
}
