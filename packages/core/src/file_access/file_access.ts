/**
 * File access helpers shared by every fileops operation.
 *
 * Validates that paths exist and have the expected type before they are
 * opened, and maps Node.js system errors to FileOpsError subclasses.
 *
 * @module file_access
 */

import * as fs from 'fs';
import { FileOpsError, InvalidInputError, errorMessage, isErrnoException } from '../errors';
import type { OpenOutputFileOptions } from './file_access.types';

/**
 * Maps a system error raised while touching `filePath` to a FileOpsError.
 * Errors that are already FileOpsErrors pass through unchanged.
 */
export function toFileOpsError(
  error: unknown,
  filePath: string,
  fallbackCode: 'READ_ERROR' | 'WRITE_ERROR'
): FileOpsError {
  if (error instanceof FileOpsError) {
    return error;
  }
  if (isErrnoException(error)) {
    switch (error.code) {
      case 'ENOENT':
      case 'ENOTDIR':
        return new InvalidInputError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
      case 'EACCES':
      case 'EPERM':
        return new InvalidInputError(`Permission denied: ${filePath}`, 'PERMISSION_DENIED', filePath);
      case 'EISDIR':
        return new InvalidInputError(`Not a file: ${filePath}`, 'NOT_A_FILE', filePath);
    }
  }
  const operation = fallbackCode === 'READ_ERROR' ? 'Read' : 'Write';
  return new FileOpsError(`${operation} error: ${errorMessage(error)}`, fallbackCode, filePath);
}

/**
 * Returns stats for `filePath`, or null when nothing exists there.
 */
export function statPath(filePath: string): fs.Stats | null {
  try {
    return fs.statSync(filePath);
  } catch (error: unknown) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw toFileOpsError(error, filePath, 'READ_ERROR');
  }
}

/**
 * Checks whether a regular file exists at `filePath`.
 */
export function fileExists(filePath: string): boolean {
  return statPath(filePath)?.isFile() ?? false;
}

/**
 * Throws InvalidInputError unless `filePath` is an existing regular file.
 */
export function assertFile(filePath: string): void {
  const stats = statPath(filePath);
  if (!stats) {
    throw new InvalidInputError(`File not found: ${filePath}`, 'FILE_NOT_FOUND', filePath);
  }
  if (!stats.isFile()) {
    throw new InvalidInputError(`Not a file: ${filePath}`, 'NOT_A_FILE', filePath);
  }
}

/**
 * Throws InvalidInputError unless `directoryPath` is an existing directory.
 */
export function assertDirectory(directoryPath: string): void {
  const stats = statPath(directoryPath);
  if (!stats) {
    throw new InvalidInputError(
      `Directory not found: ${directoryPath}`,
      'FILE_NOT_FOUND',
      directoryPath
    );
  }
  if (!stats.isDirectory()) {
    throw new InvalidInputError(
      `Not a directory: ${directoryPath}`,
      'NOT_A_DIRECTORY',
      directoryPath
    );
  }
}

/**
 * Reads a whole file as UTF-8 after checking that it exists.
 */
export function readTextFile(filePath: string): string {
  assertFile(filePath);
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    throw toFileOpsError(error, filePath, 'READ_ERROR');
  }
}

/**
 * Opens an existing file for reading and returns its descriptor.
 * The caller owns the descriptor and must close it with fs.closeSync.
 */
export function openInputFile(filePath: string): number {
  assertFile(filePath);
  try {
    return fs.openSync(filePath, 'r');
  } catch (error: unknown) {
    throw toFileOpsError(error, filePath, 'READ_ERROR');
  }
}

/**
 * Opens a file for writing, creating it when missing, and returns its descriptor.
 * The parent directory must exist.
 */
export function openOutputFile(filePath: string, options: OpenOutputFileOptions = {}): number {
  const stats = statPath(filePath);
  if (stats && !stats.isFile()) {
    throw new InvalidInputError(`Not a file: ${filePath}`, 'NOT_A_FILE', filePath);
  }

  const flags = (options.mode ?? 'truncate') === 'append' ? 'a' : 'w';
  try {
    return fs.openSync(filePath, flags);
  } catch (error: unknown) {
    throw toFileOpsError(error, filePath, 'WRITE_ERROR');
  }
}
