/**
 * Error classes for fileops operations.
 *
 * Every error carries a machine-readable `code` and, where one is involved,
 * the `filePath` that caused it.
 */

/**
 * Codes for input the caller supplied (paths, arguments, file contents).
 */
export type InvalidInputErrorCode =
  | 'FILE_NOT_FOUND'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'PERMISSION_DENIED'
  | 'INVALID_ARGUMENT'
  | 'PARSE_ERROR'
  | 'INVALID_FILTER_SPEC';

/**
 * Codes for operations that have no valid result.
 */
export type EmptyDataErrorCode = 'EMPTY_FILE';

/**
 * All error codes for fileops operations.
 */
export type FileOpsErrorCode =
  | InvalidInputErrorCode
  | EmptyDataErrorCode
  | 'READ_ERROR'
  | 'WRITE_ERROR';

/**
 * Base error class for all fileops errors.
 * Thrown directly for unexpected I/O failures.
 */
export class FileOpsError extends Error {
  constructor(
    message: string,
    public readonly code: FileOpsErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'FileOpsError';
    Object.setPrototypeOf(this, FileOpsError.prototype);
  }
}

/**
 * Error thrown when a path, argument or file content is not usable.
 */
export class InvalidInputError extends FileOpsError {
  declare readonly code: InvalidInputErrorCode;

  constructor(message: string, code: InvalidInputErrorCode, filePath?: string) {
    super(message, code, filePath);
    this.name = 'InvalidInputError';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}

/**
 * Error thrown when an operation has nothing to return,
 * e.g. picking a line from an empty file.
 */
export class EmptyDataError extends FileOpsError {
  declare readonly code: EmptyDataErrorCode;

  constructor(filePath: string) {
    super(`File contains no lines: ${filePath}`, 'EMPTY_FILE', filePath);
    this.name = 'EmptyDataError';
    Object.setPrototypeOf(this, EmptyDataError.prototype);
  }
}

/**
 * Narrows an unknown thrown value to a Node.js system error.
 * Checked structurally: errors raised by core modules may come from another
 * realm (vm contexts, Jest), where `instanceof Error` is false.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Message of a thrown value, whatever realm it was created in.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
