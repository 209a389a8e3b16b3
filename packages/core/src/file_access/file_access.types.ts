/**
 * How openOutputFile treats an existing file.
 * - truncate: existing content is discarded
 * - append: writes go to the end of the file
 */
export type OutputMode = 'truncate' | 'append';

/**
 * Options for openOutputFile.
 */
export interface OpenOutputFileOptions {
  /** Default: 'truncate' */
  mode?: OutputMode;
}
