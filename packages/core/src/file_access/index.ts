export {
  assertFile,
  assertDirectory,
  fileExists,
  statPath,
  readTextFile,
  openInputFile,
  openOutputFile,
  toFileOpsError,
} from './file_access';
export type { OutputMode, OpenOutputFileOptions } from './file_access.types';
