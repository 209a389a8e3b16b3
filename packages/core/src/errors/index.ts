export {
  FileOpsError,
  InvalidInputError,
  EmptyDataError,
  isErrnoException,
  errorMessage,
} from './errors';
export type {
  FileOpsErrorCode,
  InvalidInputErrorCode,
  EmptyDataErrorCode,
} from './errors';
