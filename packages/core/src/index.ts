export * as Errors from "./errors";
export * as FileAccess from "./file_access";
export * as FilterSpecs from "./filter_spec";
export * as Lines from "./line_loader";
export * as Appender from "./file_appender";
export * as RandomLine from "./random_line";
export * as Lister from "./file_lister";
export * as Logger from "./logger";

// Core operations
export { loadLines, loadInts } from "./line_loader";
export { appendToFile } from "./file_appender";
export { randomLine } from "./random_line";
export { listFiles } from "./file_lister";
export { openInputFile, openOutputFile } from "./file_access";
export { createFilterSpec, loadFilterSpec } from "./filter_spec";
export { FileOpsError, InvalidInputError, EmptyDataError } from "./errors";
export type { FilterSpec, FilterSpecInput, FilterKind } from "./filter_spec";
