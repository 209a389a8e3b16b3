/**
 * Line filters apply to loadLines, directory filters to listFiles.
 */
export type LineFilterKind = 'skip if starts with' | 'skip if contains';

export type DirectoryFilterKind =
  | 'targetFileExtensions'
  | 'excludeFileExtensions'
  | 'excludeFiles';

export type FilterKind = LineFilterKind | DirectoryFilterKind;

/**
 * Normalized filter specification: every kind maps to a set of patterns.
 * Built per call by the caller and never mutated by the library.
 */
export type FilterSpec = {
  readonly [K in FilterKind]?: ReadonlySet<string>;
};

/**
 * Pattern list as callers may write it: an array, a set, or a
 * comma-separated string such as ".txt,.md".
 */
export type PatternListInput = string | readonly string[] | ReadonlySet<string>;

/**
 * Loose filter specification accepted by createFilterSpec.
 */
export type FilterSpecInput = {
  readonly [K in FilterKind]?: PatternListInput;
};
