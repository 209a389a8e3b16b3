export {
  FILTER_KINDS,
  createFilterSpec,
  getPatterns,
  isFilterKind,
  loadFilterSpec,
  splitPatternList,
} from './filter_spec';
export type {
  FilterKind,
  FilterSpec,
  FilterSpecInput,
  LineFilterKind,
  DirectoryFilterKind,
  PatternListInput,
} from './filter_spec.types';
