export {
  ConfigError,
  PathcaseError,
  PathConvertError,
  type PathConvertErrorKind,
  PathNotFoundError,
  RenameIoError,
  UnsupportedConventionError,
} from './errors.js';
export * from './naming/index.js';
export {
  type ConversionMode,
  convertBasenameOnly,
  convertFull,
  convertFullExceptPrefix,
  startsWithPath,
  type TransformOptions,
  transformPath,
} from './paths/transformer.js';
export { TreeRenamer } from './rename/renamer.js';
export { createReporter, formatOutcome, formatSummary } from './rename/reporter.js';
export type { RawPath, RenameOptions, RenameOutcome, RenamePlan } from './rename/types.js';
export { type EntryKind, type TreeEntry, walkBottomUp } from './rename/walker.js';
