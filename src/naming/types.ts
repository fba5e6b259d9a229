/**
 * Type definitions for naming conventions and component conversion.
 *
 * Every value here is immutable; conversion produces new strings and never
 * holds state between calls.
 */

/**
 * Supported file naming conventions.
 *
 * Converting to some of these is lossy: word boundaries disappear in
 * `FlatCase` and `UpperFlatCase`, and a digit can't always be told apart as
 * the start, end or whole of a word. Such names cannot be reverted exactly.
 */
export type Convention =
  | 'TitleCase'
  | 'FlatCase'
  | 'UpperFlatCase'
  | 'CamelCase'
  | 'UpperCamelCase'
  | 'SnakeCase'
  | 'UpperSnakeCase'
  | 'KebabCase';

/** Command-line token for a convention: "snake", "SNAKE", "camel", ... */
export type ConventionToken = 'title' | 'flat' | 'FLAT' | 'camel' | 'CAMEL' | 'snake' | 'SNAKE' | 'kebab';

/**
 * Source and target convention for one conversion.
 *
 * Without `from`, word boundaries are guessed from separators, case changes and
 * digits, so a round trip is only guaranteed when `from` is given.
 */
export interface ConversionRequest {
  readonly from?: Convention;
  readonly to: Convention;
}

/**
 * A single path segment split around its last dot
 */
export interface PathComponent {
  /** Segment as it appears in the path: "Some File.jpg" */
  readonly name: string;

  /** Text before the last dot: "Some File" (absent for ".gitignore") */
  readonly stem?: string;

  /** Text after the last dot, without the dot: "jpg" */
  readonly extension?: string;
}
