/**
 * Catalog of supported naming conventions and their command-line tokens.
 */

import { UnsupportedConventionError } from '../errors.js';
import type { Convention, ConventionToken } from './types.js';

const TOKEN_TO_CONVENTION: Readonly<Record<ConventionToken, Convention>> = Object.freeze({
  title: 'TitleCase',
  flat: 'FlatCase',
  FLAT: 'UpperFlatCase',
  camel: 'CamelCase',
  CAMEL: 'UpperCamelCase',
  snake: 'SnakeCase',
  SNAKE: 'UpperSnakeCase',
  kebab: 'KebabCase',
});

/**
 * Tokens in display order, paired with an example of the resulting style
 */
export const CONVENTION_EXAMPLES: ReadonlyArray<readonly [ConventionToken, string]> = Object.freeze([
  ['title', 'Title Case'],
  ['flat', 'flatcase'],
  ['FLAT', 'UPPERFLATCASE'],
  ['camel', 'camelCase'],
  ['CAMEL', 'CamelCase'],
  ['snake', 'snake_case'],
  ['SNAKE', 'SNAKE_CASE'],
  ['kebab', 'kebab-case'],
] as const);

export const CONVENTION_TOKENS: readonly ConventionToken[] = Object.freeze(
  CONVENTION_EXAMPLES.map(([token]) => token),
);

export function isConventionToken(token: string): token is ConventionToken {
  return Object.hasOwn(TOKEN_TO_CONVENTION, token);
}

/**
 * Parse a command-line token into a convention
 *
 * Tokens are case-sensitive: "snake" and "SNAKE" are different conventions.
 *
 * @throws UnsupportedConventionError for any other token
 *
 * @example
 * parseConvention('kebab')  // 'KebabCase'
 * parseConvention('CAMEL')  // 'UpperCamelCase'
 * parseConvention('Snake')  // throws
 */
export function parseConvention(token: string): Convention {
  if (!isConventionToken(token)) {
    throw new UnsupportedConventionError(token);
  }
  return TOKEN_TO_CONVENTION[token];
}

/**
 * Help text table: "  snake  snake_case"
 */
export function describeConventions(): string {
  return CONVENTION_EXAMPLES.map(([token, example]) => `  ${token.padEnd(5)}  ${example}`).join('\n');
}
