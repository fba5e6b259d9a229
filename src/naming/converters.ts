/**
 * Low-level case conversion: split text into words, then join the words in
 * a target convention.
 *
 * These functions work on bare text. Path segments go through
 * `convertComponent`, which keeps file extensions out of the conversion.
 */

import type { Convention, ConversionRequest } from './types.js';

type Boundary = 'space' | 'underscore' | 'hyphen' | 'lowerUpper' | 'acronym' | 'digitUpper' | 'digit';

const CAMEL_BOUNDARIES: readonly Boundary[] = ['lowerUpper', 'acronym', 'digitUpper'];

const BOUNDARIES: Readonly<Record<Convention, readonly Boundary[]>> = {
  TitleCase: ['space'],
  FlatCase: [],
  UpperFlatCase: [],
  CamelCase: CAMEL_BOUNDARIES,
  UpperCamelCase: CAMEL_BOUNDARIES,
  SnakeCase: ['underscore'],
  UpperSnakeCase: ['underscore'],
  KebabCase: ['hyphen'],
};

// Used when the source convention is unknown
const HEURISTIC_BOUNDARIES: readonly Boundary[] = [
  'space',
  'underscore',
  'hyphen',
  ...CAMEL_BOUNDARIES,
  'digit',
];

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return isUpper(ch) || isLower(ch);
}

function isSeparator(ch: string, boundaries: readonly Boundary[]): boolean {
  return (
    (/^\s$/.test(ch) && boundaries.includes('space')) ||
    (ch === '_' && boundaries.includes('underscore')) ||
    (ch === '-' && boundaries.includes('hyphen'))
  );
}

function startsWord(
  prev: string,
  ch: string,
  next: string | undefined,
  boundaries: readonly Boundary[],
): boolean {
  if (boundaries.includes('lowerUpper') && isLower(prev) && isUpper(ch)) return true;
  if (boundaries.includes('digitUpper') && isDigit(prev) && isUpper(ch)) return true;
  // "XMLFile": the F starts a new word, the L does not
  if (
    boundaries.includes('acronym') &&
    isUpper(prev) &&
    isUpper(ch) &&
    next !== undefined &&
    isLower(next)
  ) {
    return true;
  }
  if (boundaries.includes('digit')) {
    return (isDigit(prev) && isLetter(ch)) || (isLetter(prev) && isDigit(ch));
  }
  return false;
}

/**
 * Split text into words
 *
 * @param text - Text to split (a filename stem, not a whole filename)
 * @param from - Known convention of `text`; guessed from its shape when omitted
 *
 * @example
 * splitWords('Some File')                  // ['Some', 'File']
 * splitWords('someFile2')                  // ['some', 'File', '2']
 * splitWords('some-file_name', 'KebabCase') // ['some', 'file_name']
 */
export function splitWords(text: string, from?: Convention): string[] {
  const boundaries = from ? BOUNDARIES[from] : HEURISTIC_BOUNDARIES;
  const chars = Array.from(text);
  const words: string[] = [];
  let current = '';

  chars.forEach((ch, i) => {
    if (isSeparator(ch, boundaries)) {
      if (current) words.push(current);
      current = '';
      return;
    }

    const prev = chars[i - 1];
    if (current && prev !== undefined && startsWord(prev, ch, chars[i + 1], boundaries)) {
      words.push(current);
      current = '';
    }
    current += ch;
  });

  if (current) words.push(current);
  return words;
}

/**
 * Upper-case the first character, lower-case the rest
 */
export function capitalize(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  return first.toUpperCase() + rest.join('').toLowerCase();
}

/**
 * Join words using the capitalization and separator of a convention
 *
 * @example
 * joinWords(['some', 'File'], 'SnakeCase')      // 'some_file'
 * joinWords(['some', 'file'], 'UpperCamelCase') // 'SomeFile'
 */
export function joinWords(words: readonly string[], to: Convention): string {
  const lower = words.map((w) => w.toLowerCase());
  const upper = words.map((w) => w.toUpperCase());
  const capitalized = words.map(capitalize);

  switch (to) {
    case 'TitleCase':
      return capitalized.join(' ');
    case 'FlatCase':
      return lower.join('');
    case 'UpperFlatCase':
      return upper.join('');
    case 'CamelCase':
      return lower.slice(0, 1).concat(capitalized.slice(1)).join('');
    case 'UpperCamelCase':
      return capitalized.join('');
    case 'SnakeCase':
      return lower.join('_');
    case 'UpperSnakeCase':
      return upper.join('_');
    case 'KebabCase':
      return lower.join('-');
  }
}

/**
 * Convert text between conventions
 *
 * @example
 * convertCase('Some File', { to: 'SnakeCase' })                        // 'some_file'
 * convertCase('SomeFile', { from: 'UpperCamelCase', to: 'FlatCase' }) // 'somefile'
 */
export function convertCase(text: string, request: ConversionRequest): string {
  return joinWords(splitWords(text, request.from), request.to);
}
