import { describe, expect, test } from 'vitest';
import { capitalize, convertCase, joinWords, splitWords } from '../converters.js';
import type { Convention } from '../types.js';

describe('splitWords', () => {
  describe('without a source convention', () => {
    test('splits on spaces, underscores and hyphens', () => {
      expect(splitWords('Some File')).toEqual(['Some', 'File']);
      expect(splitWords('some_file-name')).toEqual(['some', 'file', 'name']);
    });

    test('splits on case changes', () => {
      expect(splitWords('someFile')).toEqual(['some', 'File']);
      expect(splitWords('XMLHttpRequest')).toEqual(['XML', 'Http', 'Request']);
    });

    test('splits letters from digits', () => {
      expect(splitWords('someFile2')).toEqual(['some', 'File', '2']);
      expect(splitWords('photo2021')).toEqual(['photo', '2021']);
    });

    test('drops leading, trailing and repeated separators', () => {
      expect(splitWords('__leading--trailing__')).toEqual(['leading', 'trailing']);
      expect(splitWords('___')).toEqual([]);
    });

    test('keeps a single word whole', () => {
      expect(splitWords('report')).toEqual(['report']);
      expect(splitWords('REPORT')).toEqual(['REPORT']);
    });
  });

  describe('with a source convention', () => {
    test('title case only splits on spaces', () => {
      expect(splitWords('Some File_Name', 'TitleCase')).toEqual(['Some', 'File_Name']);
    });

    test('flat case never splits', () => {
      expect(splitWords('some file', 'FlatCase')).toEqual(['some file']);
      expect(splitWords('SOMEFILE', 'UpperFlatCase')).toEqual(['SOMEFILE']);
    });

    test('snake and kebab case split on their own separator', () => {
      expect(splitWords('some_File-name', 'SnakeCase')).toEqual(['some', 'File-name']);
      expect(splitWords('SOME_FILE', 'UpperSnakeCase')).toEqual(['SOME', 'FILE']);
      expect(splitWords('some-file_name', 'KebabCase')).toEqual(['some', 'file_name']);
    });

    test('camel case splits on capitals, not on spaces', () => {
      expect(splitWords('SomeFile', 'UpperCamelCase')).toEqual(['Some', 'File']);
      expect(splitWords('some fileName', 'CamelCase')).toEqual(['some file', 'Name']);
    });

    test('camel case keeps digits with the word before them', () => {
      expect(splitWords('mp3File', 'CamelCase')).toEqual(['mp3', 'File']);
    });
  });
});

describe('capitalize', () => {
  test('upper-cases the first letter and lower-cases the rest', () => {
    expect(capitalize('fILE')).toBe('File');
    expect(capitalize('éCOLE')).toBe('École');
    expect(capitalize('')).toBe('');
  });
});

describe('joinWords', () => {
  const words = ['some', 'FILE'];

  test.each<[Convention, string]>([
    ['TitleCase', 'Some File'],
    ['FlatCase', 'somefile'],
    ['UpperFlatCase', 'SOMEFILE'],
    ['CamelCase', 'someFile'],
    ['UpperCamelCase', 'SomeFile'],
    ['SnakeCase', 'some_file'],
    ['UpperSnakeCase', 'SOME_FILE'],
    ['KebabCase', 'some-file'],
  ])('joins words in %s', (to, expected) => {
    expect(joinWords(words, to)).toBe(expected);
  });

  test('joins nothing into an empty string', () => {
    expect(joinWords([], 'CamelCase')).toBe('');
  });
});

describe('convertCase', () => {
  test('guesses word boundaries without a source convention', () => {
    expect(convertCase('Some File', { to: 'SnakeCase' })).toBe('some_file');
    expect(convertCase('anAbsolute', { to: 'SnakeCase' })).toBe('an_absolute');
  });

  test('uses the source convention when given', () => {
    expect(convertCase('SomeFile', { from: 'UpperCamelCase', to: 'FlatCase' })).toBe('somefile');
    expect(convertCase('SOME_FILE', { from: 'UpperSnakeCase', to: 'KebabCase' })).toBe(
      'some-file',
    );
  });

  test('round-trips when both directions name their source convention', () => {
    const conventions: Convention[] = [
      'TitleCase',
      'FlatCase',
      'UpperFlatCase',
      'CamelCase',
      'UpperCamelCase',
      'SnakeCase',
      'UpperSnakeCase',
      'KebabCase',
    ];
    // Flat targets erase word boundaries, so they can't be converted back
    const targets = conventions.filter((c) => c !== 'FlatCase' && c !== 'UpperFlatCase');

    for (const from of conventions) {
      const original = joinWords(['alpha', 'beta', 'gamma'], from);
      for (const to of targets) {
        const converted = convertCase(original, { from, to });
        expect(convertCase(converted, { from: to, to: from })).toBe(original);
      }
    }
  });
});
