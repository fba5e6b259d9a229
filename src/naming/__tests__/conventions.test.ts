import { describe, expect, test } from 'vitest';
import { UnsupportedConventionError } from '../../errors.js';
import {
  describeConventions,
  isConventionToken,
  parseConvention,
} from '../conventions.js';

describe('parseConvention', () => {
  test('maps every token to its convention', () => {
    expect(parseConvention('title')).toBe('TitleCase');
    expect(parseConvention('flat')).toBe('FlatCase');
    expect(parseConvention('FLAT')).toBe('UpperFlatCase');
    expect(parseConvention('camel')).toBe('CamelCase');
    expect(parseConvention('CAMEL')).toBe('UpperCamelCase');
    expect(parseConvention('snake')).toBe('SnakeCase');
    expect(parseConvention('SNAKE')).toBe('UpperSnakeCase');
    expect(parseConvention('kebab')).toBe('KebabCase');
  });

  test('is case-sensitive', () => {
    expect(() => parseConvention('Snake')).toThrow(UnsupportedConventionError);
    expect(() => parseConvention('KEBAB')).toThrow("Unsupported naming convention 'KEBAB'");
  });

  test('carries the rejected token', () => {
    try {
      parseConvention('unsupported convention');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedConventionError);
      if (error instanceof UnsupportedConventionError) {
        expect(error.token).toBe('unsupported convention');
      }
    }
  });

  test('rejects the empty string', () => {
    expect(() => parseConvention('')).toThrow("Unsupported naming convention ''");
  });
});

describe('isConventionToken', () => {
  test('does not accept inherited object keys', () => {
    expect(isConventionToken('toString')).toBe(false);
    expect(isConventionToken('snake')).toBe(true);
  });
});

describe('describeConventions', () => {
  test('lists one aligned line per convention', () => {
    const lines = describeConventions().split('\n');

    expect(lines).toHaveLength(8);
    expect(lines[0]).toBe('  title  Title Case');
    expect(lines[1]).toBe('  flat   flatcase');
    expect(lines[7]).toBe('  kebab  kebab-case');
  });
});
