import { describe, expect, test } from 'vitest';
import { RenameIoError } from '../../src/errors.js';
import { createReporter, formatOutcome, formatSummary } from '../../src/rename/reporter.js';
import { collectingSink } from '../helpers/tree.js';

describe('formatOutcome', () => {
  test('lists renames only in verbose output', () => {
    expect(formatOutcome({ status: 'renamed', source: 'A B.txt', destination: 'a_b.txt' })).toEqual({
      level: 'verbose',
      message: "'A B.txt' -> 'a_b.txt'",
    });
  });

  test('always lists dry-run mappings', () => {
    expect(formatOutcome({ status: 'planned', source: 'A B.txt', destination: 'a_b.txt' })).toEqual({
      level: 'result',
      message: "'A B.txt' -> 'a_b.txt'",
    });
  });

  test('warns about skipped collisions', () => {
    expect(formatOutcome({ status: 'skipped', source: 'A B.txt', destination: 'a_b.txt' })).toEqual({
      level: 'warn',
      message: "Skipped 'A B.txt': 'a_b.txt' already exists",
    });
  });

  test('reports failures as errors', () => {
    const error = new RenameIoError('A B', 'a_b', new Error('EXDEV: cross-device link not permitted'));

    expect(formatOutcome({ status: 'failed', source: 'A B', destination: 'a_b', error })).toEqual({
      level: 'error',
      message: "Error: failed to rename 'A B' to 'a_b': EXDEV: cross-device link not permitted",
    });
  });

  test('mentions unchanged paths in verbose output', () => {
    expect(formatOutcome({ status: 'unchanged', source: 'a_b.txt' })).toEqual({
      level: 'verbose',
      message: "'a_b.txt' is already in the target convention",
    });
  });
});

describe('createReporter', () => {
  test('writes each outcome to its level and counts them', () => {
    const { sink, lines } = collectingSink();
    const reporter = createReporter(sink);

    reporter.report({ status: 'renamed', source: 'A', destination: 'a' });
    reporter.report({ status: 'skipped', source: 'B', destination: 'b' });
    reporter.report({ status: 'failed', source: 'C', error: new Error('boom') });

    expect(lines.verbose).toEqual(["'A' -> 'a'"]);
    expect(lines.warn).toEqual(["Skipped 'B': 'b' already exists"]);
    expect(lines.error).toEqual(['Error: boom']);
    expect(reporter.summary).toEqual({ renamed: 1, planned: 0, unchanged: 0, skipped: 1, failed: 1 });
  });
});

describe('formatSummary', () => {
  test('omits planned renames outside dry runs', () => {
    expect(formatSummary({ renamed: 2, planned: 0, unchanged: 1, skipped: 0, failed: 0 })).toBe(
      '2 renamed, 1 unchanged, 0 skipped, 0 failed',
    );
  });

  test('includes planned renames in dry runs', () => {
    expect(formatSummary({ renamed: 0, planned: 3, unchanged: 0, skipped: 1, failed: 0 })).toBe(
      '0 renamed, 3 planned, 0 unchanged, 1 skipped, 0 failed',
    );
  });
});
