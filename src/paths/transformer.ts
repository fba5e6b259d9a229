/**
 * Apply segment conversion across the structure of a path.
 *
 * Paths are handled component-wise: a root, then segments split on the
 * platform separator. Repeated separators and inner `.` segments are dropped,
 * so `a//./b/` is treated as `a/b`.
 */

import path from 'node:path';
import { convertComponent } from '../naming/component.js';
import type { ConversionRequest } from '../naming/types.js';

export type ConversionMode = 'basename' | 'full-path';

export interface TransformOptions {
  mode: ConversionMode;
  /** Leading part of the path left untouched in full-path mode */
  prefix?: string;
}

interface ParsedPath {
  root: string;
  segments: string[];
}

const SEPARATORS = path.sep === '/' ? /\/+/ : /[\\/]+/;

function parsePath(p: string): ParsedPath {
  const { root } = path.parse(p);
  const segments = p
    .slice(root.length)
    .split(SEPARATORS)
    .filter((segment, i) => segment !== '' && (segment !== '.' || (i === 0 && !root)));
  return { root, segments };
}

function formatPath({ root, segments }: ParsedPath): string {
  return root + segments.join(path.sep);
}

function isStructural(segment: string): boolean {
  return segment === '.' || segment === '..';
}

function convertSegments(segments: readonly string[], request: ConversionRequest): string[] {
  return segments.map((segment) =>
    isStructural(segment) ? segment : convertComponent(segment, request),
  );
}

/**
 * Convert only the final segment of a path
 *
 * Roots and paths ending in `.` or `..` have no filename and are returned
 * unchanged.
 *
 * @throws PathConvertError when the final segment cannot be converted
 *
 * @example
 * convertBasenameOnly('/An Absolute/Path To/Some File.jpg', { to: 'CamelCase' })
 * // '/An Absolute/Path To/someFile.jpg'
 */
export function convertBasenameOnly(p: string, request: ConversionRequest): string {
  const parsed = parsePath(p);
  const basename = parsed.segments.at(-1);

  if (basename === undefined || isStructural(basename)) {
    return p;
  }

  return formatPath({
    root: parsed.root,
    segments: [...parsed.segments.slice(0, -1), convertComponent(basename, request)],
  });
}

/**
 * Convert every segment of a path independently
 *
 * @throws PathConvertError from the first segment that fails; no partial result
 *
 * @example
 * convertFull('/anAbsolute/pathTo/someFile.jpg', { to: 'SnakeCase' })
 * // '/an_absolute/path_to/some_file.jpg'
 */
export function convertFull(p: string, request: ConversionRequest): string {
  const { root, segments } = parsePath(p);
  return formatPath({ root, segments: convertSegments(segments, request) });
}

/**
 * Check whether `prefix` is a leading run of whole components of `p`
 */
export function startsWithPath(p: string, prefix: string): boolean {
  const target = parsePath(p);
  const lead = parsePath(prefix);

  return (
    target.root === lead.root &&
    lead.segments.length <= target.segments.length &&
    lead.segments.every((segment, i) => segment === target.segments[i])
  );
}

/**
 * Same as `convertFull`, except the segments of `prefix` are left as they are
 *
 * When `p` does not start with `prefix` the prefix has no effect.
 *
 * @example
 * convertFullExceptPrefix('/some-path/prefix/and-a/child', '/some-path/prefix', { to: 'UpperSnakeCase' })
 * // '/some-path/prefix/AND_A/CHILD'
 */
export function convertFullExceptPrefix(
  p: string,
  prefix: string,
  request: ConversionRequest,
): string {
  if (!startsWithPath(p, prefix)) {
    return convertFull(p, request);
  }

  const { root, segments } = parsePath(p);
  const kept = parsePath(prefix).segments.length;

  return formatPath({
    root,
    segments: [...segments.slice(0, kept), ...convertSegments(segments.slice(kept), request)],
  });
}

/**
 * Compute the destination of a path for the given mode
 */
export function transformPath(
  p: string,
  request: ConversionRequest,
  options: TransformOptions,
): string {
  if (options.mode === 'basename') {
    return convertBasenameOnly(p, request);
  }
  return options.prefix === undefined
    ? convertFull(p, request)
    : convertFullExceptPrefix(p, options.prefix, request);
}
