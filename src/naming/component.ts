/**
 * Conversion of a single path segment (file or directory name).
 *
 * The stem is converted and the extension is carried over untouched, so
 * `Some File.JPG` becomes `some_file.JPG` in snake case.
 */

import { TextDecoder } from 'node:util';
import { PathConvertError } from '../errors.js';
import { convertCase } from './converters.js';
import type { ConversionRequest, PathComponent } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Decode a raw segment, rejecting anything that is not valid UTF-8 text
 *
 * @throws PathConvertError (InvalidUtf8Path)
 */
export function decodeComponent(component: string | Buffer): string {
  if (typeof component === 'string') {
    if (UNPAIRED_SURROGATE.test(component)) {
      throw new PathConvertError('InvalidUtf8Path', component);
    }
    return component;
  }

  try {
    return utf8.decode(component);
  } catch {
    throw new PathConvertError('InvalidUtf8Path', component.toString('utf-8'));
  }
}

/**
 * Split a segment around its last dot
 *
 * @example
 * decomposeComponent('Some File.jpg') // { name, stem: 'Some File', extension: 'jpg' }
 * decomposeComponent('archive.tar.gz') // { name, stem: 'archive.tar', extension: 'gz' }
 * decomposeComponent('.gitignore')    // { name, extension: 'gitignore' }
 * decomposeComponent('README')        // { name, stem: 'README' }
 */
export function decomposeComponent(name: string): PathComponent {
  const lastDot = name.lastIndexOf('.');

  if (lastDot === -1) {
    return name ? { name, stem: name } : { name };
  }

  if (lastDot === 0) {
    const extension = name.slice(1);
    return extension ? { name, extension } : { name };
  }

  return { name, stem: name.slice(0, lastDot), extension: name.slice(lastDot + 1) };
}

/**
 * Convert one path segment to the requested convention
 *
 * @param component - Segment text, or raw bytes as read from the filesystem
 * @returns Converted segment
 * @throws PathConvertError when the segment is not valid UTF-8 or is empty
 *
 * @example
 * convertComponent('Some File.jpg', { to: 'SnakeCase' })                     // 'some_file.jpg'
 * convertComponent('SomeFile.jpg', { from: 'UpperCamelCase', to: 'FlatCase' }) // 'somefile.jpg'
 * convertComponent('.gitignore', { to: 'UpperSnakeCase' })                   // '.gitignore'
 */
export function convertComponent(component: string | Buffer, request: ConversionRequest): string {
  const { name, stem, extension } = decomposeComponent(decodeComponent(component));

  if (stem === undefined) {
    if (extension === undefined) {
      throw new PathConvertError('InvalidPath', name);
    }
    // Nothing but an extension (dotfile): keep it as it is
    return name;
  }

  const converted = convertCase(stem, request);
  if (!converted) {
    // Stem made only of separators; converting would leave a bare extension
    return name;
  }

  return extension === undefined ? converted : `${converted}.${extension}`;
}
