/**
 * Naming conventions and segment conversion
 *
 * @example
 * import { convertComponent, parseConvention } from './naming/index.js';
 *
 * const to = parseConvention('snake');
 * convertComponent('Some File.jpg', { to }); // 'some_file.jpg'
 */

export { convertComponent, decodeComponent, decomposeComponent } from './component.js';
export {
  CONVENTION_EXAMPLES,
  CONVENTION_TOKENS,
  describeConventions,
  isConventionToken,
  parseConvention,
} from './conventions.js';
export { capitalize, convertCase, joinWords, splitWords } from './converters.js';
export type { Convention, ConventionToken, ConversionRequest, PathComponent } from './types.js';
