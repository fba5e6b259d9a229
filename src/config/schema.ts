import { CONVENTION_TOKENS } from '../naming/conventions.js';
import type { ConventionToken } from '../naming/types.js';
import type { ConversionMode } from '../paths/transformer.js';

/**
 * Defaults read from `pathcase.config.json`. Command-line flags win.
 */
export interface PathcaseConfig {
  from?: ConventionToken;
  mode?: ConversionMode;
  prefix?: string;
  recursive?: boolean;
  noClobber?: boolean;
  verbose?: boolean;
}

export const CONFIG_SCHEMA = {
  type: 'object',
  properties: {
    from: { type: 'string', enum: CONVENTION_TOKENS },
    mode: { type: 'string', enum: ['basename', 'full-path'] },
    prefix: { type: 'string', minLength: 1 },
    recursive: { type: 'boolean' },
    noClobber: { type: 'boolean' },
    verbose: { type: 'boolean' },
  },
  additionalProperties: false,
} as const;
