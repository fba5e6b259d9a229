/**
 * Loads optional defaults from a JSON config file
 * Uses Ajv for validation with helpful error messages
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Ajv, type ErrorObject } from 'ajv';
import { ConfigError } from '../errors.js';
import { debugLog } from '../utils/debug.js';
import { CONFIG_SCHEMA, type PathcaseConfig } from './schema.js';

export const DEFAULT_CONFIG_PATH = './pathcase.config.json';

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile<PathcaseConfig>(CONFIG_SCHEMA);

/**
 * Resolve which config file to read
 *
 * An explicit path (flag or PATHCASE_CONFIG_PATH) must exist; the default one
 * is optional.
 */
export function resolveConfigPath(explicit?: string): { path: string; required: boolean } {
  const configured = explicit ?? process.env.PATHCASE_CONFIG_PATH;
  return configured ? { path: configured, required: true } : { path: DEFAULT_CONFIG_PATH, required: false };
}

/**
 * Load and validate the config file
 *
 * @throws ConfigError when the file is unreadable, not JSON, or fails validation
 */
export async function loadConfig(explicit?: string): Promise<PathcaseConfig> {
  const { path, required } = resolveConfigPath(explicit);

  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(path, ['file not found']);
    }
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }

  return parseConfig(content, path);
}

/**
 * Validate already-parsed config content
 */
export function parseConfig(content: unknown, source: string): PathcaseConfig {
  if (validateConfig(content)) {
    debugLog('config', `Loaded config from ${source}`);
    return content;
  }
  throw new ConfigError(source, formatValidationErrors(validateConfig.errors ?? []));
}

/**
 * Format Ajv validation errors into human-readable messages
 */
export function formatValidationErrors(errors: readonly ErrorObject[]): string[] {
  return errors.map((error) => {
    const path = error.instancePath || '(root)';

    switch (error.keyword) {
      case 'type':
        return `Property '${path}' must be of type ${String(error.params.type)}`;

      case 'enum': {
        const allowed: unknown = error.params.allowedValues;
        return `Property '${path}' must be one of: ${Array.isArray(allowed) ? allowed.join(', ') : String(allowed)}`;
      }

      case 'minLength':
        return `Property '${path}' must be at least ${String(error.params.limit)} characters`;

      case 'additionalProperties':
        return `Unknown property: '${String(error.params.additionalProperty)}'`;

      default:
        return `${path}: ${error.message || 'Validation failed'}`;
    }
  });
}
