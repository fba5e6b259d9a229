/**
 * Diagnostics for tracing a run, written to stderr.
 * Controlled by PATHCASE_DEBUG:
 * - 0 or unset: off
 * - 1: one line per directory listed, directory created, config loaded or path failed
 * - 2: as 1, plus stack traces and the underlying cause of rename failures
 */

import { errnoCode } from '../errors.js';

export type DebugScope = 'config' | 'walk' | 'rename';

const DEBUG_LEVEL = Number.parseInt(process.env.PATHCASE_DEBUG || '0', 10) || 0;

export function debugLog(scope: DebugScope, message: string): void {
  if (DEBUG_LEVEL > 0) {
    console.error(`[pathcase:${scope}] ${message}`);
  }
}

/**
 * Log a failure with its errno code when the filesystem reported one
 */
export function debugError(scope: DebugScope, message: string, error: unknown): void {
  if (DEBUG_LEVEL === 0) return;

  const reason = error instanceof Error ? error.message : String(error);
  const code = errnoCode(error);
  console.error(`[pathcase:${scope}] ${message}: ${reason}${code ? ` (${code})` : ''}`);

  if (DEBUG_LEVEL >= 2 && error instanceof Error) {
    if (error.stack) console.error(error.stack);
    if (error.cause instanceof Error) console.error(`  caused by: ${error.cause.message}`);
  }
}
