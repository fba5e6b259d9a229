import type { ConversionRequest } from '../naming/types.js';
import type { ConversionMode } from '../paths/transformer.js';

/** A path as text, or as raw bytes read from a directory listing */
export type RawPath = string | Buffer;

/**
 * Source and destination of one rename, computed and applied right away
 */
export interface RenamePlan {
  readonly source: RawPath;
  readonly destination: RawPath;
  /** Directory that must exist before the rename */
  readonly parent: RawPath;
}

export type RenameOutcome =
  | { readonly status: 'renamed'; readonly source: string; readonly destination: string }
  | { readonly status: 'planned'; readonly source: string; readonly destination: string }
  | { readonly status: 'unchanged'; readonly source: string }
  | { readonly status: 'skipped'; readonly source: string; readonly destination: string }
  | {
      readonly status: 'failed';
      readonly source: string;
      readonly destination?: string;
      readonly error: Error;
    };

export type RenameStatus = RenameOutcome['status'];

export interface RenameOptions {
  request: ConversionRequest;
  mode: ConversionMode;
  /** Only used in full-path mode */
  prefix?: string;
  /** Leave existing destinations alone and report the collision instead */
  noClobber: boolean;
  /** Compute and report destinations without touching the filesystem */
  dryRun: boolean;
  /** Called with every outcome as soon as it is known */
  onOutcome?: (outcome: RenameOutcome) => void;
}
