import type { Stats } from 'node:fs';
import { lstat, readdir } from 'node:fs/promises';
import path from 'node:path';
import { debugLog } from '../utils/debug.js';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

/**
 * One entry of a directory tree.
 *
 * Paths are raw bytes so names that are not valid UTF-8 can still be
 * addressed on disk.
 */
export interface TreeEntry {
  readonly path: Buffer;
  /** Directory containing the entry, as it was when the entry was listed */
  readonly parent: Buffer;
  readonly name: Buffer;
  readonly kind: EntryKind;
  /** 0 for the root of the walk */
  readonly depth: number;
}

export interface WalkOptions {
  /**
   * Called when a directory cannot be listed or an entry cannot be inspected.
   * The walk skips what it could not read and continues. Without a handler
   * the error is thrown.
   */
  onError?: (path: Buffer, error: unknown) => void;
}

const SEP = Buffer.from(path.sep);

function kindOf(stats: Stats): EntryKind {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

export function joinRaw(parent: Buffer, name: Buffer): Buffer {
  return parent.length > 0 && !parent.subarray(-SEP.length).equals(SEP)
    ? Buffer.concat([parent, SEP, name])
    : Buffer.concat([parent, name]);
}

function trimTrailingSeparators(p: string): string {
  let end = p.length;
  while (end > 1 && p.endsWith(path.sep, end)) end--;
  return p.slice(0, end);
}

/**
 * Walk a tree contents-first: every entry below a directory is yielded
 * before the directory itself, and the root comes last.
 *
 * A consumer may rename each entry as soon as it is yielded. Entries that
 * are still pending always live under directories that have not been
 * renamed yet, so their paths stay valid. Symbolic links are yielded as
 * leaves and never followed.
 *
 * @example
 * for await (const entry of walkBottomUp('photos')) {
 *   console.log(entry.path.toString()); // photos/2021/a.jpg, photos/2021, photos
 * }
 */
export async function* walkBottomUp(
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<TreeEntry, void, undefined> {
  const rootPath = trimTrailingSeparators(root);
  const raw = Buffer.from(rootPath);
  const stats = await lstat(raw);

  yield* visit(
    {
      path: raw,
      parent: Buffer.from(path.dirname(rootPath)),
      name: Buffer.from(path.basename(rootPath)),
      kind: kindOf(stats),
      depth: 0,
    },
    options,
  );
}

async function* visit(
  entry: TreeEntry,
  options: WalkOptions,
): AsyncGenerator<TreeEntry, void, undefined> {
  if (entry.kind === 'directory') {
    let names: Buffer[] = [];
    try {
      names = await readdir(entry.path, { encoding: 'buffer' });
    } catch (error) {
      report(entry.path, error, options);
    }

    names.sort(Buffer.compare);
    debugLog('walk', `Listing ${entry.path.toString()}: ${names.length} entries`);

    for (const name of names) {
      const child = joinRaw(entry.path, name);
      let stats: Stats;
      try {
        stats = await lstat(child);
      } catch (error) {
        report(child, error, options);
        continue;
      }

      yield* visit(
        { path: child, parent: entry.path, name, kind: kindOf(stats), depth: entry.depth + 1 },
        options,
      );
    }
  }

  yield entry;
}

function report(p: Buffer, error: unknown, options: WalkOptions): void {
  if (!options.onError) {
    throw error;
  }
  options.onError(p, error);
}
