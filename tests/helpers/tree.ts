import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { OutputSink } from '../../src/utils/output.js';

/**
 * Create a scratch directory holding the given files (with their content)
 * and empty directories
 */
export async function createTree(
  files: Record<string, string>,
  dirs: readonly string[] = [],
): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'pathcase-'));

  for (const [file, content] of Object.entries(files)) {
    const path = join(root, file);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }

  for (const dir of dirs) {
    await mkdir(join(root, dir), { recursive: true });
  }

  return root;
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

export type CollectedLines = Record<keyof OutputSink, string[]>;

/**
 * Output sink that records lines instead of printing them
 */
export function collectingSink(): { sink: OutputSink; lines: CollectedLines } {
  const lines: CollectedLines = { info: [], result: [], warn: [], error: [], verbose: [] };
  return {
    lines,
    sink: {
      info: (message) => lines.info.push(message),
      result: (message) => lines.result.push(message),
      warn: (message) => lines.warn.push(message),
      error: (message) => lines.error.push(message),
      verbose: (message) => lines.verbose.push(message),
    },
  };
}
