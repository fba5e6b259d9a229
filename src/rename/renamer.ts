import type { Stats } from 'node:fs';
import { lstat, mkdir, rename } from 'node:fs/promises';
import path from 'node:path';
import { errnoCode, RenameIoError } from '../errors.js';
import { convertComponent } from '../naming/component.js';
import { type ConversionMode, transformPath } from '../paths/transformer.js';
import { debugError, debugLog } from '../utils/debug.js';
import type { RawPath, RenameOptions, RenameOutcome, RenamePlan } from './types.js';
import { joinRaw, type TreeEntry, walkBottomUp } from './walker.js';

function display(p: RawPath): string {
  return typeof p === 'string' ? p : p.toString('utf-8');
}

function toBuffer(p: RawPath): Buffer {
  return typeof p === 'string' ? Buffer.from(p) : p;
}

function samePath(a: RawPath, b: RawPath): boolean {
  if (typeof a === 'string' && typeof b === 'string') {
    return path.resolve(a) === path.resolve(b);
  }
  return toBuffer(a).equals(toBuffer(b));
}

async function lstatIfExists(p: RawPath): Promise<Stats | undefined> {
  try {
    return await lstat(p);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return undefined;
    throw error;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Renames paths into a target naming convention.
 *
 * Every rename is independent: a failure is recorded as a `failed` outcome
 * and the next path is processed. Nothing is rolled back.
 */
export class TreeRenamer {
  private readonly options: RenameOptions;

  constructor(options: RenameOptions) {
    this.options = options;
  }

  /**
   * Rename a single path using the configured mode, or `mode` if given
   */
  async applyOne(p: string, mode: ConversionMode = this.options.mode): Promise<RenameOutcome> {
    let destination: string;
    try {
      destination = transformPath(p, this.options.request, { mode, prefix: this.options.prefix });
    } catch (error) {
      return this.record({ status: 'failed', source: p, error: toError(error) });
    }

    return this.execute({ source: p, destination, parent: path.dirname(destination) });
  }

  /**
   * Rename everything under `directory`, then `directory` itself.
   *
   * Entries are converted by name only, relative to the directory that holds
   * them. Full-path conversion doesn't apply here: parents are renamed after
   * their contents.
   */
  async applyRecursive(directory: string): Promise<RenameOutcome[]> {
    const outcomes: RenameOutcome[] = [];
    const walk = walkBottomUp(directory, {
      onError: (p, error) => {
        outcomes.push(this.record({ status: 'failed', source: display(p), error: toError(error) }));
      },
    });

    for await (const entry of walk) {
      const outcome =
        entry.depth === 0 ? await this.applyOne(directory, 'basename') : await this.applyEntry(entry);
      outcomes.push(outcome);
    }

    return outcomes;
  }

  private async applyEntry(entry: TreeEntry): Promise<RenameOutcome> {
    let converted: string;
    try {
      converted = convertComponent(entry.name, this.options.request);
    } catch (error) {
      return this.record({ status: 'failed', source: display(entry.path), error: toError(error) });
    }

    const destination = joinRaw(entry.parent, Buffer.from(converted));
    return this.execute({ source: entry.path, destination, parent: entry.parent });
  }

  private async execute(plan: RenamePlan): Promise<RenameOutcome> {
    const source = display(plan.source);
    const destination = display(plan.destination);

    if (samePath(plan.source, plan.destination)) {
      return this.record({ status: 'unchanged', source });
    }

    try {
      // An earlier rename may have moved the source away
      await lstat(plan.source);

      if (this.options.noClobber && (await this.isOccupied(plan))) {
        return this.record({ status: 'skipped', source, destination });
      }

      if (this.options.dryRun) {
        return this.record({ status: 'planned', source, destination });
      }

      if (!(await lstatIfExists(plan.parent))) {
        debugLog('rename', `Creating directory ${display(plan.parent)}`);
        await mkdir(plan.parent, { recursive: true });
      }

      await rename(plan.source, plan.destination);
    } catch (error) {
      const failure = new RenameIoError(source, destination, error);
      return this.record({ status: 'failed', source, destination, error: failure });
    }

    return this.record({ status: 'renamed', source, destination });
  }

  /**
   * Whether the destination is held by something other than the source.
   * On case-insensitive filesystems `Foo` and `foo` are the same entry,
   * which is not a collision.
   */
  private async isOccupied(plan: RenamePlan): Promise<boolean> {
    const existing = await lstatIfExists(plan.destination);
    if (!existing) return false;

    const current = await lstat(plan.source);
    return existing.ino !== current.ino || existing.dev !== current.dev;
  }

  private record(outcome: RenameOutcome): RenameOutcome {
    if (outcome.status === 'failed') {
      debugError('rename', `Failed to process '${outcome.source}'`, outcome.error);
    }
    this.options.onOutcome?.(outcome);
    return outcome;
  }
}
