import { existsSync, lstatSync } from 'node:fs';
import { type Command, Option } from 'commander';
import { loadConfig } from '../config/loader.js';
import type { PathcaseConfig } from '../config/schema.js';
import { errnoCode, PathcaseError, PathNotFoundError } from '../errors.js';
import { describeConventions, parseConvention } from '../naming/conventions.js';
import type { ConversionRequest } from '../naming/types.js';
import type { ConversionMode } from '../paths/transformer.js';
import { TreeRenamer } from '../rename/renamer.js';
import { createReporter, formatSummary } from '../rename/reporter.js';
import { output, type OutputSink } from '../utils/output.js';

export const ExitCode = {
  Success: 0,
  InvalidArguments: 1,
  PathNotFound: 2,
  PartialFailure: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface ConvertOptions {
  recursive?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  basename?: boolean;
  fullPath?: boolean;
  prefix?: string;
  from?: string;
  /** `false` when --no-clobber is given */
  clobber?: boolean;
  config?: string;
}

interface ResolvedRun {
  request: ConversionRequest;
  mode: ConversionMode;
  prefix?: string;
  recursive: boolean;
  noClobber: boolean;
  dryRun: boolean;
  verbose: boolean;
}

function resolveRun(into: string, options: ConvertOptions, config: PathcaseConfig): ResolvedRun {
  const fromToken = options.from ?? config.from;
  const mode: ConversionMode = options.fullPath
    ? 'full-path'
    : options.basename
      ? 'basename'
      : (config.mode ?? 'basename');

  return {
    request: Object.freeze({
      from: fromToken === undefined ? undefined : parseConvention(fromToken),
      to: parseConvention(into),
    }),
    mode,
    prefix: options.prefix ?? config.prefix,
    recursive: options.recursive ?? config.recursive ?? false,
    noClobber: options.clobber === false || (config.noClobber ?? false),
    dryRun: options.dryRun ?? false,
    verbose: options.verbose ?? config.verbose ?? false,
  };
}

/**
 * Run a conversion and return the process exit code.
 *
 * Convention tokens, config and input paths are all checked before the
 * first rename; any problem there stops the run with nothing changed.
 * Failures after that are reported per path and the run continues.
 */
export async function runConvert(
  into: string,
  paths: readonly string[],
  options: ConvertOptions,
  sink: OutputSink = output,
): Promise<ExitCode> {
  let run: ResolvedRun;
  try {
    const config = await loadConfig(options.config);
    run = resolveRun(into, options, config);

    for (const p of paths) {
      if (!existsSync(p) && !isDanglingLink(p)) {
        throw new PathNotFoundError(p);
      }
    }
  } catch (error) {
    if (!(error instanceof PathcaseError)) throw error;
    sink.error(`Error: ${error.message}`);
    return error instanceof PathNotFoundError ? ExitCode.PathNotFound : ExitCode.InvalidArguments;
  }

  if (sink === output) {
    if (options.quiet) {
      output.setLevel('quiet');
    } else if (run.verbose) {
      output.setLevel('verbose');
    }
  }

  if (run.recursive && run.mode === 'full-path') {
    sink.warn('Warning: --full-path is ignored with --recursive; entries are converted by name');
  }

  if (run.dryRun) {
    sink.info('Dry run: no paths will be renamed');
  }

  const reporter = createReporter(sink);
  const renamer = new TreeRenamer({
    request: run.request,
    mode: run.mode,
    prefix: run.prefix,
    noClobber: run.noClobber,
    dryRun: run.dryRun,
    onOutcome: (outcome) => reporter.report(outcome),
  });

  for (const p of paths) {
    if (run.recursive && isDirectory(p)) {
      await renamer.applyRecursive(p);
    } else {
      await renamer.applyOne(p);
    }
  }

  sink.verbose(formatSummary(reporter.summary));
  return reporter.summary.failed > 0 ? ExitCode.PartialFailure : ExitCode.Success;
}

/**
 * Inputs are checked up front, but an earlier input may have renamed this
 * one since; a missing path is left for the renamer to report.
 */
function isDirectory(p: string): boolean {
  try {
    return lstatSync(p).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

function isDanglingLink(p: string): boolean {
  try {
    return lstatSync(p).isSymbolicLink();
  } catch {
    return false;
  }
}

export function convertCommand(program: Command): void {
  program
    .argument('<into>', 'target naming convention')
    .argument('<paths...>', 'the paths to convert')
    .option('-r, --recursive', 'recurse into directories')
    .option('--dry-run', 'show the operations that would be performed without doing them')
    .option('-v, --verbose', 'print a message for every converted path')
    .option('-q, --quiet', 'suppress non-critical output')
    .addOption(
      new Option('-b, --basename', 'only convert the basename of each path (default)').conflicts(
        'fullPath',
      ),
    )
    .addOption(new Option('-F, --full-path', 'convert every component of each path'))
    .option('-P, --prefix <path>', "leading path left unchanged by '--full-path'")
    .option(
      '-f, --from <convention>',
      'current naming convention, if known; improves word splitting',
    )
    .option('-n, --no-clobber', 'do not overwrite existing files')
    .option('-c, --config <file>', 'config file (default: ./pathcase.config.json)')
    .addHelpText(
      'after',
      `
Conventions:
${describeConventions()}

Examples:
  $ pathcase snake "Some File.jpg"                 # -> some_file.jpg
  $ pathcase -f CAMEL flat SomeFile.jpg            # -> somefile.jpg
  $ pathcase -F -P /mnt/media kebab "/mnt/media/My Photos/Img 1.png"
  $ pathcase -r --dry-run snake ./Downloads        # preview a whole tree

Exit codes:
  0  all paths converted (skipped collisions included)
  1  invalid arguments, convention or config
  2  an input path does not exist
  3  one or more paths failed to convert or rename
`,
    )
    .action(async (into: string, paths: string[], options: ConvertOptions) => {
      const code = await runConvert(into, paths, options);
      process.exit(code);
    });
}
