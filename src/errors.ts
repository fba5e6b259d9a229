/**
 * Error types raised while converting and renaming paths.
 *
 * Conversion and rename errors are per-path: the renamer turns them into
 * `failed` outcomes and carries on. Convention, config and missing-path errors
 * are raised before anything is renamed and end the run.
 */

export class PathcaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedConventionError extends PathcaseError {
  readonly token: string;

  constructor(token: string) {
    super(`Unsupported naming convention '${token}'`);
    this.token = token;
  }
}

export type PathConvertErrorKind = 'InvalidUtf8Path' | 'InvalidPath';

export class PathConvertError extends PathcaseError {
  readonly kind: PathConvertErrorKind;
  readonly component: string;

  constructor(kind: PathConvertErrorKind, component: string) {
    super(
      kind === 'InvalidUtf8Path'
        ? `path contains invalid utf-8 characters: ${component}`
        : `paths must contain either a stem or an extension or both: '${component}'`,
    );
    this.kind = kind;
    this.component = component;
  }
}

export class PathNotFoundError extends PathcaseError {
  readonly path: string;

  constructor(path: string) {
    super(`no such file or directory '${path}'`);
    this.path = path;
  }
}

export class RenameIoError extends PathcaseError {
  readonly source: string;
  readonly destination: string;
  /** errno code reported by the filesystem, e.g. `EXDEV` */
  readonly code: string | undefined;

  constructor(source: string, destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to rename '${source}' to '${destination}': ${reason}`);
    this.source = source;
    this.destination = destination;
    this.code = errnoCode(cause);
    this.cause = cause;
  }
}

export class ConfigError extends PathcaseError {
  readonly configPath: string;
  readonly details: readonly string[];

  constructor(configPath: string, details: readonly string[]) {
    super(`Invalid config '${configPath}': ${details.join(', ')}`);
    this.configPath = configPath;
    this.details = details;
  }
}

/**
 * Read the `code` property Node attaches to system errors
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
