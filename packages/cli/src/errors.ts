/**
 * Typed errors for repository tracking.
 *
 * Every error carries a `kind` so callers can tell per-item failures
 * (reported, run continues) from fatal ones (config store, usage).
 */

export type RepoErrorKind =
  | "not-a-repository"
  | "already-exists"
  | "does-not-exist"
  | "invalid-alias"
  | "name-extraction"
  | "io"
  | "config"
  | "usage";

export class RepoError extends Error {
  constructor(
    message: string,
    public readonly kind: RepoErrorKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "RepoError";
  }

  /** Config and usage errors end the run with a non-zero exit code. */
  get fatal(): boolean {
    return this.kind === "config" || this.kind === "usage";
  }
}

export class NotARepositoryError extends RepoError {
  constructor(public readonly path: string) {
    super(`Not a git repository: ${path}`, "not-a-repository");
    this.name = "NotARepositoryError";
  }
}

export class RepoAlreadyExistsError extends RepoError {
  constructor(public readonly alias: string) {
    super(`A repo named "${alias}" already exists.`, "already-exists");
    this.name = "RepoAlreadyExistsError";
  }
}

export class RepoDoesNotExistError extends RepoError {
  constructor(public readonly alias: string) {
    super(`No repo named "${alias}".`, "does-not-exist");
    this.name = "RepoDoesNotExistError";
  }
}

export class InvalidAliasError extends RepoError {
  constructor(public readonly alias: string) {
    super(`"${alias}" cannot be used as a repo name.`, "invalid-alias");
    this.name = "InvalidAliasError";
  }
}

export class NameExtractionError extends RepoError {
  constructor(public readonly path: string) {
    super(`Cannot derive a repo name from path: ${path}`, "name-extraction");
    this.name = "NameExtractionError";
  }
}

export class DirectoryReadError extends RepoError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Cannot read directory ${path}: ${causeMessage(cause)}`, "io", cause);
    this.name = "DirectoryReadError";
  }
}

export class ConfigStoreError extends RepoError {
  constructor(
    message: string,
    public readonly configPath: string,
    cause?: unknown,
  ) {
    super(message, "config", cause);
    this.name = "ConfigStoreError";
  }
}

export class UsageError extends RepoError {
  constructor(message: string) {
    super(message, "usage");
    this.name = "UsageError";
  }
}

function causeMessage(cause: unknown): string {
  if (isErrnoException(cause) && cause.code) return cause.code;
  return cause instanceof Error ? cause.message : String(cause);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** One line for stderr, whatever was thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
