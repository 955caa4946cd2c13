export type ErrorKind =
  | 'config'
  | 'filter-check'
  | 'filter-run'
  | 'install'
  | 'lock'
  | 'stage'
  | 'export'
  | 'internal';

/**
 * Base class for every error the pipeline raises on purpose. The underlying
 * failure is kept in `cause`, so a chain of wrapped errors reads from the
 * operation down to the root problem.
 */
export class RegolithError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

export class FilterCheckError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('filter-check', message, options);
  }
}

export class FilterRunError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('filter-run', message, options);
  }
}

export class InstallError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('install', message, options);
  }
}

export type LockFailure = 'locked' | 'acquire' | 'release';

export class LockError extends RegolithError {
  readonly reason: LockFailure;

  constructor(reason: LockFailure, message: string, options?: { cause?: unknown }) {
    super('lock', message, options);
    this.reason = reason;
  }
}

export class StageError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('stage', message, options);
  }
}

export class ExportError extends RegolithError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('export', message, options);
  }
}

/**
 * Adds `message` in front of `err`, keeping the kind of a pipeline error.
 */
export function wrapError(err: unknown, message: string): RegolithError {
  const kind = err instanceof RegolithError ? err.kind : 'internal';
  return new RegolithError(kind, message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Error code of a failed fs / child_process call (`ENOENT`, `EEXIST`, ...). */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Flattens the `cause` chain into lines, outermost first.
 */
export function formatErrorChain(err: unknown): string {
  const lines: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    lines.push(lines.length === 0 ? errorMessage(current) : `[+] ${errorMessage(current)}`);
    current = current instanceof Error ? current.cause : undefined;
  }
  return lines.join('\n');
}
