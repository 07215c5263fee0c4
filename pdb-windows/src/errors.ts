export type ErrorKind = "load" | "write" | "format" | "config";

/**
 * Base class for failures reported per file. `file` is the path the
 * failure belongs to, when there is one.
 */
export abstract class PdbToolError extends Error {
  abstract readonly kind: ErrorKind;
  readonly file?: string;

  constructor(message: string, options: { file?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.file = options.file;
  }
}

/** File unreadable, missing, or not a valid structure. */
export class LoadError extends PdbToolError {
  readonly kind = "load";
  readonly notFound: boolean;

  constructor(message: string, options: { file?: string; cause?: unknown; notFound?: boolean } = {}) {
    super(message, options);
    this.notFound = options.notFound ?? false;
  }
}

/** Destination directory or file could not be created or written. */
export class WriteError extends PdbToolError {
  readonly kind = "write";
}

/** A line does not follow the fixed-column layout it is expected to carry. */
export class FormatError extends PdbToolError {
  readonly kind = "format";
  readonly lineNumber: number;
  readonly detail: string;

  constructor(detail: string, lineNumber: number, options: { file?: string; cause?: unknown } = {}) {
    super(`Line ${lineNumber}: ${detail}`, options);
    this.lineNumber = lineNumber;
    this.detail = detail;
  }
}

/** Invalid component configuration or command-line usage. */
export class ConfigError extends PdbToolError {
  readonly kind = "config";
}

/** Wraps a failure to read or parse `file`, keeping tool errors as they are. */
export function toLoadError(file: string, err: unknown): PdbToolError {
  if (err instanceof PdbToolError) return err;
  if (isNodeError(err, "ENOENT")) {
    return new LoadError(`File not found: ${file}`, { file, cause: err, notFound: true });
  }
  return new LoadError(`Cannot load ${file}: ${errorMessage(err)}`, { file, cause: err });
}

export function toWriteError(file: string, err: unknown): PdbToolError {
  if (err instanceof PdbToolError) return err;
  return new WriteError(`Cannot write ${file}: ${errorMessage(err)}`, { file, cause: err });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function isNodeError(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
