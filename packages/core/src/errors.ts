export const BASEDIR_ERROR_CODES = ["MISSING_CONFIGURATION", "PATH_ESCAPE", "FILESYSTEM"] as const;

export type BaseDirErrorCode = (typeof BASEDIR_ERROR_CODES)[number];

export class BaseDirError extends Error {
  code: BaseDirErrorCode;

  constructor(code: BaseDirErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BaseDirError";
    this.code = code;
  }
}

/**
 * Neither the environment variable nor the fallback produced a usable path.
 */
export class MissingConfigurationError extends BaseDirError {
  variableName: string | null;

  constructor(variableName: string | null, message: string) {
    super("MISSING_CONFIGURATION", message);
    this.name = "MissingConfigurationError";
    this.variableName = variableName;
  }
}

/**
 * A joined sub-path resolved outside of its base directory.
 */
export class PathEscapeError extends BaseDirError {
  base: string;
  candidate: string;

  constructor(base: string, candidate: string) {
    super("PATH_ESCAPE", `${candidate} is not inside ${base}`);
    this.name = "PathEscapeError";
    this.base = base;
    this.candidate = candidate;
  }
}

export class FilesystemError extends BaseDirError {
  path: string;
  errno: string | null;

  constructor(path: string, cause: unknown) {
    const errno = readErrnoCode(cause);
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("FILESYSTEM", `failed to create directory: ${path} (${reason})`, { cause });
    this.name = "FilesystemError";
    this.path = path;
    this.errno = errno;
  }
}

const readErrnoCode = (error: unknown): string | null => {
  if (!(error instanceof Error) || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
};

export const isBaseDirError = (value: unknown): value is BaseDirError =>
  value instanceof BaseDirError;
