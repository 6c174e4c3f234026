export type LoadErrorCode = "FILE_NOT_FOUND" | "FORMAT_ERROR";

/**
 * Raised when the dataset cannot be read: the file is missing, its bytes
 * cannot be decoded, or it lacks the columns the reports need.
 */
export class LoadError extends Error {
  readonly code: LoadErrorCode;
  readonly path: string;

  constructor(
    code: LoadErrorCode,
    path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LoadError";
    this.code = code;
    this.path = path;
  }
}

/** Raised when an environment value cannot be used. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
