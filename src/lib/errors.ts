export type ErrorCode =
  | "CONFIG_PARSE"
  | "NOT_INSTALLED"
  | "FORMAT_MISMATCH"
  | "UNEXPECTED_RESPONSE"
  | "FILESYSTEM"
  | "EXTRACTION"
  | "SETUP";

export class BinfetchError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BinfetchError";
  }
}

/** The packages file is unreadable, not valid YAML, or has an invalid entry. */
export class ConfigParseError extends BinfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG_PARSE", options);
    this.name = "ConfigParseError";
  }
}

/** The version command could not be found on PATH. */
export class NotInstalledError extends BinfetchError {
  constructor(public readonly command: string) {
    super(`${command}: command not found`, "NOT_INSTALLED");
    this.name = "NotInstalledError";
  }
}

export class FormatMismatchError extends BinfetchError {
  constructor(pattern: RegExp) {
    super(`cannot determine current version, output does not match ${pattern}`, "FORMAT_MISMATCH");
    this.name = "FormatMismatchError";
  }
}

export class UnexpectedResponseError extends BinfetchError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
  ) {
    super(message, "UNEXPECTED_RESPONSE");
    this.name = "UnexpectedResponseError";
  }
}

export class FilesystemError extends BinfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "FILESYSTEM", options);
    this.name = "FilesystemError";
  }
}

export class ExtractionError extends BinfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EXTRACTION", options);
    this.name = "ExtractionError";
  }
}

/** Aborts the whole run before any package is processed. */
export class SetupError extends BinfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SETUP", options);
    this.name = "SetupError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
