export type TidyErrorCode = "not_found" | "configuration" | "parse";

export class TidyError extends Error {
  readonly code: TidyErrorCode;

  constructor(code: TidyErrorCode, message: string) {
    super(message);
    this.name = "TidyError";
    this.code = code;
  }
}

/** Missing source directory or undo manifest. */
export class NotFoundError extends TidyError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

/** Source/destination layout that would make the run organize its own output. */
export class ConfigurationError extends TidyError {
  constructor(message: string) {
    super("configuration", message);
    this.name = "ConfigurationError";
  }
}

export class ParseError extends TidyError {
  constructor(message: string) {
    super("parse", message);
    this.name = "ParseError";
  }
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
