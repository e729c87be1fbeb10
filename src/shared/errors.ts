export type SwitchErrorKind = "io" | "parse" | "home_unavailable" | "empty_token";

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SwitchError extends Error {
  constructor(
    readonly kind: SwitchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SwitchError";
  }
}

export class IoError extends SwitchError {
  constructor(context: string, cause: unknown) {
    super("io", `${context}: ${describeError(cause)}`, { cause });
    this.name = "IoError";
  }
}

export class ParseError extends SwitchError {
  constructor(context: string, cause?: unknown) {
    super(
      "parse",
      cause === undefined ? context : `${context}: ${describeError(cause)}`,
      { cause },
    );
    this.name = "ParseError";
  }
}

export class HomeDirectoryUnavailableError extends SwitchError {
  constructor() {
    super("home_unavailable", "Could not find home directory");
    this.name = "HomeDirectoryUnavailableError";
  }
}

export class EmptyTokenError extends SwitchError {
  constructor() {
    super("empty_token", "Token cannot be empty");
    this.name = "EmptyTokenError";
  }
}
