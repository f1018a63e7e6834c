export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "AppError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", 500);
    this.name = "ConfigError";
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_INPUT", 400);
    this.name = "InvalidInputError";
  }
}

export type SummarizerFailureReason = "unavailable" | "timeout" | "invalid_input";

/** Recoverable: the gate answers with trimmed text instead. */
export class SummarizerError extends AppError {
  readonly reason: SummarizerFailureReason;

  constructor(message: string, reason: SummarizerFailureReason, options?: { cause?: unknown }) {
    super(message, "SUMMARIZER_UNAVAILABLE", 503, options);
    this.name = "SummarizerError";
    this.reason = reason;
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/**
 * Abort reasons can be any value (`@hono/node-server` aborts with a plain
 * string). Abort errors pass through; anything else becomes an AbortError.
 */
export function toAbortError(reason: unknown): Error {
  if (isAbortError(reason) && reason instanceof Error) {
    return reason;
  }
  const err = new Error(reason === undefined ? "This operation was aborted" : errorMessage(reason), { cause: reason });
  err.name = "AbortError";
  return err;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return String(err);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
