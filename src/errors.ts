/**
 * Error taxonomy for the collector. Every error carries a stable `code` so the
 * CLI and the HTTP surface can branch on it without `instanceof` chains.
 */
export type CollectorErrorCode =
  | "CONFIG_MISSING"
  | "CONFIG_INVALID"
  | "RATE_LIMITED"
  | "TRANSPORT_FAILURE"
  | "EXHAUSTED_RETRIES"
  | "CORRUPT_LOG"
  | "INVALID_DATE";

export class CollectorError extends Error {
  readonly code: CollectorErrorCode;

  constructor(code: CollectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Required settings absent; fatal before any collection starts. */
export class ConfigMissingError extends CollectorError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super("CONFIG_MISSING", `Missing required settings: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class ConfigInvalidError extends CollectorError {
  constructor(message: string) {
    super("CONFIG_INVALID", `Invalid settings: ${message}`);
  }
}

/** HTTP 429 from upstream. `retryAfterSeconds` is the server-advised wait, when one was valid. */
export class RateLimitedError extends CollectorError {
  readonly status = 429;
  readonly retryAfterSeconds: number | null;

  constructor(url: string, retryAfterSeconds: number | null) {
    super("RATE_LIMITED", `429 Too Many Requests for url: ${url}`);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/** Connection error, timeout, or a non-2xx status other than 429. `status` is null when no response arrived. */
export class TransportFailureError extends CollectorError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super("TRANSPORT_FAILURE", message, options);
    this.status = status;
  }
}

export class ExhaustedRetriesError extends CollectorError {
  readonly attempts: number;
  declare readonly cause: RateLimitedError | TransportFailureError;

  constructor(attempts: number, cause: RateLimitedError | TransportFailureError) {
    super(
      "EXHAUSTED_RETRIES",
      `Gave up after ${attempts} attempt(s): ${cause.message}`,
      { cause },
    );
    this.attempts = attempts;
  }
}

export class CorruptLogError extends CollectorError {
  /** 1-based line number of the first malformed line. */
  readonly line: number;

  constructor(logPath: string, line: number, options?: { cause?: unknown }) {
    super("CORRUPT_LOG", `Malformed record at ${logPath}:${line}`, options);
    this.line = line;
  }
}

export class InvalidDateError extends CollectorError {
  constructor(input: string) {
    super("INVALID_DATE", `Expected a YYYY-MM-DD calendar date, got "${input}"`);
  }
}

export function isCollectorError(err: unknown): err is CollectorError {
  return err instanceof CollectorError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
