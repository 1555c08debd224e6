/**
 * Error hierarchy for the LLM client.
 *
 * All library errors inherit from SDKError. Transient network and status
 * failures are resolved by the retry executor; everything that escapes it
 * says how many attempts were made.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

/** Options accepted by every SDKError constructor. */
export interface SDKErrorOptions {
  cause?: unknown;
  retryable?: boolean;
  /** Number of provider attempts made before this error surfaced. */
  attempts?: number;
}

/** Base error for all client errors. */
export class SDKError extends Error {
  /** Whether this error is safe to retry. */
  readonly retryable: boolean;
  /** Number of provider attempts made, when known. */
  readonly attempts?: number;

  constructor(message: string, options?: SDKErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
    this.retryable = options?.retryable ?? false;
    this.attempts = options?.attempts;
  }
}

// ---------------------------------------------------------------------------
// ProviderError: errors from the LLM provider
// ---------------------------------------------------------------------------

/** Fields shared by every provider error. */
export interface ProviderErrorOptions {
  provider: string;
  status_code?: number;
  error_code?: string;
  retryable?: boolean;
  retry_after?: number;
  raw?: Record<string, unknown>;
  /** Raw response text, kept when the body was not JSON. */
  body_text?: string;
  attempts?: number;
  cause?: unknown;
}

/** Provider error options without the retryable flag (fixed per subclass). */
export type FixedProviderErrorOptions = Omit<ProviderErrorOptions, "retryable">;

/** Error returned by an LLM provider. */
export class ProviderError extends SDKError {
  /** Which provider returned the error. */
  readonly provider: string;
  /** HTTP status code, if applicable. */
  readonly status_code?: number;
  /** Provider-specific error code. */
  readonly error_code?: string;
  /** Seconds to wait before retrying. */
  readonly retry_after?: number;
  /** Raw error response body from the provider. */
  readonly raw?: Record<string, unknown>;
  /** Raw response text. */
  readonly body_text?: string;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, {
      cause: options.cause,
      retryable: options.retryable ?? false,
      attempts: options.attempts,
    });
    this.name = "ProviderError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
    this.retry_after = options.retry_after;
    this.raw = options.raw;
    this.body_text = options.body_text;
  }
}

// ---------------------------------------------------------------------------
// ProviderError subclasses: non-retryable
// ---------------------------------------------------------------------------

/** 401: Invalid API key, expired token. */
export class AuthenticationError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AuthenticationError";
  }
}

/** 403: Insufficient permissions. */
export class AccessDeniedError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "AccessDeniedError";
  }
}

/** 404: Model not found, endpoint not found. */
export class NotFoundError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "NotFoundError";
  }
}

/** 400/422: Malformed request, invalid parameters. */
export class InvalidRequestError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "InvalidRequestError";
  }
}

/** Response blocked by safety/content filter. */
export class ContentFilterError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContentFilterError";
  }
}

/** Input + output exceeds context window. */
export class ContextLengthError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "ContextLengthError";
  }
}

/**
 * 429 whose body reports a billing or usage quota that is used up.
 * Retrying cannot succeed until the account changes.
 */
export class QuotaExhaustedError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: false });
    this.name = "QuotaExhaustedError";
  }
}

// ---------------------------------------------------------------------------
// ProviderError subclasses: retryable
// ---------------------------------------------------------------------------

/** A status in the retryable class (429, 500, 502, 503, 504). */
export class RetryableStatusError extends ProviderError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, { ...options, retryable: true });
    this.name = "RetryableStatusError";
  }
}

/** 429: Rate limit exceeded. */
export class RateLimitError extends RetryableStatusError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

/** 500-599: Provider internal error. */
export class ServerError extends RetryableStatusError {
  constructor(message: string, options: FixedProviderErrorOptions) {
    super(message, options);
    this.name = "ServerError";
  }
}

// ---------------------------------------------------------------------------
// Non-provider errors
// ---------------------------------------------------------------------------

/** Request timed out. Retryable. */
export class RequestTimeoutError extends SDKError {
  constructor(message: string, options?: { cause?: unknown; attempts?: number }) {
    super(message, { ...options, retryable: true });
    this.name = "RequestTimeoutError";
  }
}

/** Network-level failure: no response was obtained. Retryable. */
export class NetworkError extends SDKError {
  constructor(message: string, options?: { cause?: unknown; attempts?: number }) {
    super(message, { ...options, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * The caller cancelled the call, before an attempt or while waiting out a
 * backoff delay. Carries the last error observed before cancellation.
 */
export class CancelledError extends SDKError {
  readonly lastError?: Error;

  constructor(
    message: string,
    options?: { cause?: unknown; attempts?: number; lastError?: Error },
  ) {
    super(message, {
      cause: options?.cause,
      attempts: options?.attempts,
      retryable: false,
    });
    this.name = "CancelledError";
    this.lastError = options?.lastError;
  }
}

/** Every permitted attempt threw a retryable error. */
export class RetryExhaustedError extends SDKError {
  readonly lastError: Error;

  constructor(lastError: Error, attempts: number) {
    super(`request failed after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
      attempts,
      retryable: false,
    });
    this.name = "RetryExhaustedError";
    this.lastError = lastError;
  }
}

/**
 * Structured text could not be decoded, even after repair. Both the
 * original text and the repaired candidate are kept for diagnostics.
 */
export class JSONRepairError extends SDKError {
  readonly original: string;
  readonly repaired: string;

  constructor(original: string, repaired: string, cause: unknown) {
    super(`failed to decode structured text: ${describeCause(cause)}`, {
      cause,
      retryable: false,
    });
    this.name = "JSONRepairError";
    this.original = original;
    this.repaired = repaired;
  }
}

/** Tool call arguments failed to decode. Not retryable. */
export class InvalidToolCallError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "InvalidToolCallError";
  }
}

/** SDK misconfiguration (missing provider, etc.). Not retryable. */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "ConfigurationError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
