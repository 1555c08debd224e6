/**
 * Error mapping utility for provider HTTP responses.
 *
 * Maps HTTP status codes and response bodies to the typed error hierarchy.
 * Used once the retry executor has returned a final non-2xx response.
 */

import {
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  ContentFilterError,
  ContextLengthError,
  QuotaExhaustedError,
  RequestTimeoutError,
} from "../types/index.js";
import type { FixedProviderErrorOptions } from "../types/index.js";
import { isPlainObject } from "./json-repair.js";
import type { QuotaClassifier } from "./retry.js";
import { isQuotaExhausted, parseRetryAfter } from "./retry.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Try to extract a human-readable error message from a provider response body. */
function extractMessage(body: unknown, text?: string): string {
  if (isPlainObject(body)) {
    // Most providers nest under `error.message`.
    const error = body["error"];
    if (isPlainObject(error) && typeof error["message"] === "string") {
      return error["message"];
    }

    if (typeof body["message"] === "string") return body["message"];
    if (typeof error === "string") return error;
  }

  if (typeof body === "string") return body;
  if (text) return text;

  try {
    return JSON.stringify(body) ?? String(body);
  } catch {
    return String(body);
  }
}

/** Try to extract an error code from a provider response body. */
function extractErrorCode(body: unknown): string | undefined {
  if (!isPlainObject(body)) return undefined;

  const error = body["error"];
  if (isPlainObject(error)) {
    if (typeof error["code"] === "string") return error["code"];
    if (typeof error["type"] === "string") return error["type"];
  }

  if (typeof body["code"] === "string") return body["code"];
  if (typeof body["type"] === "string") return body["type"];
  return undefined;
}

// ---------------------------------------------------------------------------
// Message-based classification
// ---------------------------------------------------------------------------

/** Patterns checked against the error message for ambiguous status codes. */
const MESSAGE_PATTERNS: Array<{
  patterns: RegExp[];
  classify: (message: string, opts: FixedProviderErrorOptions) => ProviderError;
}> = [
  {
    patterns: [/not found/i, /does not exist/i],
    classify: (msg, opts) => new NotFoundError(msg, opts),
  },
  {
    patterns: [/unauthorized/i, /invalid key/i],
    classify: (msg, opts) => new AuthenticationError(msg, opts),
  },
  {
    patterns: [/context length/i, /too many tokens/i],
    classify: (msg, opts) => new ContextLengthError(msg, opts),
  },
  {
    patterns: [/content filter/i, /safety/i],
    classify: (msg, opts) => new ContentFilterError(msg, opts),
  },
];

function classifyByMessage(
  message: string,
  opts: FixedProviderErrorOptions,
): ProviderError | undefined {
  for (const { patterns, classify } of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return classify(message, opts);
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface MapHttpErrorOptions {
  /** Response headers (used to extract Retry-After). */
  headers?: Headers;
  /** Raw response text. */
  text?: string;
  /** Attempts made before this response was accepted as final. */
  attempts?: number;
  /** Provider-specific quota detection. */
  isQuotaExhausted?: QuotaClassifier;
}

/**
 * Map an HTTP error response to a typed `ProviderError`.
 *
 * @param status   - HTTP status code from the provider response.
 * @param body     - Parsed JSON body (or raw text) from the response.
 * @param provider - Provider name (e.g. "openai", "openrouter").
 */
export function mapHttpError(
  status: number,
  body: unknown,
  provider: string,
  options: MapHttpErrorOptions = {},
): ProviderError | RequestTimeoutError {
  const message = extractMessage(body, options.text);
  const opts: FixedProviderErrorOptions = {
    provider,
    status_code: status,
    error_code: extractErrorCode(body),
    retry_after: parseRetryAfter(options.headers),
    raw: isPlainObject(body) ? body : undefined,
    body_text: options.text,
    attempts: options.attempts,
  };

  switch (status) {
    case 400:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 401:
      return new AuthenticationError(message, opts);
    case 403:
      return new AccessDeniedError(message, opts);
    case 404:
      return new NotFoundError(message, opts);
    case 408:
      return new RequestTimeoutError(message, { attempts: options.attempts });
    case 413:
      return classifyByMessage(message, opts) ?? new ContextLengthError(message, opts);
    case 422:
      return classifyByMessage(message, opts) ?? new InvalidRequestError(message, opts);
    case 429: {
      const quota = options.isQuotaExhausted ?? isQuotaExhausted;
      if (quota(status, body ?? options.text)) {
        return new QuotaExhaustedError(message, opts);
      }
      return new RateLimitError(message, opts);
    }
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(message, opts);
  }

  // Any other status: message-based classification, then a generic
  // non-retryable ProviderError.
  return classifyByMessage(message, opts) ?? new ProviderError(message, opts);
}
