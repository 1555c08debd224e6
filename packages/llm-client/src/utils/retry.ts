/**
 * Retry executor with exponential backoff and jitter.
 *
 * Wraps one logical provider call. Attempts are strictly sequential:
 *
 *   Attempting -> Succeeded
 *   Attempting -> RetryableFailure -> Backoff -> Attempting
 *   Attempting -> NonRetryableFailure | QuotaExhausted | Cancelled -> Failed
 *
 * Policy:
 *   - Exponential backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * (1 +/- jitter)`, clamped to `maxDelay`
 *   - Retry network failures and statuses 429/500/502/503/504
 *   - Never retry a 429 whose body reports an exhausted quota
 *   - Respect `Retry-After` on retryable statuses and `retry_after` on
 *     thrown errors, up to `maxDelay`
 *   - Check the caller's AbortSignal before every attempt and during backoff
 */

import {
  CancelledError,
  ConfigurationError,
  RetryableStatusError,
  RetryExhaustedError,
} from "../types/errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { isPlainObject } from "./json-repair.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Retry attempts after the initial call. Default: 3. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Upper bound for any single delay in milliseconds. Default: 30000. */
  maxDelay: number;
  /** Exponential backoff factor. Default: 2. */
  backoffMultiplier: number;
  /** Relative jitter; 0.1 means +/- 10%. 0 disables jitter. Default: 0.1. */
  jitter: number;
}

/** Classification of a single attempt. */
export type AttemptOutcome =
  | "success"
  | "retryable"
  | "non_retryable"
  | "quota_exhausted"
  | "cancelled";

/** What happened on one attempt. Handed to `onAttempt`, never stored. */
export interface RetryAttemptRecord {
  /** 0-indexed attempt number. */
  readonly attempt: number;
  /** Backoff waited after this attempt, in milliseconds (0 when none). */
  readonly delay: number;
  readonly outcome: AttemptOutcome;
  /** Status of the response, when one was obtained. */
  readonly status?: number;
  /** Error thrown by the attempt, when it threw. */
  readonly error?: Error;
}

/** A call result the executor can classify. */
export interface StatusResult {
  readonly status: number;
  /** Parsed response body, when it was JSON. */
  readonly body?: unknown;
  /** Raw response text. */
  readonly text?: string;
  /** Response headers; `Retry-After` is honoured during backoff. */
  readonly headers?: Headers;
}

/** Decides whether a response reports an exhausted quota. */
export type QuotaClassifier = (status: number, body: unknown) => boolean;

export interface RetryOptions {
  /** Overrides merged over DEFAULT_RETRY_POLICY. */
  policy?: Partial<RetryPolicy>;
  /** Caller cancellation. */
  signal?: AbortSignal;
  /** Provider-specific quota detection. Default: {@link isQuotaExhausted}. */
  isQuotaExhausted?: QuotaClassifier;
  /** Called once per attempt, after it is classified. */
  onAttempt?: (record: RetryAttemptRecord) => void;
  logger?: Logger;
  /** Provider name used in messages. */
  provider?: string;
  /** Random source in [0, 1) for jitter. Default: Math.random. */
  random?: () => number;
}

/** Error shape we check for retryable/retry_after fields. */
interface RetryableErrorShape extends Error {
  retryable?: boolean;
  retry_after?: number;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitter: 0.1,
});

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

const QUOTA_CODES = new Set(["insufficient_quota", "billing_hard_limit_reached"]);

/**
 * Merge policy overrides, later ones winning, over DEFAULT_RETRY_POLICY.
 * Members set to `undefined` are skipped.
 *
 * @throws {ConfigurationError} when `maxRetries` is not a non-negative integer.
 */
export function resolveRetryPolicy(
  ...overrides: ReadonlyArray<Partial<RetryPolicy> | undefined>
): RetryPolicy {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY };
  for (const override of overrides) {
    if (!override) continue;
    if (override.maxRetries !== undefined) policy.maxRetries = override.maxRetries;
    if (override.baseDelay !== undefined) policy.baseDelay = override.baseDelay;
    if (override.maxDelay !== undefined) policy.maxDelay = override.maxDelay;
    if (override.backoffMultiplier !== undefined) {
      policy.backoffMultiplier = override.backoffMultiplier;
    }
    if (override.jitter !== undefined) policy.jitter = override.jitter;
  }

  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new ConfigurationError(
      `maxRetries must be a non-negative integer, got ${policy.maxRetries}`,
    );
  }
  return policy;
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** 429, 500, 502, 503 and 504 are worth another attempt. */
export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

/**
 * Default quota classifier: a 429 whose body carries an `insufficient_quota`
 * or `billing_hard_limit_reached` code or type, either under `error` or at
 * the top level. Ordinary rate limits return false.
 */
export function isQuotaExhausted(status: number, body: unknown): boolean {
  if (status !== 429) return false;

  let parsed = body;
  if (typeof body === "string") {
    try {
      parsed = JSON.parse(body);
    } catch {
      return false;
    }
  }
  if (!isPlainObject(parsed)) return false;

  const error = isPlainObject(parsed["error"]) ? parsed["error"] : parsed;
  return [error["code"], error["type"]].some(
    (value) => typeof value === "string" && QUOTA_CODES.has(value),
  );
}

/**
 * Parse a `Retry-After` header into seconds.
 *
 * Only the integer-seconds form is handled; HTTP-dates are uncommon for
 * LLM APIs.
 */
export function parseRetryAfter(headers?: Headers): number | undefined {
  const raw = headers?.get("retry-after");
  if (raw == null) return undefined;

  const seconds = parseFloat(raw);
  return !Number.isNaN(seconds) && seconds >= 0 ? seconds : undefined;
}

function isRetryableError(err: Error): err is RetryableErrorShape {
  return "retryable" in err && err.retryable === true;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// ---------------------------------------------------------------------------
// Delay
// ---------------------------------------------------------------------------

/**
 * Calculate the delay after a given attempt.
 *
 * `attempt` is 0-indexed (first retry = attempt 0). The result lies within
 * `jitter` of the capped exponential value and never exceeds `maxDelay`.
 */
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const base = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );

  if (policy.jitter <= 0) return base;

  const factor = 1 + policy.jitter * (2 * random() - 1);
  return Math.min(base * factor, policy.maxDelay);
}

/**
 * Wait `ms` milliseconds, or until `signal` aborts.
 *
 * Rejects with CancelledError on abort. The timer and the abort listener
 * are both released whichever finishes first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(
      new CancelledError("Cancelled before backoff", { cause: signal.reason }),
    );
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError("Cancelled during backoff", { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

/**
 * Execute `call` under the retry policy.
 *
 * `call` resolves to a response carrying a `status`, or rejects when no
 * response was obtained. The executor:
 *   - returns successes and non-retryable statuses immediately;
 *   - returns a quota-exhausted 429 immediately, without another attempt;
 *   - retries retryable statuses; on the final attempt the raw result is
 *     returned as-is and the caller decides whether it is a failure;
 *   - waits a status result's `Retry-After` instead of the backoff, and
 *     returns the result at once when that exceeds `maxDelay`;
 *   - retries errors marked `retryable`, throwing RetryExhaustedError once
 *     the budget is spent, and rethrows any other error at once;
 *   - throws CancelledError (with the last observed error) when the signal
 *     aborts before an attempt, during one, or during a backoff wait.
 */
export async function executeWithRetry<T extends StatusResult>(
  call: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = resolveRetryPolicy(options.policy);
  const quotaExhausted = options.isQuotaExhausted ?? isQuotaExhausted;
  const logger = options.logger ?? silentLogger;
  const provider = options.provider ?? "provider";
  const { signal, onAttempt } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (signal?.aborted) {
      onAttempt?.({ attempt, delay: 0, outcome: "cancelled", error: lastError });
      throw new CancelledError(
        `${provider} call cancelled before attempt ${attempt + 1}`,
        { cause: signal.reason, attempts: attempt, lastError },
      );
    }

    const isLast = attempt >= policy.maxRetries;
    let delay: number;

    try {
      const result = await call(attempt);

      if (!isRetryableStatus(result.status)) {
        const outcome = result.status < 400 ? "success" : "non_retryable";
        onAttempt?.({ attempt, delay: 0, outcome, status: result.status });
        return result;
      }

      if (quotaExhausted(result.status, result.body ?? result.text)) {
        onAttempt?.({ attempt, delay: 0, outcome: "quota_exhausted", status: result.status });
        logger.warn("quota exhausted; not retrying", { provider, attempt });
        return result;
      }

      if (isLast) {
        onAttempt?.({ attempt, delay: 0, outcome: "retryable", status: result.status });
        return result;
      }

      const retryAfter = parseRetryAfter(result.headers);
      if (retryAfter !== undefined && retryAfter * 1000 > policy.maxDelay) {
        onAttempt?.({ attempt, delay: 0, outcome: "non_retryable", status: result.status });
        logger.warn("retry-after exceeds maxDelay; not retrying", {
          provider,
          attempt,
          retryAfter,
        });
        return result;
      }

      lastError = new RetryableStatusError(
        `${provider} responded with status ${result.status}`,
        {
          provider,
          status_code: result.status,
          body_text: result.text,
          retry_after: retryAfter,
          attempts: attempt + 1,
        },
      );
      delay =
        retryAfter !== undefined && retryAfter > 0
          ? retryAfter * 1000
          : calculateDelay(attempt, policy, options.random);
      onAttempt?.({ attempt, delay, outcome: "retryable", status: result.status });
      logger.warn("retrying after retryable status", {
        provider,
        attempt,
        status: result.status,
        delay,
      });
    } catch (err: unknown) {
      const error = toError(err);

      if (error instanceof CancelledError || signal?.aborted) {
        onAttempt?.({ attempt, delay: 0, outcome: "cancelled", error });
        throw new CancelledError(
          `${provider} call cancelled during attempt ${attempt + 1}`,
          { cause: error, attempts: attempt + 1, lastError: lastError ?? error },
        );
      }

      if (!isRetryableError(error)) {
        onAttempt?.({ attempt, delay: 0, outcome: "non_retryable", error });
        throw error;
      }

      lastError = error;

      if (isLast) {
        onAttempt?.({ attempt, delay: 0, outcome: "retryable", error });
        throw new RetryExhaustedError(error, attempt + 1);
      }

      if (error.retry_after != null && error.retry_after > 0) {
        const retryAfterMs = error.retry_after * 1000;
        if (retryAfterMs > policy.maxDelay) {
          // The provider asks for a longer wait than we are willing to absorb.
          onAttempt?.({ attempt, delay: 0, outcome: "non_retryable", error });
          throw error;
        }
        delay = retryAfterMs;
      } else {
        delay = calculateDelay(attempt, policy, options.random);
      }

      onAttempt?.({ attempt, delay, outcome: "retryable", error });
      logger.warn("retrying after error", {
        provider,
        attempt,
        error: error.message,
        delay,
      });
    }

    try {
      await sleep(delay, signal);
    } catch (err: unknown) {
      logger.debug("cancelled during backoff", { provider, attempt });
      throw new CancelledError(
        `${provider} call cancelled during backoff after attempt ${attempt + 1}`,
        { cause: err, attempts: attempt + 1, lastError },
      );
    }
  }

  // Unreachable: the final attempt always returns or throws.
  throw lastError ?? new Error("executeWithRetry: unexpected state");
}
