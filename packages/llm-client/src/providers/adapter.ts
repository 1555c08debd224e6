/**
 * ProviderAdapter interface: the contract every provider must implement.
 */

import type { Request, Response } from "../types/index.js";
import type { RetryAttemptRecord, RetryPolicy } from "../utils/retry.js";

/** Per-call options threaded from the caller down to the HTTP attempt loop. */
export interface CallOptions {
  /** Cancels the call before an attempt, during one, or during backoff. */
  signal?: AbortSignal;
  /** Overrides merged over the adapter's retry policy for this call. */
  retry?: Partial<RetryPolicy>;
  /** Observes each classified attempt. */
  onAttempt?: (record: RetryAttemptRecord) => void;
}

/**
 * The contract that every LLM provider adapter must implement.
 *
 * Each adapter translates between the unified Request/Response types and
 * the provider's native API format, and owns the retry loop for its calls.
 */
export interface ProviderAdapter {
  /** Provider name, e.g. "openai", "openrouter". */
  readonly name: string;

  /**
   * Send a request and wait for the model to finish.
   *
   * Resolves with the full response, or rejects with a typed SDKError once
   * retries are exhausted or a non-retryable failure occurs.
   */
  complete(request: Request, options?: CallOptions): Promise<Response>;

  /**
   * Release resources (HTTP connections, etc.). Called by Client.close().
   */
  close?(): Promise<void>;
}
