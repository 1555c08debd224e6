/**
 * Thin HTTP wrapper around the native `fetch` API.
 *
 * Non-2xx responses resolve normally so the retry executor can classify
 * them by status and body. Only failures that produced no response at all
 * reject, already mapped to the client's error types.
 */

import {
  CancelledError,
  NetworkError,
  RequestTimeoutError,
} from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved response from an HTTP request. */
export interface HttpResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body (or `undefined` if response was not valid JSON). */
  body: unknown;
  /** Raw response text. */
  text: string;
}

export interface HttpRequestOptions {
  /** Per-attempt timeout in milliseconds. */
  timeout?: number;
  /** Caller-provided abort signal. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Merge multiple header objects. Later entries override earlier ones.
 * A `Content-Type: application/json` default is always present unless
 * explicitly overridden.
 */
export function mergeHeaders(
  ...headerSets: Array<Record<string, string> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {
    "Content-Type": "application/json",
  };
  for (const set of headerSets) {
    if (set) Object.assign(merged, set);
  }
  return merged;
}

function buildSignal(options?: HttpRequestOptions): {
  signal?: AbortSignal;
  timeoutSignal?: AbortSignal;
} {
  const timeoutSignal =
    options?.timeout != null && options.timeout > 0
      ? AbortSignal.timeout(options.timeout)
      : undefined;

  const signals = [options?.signal, timeoutSignal].filter(
    (s): s is AbortSignal => s !== undefined,
  );

  if (signals.length === 0) return {};
  if (signals.length === 1) return { signal: signals[0], timeoutSignal };
  return { signal: AbortSignal.any(signals), timeoutSignal };
}

/** Map a rejected fetch to cancellation, timeout or a network failure. */
function mapFetchFailure(
  err: unknown,
  url: string,
  options: HttpRequestOptions | undefined,
  timeoutSignal: AbortSignal | undefined,
): Error {
  if (options?.signal?.aborted) {
    return new CancelledError(`Request to ${url} was cancelled`, { cause: err });
  }
  if (timeoutSignal?.aborted) {
    return new RequestTimeoutError(
      `Request to ${url} timed out after ${options?.timeout}ms`,
      { cause: err },
    );
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new NetworkError(`Request to ${url} failed: ${detail}`, { cause: err });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Send a JSON POST request and return the parsed response.
 *
 * @throws {CancelledError} when the caller's signal aborts the request.
 * @throws {RequestTimeoutError} when the per-attempt timeout fires.
 * @throws {NetworkError} on any other failure to obtain a response.
 */
export async function httpPost(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  options?: HttpRequestOptions,
): Promise<HttpResponse> {
  const { signal, timeoutSignal } = buildSignal(options);

  let res: globalThis.Response;
  let text: string;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: mergeHeaders(headers),
      body: JSON.stringify(body),
      signal,
    });
    text = await res.text();
  } catch (err) {
    throw mapFetchFailure(err, url, options, timeoutSignal);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = undefined;
  }

  return {
    status: res.status,
    headers: res.headers,
    body: parsed,
    text,
  };
}
