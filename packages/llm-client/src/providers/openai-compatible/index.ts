/**
 * Provider adapter for the Chat Completions API.
 *
 * Serves OpenAI and compatible endpoints (OpenRouter, vLLM, Ollama, Together,
 * Groq). Every call runs its HTTP attempts under the retry executor.
 */

import type { CallOptions, ProviderAdapter } from "../adapter.js";
import type { Request, Response } from "../../types/index.js";
import { ProviderError } from "../../types/index.js";
import {
  executeWithRetry,
  httpPost,
  mapHttpError,
  mergeHeaders,
  resolveRetryPolicy,
  silentLogger,
  type Logger,
  type QuotaClassifier,
  type RetryPolicy,
} from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

export interface OpenAICompatibleAdapterOptions {
  apiKey: string;
  baseUrl: string;
  providerName?: string;
  defaultHeaders?: Record<string, string>;
  /** Retry policy overrides for every call made by this adapter. */
  retry?: Partial<RetryPolicy>;
  /** Per-attempt timeout in milliseconds. */
  timeout?: number;
  /** Provider-specific quota detection for 429 bodies. */
  isQuotaExhausted?: QuotaClassifier;
  logger?: Logger;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly retry: Partial<RetryPolicy>;
  private readonly timeout: number | undefined;
  private readonly isQuotaExhausted: QuotaClassifier | undefined;
  private readonly logger: Logger;

  constructor(options: OpenAICompatibleAdapterOptions) {
    this.name = options.providerName ?? "openai-compatible";
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.retry = options.retry ?? {};
    this.timeout = options.timeout;
    this.isQuotaExhausted = options.isQuotaExhausted;
    this.logger = options.logger ?? silentLogger;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }
    return mergeHeaders(headers, this.defaultHeaders);
  }

  async complete(request: Request, options: CallOptions = {}): Promise<Response> {
    const body = translateRequest(request);
    const url = `${this.baseUrl}/v1/chat/completions`;
    const headers = this.buildHeaders();

    let attempts = 0;
    const httpRes = await executeWithRetry(
      (attempt) => {
        attempts = attempt + 1;
        return httpPost(url, body, headers, {
          timeout: this.timeout,
          signal: options.signal,
        });
      },
      {
        policy: resolveRetryPolicy(this.retry, options.retry),
        signal: options.signal,
        isQuotaExhausted: this.isQuotaExhausted,
        onAttempt: options.onAttempt,
        logger: this.logger,
        provider: this.name,
      },
    );

    if (httpRes.status < 200 || httpRes.status >= 300) {
      throw mapHttpError(httpRes.status, httpRes.body, this.name, {
        headers: httpRes.headers,
        text: httpRes.text,
        attempts,
        isQuotaExhausted: this.isQuotaExhausted,
      });
    }

    if (httpRes.body === undefined) {
      throw new ProviderError(`${this.name} returned a body that is not JSON`, {
        provider: this.name,
        status_code: httpRes.status,
        body_text: httpRes.text,
        attempts,
      });
    }

    return translateResponse(httpRes.body, this.name);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
