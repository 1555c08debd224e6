/**
 * predict(): one signature-driven call from inputs to validated outputs.
 *
 * format -> cache lookup -> Client.complete (retries inside the provider)
 * -> cache store -> parse. A parse failure is returned to the caller as
 * is; the model is never re-prompted.
 */

import {
  ContentKind,
  cacheKey,
  getDefaultClient,
  getMessageText,
  silentLogger,
  type Client,
  type FinishReason,
  type Logger,
  type Message,
  type Request,
  type Response,
  type ResponseCache,
  type RetryPolicy,
  type Tool,
  type ToolCallContentPart,
  type ToolChoice,
  type Usage,
} from "@sigil/llm-client";
import type { Adapter, ParseDiagnostics, ParseResult } from "./adapters/adapter.js";
import { FallbackAdapter } from "./adapters/fallback.js";
import type { Example } from "./example.js";
import type { History } from "./history.js";
import type { FieldMap, Signature } from "./signature.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PredictOptions {
  signature: Signature;
  inputs: Readonly<Record<string, unknown>>;
  /** Provider's native model ID. */
  model: string;
  /** Default: a FallbackAdapter (marker, then JSON). */
  adapter?: Adapter;
  examples?: readonly Example[];
  history?: History;
  /** Default: the module-level default client. */
  client?: Client;
  /** Provider name; the client's default when omitted. */
  provider?: string;
  cache?: ResponseCache;
  signal?: AbortSignal;
  retry?: Partial<RetryPolicy>;
  temperature?: number;
  maxTokens?: number;
  /**
   * Tools offered to the model. A model forced to call one answers through
   * its arguments, which are parsed like message text.
   */
  tools?: readonly Tool[];
  toolChoice?: ToolChoice;
  logger?: Logger;
}

export interface Prediction {
  readonly outputs: FieldMap;
  readonly diagnostics: ParseDiagnostics;
  readonly usage: Usage;
  readonly finishReason: FinishReason;
  readonly response: Response;
  /** True when the response came from the cache. */
  readonly cached: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Text to parse: the message text, or the first tool call's arguments when
 * the model answered through a tool call only.
 */
export function responseText(message: Message): string {
  const text = getMessageText(message);
  if (text.trim() !== "") return text;

  const call = message.content.find(
    (part): part is ToolCallContentPart => part.kind === ContentKind.TOOL_CALL,
  );
  if (!call) return text;

  const args = call.tool_call.arguments;
  return typeof args === "string" ? args : JSON.stringify(args);
}

// ---------------------------------------------------------------------------
// predict()
// ---------------------------------------------------------------------------

/**
 * Render the signature, call the model and parse its answer.
 *
 * @throws {FieldError} when the inputs do not satisfy the signature.
 * @throws {SDKError} provider, retry and cancellation errors from the client.
 * @throws {OutputParseError} or {ChainExhaustedError} when the answer
 *   cannot be parsed.
 */
export async function predict(options: PredictOptions): Promise<Prediction> {
  const { signature, inputs } = options;
  const logger = options.logger ?? silentLogger;
  const adapter = options.adapter ?? new FallbackAdapter(undefined, { logger });
  const client = options.client ?? getDefaultClient();

  const request: Request = {
    model: options.model,
    provider: options.provider,
    messages: adapter.format(signature, inputs, options.examples, options.history),
    response_format: adapter.responseFormat?.(signature),
    temperature: options.temperature,
    max_tokens: options.maxTokens,
    tools: options.tools,
    tool_choice: options.toolChoice,
  };

  const key = options.cache ? cacheKey(request) : undefined;
  let response = key !== undefined ? options.cache?.get(key) : undefined;
  const cached = response !== undefined;

  if (response !== undefined) {
    logger.debug("response cache hit", { model: request.model, adapter: adapter.name });
  } else {
    response = await client.complete(request, {
      signal: options.signal,
      retry: options.retry,
    });
    if (key !== undefined) options.cache?.set(key, response);
  }

  const text = responseText(response.message);
  let parsed: ParseResult;
  try {
    parsed = adapter.parse(text, signature);
  } catch (err) {
    logger.warn("failed to parse response", {
      adapter: adapter.name,
      model: response.model,
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  }

  logger.debug("parsed response", {
    adapter: parsed.diagnostics.adapter,
    attempts: parsed.diagnostics.attempts,
    fallbackUsed: parsed.diagnostics.fallbackUsed,
    repaired: parsed.diagnostics.repaired,
  });

  return {
    outputs: parsed.outputs,
    diagnostics: parsed.diagnostics,
    usage: response.usage,
    finishReason: response.finish_reason,
    response,
    cached,
  };
}
