/**
 * Response types for the LLM client.
 */

import type { Message } from "./message.js";
import { getMessageText, getMessageToolCalls } from "./message.js";
import type { ToolCall } from "./tool.js";

// ---------------------------------------------------------------------------
// FinishReason
// ---------------------------------------------------------------------------

/** Why the provider stopped generating. */
export interface FinishReason {
  readonly reason: "stop" | "length" | "tool_calls" | "content_filter" | "other";
  /** The provider's own finish reason string. */
  readonly raw?: string;
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/** Token usage counters for one or more calls. */
export class Usage {
  readonly input_tokens: number;
  readonly output_tokens: number;
  readonly total_tokens: number;
  /** Provider's raw usage object. */
  readonly raw?: Record<string, unknown>;

  constructor(init: {
    input_tokens: number;
    output_tokens: number;
    total_tokens?: number;
    raw?: Record<string, unknown>;
  }) {
    this.input_tokens = init.input_tokens;
    this.output_tokens = init.output_tokens;
    this.total_tokens = init.total_tokens ?? init.input_tokens + init.output_tokens;
    this.raw = init.raw;
  }

  /** Sum of two usage records. The raw objects are dropped. */
  add(other: Usage): Usage {
    return new Usage({
      input_tokens: this.input_tokens + other.input_tokens,
      output_tokens: this.output_tokens + other.output_tokens,
      total_tokens: this.total_tokens + other.total_tokens,
    });
  }

  static empty(): Usage {
    return new Usage({ input_tokens: 0, output_tokens: 0 });
  }
}

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

/** A complete provider response: the raw result of one successful call. */
export interface Response {
  readonly id: string;
  readonly model: string;
  readonly provider: string;
  /** The assistant message: free text plus optional tool-call parts. */
  readonly message: Message;
  readonly finish_reason: FinishReason;
  readonly usage: Usage;
  /** The provider's raw response body. */
  readonly raw?: Record<string, unknown>;
}

/** Concatenated text of the response message. */
export function getResponseText(response: Response): string {
  return getMessageText(response.message);
}

/** Tool calls of the response message, arguments decoded. */
export function getResponseToolCalls(response: Response): ToolCall[] {
  return getMessageToolCalls(response.message);
}
