/**
 * Request types for the LLM client.
 */

import type { Message } from "./message.js";
import type { Tool, ToolChoice } from "./tool.js";

/** Controls the format of the model's response. */
export interface ResponseFormat {
  /** "text", "json_object", or "json_schema". */
  readonly type: "text" | "json_object" | "json_schema";
  /** Required when type is "json_schema". */
  readonly json_schema?: Record<string, unknown>;
}

/**
 * The single input type for `complete()`. A rendered request is immutable
 * and owned by the call in progress.
 */
export interface Request {
  /** Provider's native model ID. */
  readonly model: string;
  readonly messages: readonly Message[];
  /** Uses the client's default provider if omitted. */
  readonly provider?: string;
  readonly tools?: readonly Tool[];
  /** Defaults to AUTO if tools are present. */
  readonly tool_choice?: ToolChoice;
  readonly response_format?: ResponseFormat;
  readonly temperature?: number;
  readonly top_p?: number;
  readonly max_tokens?: number;
  readonly stop_sequences?: readonly string[];
  /** Arbitrary key-value pairs. Not sent to the provider. */
  readonly metadata?: Record<string, string>;
}
