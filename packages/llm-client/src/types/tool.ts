/**
 * Tool-related types.
 */

/** A model-initiated tool invocation extracted from a response. */
export interface ToolCall {
  /** Unique identifier (provider-assigned). */
  readonly id: string;
  readonly name: string;
  /** Decoded JSON arguments. */
  readonly arguments: Record<string, unknown>;
  /** Raw argument string before decoding, when the provider sent one. */
  readonly raw_arguments?: string;
  /** Whether structured-text repair was needed to decode the arguments. */
  readonly repaired?: boolean;
}

/** Controls whether and how the model uses tools. */
export interface ToolChoice {
  readonly mode: "auto" | "none" | "required" | "named";
  /** Required when mode is "named". */
  readonly tool_name?: string;
}

/** A tool definition offered to the model. */
export interface Tool {
  /** [a-zA-Z][a-zA-Z0-9_]* max 64 chars. */
  readonly name: string;
  readonly description: string;
  /** JSON Schema for the arguments (root must be "object"). */
  readonly parameters: Record<string, unknown>;
}
