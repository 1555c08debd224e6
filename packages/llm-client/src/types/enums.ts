/**
 * Core enums for the LLM client.
 *
 * Uses the `as const satisfies` pattern instead of TypeScript enums.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** Message roles understood by every supported provider. */
export const Role = {
  /** High-level instructions shaping model behavior. Typically first. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output: text and tool calls. */
  ASSISTANT: "assistant",
  /** Tool execution results, linked by tool_call_id. */
  TOOL: "tool",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// ContentKind
// ---------------------------------------------------------------------------

/** Discriminator tags for ContentPart. */
export const ContentKind = {
  TEXT: "text",
  /** A model-initiated tool invocation. */
  TOOL_CALL: "tool_call",
  /** The result of executing a tool call. */
  TOOL_RESULT: "tool_result",
} as const satisfies Record<string, string>;

export type ContentKind = (typeof ContentKind)[keyof typeof ContentKind];
