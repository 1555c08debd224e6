/**
 * Message and ContentPart types for the LLM client.
 */

import type { Role } from "./enums.js";
import { ContentKind } from "./enums.js";
import { Role as RoleValues } from "./enums.js";
import type { ToolCall as ToolCallType } from "./tool.js";
import { InvalidToolCallError } from "./errors.js";
import { decodeJSON, isPlainObject } from "../utils/json-repair.js";

// ---------------------------------------------------------------------------
// Content data structures
// ---------------------------------------------------------------------------

/** Data for a tool call content part. */
export interface ToolCallData {
  /** Unique identifier for this call (provider-assigned). */
  readonly id: string;
  readonly name: string;
  /**
   * Decoded JSON arguments, or the raw argument string when it could not
   * be decoded even after repair.
   */
  readonly arguments: Record<string, unknown> | string;
  /** Whether the decoded arguments needed structured-text repair. */
  readonly repaired?: boolean;
}

/** Data for a tool result content part. */
export interface ToolResultData {
  /** The ToolCallData.id this result answers. */
  readonly tool_call_id: string;
  readonly content: string | Record<string, unknown>;
  readonly is_error: boolean;
}

// ---------------------------------------------------------------------------
// ContentPart: discriminated union on `kind`
// ---------------------------------------------------------------------------

export interface TextContentPart {
  readonly kind: typeof ContentKind.TEXT;
  readonly text: string;
}

export interface ToolCallContentPart {
  readonly kind: typeof ContentKind.TOOL_CALL;
  readonly tool_call: ToolCallData;
}

export interface ToolResultContentPart {
  readonly kind: typeof ContentKind.TOOL_RESULT;
  readonly tool_result: ToolResultData;
}

export type ContentPart =
  | TextContentPart
  | ToolCallContentPart
  | ToolResultContentPart;

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** The fundamental unit of conversation. */
export interface Message {
  readonly role: Role;
  readonly content: readonly ContentPart[];
  /** For tool messages. */
  readonly name?: string;
  /** Links a tool-result message to its tool call. */
  readonly tool_call_id?: string;
}

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): Message {
  return {
    role: RoleValues.SYSTEM,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): Message {
  return {
    role: RoleValues.USER,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

/** Create an assistant message from plain text. */
export function createAssistantMessage(text: string): Message {
  return {
    role: RoleValues.ASSISTANT,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

/** Create a tool-result message. */
export function createToolResultMessage(
  tool_call_id: string,
  content: string | Record<string, unknown>,
  is_error = false,
): Message {
  return {
    role: RoleValues.TOOL,
    content: [
      {
        kind: ContentKind.TOOL_RESULT,
        tool_result: { tool_call_id, content, is_error },
      },
    ],
    tool_call_id,
  };
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

/**
 * Concatenate text from all TEXT content parts of a message.
 * Returns empty string if no text parts exist.
 */
export function getMessageText(message: Message): string {
  return message.content
    .filter((part): part is TextContentPart => part.kind === ContentKind.TEXT)
    .map((part) => part.text)
    .join("");
}

/**
 * Extract all tool calls from a message's content parts.
 *
 * String arguments are decoded (with repair). Arguments that still fail to
 * decode raise InvalidToolCallError whose cause is the JSONRepairError.
 */
export function getMessageToolCalls(message: Message): ToolCallType[] {
  return message.content
    .filter(
      (part): part is ToolCallContentPart =>
        part.kind === ContentKind.TOOL_CALL,
    )
    .map((part) => toToolCall(part.tool_call));
}

function toToolCall(data: ToolCallData): ToolCallType {
  if (typeof data.arguments !== "string") {
    return {
      id: data.id,
      name: data.name,
      arguments: data.arguments,
      repaired: data.repaired,
    };
  }

  const decoded = decodeJSON(data.arguments);
  if (!decoded.ok) {
    throw new InvalidToolCallError(
      `Tool call "${data.name}" (${data.id}) has undecodable arguments`,
      { cause: decoded.error },
    );
  }
  if (!isPlainObject(decoded.value)) {
    throw new InvalidToolCallError(
      `Tool call "${data.name}" (${data.id}) arguments are not an object`,
    );
  }

  return {
    id: data.id,
    name: data.name,
    arguments: decoded.value,
    raw_arguments: data.arguments,
    repaired: decoded.repaired,
  };
}
