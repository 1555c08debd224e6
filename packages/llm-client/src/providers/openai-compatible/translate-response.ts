/**
 * Translate a Chat Completions response body into the unified Response format.
 */

import {
  ContentKind,
  Role,
  Usage,
  type ContentPart,
  type FinishReason,
  type Message,
  type Response,
  type ToolCallData,
} from "../../types/index.js";
import { decodeJSON, isPlainObject } from "../../utils/json-repair.js";

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function readString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === "number" ? value : undefined;
}

function readObject(
  obj: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = obj[key];
  return isPlainObject(value) ? value : undefined;
}

// ---------------------------------------------------------------------------
// Finish reason mapping
// ---------------------------------------------------------------------------

function mapFinishReason(raw: string | undefined): FinishReason {
  if (!raw) return { reason: "other" };

  switch (raw) {
    case "stop":
    case "length":
    case "tool_calls":
    case "content_filter":
      return { reason: raw, raw };
    default:
      return { reason: "other", raw };
  }
}

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

/**
 * Decode tool-call arguments, repairing near-valid JSON. Arguments that
 * still fail (or decode to something other than an object) are kept as
 * the raw string; getMessageToolCalls reports them.
 */
function translateToolCall(raw: Record<string, unknown>): ToolCallData {
  const fn = readObject(raw, "function") ?? {};
  const id = readString(raw, "id") ?? "";
  const name = readString(fn, "name") ?? "";
  const rawArguments = readString(fn, "arguments") ?? "{}";

  const decoded = decodeJSON(rawArguments);
  if (decoded.ok && isPlainObject(decoded.value)) {
    return { id, name, arguments: decoded.value, repaired: decoded.repaired };
  }
  return { id, name, arguments: rawArguments };
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateResponse(raw: unknown, providerName: string): Response {
  const data = isPlainObject(raw) ? raw : {};
  const choices = Array.isArray(data["choices"]) ? data["choices"] : [];
  const firstChoice: unknown = choices[0];
  const choice = isPlainObject(firstChoice) ? firstChoice : {};
  const rawMessage = readObject(choice, "message") ?? {};

  const contentParts: ContentPart[] = [];

  const text = readString(rawMessage, "content");
  if (text) {
    contentParts.push({ kind: ContentKind.TEXT, text });
  }

  const toolCalls = rawMessage["tool_calls"];
  if (Array.isArray(toolCalls)) {
    for (const tc of toolCalls) {
      if (!isPlainObject(tc)) continue;
      contentParts.push({
        kind: ContentKind.TOOL_CALL,
        tool_call: translateToolCall(tc),
      });
    }
  }

  const message: Message = {
    role: Role.ASSISTANT,
    content: contentParts,
  };

  const rawUsage = readObject(data, "usage");
  const usage = rawUsage
    ? new Usage({
        input_tokens: readNumber(rawUsage, "prompt_tokens") ?? 0,
        output_tokens: readNumber(rawUsage, "completion_tokens") ?? 0,
        total_tokens: readNumber(rawUsage, "total_tokens"),
        raw: rawUsage,
      })
    : Usage.empty();

  return {
    id: readString(data, "id") ?? "",
    model: readString(data, "model") ?? "",
    provider: providerName,
    message,
    finish_reason: mapFinishReason(readString(choice, "finish_reason")),
    usage,
    raw: data,
  };
}
