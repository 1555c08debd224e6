/**
 * Translate a unified Request into the Chat Completions wire format.
 *
 * Used for OpenAI itself and for compatible endpoints (OpenRouter, vLLM,
 * Ollama, Together, Groq).
 */

import {
  ContentKind,
  Role,
  type Request,
  type Message,
  type ContentPart,
  type TextContentPart,
  type Tool,
  type ToolChoice,
  type ResponseFormat,
} from "../../types/index.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export interface ChatCompletionToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant" | "tool";
  content: string | null;
  tool_calls?: ChatCompletionToolCall[];
  tool_call_id?: string;
}

export interface ChatCompletionToolDef {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export type ChatCompletionToolChoice =
  | "auto"
  | "none"
  | "required"
  | { type: "function"; function: { name: string } };

export type ChatCompletionResponseFormat =
  | { type: "text" }
  | { type: "json_object" }
  | { type: "json_schema"; json_schema: Record<string, unknown> };

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  temperature?: number;
  top_p?: number;
  max_tokens?: number;
  stop?: readonly string[];
  tools?: ChatCompletionToolDef[];
  tool_choice?: ChatCompletionToolChoice;
  response_format?: ChatCompletionResponseFormat;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function joinText(parts: readonly ContentPart[], separator: string): string {
  return parts
    .filter((p): p is TextContentPart => p.kind === ContentKind.TEXT)
    .map((p) => p.text)
    .join(separator);
}

function translateAssistant(msg: Message): ChatCompletionMessage {
  const toolCalls: ChatCompletionToolCall[] = [];

  for (const part of msg.content) {
    if (part.kind !== ContentKind.TOOL_CALL) continue;
    const tc = part.tool_call;
    toolCalls.push({
      id: tc.id,
      type: "function",
      function: {
        name: tc.name,
        arguments:
          typeof tc.arguments === "string" ? tc.arguments : JSON.stringify(tc.arguments),
      },
    });
  }

  const text = joinText(msg.content, "");
  const chatMsg: ChatCompletionMessage = {
    role: "assistant",
    content: text.length > 0 ? text : null,
  };
  if (toolCalls.length > 0) chatMsg.tool_calls = toolCalls;
  return chatMsg;
}

function translateMessages(messages: readonly Message[]): ChatCompletionMessage[] {
  const result: ChatCompletionMessage[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case Role.SYSTEM:
        result.push({ role: "system", content: joinText(msg.content, "\n") });
        break;

      case Role.USER:
        result.push({ role: "user", content: joinText(msg.content, "\n") });
        break;

      case Role.ASSISTANT:
        result.push(translateAssistant(msg));
        break;

      case Role.TOOL:
        for (const part of msg.content) {
          if (part.kind !== ContentKind.TOOL_RESULT) continue;
          const tr = part.tool_result;
          result.push({
            role: "tool",
            content: typeof tr.content === "string" ? tr.content : JSON.stringify(tr.content),
            tool_call_id: tr.tool_call_id,
          });
        }
        break;
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Tools and response format
// ---------------------------------------------------------------------------

function translateTools(tools: readonly Tool[]): ChatCompletionToolDef[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function translateToolChoice(
  toolChoice: ToolChoice | undefined,
): ChatCompletionToolChoice | undefined {
  if (!toolChoice) return undefined;

  switch (toolChoice.mode) {
    case "auto":
    case "none":
    case "required":
      return toolChoice.mode;
    case "named":
      if (toolChoice.tool_name === undefined) return undefined;
      return { type: "function", function: { name: toolChoice.tool_name } };
  }
}

function translateResponseFormat(
  format: ResponseFormat,
): ChatCompletionResponseFormat {
  if (format.type === "json_schema" && format.json_schema) {
    return { type: "json_schema", json_schema: format.json_schema };
  }
  return format.type === "text" ? { type: "text" } : { type: "json_object" };
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(request: Request): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: translateMessages(request.messages),
  };

  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.top_p !== undefined) body.top_p = request.top_p;
  if (request.max_tokens !== undefined) body.max_tokens = request.max_tokens;

  if (request.stop_sequences && request.stop_sequences.length > 0) {
    body.stop = request.stop_sequences;
  }

  if (request.tools && request.tools.length > 0) {
    body.tools = translateTools(request.tools);
    const tc = translateToolChoice(request.tool_choice);
    if (tc !== undefined) body.tool_choice = tc;
  }

  if (request.response_format) {
    body.response_format = translateResponseFormat(request.response_format);
  }

  return body;
}
