/**
 * Barrel re-export for all provider adapters.
 */

// Adapter interface
export type { CallOptions, ProviderAdapter } from "./adapter.js";

// Chat Completions adapter (OpenAI, OpenRouter and compatible endpoints)
export {
  OpenAICompatibleAdapter,
  translateRequest,
  translateResponse,
} from "./openai-compatible/index.js";
export type { OpenAICompatibleAdapterOptions } from "./openai-compatible/index.js";
export type {
  ChatCompletionMessage,
  ChatCompletionRequestBody,
  ChatCompletionResponseFormat,
  ChatCompletionToolCall,
  ChatCompletionToolChoice,
  ChatCompletionToolDef,
} from "./openai-compatible/translate-request.js";
