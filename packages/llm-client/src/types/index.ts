/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, ContentKind } from "./enums.js";

// Message types
export type {
  ToolCallData,
  ToolResultData,
  TextContentPart,
  ToolCallContentPart,
  ToolResultContentPart,
  ContentPart,
  Message,
} from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolResultMessage,
  getMessageText,
  getMessageToolCalls,
} from "./message.js";

// Tool types
export type { Tool, ToolCall, ToolChoice } from "./tool.js";

// Request types
export type { Request, ResponseFormat } from "./request.js";

// Response types
export type { FinishReason, Response } from "./response.js";
export { Usage, getResponseText, getResponseToolCalls } from "./response.js";

// Error types
export type {
  SDKErrorOptions,
  ProviderErrorOptions,
  FixedProviderErrorOptions,
} from "./errors.js";
export {
  SDKError,
  ProviderError,
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContentFilterError,
  ContextLengthError,
  QuotaExhaustedError,
  RetryableStatusError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  NetworkError,
  CancelledError,
  RetryExhaustedError,
  JSONRepairError,
  InvalidToolCallError,
  ConfigurationError,
} from "./errors.js";
