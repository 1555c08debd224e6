/**
 * Barrel re-export for provider utility modules.
 */

// HTTP client wrapper
export { httpPost, mergeHeaders } from "./http.js";
export type { HttpResponse, HttpRequestOptions } from "./http.js";

// Retry executor
export {
  DEFAULT_RETRY_POLICY,
  calculateDelay,
  executeWithRetry,
  isQuotaExhausted,
  isRetryableStatus,
  parseRetryAfter,
  resolveRetryPolicy,
  sleep,
} from "./retry.js";
export type {
  AttemptOutcome,
  QuotaClassifier,
  RetryAttemptRecord,
  RetryOptions,
  RetryPolicy,
  StatusResult,
} from "./retry.js";

// Error mapping utility
export { mapHttpError } from "./error-mapping.js";
export type { MapHttpErrorOptions } from "./error-mapping.js";

// Structured-text repair
export {
  decodeJSON,
  extractJSONObjects,
  isPlainObject,
  repairJSON,
} from "./json-repair.js";
export type { DecodeResult } from "./json-repair.js";

// Logging
export { createConsoleLogger, isLogLevel, silentLogger } from "./logger.js";
export type { LogContext, LogLevel, Logger } from "./logger.js";
