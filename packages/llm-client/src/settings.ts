/**
 * Environment-driven settings.
 *
 * `loadSettings` reads an environment record once and returns an immutable
 * settings object. Nothing here is consulted implicitly; callers pass the
 * values where they are needed.
 */

import { ConfigurationError } from "./types/errors.js";
import type { LogLevel } from "./utils/logger.js";
import { isLogLevel } from "./utils/logger.js";
import { DEFAULT_RETRY_POLICY } from "./utils/retry.js";

export type Environment = Record<string, string | undefined>;

export interface Settings {
  /** Provider name routed to when a request names none. */
  readonly provider?: string;
  /** Provider-native model ID. */
  readonly model?: string;
  readonly maxRetries: number;
  /** Per-attempt timeout in milliseconds. */
  readonly timeout?: number;
  readonly logLevel: LogLevel;
  /** Cache entry lifetime in milliseconds; 0 means no expiry. */
  readonly cacheTTL: number;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  maxRetries: DEFAULT_RETRY_POLICY.maxRetries,
  logLevel: "warn",
  cacheTTL: 0,
});

/** Provider prefixes accepted on model names, e.g. "openai/gpt-4o-mini". */
const PROVIDER_PREFIXES = ["openai", "openrouter"] as const;

function parseNonNegativeInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

/** Split "openai/gpt-4o-mini" into its provider and model parts. */
function splitModel(model: string): { provider?: string; model: string } {
  for (const prefix of PROVIDER_PREFIXES) {
    if (model.startsWith(`${prefix}/`)) {
      return { provider: prefix, model: model.slice(prefix.length + 1) };
    }
  }
  return { model };
}

/**
 * Read settings from the environment.
 *
 * | Variable            | Meaning                                 |
 * |---------------------|-----------------------------------------|
 * | `SIGIL_PROVIDER`    | default provider name                   |
 * | `SIGIL_MODEL`       | model ID, optionally `provider/model`   |
 * | `SIGIL_MAX_RETRIES` | retries after the first attempt         |
 * | `SIGIL_TIMEOUT`     | per-attempt timeout, seconds            |
 * | `SIGIL_LOG_LEVEL`   | debug, info, warn, error or silent      |
 * | `SIGIL_CACHE_TTL`   | cache entry lifetime, seconds           |
 *
 * @throws {ConfigurationError} when a variable is set to an invalid value.
 */
export function loadSettings(env: Environment = process.env): Settings {
  const settings: {
    -readonly [K in keyof Settings]: Settings[K];
  } = { ...DEFAULT_SETTINGS };

  const model = env["SIGIL_MODEL"];
  if (model) {
    const split = splitModel(model);
    settings.model = split.model;
    if (split.provider) settings.provider = split.provider;
  }

  const provider = env["SIGIL_PROVIDER"];
  if (provider) settings.provider = provider;

  const retries = env["SIGIL_MAX_RETRIES"];
  if (retries) settings.maxRetries = parseNonNegativeInt("SIGIL_MAX_RETRIES", retries);

  const timeout = env["SIGIL_TIMEOUT"];
  if (timeout) {
    const seconds = parseNonNegativeInt("SIGIL_TIMEOUT", timeout);
    if (seconds > 0) settings.timeout = seconds * 1000;
  }

  const logLevel = env["SIGIL_LOG_LEVEL"];
  if (logLevel) {
    const normalized = logLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigurationError(`SIGIL_LOG_LEVEL "${logLevel}" is not a log level`);
    }
    settings.logLevel = normalized;
  }

  const ttl = env["SIGIL_CACHE_TTL"];
  if (ttl) settings.cacheTTL = parseNonNegativeInt("SIGIL_CACHE_TTL", ttl) * 1000;

  return Object.freeze(settings);
}
