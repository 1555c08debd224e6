export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export provider utilities
export * from "./utils/index.js";

// Re-export provider adapters
export * from "./providers/index.js";

// Re-export Client class and related types
export { Client } from "./client.js";
export type { ClientConfig, FromEnvOptions, Middleware } from "./client.js";

// Response cache boundary
export { MemoryCache, cacheKey } from "./cache.js";
export type { CacheStats, MemoryCacheOptions, ResponseCache } from "./cache.js";

// Settings
export { DEFAULT_SETTINGS, loadSettings } from "./settings.js";
export type { Environment, Settings } from "./settings.js";

// ---------------------------------------------------------------------------
// Module-level default client
// ---------------------------------------------------------------------------

import { Client } from "./client.js";

let defaultClient: Client | undefined;

/**
 * Set the module-level default Client instance.
 */
export function setDefaultClient(client: Client): void {
  defaultClient = client;
}

/**
 * Get the module-level default Client instance.
 *
 * If none has been set, creates one via `Client.fromEnv()` and caches it.
 */
export function getDefaultClient(): Client {
  if (!defaultClient) {
    defaultClient = Client.fromEnv();
  }
  return defaultClient;
}

/**
 * Reset the module-level default client to undefined.
 * Primarily useful for testing.
 */
export function resetDefaultClient(): void {
  defaultClient = undefined;
}
