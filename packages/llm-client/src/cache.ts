/**
 * Response cache boundary.
 *
 * A cache maps a deterministic request key to a completed Response. Entries
 * are copied on the way in and on the way out, so callers can never mutate
 * what the cache holds.
 */

import { createHash } from "node:crypto";
import type { Request } from "./types/request.js";
import { Usage, type Response } from "./types/response.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Anything that can store and return completed responses by key. */
export interface ResponseCache {
  get(key: string): Response | undefined;
  set(key: string, response: Response): void;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
  /** Hits as a percentage of lookups (0-100); 0 before any lookup. */
  readonly hitRate: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000. */
  capacity?: number;
  /** Entry lifetime in milliseconds. 0 or omitted: entries never expire. */
  ttl?: number;
  /** Clock, in milliseconds. Default: Date.now. */
  now?: () => number;
}

interface CacheEntry {
  response: Response;
  /** 0 when the entry never expires. */
  expiresAt: number;
}

// ---------------------------------------------------------------------------
// Copying
// ---------------------------------------------------------------------------

function copyResponse(response: Response): Response {
  return {
    ...response,
    message: structuredClone(response.message),
    finish_reason: { ...response.finish_reason },
    usage: new Usage({
      input_tokens: response.usage.input_tokens,
      output_tokens: response.usage.output_tokens,
      total_tokens: response.usage.total_tokens,
      raw: response.usage.raw ? structuredClone(response.usage.raw) : undefined,
    }),
    raw: response.raw ? structuredClone(response.raw) : undefined,
  };
}

// ---------------------------------------------------------------------------
// MemoryCache
// ---------------------------------------------------------------------------

/**
 * In-process LRU cache with optional TTL.
 *
 * Relies on Map insertion order: the first key is the least recently used.
 */
export class MemoryCache implements ResponseCache {
  readonly capacity: number;
  private readonly ttl: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.ttl = options.ttl ?? 0;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): Response | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    if (entry.expiresAt > 0 && this.now() >= entry.expiresAt) {
      this.misses++;
      return undefined;
    }

    this.entries.set(key, entry);
    this.hits++;
    return copyResponse(entry.response);
  }

  set(key: string, response: Response): void {
    if (this.capacity <= 0) return;

    this.entries.delete(key);
    this.entries.set(key, {
      response: copyResponse(response),
      expiresAt: this.ttl > 0 ? this.now() + this.ttl : 0,
    });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /** Drop every entry and reset the counters. */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      hitRate: lookups === 0 ? 0 : (this.hits / lookups) * 100,
    };
  }
}

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/** JSON with object keys sorted at every level; undefined members dropped. */
function canonicalJSON(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJSON(item ?? null)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJSON(member)}`);
    return `{${members.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/**
 * Deterministic cache key for a request: SHA-256 (hex) over the fields that
 * affect the model's output. `metadata` is excluded.
 */
export function cacheKey(request: Request): string {
  const keyData = {
    provider: request.provider,
    model: request.model,
    messages: request.messages,
    tools: request.tools,
    tool_choice: request.tool_choice,
    response_format: request.response_format,
    temperature: request.temperature,
    top_p: request.top_p,
    max_tokens: request.max_tokens,
    stop_sequences: request.stop_sequences,
  };
  return createHash("sha256").update(canonicalJSON(keyData)).digest("hex");
}
