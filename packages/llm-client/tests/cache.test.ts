import { describe, it, expect } from "vitest";
import { MemoryCache, cacheKey } from "../src/cache.js";
import { Role, ContentKind } from "../src/types/enums.js";
import { createUserMessage } from "../src/types/message.js";
import type { Request } from "../src/types/request.js";
import { Usage, type Response } from "../src/types/response.js";

function textResponse(text: string): Response {
  return {
    id: `resp-${text}`,
    model: "test-model",
    provider: "openai",
    message: { role: Role.ASSISTANT, content: [{ kind: ContentKind.TEXT, text }] },
    finish_reason: { reason: "stop" },
    usage: new Usage({ input_tokens: 3, output_tokens: 4 }),
    raw: { id: `resp-${text}` },
  };
}

describe("MemoryCache", () => {
  it("returns what was stored and misses unknown keys", () => {
    const cache = new MemoryCache();
    cache.set("a", textResponse("alpha"));

    expect(cache.get("a")?.message.content).toEqual([{ kind: "text", text: "alpha" }]);
    expect(cache.get("b")).toBeUndefined();
  });

  it("evicts the least recently used entry at capacity", () => {
    const cache = new MemoryCache({ capacity: 2 });
    cache.set("a", textResponse("a"));
    cache.set("b", textResponse("b"));
    cache.get("a");
    cache.set("c", textResponse("c"));

    expect(cache.size).toBe(2);
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")?.id).toBe("resp-a");
    expect(cache.get("c")?.id).toBe("resp-c");
  });

  it("replacing a key does not grow the cache", () => {
    const cache = new MemoryCache({ capacity: 2 });
    cache.set("a", textResponse("first"));
    cache.set("a", textResponse("second"));

    expect(cache.size).toBe(1);
    expect(cache.get("a")?.id).toBe("resp-second");
  });

  it("expires entries after the ttl", () => {
    let now = 1_000;
    const cache = new MemoryCache({ ttl: 500, now: () => now });
    cache.set("a", textResponse("a"));

    now = 1_499;
    expect(cache.get("a")?.id).toBe("resp-a");
    now = 1_500;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("stores nothing with capacity 0", () => {
    const cache = new MemoryCache({ capacity: 0 });
    cache.set("a", textResponse("a"));
    expect(cache.size).toBe(0);
    expect(cache.get("a")).toBeUndefined();
  });

  it("hands out copies the caller cannot use to change the entry", () => {
    const cache = new MemoryCache();
    const original = textResponse("a");
    cache.set("a", original);

    const first = cache.get("a");
    expect(first).not.toBe(original);
    if (first?.raw) first.raw["id"] = "tampered";
    if (original.raw) original.raw["id"] = "tampered too";

    expect(cache.get("a")?.raw).toEqual({ id: "resp-a" });
  });

  it("counts hits and misses", () => {
    const cache = new MemoryCache();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, hitRate: 0 });

    cache.set("a", textResponse("a"));
    cache.get("a");
    cache.get("missing");

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1, hitRate: 50 });
  });

  it("clear() drops entries and counters", () => {
    const cache = new MemoryCache();
    cache.set("a", textResponse("a"));
    cache.get("a");
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0, hitRate: 0 });
  });
});

describe("cacheKey", () => {
  const base: Request = {
    model: "test-model",
    messages: [createUserMessage("Classify: great product")],
    temperature: 0,
  };

  it("is a 64-character hex digest", () => {
    expect(cacheKey(base)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("does not depend on property order", () => {
    const reordered: Request = {
      temperature: 0,
      messages: [createUserMessage("Classify: great product")],
      model: "test-model",
    };
    expect(cacheKey(reordered)).toBe(cacheKey(base));
  });

  it("ignores metadata", () => {
    expect(cacheKey({ ...base, metadata: { trace: "abc" } })).toBe(cacheKey(base));
  });

  it("changes with anything that affects the output", () => {
    expect(cacheKey({ ...base, temperature: 0.5 })).not.toBe(cacheKey(base));
    expect(cacheKey({ ...base, model: "other-model" })).not.toBe(cacheKey(base));
    expect(
      cacheKey({ ...base, messages: [createUserMessage("Classify: bad product")] }),
    ).not.toBe(cacheKey(base));
  });
});
