import { describe, it, expect, vi } from "vitest";
import { Client } from "../src/client.js";
import type { Middleware } from "../src/client.js";
import type { CallOptions, ProviderAdapter } from "../src/providers/adapter.js";
import { OpenAICompatibleAdapter } from "../src/providers/openai-compatible/index.js";
import type { Request } from "../src/types/request.js";
import type { Response } from "../src/types/response.js";
import { ConfigurationError } from "../src/types/errors.js";
import { Role, ContentKind } from "../src/types/enums.js";
import { Usage } from "../src/types/response.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function textResponse(provider: string, text: string): Response {
  return {
    id: `resp-${provider}`,
    model: "test-model",
    provider,
    message: {
      role: Role.ASSISTANT,
      content: [{ kind: ContentKind.TEXT, text }],
    },
    finish_reason: { reason: "stop" },
    usage: new Usage({ input_tokens: 10, output_tokens: 5 }),
  };
}

function createMockAdapter(name: string) {
  return {
    name,
    complete: vi
      .fn<(request: Request, options?: CallOptions) => Promise<Response>>()
      .mockResolvedValue(textResponse(name, `Hello from ${name}`)),
    close: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
  } satisfies ProviderAdapter;
}

function createRequest(overrides?: Partial<Request>): Request {
  return {
    model: "test-model",
    messages: [
      {
        role: Role.USER,
        content: [{ kind: ContentKind.TEXT, text: "Hello" }],
      },
    ],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Client", () => {
  describe("provider routing", () => {
    it("routes to the provider specified in request.provider", async () => {
      const alpha = createMockAdapter("alpha");
      const beta = createMockAdapter("beta");

      const client = new Client({
        providers: { alpha, beta },
        defaultProvider: "alpha",
      });

      const req = createRequest({ provider: "beta" });
      const res = await client.complete(req);

      expect(beta.complete).toHaveBeenCalledWith(req, {});
      expect(alpha.complete).not.toHaveBeenCalled();
      expect(res.provider).toBe("beta");
    });

    it("routes to the default provider when request.provider is omitted", async () => {
      const alpha = createMockAdapter("alpha");
      const beta = createMockAdapter("beta");

      const client = new Client({
        providers: { alpha, beta },
        defaultProvider: "alpha",
      });

      const res = await client.complete(createRequest());

      expect(alpha.complete).toHaveBeenCalledOnce();
      expect(beta.complete).not.toHaveBeenCalled();
      expect(res.provider).toBe("alpha");
    });

    it("lists registered providers in order", () => {
      const client = new Client({
        providers: { alpha: createMockAdapter("alpha"), beta: createMockAdapter("beta") },
      });
      expect(client.providerNames).toEqual(["alpha", "beta"]);
    });
  });

  describe("ConfigurationError", () => {
    it("throws when no provider is specified and no default is configured", async () => {
      const client = new Client({ providers: {} });
      const req = createRequest();

      await expect(client.complete(req)).rejects.toThrow(ConfigurationError);
      await expect(client.complete(req)).rejects.toThrow(
        "No provider specified in request and no default provider configured",
      );
    });

    it("throws when the requested provider is not registered", async () => {
      const alpha = createMockAdapter("alpha");
      const client = new Client({
        providers: { alpha },
        defaultProvider: "alpha",
      });

      const req = createRequest({ provider: "unknown" });

      await expect(client.complete(req)).rejects.toThrow(ConfigurationError);
      await expect(client.complete(req)).rejects.toThrow(
        'Provider "unknown" is not registered',
      );
    });
  });

  describe("complete()", () => {
    it("passes call options through to the adapter", async () => {
      const adapter = createMockAdapter("test");
      const client = new Client({ providers: { test: adapter }, defaultProvider: "test" });
      const controller = new AbortController();
      const onAttempt = vi.fn();
      const options: CallOptions = {
        signal: controller.signal,
        retry: { maxRetries: 1 },
        onAttempt,
      };

      const res = await client.complete(createRequest(), options);

      expect(adapter.complete).toHaveBeenCalledWith(createRequest(), options);
      expect(res.message.content).toEqual([{ kind: ContentKind.TEXT, text: "Hello from test" }]);
    });

    it("propagates adapter errors", async () => {
      const adapter = createMockAdapter("test");
      adapter.complete.mockRejectedValue(new Error("provider down"));
      const client = new Client({ providers: { test: adapter }, defaultProvider: "test" });

      await expect(client.complete(createRequest())).rejects.toThrow("provider down");
    });
  });

  describe("middleware (onion pattern)", () => {
    it("follows onion pattern: first middleware is outermost", async () => {
      const order: string[] = [];

      const mw1: Middleware = async (req, next) => {
        order.push("mw1-before");
        const res = await next(req);
        order.push("mw1-after");
        return res;
      };

      const mw2: Middleware = async (req, next) => {
        order.push("mw2-before");
        const res = await next(req);
        order.push("mw2-after");
        return res;
      };

      const adapter = createMockAdapter("test");
      adapter.complete.mockImplementation(async () => {
        order.push("adapter");
        return textResponse("test", "ok");
      });

      const client = new Client({
        providers: { test: adapter },
        defaultProvider: "test",
        middleware: [mw1, mw2],
      });

      await client.complete(createRequest());

      expect(order).toEqual([
        "mw1-before",
        "mw2-before",
        "adapter",
        "mw2-after",
        "mw1-after",
      ]);
    });

    it("allows middleware to modify the request", async () => {
      const adapter = createMockAdapter("test");

      const addMetadata: Middleware = async (req, next) => {
        const modified: Request = {
          ...req,
          metadata: { ...req.metadata, injected: "true" },
        };
        return next(modified);
      };

      const client = new Client({
        providers: { test: adapter },
        defaultProvider: "test",
        middleware: [addMetadata],
      });

      await client.complete(createRequest());

      const passedRequest = adapter.complete.mock.calls[0]?.[0];
      expect(passedRequest?.metadata).toEqual({ injected: "true" });
    });
  });

  describe("fromEnv()", () => {
    it("registers openai when OPENAI_API_KEY is set", () => {
      const client = Client.fromEnv({ OPENAI_API_KEY: "test-key" });
      expect(client.providerNames).toEqual(["openai"]);
    });

    it("registers openrouter when OPENROUTER_API_KEY is set", () => {
      const client = Client.fromEnv({ OPENROUTER_API_KEY: "test-key" });
      expect(client.providerNames).toEqual(["openrouter"]);
    });

    it("registers both providers, openai first", () => {
      const client = Client.fromEnv({
        OPENAI_API_KEY: "test-key",
        OPENROUTER_API_KEY: "test-key",
      });
      expect(client.providerNames).toEqual(["openai", "openrouter"]);
    });

    it("creates a client with no providers when no keys are set", async () => {
      const client = Client.fromEnv({});
      expect(client.providerNames).toEqual([]);
      await expect(client.complete(createRequest())).rejects.toThrow(ConfigurationError);
    });

    it("uses the first registered provider as default", async () => {
      const complete = vi
        .spyOn(OpenAICompatibleAdapter.prototype, "complete")
        .mockResolvedValue(textResponse("openai", "hi"));

      const client = Client.fromEnv({
        OPENAI_API_KEY: "test-key",
        OPENROUTER_API_KEY: "test-key",
      });
      const res = await client.complete(createRequest());

      expect(res.provider).toBe("openai");
      expect(complete).toHaveBeenCalledOnce();
      expect(complete.mock.contexts[0]).toHaveProperty("name", "openai");
      complete.mockRestore();
    });

    it("prefers the requested default provider when registered", async () => {
      const complete = vi
        .spyOn(OpenAICompatibleAdapter.prototype, "complete")
        .mockResolvedValue(textResponse("openrouter", "hi"));

      const client = Client.fromEnv(
        { OPENAI_API_KEY: "test-key", OPENROUTER_API_KEY: "test-key" },
        { defaultProvider: "openrouter" },
      );
      await client.complete(createRequest());

      expect(complete.mock.contexts[0]).toHaveProperty("name", "openrouter");
      complete.mockRestore();
    });
  });

  describe("close()", () => {
    it("calls close() on all registered adapters", async () => {
      const alpha = createMockAdapter("alpha");
      const beta = createMockAdapter("beta");
      const client = new Client({ providers: { alpha, beta } });

      await client.close();

      expect(alpha.close).toHaveBeenCalledOnce();
      expect(beta.close).toHaveBeenCalledOnce();
    });

    it("does not throw when adapters have no close method", async () => {
      const adapter: ProviderAdapter = {
        name: "bare",
        complete: async () => textResponse("bare", "ok"),
      };
      const client = new Client({ providers: { bare: adapter } });

      await expect(client.close()).resolves.toBeUndefined();
    });
  });
});
