/**
 * Client class: the routing layer above provider adapters.
 *
 * Routes requests to provider adapters, applies middleware in onion pattern,
 * and provides a factory for environment-based configuration.
 */

import type { CallOptions, ProviderAdapter } from "./providers/adapter.js";
import { OpenAICompatibleAdapter } from "./providers/openai-compatible/index.js";
import type { Request } from "./types/request.js";
import type { Response } from "./types/response.js";
import { ConfigurationError } from "./types/errors.js";
import type { Logger } from "./utils/logger.js";
import type { RetryPolicy } from "./utils/retry.js";
import type { Environment } from "./settings.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Middleware for `complete()` calls.
 *
 * Follows the onion pattern: middleware runs in registration order for the
 * request phase and in reverse order for the response phase.
 */
export type Middleware = (
  request: Request,
  next: (request: Request) => Promise<Response>,
) => Promise<Response>;

/** Configuration for the Client constructor. */
export interface ClientConfig {
  /** Named provider adapters. */
  providers?: Record<string, ProviderAdapter>;
  /** Key into `providers` to use when `request.provider` is omitted. */
  defaultProvider?: string;
  /** Middleware chain for `complete()` calls (onion pattern). */
  middleware?: Middleware[];
}

/** Options applied to every adapter created by `Client.fromEnv()`. */
export interface FromEnvOptions {
  retry?: Partial<RetryPolicy>;
  /** Per-attempt timeout in milliseconds. */
  timeout?: number;
  logger?: Logger;
  /** Preferred default provider, when registered. */
  defaultProvider?: string;
}

const OPENAI_BASE_URL = "https://api.openai.com";
const OPENROUTER_BASE_URL = "https://openrouter.ai/api";

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | undefined;
  private readonly middleware: Middleware[];

  constructor(config: ClientConfig) {
    this.providers = { ...(config.providers ?? {}) };
    this.defaultProvider = config.defaultProvider;
    this.middleware = [...(config.middleware ?? [])];
  }

  // -----------------------------------------------------------------------
  // Static factory
  // -----------------------------------------------------------------------

  /**
   * Create a Client from environment variables.
   *
   * Registers `openai` when `OPENAI_API_KEY` is set and `openrouter` when
   * `OPENROUTER_API_KEY` is set; `OPENAI_BASE_URL` / `OPENROUTER_BASE_URL`
   * override the endpoints. The preferred default is used when registered,
   * otherwise the first registered adapter becomes the default.
   */
  static fromEnv(env: Environment = process.env, options: FromEnvOptions = {}): Client {
    const providers: Record<string, ProviderAdapter> = {};
    const shared = {
      retry: options.retry,
      timeout: options.timeout,
      logger: options.logger,
    };

    const openaiKey = env["OPENAI_API_KEY"];
    if (openaiKey) {
      providers["openai"] = new OpenAICompatibleAdapter({
        ...shared,
        apiKey: openaiKey,
        baseUrl: env["OPENAI_BASE_URL"] || OPENAI_BASE_URL,
        providerName: "openai",
      });
    }

    const openrouterKey = env["OPENROUTER_API_KEY"];
    if (openrouterKey) {
      providers["openrouter"] = new OpenAICompatibleAdapter({
        ...shared,
        apiKey: openrouterKey,
        baseUrl: env["OPENROUTER_BASE_URL"] || OPENROUTER_BASE_URL,
        providerName: "openrouter",
      });
    }

    const preferred = options.defaultProvider;
    const defaultProvider =
      preferred !== undefined && preferred in providers
        ? preferred
        : Object.keys(providers)[0];
    return new Client({ providers, defaultProvider });
  }

  // -----------------------------------------------------------------------
  // Provider resolution
  // -----------------------------------------------------------------------

  /**
   * Resolve the adapter for a given request.
   *
   * If `request.provider` is set, look it up; otherwise fall back to the
   * default provider. Throws `ConfigurationError` on any routing failure.
   */
  private resolveAdapter(request: Request): ProviderAdapter {
    const providerName = request.provider ?? this.defaultProvider;

    if (!providerName) {
      throw new ConfigurationError(
        "No provider specified in request and no default provider configured",
      );
    }

    const adapter = this.providers[providerName];
    if (!adapter) {
      throw new ConfigurationError(
        `Provider "${providerName}" is not registered`,
      );
    }

    return adapter;
  }

  /** Names of the registered providers, in registration order. */
  get providerNames(): string[] {
    return Object.keys(this.providers);
  }

  // -----------------------------------------------------------------------
  // complete()
  // -----------------------------------------------------------------------

  /**
   * Blocking call. Routes to the resolved adapter and applies the
   * middleware chain in onion pattern.
   *
   * Retries happen inside the adapter, under `options.retry`, and stop when
   * `options.signal` aborts.
   */
  async complete(request: Request, options: CallOptions = {}): Promise<Response> {
    const adapter = this.resolveAdapter(request);

    const innermost = (req: Request): Promise<Response> =>
      adapter.complete(req, options);

    // The first middleware registered is the outermost.
    const chain = this.middleware.reduceRight<
      (req: Request) => Promise<Response>
    >((next, mw) => (req: Request) => mw(req, next), innermost);

    return chain(request);
  }

  // -----------------------------------------------------------------------
  // close()
  // -----------------------------------------------------------------------

  /**
   * Release resources held by all registered providers.
   */
  async close(): Promise<void> {
    const closeTasks = Object.values(this.providers).map((adapter) =>
      adapter.close?.(),
    );
    await Promise.all(closeTasks);
  }
}
