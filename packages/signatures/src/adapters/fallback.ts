/**
 * Fallback chain: several adapters tried in order against the same response.
 */

import {
  ConfigurationError,
  SDKError,
  silentLogger,
  type Logger,
  type Message,
  type ResponseFormat,
} from "@sigil/llm-client";
import { ChainExhaustedError, type AdapterFailure } from "../errors.js";
import type { Example } from "../example.js";
import type { History } from "../history.js";
import type { Signature } from "../signature.js";
import type { Adapter, ParseResult } from "./adapter.js";
import { JSONAdapter } from "./json.js";
import { MarkerAdapter } from "./marker.js";

export interface FallbackAdapterOptions {
  logger?: Logger;
}

export class FallbackAdapter implements Adapter {
  readonly name = "fallback";
  readonly adapters: readonly Adapter[];
  private readonly logger: Logger;

  /**
   * @param adapters - tried in order; the first one also renders the prompt.
   *   Defaults to marker, then JSON.
   * @throws {ConfigurationError} when `adapters` is empty.
   */
  constructor(
    adapters: readonly Adapter[] = [new MarkerAdapter(), new JSONAdapter()],
    options: FallbackAdapterOptions = {},
  ) {
    if (adapters.length === 0) {
      throw new ConfigurationError("fallback adapter needs at least one adapter");
    }
    this.adapters = [...adapters];
    this.logger = options.logger ?? silentLogger;
  }

  private get primary(): Adapter {
    const [first] = this.adapters;
    if (!first) throw new ConfigurationError("fallback adapter needs at least one adapter");
    return first;
  }

  format(
    signature: Signature,
    inputs: Readonly<Record<string, unknown>>,
    examples?: readonly Example[],
    history?: History,
  ): Message[] {
    return this.primary.format(signature, inputs, examples, history);
  }

  responseFormat(signature: Signature): ResponseFormat | undefined {
    return this.primary.responseFormat?.(signature);
  }

  /**
   * Parse with each adapter in turn; the first success wins.
   *
   * Only SDK errors count as a parse failure. Anything else is a bug and
   * propagates immediately.
   */
  parse(text: string, signature: Signature): ParseResult {
    const failures: AdapterFailure[] = [];

    for (const [index, adapter] of this.adapters.entries()) {
      let result: ParseResult;
      try {
        result = adapter.parse(text, signature);
      } catch (err) {
        if (!(err instanceof SDKError)) throw err;
        failures.push(
          Object.freeze({ adapter: adapter.name, index, reason: err.message, error: err }),
        );
        this.logger.debug("adapter failed to parse response", {
          adapter: adapter.name,
          index,
          reason: err.message,
        });
        continue;
      }

      if (index > 0) {
        this.logger.info("fallback adapter parsed response", {
          adapter: adapter.name,
          index,
        });
      }

      return {
        outputs: result.outputs,
        diagnostics: Object.freeze({
          adapter: adapter.name,
          adapterIndex: index,
          attempts: index + 1,
          fallbackUsed: index > 0,
          failures: Object.freeze([...failures]),
          repaired: result.diagnostics.repaired,
        }),
      };
    }

    this.logger.warn("all adapters failed to parse response", {
      adapters: this.adapters.map((a) => a.name),
      length: text.length,
    });
    throw new ChainExhaustedError(failures, text);
  }
}
