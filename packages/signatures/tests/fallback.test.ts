import { describe, it, expect, vi } from "vitest";
import { ConfigurationError } from "@sigil/llm-client";
import type { Adapter } from "../src/adapters/adapter.js";
import { FallbackAdapter } from "../src/adapters/fallback.js";
import { JSONAdapter } from "../src/adapters/json.js";
import { MarkerAdapter } from "../src/adapters/marker.js";
import { ChainExhaustedError, OutputParseError } from "../src/errors.js";
import { sentimentSignature, spyLogger } from "./helpers.js";

const MARKER_FAILURE =
  'marker adapter: required field "sentiment" is missing; required field "confidence" is missing';

describe("FallbackAdapter", () => {
  it("needs at least one adapter", () => {
    expect(() => new FallbackAdapter([])).toThrow(ConfigurationError);
    expect(() => new FallbackAdapter([])).toThrow("fallback adapter needs at least one adapter");
  });

  it("tries marker, then JSON, by default", () => {
    expect(new FallbackAdapter().adapters.map((a) => a.name)).toEqual(["marker", "json"]);
  });

  it("renders the prompt with the first adapter", () => {
    const inputs = { review: "Great battery life." };
    expect(new FallbackAdapter().format(sentimentSignature(), inputs)).toEqual(
      new MarkerAdapter().format(sentimentSignature(), inputs),
    );
  });

  it("takes the response format of the first adapter", () => {
    const sig = sentimentSignature();
    expect(new FallbackAdapter().responseFormat(sig)).toBeUndefined();
    const chain = new FallbackAdapter([
      new JSONAdapter({ responseFormat: "json_object" }),
      new MarkerAdapter(),
    ]);
    expect(chain.responseFormat(sig)).toEqual({ type: "json_object" });
  });
});

describe("FallbackAdapter.parse", () => {
  it("uses the first adapter when it succeeds", () => {
    const result = new FallbackAdapter().parse(
      "[[ ## sentiment ## ]]\npositive\n\n[[ ## confidence ## ]]\n0.92",
      sentimentSignature(),
    );

    expect(result.outputs).toEqual({ sentiment: "positive", confidence: 0.92 });
    expect(result.diagnostics).toEqual({
      adapter: "marker",
      adapterIndex: 0,
      attempts: 1,
      fallbackUsed: false,
      failures: [],
      repaired: false,
    });
  });

  it("falls back to JSON and records the marker failure", () => {
    const result = new FallbackAdapter().parse(
      '{"sentiment": "positive", "confidence": 0.92}',
      sentimentSignature(),
    );

    expect(result.outputs).toEqual({ sentiment: "positive", confidence: 0.92 });
    expect(result.diagnostics).toMatchObject({
      adapter: "json",
      adapterIndex: 1,
      attempts: 2,
      fallbackUsed: true,
      repaired: false,
    });
    expect(result.diagnostics.failures).toHaveLength(1);
    expect(result.diagnostics.failures[0]).toMatchObject({
      adapter: "marker",
      index: 0,
      reason: MARKER_FAILURE,
    });
    expect(result.diagnostics.failures[0]?.error).toBeInstanceOf(OutputParseError);
  });

  it("decodes JSON wrapped in prose and reports repair", () => {
    const result = new FallbackAdapter().parse(
      "The review is upbeat. {sentiment: 'positive', confidence: 0.85,} Let me know!",
      sentimentSignature(),
    );
    expect(result.outputs).toEqual({ sentiment: "positive", confidence: 0.85 });
    expect(result.diagnostics.repaired).toBe(true);
  });

  it("freezes the diagnostics", () => {
    const result = new FallbackAdapter().parse(
      '{"sentiment": "neutral", "confidence": 0.5}',
      sentimentSignature(),
    );
    expect(Object.isFrozen(result.diagnostics)).toBe(true);
    expect(Object.isFrozen(result.diagnostics.failures)).toBe(true);
  });

  it("throws ChainExhaustedError listing every failure", () => {
    const text = "I cannot help with that.";
    let caught: unknown;
    try {
      new FallbackAdapter().parse(text, sentimentSignature());
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ChainExhaustedError);
    if (!(caught instanceof ChainExhaustedError)) return;
    expect(caught.message).toBe(
      "all 2 adapters failed to parse response (length=24):\n" +
        `  - [0] marker: ${MARKER_FAILURE}\n` +
        "  - [1] json: json adapter: no JSON object found in response",
    );
    expect(caught.text).toBe(text);
    expect(caught.failures.map((f) => f.adapter)).toEqual(["marker", "json"]);
    expect(caught.cause).toBe(caught.failures[1]?.error);
    expect(caught.retryable).toBe(false);
  });

  it("propagates errors that are not parse failures", () => {
    const broken: Adapter = {
      name: "broken",
      format: () => [],
      parse: () => {
        throw new TypeError("cannot read properties of undefined");
      },
    };
    const json = new JSONAdapter();
    const parse = vi.spyOn(json, "parse");

    expect(() =>
      new FallbackAdapter([broken, json]).parse('{"sentiment": "positive"}', sentimentSignature()),
    ).toThrow(TypeError);
    expect(parse).not.toHaveBeenCalled();
  });

  it("logs each failure and the fallback success", () => {
    const logger = spyLogger();
    new FallbackAdapter(undefined, { logger }).parse(
      '{"sentiment": "positive", "confidence": 0.92}',
      sentimentSignature(),
    );

    expect(logger.debug).toHaveBeenCalledWith("adapter failed to parse response", {
      adapter: "marker",
      index: 0,
      reason: MARKER_FAILURE,
    });
    expect(logger.info).toHaveBeenCalledWith("fallback adapter parsed response", {
      adapter: "json",
      index: 1,
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("warns when every adapter fails", () => {
    const logger = spyLogger();
    const chain = new FallbackAdapter(undefined, { logger });

    expect(() => chain.parse("I cannot help with that.", sentimentSignature())).toThrow(
      ChainExhaustedError,
    );
    expect(logger.warn).toHaveBeenCalledWith("all adapters failed to parse response", {
      adapters: ["marker", "json"],
      length: 24,
    });
  });
});
