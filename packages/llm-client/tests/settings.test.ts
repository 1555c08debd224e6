import { describe, it, expect } from "vitest";
import { DEFAULT_SETTINGS, loadSettings } from "../src/settings.js";
import { ConfigurationError } from "../src/types/errors.js";

describe("loadSettings", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS).toEqual({ maxRetries: 3, logLevel: "warn", cacheTTL: 0 });
  });

  it("reads every variable", () => {
    const settings = loadSettings({
      SIGIL_PROVIDER: "openrouter",
      SIGIL_MODEL: "test-model",
      SIGIL_MAX_RETRIES: "5",
      SIGIL_TIMEOUT: "30",
      SIGIL_LOG_LEVEL: "DEBUG",
      SIGIL_CACHE_TTL: "60",
    });

    expect(settings).toEqual({
      provider: "openrouter",
      model: "test-model",
      maxRetries: 5,
      timeout: 30_000,
      logLevel: "debug",
      cacheTTL: 60_000,
    });
  });

  it("splits a provider prefix off the model", () => {
    expect(loadSettings({ SIGIL_MODEL: "openai/gpt-4o-mini" })).toMatchObject({
      provider: "openai",
      model: "gpt-4o-mini",
    });
  });

  it("lets SIGIL_PROVIDER win over the model prefix", () => {
    expect(
      loadSettings({ SIGIL_MODEL: "openai/gpt-4o-mini", SIGIL_PROVIDER: "openrouter" }),
    ).toMatchObject({ provider: "openrouter", model: "gpt-4o-mini" });
  });

  it("keeps unknown prefixes as part of the model", () => {
    const settings = loadSettings({ SIGIL_MODEL: "meta/llama-3" });
    expect(settings.model).toBe("meta/llama-3");
    expect(settings.provider).toBeUndefined();
  });

  it("treats a zero timeout as no timeout", () => {
    expect(loadSettings({ SIGIL_TIMEOUT: "0" }).timeout).toBeUndefined();
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadSettings({}))).toBe(true);
  });

  it.each([
    ["SIGIL_MAX_RETRIES", "-1", 'SIGIL_MAX_RETRIES must be a non-negative integer, got "-1"'],
    ["SIGIL_TIMEOUT", "1.5", 'SIGIL_TIMEOUT must be a non-negative integer, got "1.5"'],
    ["SIGIL_CACHE_TTL", "soon", 'SIGIL_CACHE_TTL must be a non-negative integer, got "soon"'],
    ["SIGIL_LOG_LEVEL", "loud", 'SIGIL_LOG_LEVEL "loud" is not a log level'],
  ])("rejects %s=%s", (name, value, message) => {
    const load = () => loadSettings({ [name]: value });
    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(message);
  });
});
