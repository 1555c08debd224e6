import { vi } from "vitest";
import type { Logger } from "@sigil/llm-client";
import { FieldKind, Signature } from "../src/signature.js";

/** Review sentiment: one string input, a class output and a float output. */
export function sentimentSignature(): Signature {
  return new Signature("Classify the sentiment of a product review.")
    .addInput("review", FieldKind.STRING, "customer review text")
    .addClassOutput("sentiment", ["positive", "negative", "neutral"], "overall tone")
    .addOutput("confidence", FieldKind.FLOAT, "confidence between 0 and 1");
}

/** A single string output named `answer`. */
export function answerSignature(): Signature {
  return new Signature().addInput("question", FieldKind.STRING).addOutput("answer", FieldKind.STRING);
}

export function spyLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  } satisfies Logger;
}
