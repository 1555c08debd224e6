/**
 * The Adapter contract and helpers shared by every prompt strategy.
 *
 * An adapter renders a signature plus inputs into provider messages and
 * recovers a validated field map from the provider's raw text.
 */

import type { Message, ResponseFormat } from "@sigil/llm-client";
import type { AdapterFailure } from "../errors.js";
import type { Example } from "../example.js";
import type { History } from "../history.js";
import type { Field, FieldMap, Signature } from "../signature.js";
import { FieldKind } from "../signature.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** How a response was parsed. Frozen once parsing completes. */
export interface ParseDiagnostics {
  /** Name of the adapter whose parse succeeded. */
  readonly adapter: string;
  /** Position of that adapter in its chain; 0 outside a chain. */
  readonly adapterIndex: number;
  /** Parse attempts made, the successful one included. */
  readonly attempts: number;
  /** True when an adapter after the first one succeeded. */
  readonly fallbackUsed: boolean;
  /** Every failed attempt before the success, in order. */
  readonly failures: readonly AdapterFailure[];
  /** True when structured-text repair was needed. */
  readonly repaired: boolean;
}

export interface ParseResult {
  readonly outputs: FieldMap;
  readonly diagnostics: ParseDiagnostics;
}

export interface Adapter {
  readonly name: string;

  /**
   * Render the request messages.
   *
   * @throws {FieldError} when a required input is missing or mistyped.
   */
  format(
    signature: Signature,
    inputs: Readonly<Record<string, unknown>>,
    examples?: readonly Example[],
    history?: History,
  ): Message[];

  /**
   * Recover the output fields from raw response text.
   *
   * @throws {OutputParseError} or {ChainExhaustedError} when no valid field
   *   map can be produced.
   */
  parse(text: string, signature: Signature): ParseResult;

  /** Provider-side output constraint matching this adapter's framing, if any. */
  responseFormat?(signature: Signature): ResponseFormat | undefined;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Diagnostics for a standalone (unchained) successful parse. */
export function singleAttempt(adapter: string, repaired: boolean): ParseDiagnostics {
  return Object.freeze({
    adapter,
    adapterIndex: 0,
    attempts: 1,
    fallbackUsed: false,
    failures: Object.freeze([]),
    repaired,
  });
}

/** Render a value for a prompt line: strings verbatim, everything else as JSON. */
export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? String(value);
}

/**
 * `--- Inputs ---` section: one `name (description): value` line per input
 * that is present, in signature order.
 */
export function renderInputs(
  signature: Signature,
  inputs: Readonly<Record<string, unknown>>,
): string {
  if (signature.inputFields.length === 0) return "";

  const lines = ["--- Inputs ---"];
  for (const field of signature.inputFields) {
    const value = inputs[field.name];
    if (value === undefined) continue;
    const label = field.description ? `${field.name} (${field.description})` : field.name;
    lines.push(`${label}: ${formatValue(value)}`);
  }
  return `${lines.join("\n")}\n\n`;
}

/** Comma-separated hints for an output field: legal values, description, optional. */
export function fieldHints(field: Field): string[] {
  const hints: string[] = [];
  if (field.kind === FieldKind.CLASS && field.classes) {
    hints.push(`one of: ${field.classes.join(", ")}`);
  }
  if (field.description) hints.push(field.description);
  if (field.optional) hints.push("optional");
  return hints;
}

/** Example inputs in signature order, as `name: value` lines. */
export function exampleInputLines(signature: Signature, example: Example): string[] {
  const lines: string[] = [];
  for (const field of signature.inputFields) {
    const value = example.inputs[field.name];
    if (value !== undefined) lines.push(`${field.name}: ${formatValue(value)}`);
  }
  return lines;
}
