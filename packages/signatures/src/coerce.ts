/**
 * Value coercion shared by the adapters.
 *
 * Models answer "0.92", "High (95%)" or "yes" where a number or boolean was
 * asked for. Coercion turns such values into the declared kind where the
 * intent is unambiguous and otherwise leaves them alone for validation to
 * reject.
 */

import { decodeJSON } from "@sigil/llm-client";
import type { Field, FieldMap, Signature } from "./signature.js";
import { FieldKind, checkFieldValue } from "./signature.js";
import { FieldMissingError, OutputParseError, type FieldError } from "./errors.js";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const NUMBER_TOKEN = /-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

/** Qualitative confidence words some models use instead of numbers. */
const QUALITATIVE_NUMBERS: Record<string, number> = {
  "very high": 0.95,
  high: 0.9,
  medium: 0.7,
  moderate: 0.7,
  low: 0.3,
  "very low": 0.1,
};

const TRUE_WORDS = new Set(["true", "t", "yes", "y", "1"]);
const FALSE_WORDS = new Set(["false", "f", "no", "n", "0"]);

/**
 * First numeric token in `text` ("High (95%)" -> 95), else a qualitative
 * confidence word, else undefined.
 */
export function extractNumber(text: string): number | undefined {
  const match = NUMBER_TOKEN.exec(text);
  if (match) return Number(match[0]);
  return QUALITATIVE_NUMBERS[text.trim().toLowerCase()];
}

export function parseBool(text: string): boolean | undefined {
  const word = text.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return undefined;
}

// ---------------------------------------------------------------------------
// Per-field coercion
// ---------------------------------------------------------------------------

export interface CoerceOptions {
  /**
   * Join arrays with newlines and stringify numbers and booleans for
   * `string` and `class` fields (structured-object responses).
   */
  stringifyScalars?: boolean;
}

/** Result of coercing one field; `repaired` when structured-text repair was used. */
export interface Coerced {
  value: unknown;
  repaired: boolean;
}

/** Coerce one raw value toward `field.kind`. Never throws. */
export function coerceValue(field: Field, value: unknown, options: CoerceOptions = {}): Coerced {
  const keep: Coerced = { value, repaired: false };

  switch (field.kind) {
    case FieldKind.INT:
    case FieldKind.FLOAT: {
      if (typeof value !== "string") return keep;
      const n = extractNumber(value);
      return n === undefined ? keep : { value: n, repaired: false };
    }

    case FieldKind.BOOL: {
      if (typeof value !== "string") return keep;
      const b = parseBool(value);
      return b === undefined ? keep : { value: b, repaired: false };
    }

    case FieldKind.JSON: {
      if (typeof value !== "string" || value.trim() === "") return keep;
      const decoded = decodeJSON(value);
      return decoded.ok ? { value: decoded.value, repaired: decoded.repaired } : keep;
    }

    case FieldKind.STRING:
    case FieldKind.CLASS: {
      if (typeof value === "string") return { value: value.trim(), repaired: false };
      if (!options.stringifyScalars) return keep;
      if (Array.isArray(value)) return { value: value.map(String).join("\n"), repaired: false };
      if (typeof value === "number" || typeof value === "boolean") {
        return { value: String(value), repaired: false };
      }
      return keep;
    }
  }
}

// ---------------------------------------------------------------------------
// Whole-map finalization
// ---------------------------------------------------------------------------

export interface Finalized {
  outputs: FieldMap;
  repaired: boolean;
}

/**
 * Coerce and validate raw values for every output field.
 *
 * Returns the complete field map or throws OutputParseError listing every
 * violation; a partially valid map is never returned. Keys that are not
 * output fields are dropped.
 *
 * @param adapter - adapter name used in the error.
 */
export function finalizeOutputs(
  adapter: string,
  signature: Signature,
  raw: Readonly<Record<string, unknown>>,
  options: CoerceOptions = {},
): Finalized {
  const outputs: FieldMap = {};
  const violations: FieldError[] = [];
  let repaired = false;

  for (const field of signature.outputFields) {
    const value = raw[field.name];
    if (value === undefined || value === null) {
      if (!field.optional) violations.push(new FieldMissingError(field.name));
      continue;
    }

    const coerced = coerceValue(field, value, options);
    const check = checkFieldValue(field, coerced.value);
    if (check.ok) {
      outputs[field.name] = check.value;
      if (coerced.repaired) repaired = true;
    } else {
      violations.push(check.error);
    }
  }

  if (violations.length > 0) {
    throw OutputParseError.fromViolations(adapter, violations);
  }
  return { outputs, repaired };
}
