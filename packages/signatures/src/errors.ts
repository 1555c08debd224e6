/**
 * Field validation and parse errors.
 *
 * All extend the client's SDKError and are never retryable: a response that
 * does not honour the requested format is not fixed by calling again with
 * the same prompt.
 */

import { SDKError } from "@sigil/llm-client";
import type { FieldKind } from "./signature.js";

// ---------------------------------------------------------------------------
// Field-level errors
// ---------------------------------------------------------------------------

/** Base for every violation tied to one named field. */
export class FieldError extends SDKError {
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, retryable: false });
    this.name = "FieldError";
    this.field = field;
  }
}

/** A required field is absent. */
export class FieldMissingError extends FieldError {
  constructor(field: string) {
    super(field, `required field "${field}" is missing`);
    this.name = "FieldMissingError";
  }
}

/** A field value has the wrong runtime kind. */
export class FieldTypeError extends FieldError {
  readonly expected: FieldKind;
  readonly actual: string;

  constructor(field: string, expected: FieldKind, actual: string) {
    super(field, `field "${field}" expected ${expected}, got ${actual}`);
    this.name = "FieldTypeError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** A class field value is not one of its legal values. */
export class EnumViolationError extends FieldError {
  readonly value: string;
  readonly allowed: readonly string[];

  constructor(field: string, value: string, allowed: readonly string[]) {
    super(
      field,
      `field "${field}" has value "${value}", expected one of: ${allowed.join(", ")}`,
    );
    this.name = "EnumViolationError";
    this.value = value;
    this.allowed = allowed;
  }
}

// ---------------------------------------------------------------------------
// Parse errors
// ---------------------------------------------------------------------------

/** One adapter could not produce a valid field map from the response text. */
export class OutputParseError extends SDKError {
  /** Name of the adapter that failed. */
  readonly adapter: string;
  /** Every field violation found; empty when the text had no usable structure. */
  readonly violations: readonly FieldError[];

  constructor(
    adapter: string,
    message: string,
    options?: { violations?: readonly FieldError[]; cause?: unknown },
  ) {
    super(`${adapter} adapter: ${message}`, { cause: options?.cause, retryable: false });
    this.name = "OutputParseError";
    this.adapter = adapter;
    this.violations = options?.violations ?? [];
  }

  /** Build the error from field violations, naming each in the message. */
  static fromViolations(adapter: string, violations: readonly FieldError[]): OutputParseError {
    const detail = violations.map((v) => v.message).join("; ");
    return new OutputParseError(adapter, detail, { violations });
  }
}

/** Why one adapter in a fallback chain failed. */
export interface AdapterFailure {
  readonly adapter: string;
  /** Position of the adapter in the chain. */
  readonly index: number;
  readonly reason: string;
  readonly error: Error;
}

/** Every adapter in a fallback chain failed to parse the same response. */
export class ChainExhaustedError extends SDKError {
  readonly failures: readonly AdapterFailure[];
  /** The raw response text every adapter was given. */
  readonly text: string;

  constructor(failures: readonly AdapterFailure[], text: string) {
    const lines = failures.map((f) => `  - [${f.index}] ${f.adapter}: ${f.reason}`);
    super(
      `all ${failures.length} adapters failed to parse response (length=${text.length}):\n${lines.join("\n")}`,
      { cause: failures[failures.length - 1]?.error, retryable: false },
    );
    this.name = "ChainExhaustedError";
    this.failures = failures;
    this.text = text;
  }
}
