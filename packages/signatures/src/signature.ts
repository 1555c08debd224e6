/**
 * Signature and field model.
 *
 * A Signature is a static description of a call: ordered input fields,
 * ordered output fields, and a task description. It has no network
 * behaviour; adapters read it to render prompts and to validate what they
 * parse back.
 */

import { ConfigurationError, isPlainObject } from "@sigil/llm-client";
import {
  EnumViolationError,
  FieldError,
  FieldMissingError,
  FieldTypeError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Field kinds
// ---------------------------------------------------------------------------

export const FieldKind = {
  STRING: "string",
  INT: "int",
  FLOAT: "float",
  BOOL: "bool",
  /** Object, array, or a string holding structured text. */
  JSON: "json",
  /** A string constrained to a closed set of legal values. */
  CLASS: "class",
} as const satisfies Record<string, string>;

export type FieldKind = (typeof FieldKind)[keyof typeof FieldKind];

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Field {
  readonly name: string;
  readonly kind: FieldKind;
  readonly description: string;
  readonly optional: boolean;
  /** Legal values; `class` fields only. */
  readonly classes?: readonly string[];
  /** Lower-cased synonym -> legal value, consulted before the membership check. */
  readonly aliases?: Readonly<Record<string, string>>;
}

/** A value that satisfies some field kind. */
export type FieldValue =
  | string
  | number
  | boolean
  | readonly unknown[]
  | Readonly<Record<string, unknown>>;

/** Field name -> validated value. Optional fields that were absent are omitted. */
export type FieldMap = Record<string, FieldValue>;

export interface ClassOutputOptions {
  optional?: boolean;
  /** Synonym -> legal value, e.g. `{ pos: "positive" }`. Keys are case-insensitive. */
  aliases?: Record<string, string>;
}

/** Outcome of checking one value against one field. */
export type FieldCheck =
  | { ok: true; value: FieldValue }
  | { ok: false; error: FieldError };

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const JSON_SCHEMA_TYPES: Record<FieldKind, string | string[]> = {
  string: "string",
  int: "integer",
  float: "number",
  bool: "boolean",
  json: ["object", "array", "string"],
  class: "string",
};

// ---------------------------------------------------------------------------
// Value checks
// ---------------------------------------------------------------------------

/** Describe a runtime value in field-kind vocabulary, for error messages. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "number":
      return Number.isInteger(value) ? "int" : "float";
    case "boolean":
      return "bool";
    default:
      return typeof value;
  }
}

/**
 * Normalize a class value: case-insensitive match against the legal values,
 * then alias lookup. Returns the input unchanged when neither matches.
 */
export function normalizeClassValue(value: string, field: Field): string {
  const needle = value.trim().toLowerCase();

  for (const legal of field.classes ?? []) {
    if (legal.toLowerCase() === needle) return legal;
  }

  const alias = field.aliases?.[needle];
  if (alias !== undefined) return alias;

  return value;
}

/**
 * Check one present value against a field's kind. Class values come back
 * normalized to their legal spelling.
 */
export function checkFieldValue(field: Field, value: unknown): FieldCheck {
  const typeError = (): FieldCheck => ({
    ok: false,
    error: new FieldTypeError(field.name, field.kind, describeValue(value)),
  });

  switch (field.kind) {
    case FieldKind.STRING:
      return typeof value === "string" ? { ok: true, value } : typeError();

    case FieldKind.INT:
      return typeof value === "number" && Number.isInteger(value)
        ? { ok: true, value }
        : typeError();

    case FieldKind.FLOAT:
      return typeof value === "number" && Number.isFinite(value)
        ? { ok: true, value }
        : typeError();

    case FieldKind.BOOL:
      return typeof value === "boolean" ? { ok: true, value } : typeError();

    case FieldKind.JSON:
      if (typeof value === "string" || Array.isArray(value) || isPlainObject(value)) {
        return { ok: true, value };
      }
      return typeError();

    case FieldKind.CLASS: {
      if (typeof value !== "string") return typeError();
      const classes = field.classes ?? [];
      const normalized = normalizeClassValue(value, field);
      return classes.includes(normalized)
        ? { ok: true, value: normalized }
        : { ok: false, error: new EnumViolationError(field.name, value, classes) };
    }
  }
}

/**
 * Validate a field map against a list of fields.
 *
 * Pure: reports every violation (at most one per field) and never modifies
 * `values`. Absent means `undefined` or `null`.
 */
export function validateFields(
  fields: readonly Field[],
  values: Readonly<Record<string, unknown>>,
): FieldError[] {
  const errors: FieldError[] = [];

  for (const field of fields) {
    const value = values[field.name];
    if (value === undefined || value === null) {
      if (!field.optional) errors.push(new FieldMissingError(field.name));
      continue;
    }
    const check = checkFieldValue(field, value);
    if (!check.ok) errors.push(check.error);
  }

  return errors;
}

/** Validate parsed outputs against a signature's output fields. */
export function validateOutputs(
  signature: Signature,
  outputs: Readonly<Record<string, unknown>>,
): FieldError[] {
  return validateFields(signature.outputFields, outputs);
}

// ---------------------------------------------------------------------------
// Signature
// ---------------------------------------------------------------------------

export class Signature {
  readonly description: string;
  private readonly _inputs: Field[] = [];
  private readonly _outputs: Field[] = [];

  constructor(description = "") {
    this.description = description;
  }

  get inputFields(): readonly Field[] {
    return this._inputs;
  }

  get outputFields(): readonly Field[] {
    return this._outputs;
  }

  // -----------------------------------------------------------------------
  // Builders
  // -----------------------------------------------------------------------

  addInput(name: string, kind: FieldKind, description = ""): this {
    return this.add(this._inputs, { name, kind, description, optional: false });
  }

  addOptionalInput(name: string, kind: FieldKind, description = ""): this {
    return this.add(this._inputs, { name, kind, description, optional: true });
  }

  addOutput(name: string, kind: FieldKind, description = ""): this {
    return this.add(this._outputs, { name, kind, description, optional: false });
  }

  addOptionalOutput(name: string, kind: FieldKind, description = ""): this {
    return this.add(this._outputs, { name, kind, description, optional: true });
  }

  /** Add a `class` output constrained to `classes`. */
  addClassOutput(
    name: string,
    classes: readonly string[],
    description = "",
    options: ClassOutputOptions = {},
  ): this {
    if (classes.length === 0) {
      throw new ConfigurationError(`class field "${name}" needs at least one legal value`);
    }

    const aliases: Record<string, string> = {};
    for (const [alias, target] of Object.entries(options.aliases ?? {})) {
      if (!classes.includes(target)) {
        throw new ConfigurationError(
          `alias "${alias}" of field "${name}" points at "${target}", which is not a legal value`,
        );
      }
      aliases[alias.trim().toLowerCase()] = target;
    }

    return this.add(this._outputs, {
      name,
      kind: FieldKind.CLASS,
      description,
      optional: options.optional ?? false,
      classes: [...classes],
      aliases: Object.keys(aliases).length > 0 ? aliases : undefined,
    });
  }

  private add(list: Field[], field: Field): this {
    if (!FIELD_NAME.test(field.name)) {
      throw new ConfigurationError(
        `field name "${field.name}" must start with a letter or underscore and contain only letters, digits and underscores`,
      );
    }
    if (field.kind === FieldKind.CLASS && (field.classes ?? []).length === 0) {
      throw new ConfigurationError(
        `class field "${field.name}" needs legal values; use addClassOutput`,
      );
    }
    if (this.getInputField(field.name) || this.getOutputField(field.name)) {
      throw new ConfigurationError(`field "${field.name}" is already defined`);
    }
    list.push(Object.freeze(field));
    return this;
  }

  // -----------------------------------------------------------------------
  // Lookup
  // -----------------------------------------------------------------------

  getInputField(name: string): Field | undefined {
    return this._inputs.find((f) => f.name === name);
  }

  getOutputField(name: string): Field | undefined {
    return this._outputs.find((f) => f.name === name);
  }

  // -----------------------------------------------------------------------
  // Validation
  // -----------------------------------------------------------------------

  /**
   * Check caller-supplied inputs.
   *
   * @throws {FieldError} the first violation: a missing required input or a
   *   mistyped one.
   */
  validateInputs(inputs: Readonly<Record<string, unknown>>): void {
    const [first] = validateFields(this._inputs, inputs);
    if (first) throw first;
  }

  validateOutputs(outputs: Readonly<Record<string, unknown>>): FieldError[] {
    return validateOutputs(this, outputs);
  }

  /**
   * JSON Schema describing the output object, for providers that support
   * schema-constrained output.
   */
  toJSONSchema(): Record<string, unknown> {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const field of this._outputs) {
      const property: Record<string, unknown> = { type: JSON_SCHEMA_TYPES[field.kind] };
      if (field.kind === FieldKind.CLASS && field.classes) {
        property["enum"] = [...field.classes];
      }
      if (field.description) property["description"] = field.description;

      properties[field.name] = property;
      if (!field.optional) required.push(field.name);
    }

    const schema: Record<string, unknown> = { type: "object", properties };
    if (required.length > 0) schema["required"] = required;
    if (this.description) schema["description"] = this.description;
    return schema;
  }
}
