/**
 * Structured-object adapter: asks for one JSON object keyed by output field
 * names and decodes it out of the response, repairing it when needed.
 */

import {
  createUserMessage,
  decodeJSON,
  extractJSONObjects,
  isPlainObject,
  type JSONRepairError,
  type Message,
  type ResponseFormat,
} from "@sigil/llm-client";
import { finalizeOutputs } from "../coerce.js";
import { OutputParseError } from "../errors.js";
import type { Example } from "../example.js";
import type { History } from "../history.js";
import type { Signature } from "../signature.js";
import { FieldKind } from "../signature.js";
import type { Adapter, ParseResult } from "./adapter.js";
import { exampleInputLines, renderInputs, singleAttempt } from "./adapter.js";

/** Keys accepted for an `answer` output field besides its own name. */
const ANSWER_SYNONYMS = ["final", "finalanswer", "finalresult", "result", "response"];

export interface JSONAdapterOptions {
  /**
   * Ask the provider to constrain output: `"json_object"` for any object,
   * `"json_schema"` for the signature's schema. Default: none.
   */
  responseFormat?: "json_object" | "json_schema";
}

/** Lower-case and drop spaces, underscores and hyphens: "Final Answer" -> "finalanswer". */
export function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[\s_-]/g, "");
}

/**
 * Map an object's keys onto output field names. Unknown keys are dropped;
 * when two keys land on the same field, the first non-null value wins.
 */
function mapKeys(
  signature: Signature,
  object: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const byKey = new Map<string, string>();
  for (const field of signature.outputFields) byKey.set(normalizeKey(field.name), field.name);

  if (signature.getOutputField("answer")) {
    for (const synonym of ANSWER_SYNONYMS) {
      if (!byKey.has(synonym)) byKey.set(synonym, "answer");
    }
  }

  const mapped: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    const name = byKey.get(normalizeKey(key));
    if (name === undefined) continue;
    if (mapped[name] === undefined || mapped[name] === null) mapped[name] = value;
  }
  return mapped;
}

function indent(text: string, prefix: string): string {
  return text
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

export class JSONAdapter implements Adapter {
  readonly name = "json";
  private readonly _responseFormat: JSONAdapterOptions["responseFormat"];

  constructor(options: JSONAdapterOptions = {}) {
    this._responseFormat = options.responseFormat;
  }

  format(
    signature: Signature,
    inputs: Readonly<Record<string, unknown>>,
    examples: readonly Example[] = [],
    history?: History,
  ): Message[] {
    signature.validateInputs(inputs);

    let prompt = signature.description ? `${signature.description}\n\n` : "";

    if (examples.length > 0) {
      prompt += "--- Examples ---\n";
      examples.forEach((example, i) => {
        prompt += `Example ${i + 1}:\nInputs:\n`;
        for (const line of exampleInputLines(signature, example)) prompt += `  ${line}\n`;

        const expected: Record<string, unknown> = {};
        for (const field of signature.outputFields) {
          const value = example.outputs[field.name];
          if (value !== undefined) expected[field.name] = value;
        }
        prompt += `Expected Output:\n${indent(JSON.stringify(expected, null, 2), "  ")}\n\n`;
      });
    }

    prompt += renderInputs(signature, inputs);

    prompt += "--- Required Output Format ---\n";
    prompt += "Respond with a JSON object containing:\n";
    for (const field of signature.outputFields) {
      let line = `- ${field.name} (${field.kind})`;
      if (field.optional) line += " (optional)";
      if (field.kind === FieldKind.CLASS && field.classes) {
        line += ` [one of: ${field.classes.join(", ")}]`;
      }
      if (field.description) line += `: ${field.description}`;
      prompt += `${line}\n`;
    }
    prompt +=
      "\nIMPORTANT: Return ONLY valid JSON in your response. " +
      "Do not include any markdown formatting, code blocks, or explanatory text.\n";

    return [...(history?.get() ?? []), createUserMessage(prompt)];
  }

  responseFormat(signature: Signature): ResponseFormat | undefined {
    switch (this._responseFormat) {
      case "json_object":
        return { type: "json_object" };
      case "json_schema":
        return {
          type: "json_schema",
          json_schema: { name: "outputs", strict: false, schema: signature.toJSONSchema() },
        };
      default:
        return undefined;
    }
  }

  parse(text: string, signature: Signature): ParseResult {
    const spans = extractJSONObjects(text);
    if (spans.length === 0) return this.parsePlainText(text, signature);

    // Spans are tried in order; one that decodes but fails validation does
    // not stop the search, so prose like "{field: value}" before the answer
    // is skipped. The first violation wins when nothing validates.
    let decodeError: JSONRepairError | undefined;
    let violation: OutputParseError | undefined;
    for (const span of spans) {
      const decoded = decodeJSON(span);
      if (!decoded.ok) {
        if (decodeError === undefined) decodeError = decoded.error;
        continue;
      }
      if (!isPlainObject(decoded.value)) continue;

      try {
        const { outputs, repaired } = finalizeOutputs(
          this.name,
          signature,
          mapKeys(signature, decoded.value),
          { stringifyScalars: true },
        );
        return { outputs, diagnostics: singleAttempt(this.name, decoded.repaired || repaired) };
      } catch (err: unknown) {
        if (!(err instanceof OutputParseError)) throw err;
        if (violation === undefined) violation = err;
      }
    }

    if (violation) throw violation;
    throw new OutputParseError(this.name, "no decodable JSON object in response", {
      cause: decodeError,
    });
  }

  /** A lone `string` output takes the whole text when no object is present. */
  private parsePlainText(text: string, signature: Signature): ParseResult {
    const [only, ...rest] = signature.outputFields;
    const content = text.trim();

    if (only && rest.length === 0 && only.kind === FieldKind.STRING && content !== "") {
      return {
        outputs: { [only.name]: content },
        diagnostics: singleAttempt(this.name, false),
      };
    }
    throw new OutputParseError(this.name, "no JSON object found in response");
  }
}
