/**
 * Marker-delimited adapter.
 *
 * Asks the model to put each output field after a `[[ ## name ## ]]` marker
 * and slices the response between markers. Works with models that do not
 * reliably produce JSON.
 */

import { createAssistantMessage, createUserMessage, type Message } from "@sigil/llm-client";
import { finalizeOutputs } from "../coerce.js";
import type { Example } from "../example.js";
import type { History } from "../history.js";
import type { Field, Signature } from "../signature.js";
import { FieldKind, normalizeClassValue } from "../signature.js";
import type { Adapter, ParseResult } from "./adapter.js";
import {
  exampleInputLines,
  fieldHints,
  formatValue,
  renderInputs,
  singleAttempt,
} from "./adapter.js";

// ---------------------------------------------------------------------------
// Markers
// ---------------------------------------------------------------------------

/** The canonical marker for a field. */
export function marker(name: string): string {
  return `[[ ## ${name} ## ]]`;
}

/**
 * Tolerant marker for one field: spaces optional, and one or both closing
 * brackets may be missing. Field names are plain identifiers, so they need
 * no escaping.
 */
function fieldMarkerPattern(name: string): RegExp {
  return new RegExp(`\\[\\[\\s*##\\s*${name}\\s*##[ \\t]*\\]{0,2}`);
}

/** Start of any marker, whatever the field. */
const ANY_MARKER = /\[\[\s*##\s*\w+\s*##/g;

const COMPLETE_MARKER = /\[\[\s*##\s*\w+\s*##\s*\]\]/g;

const LEADING_FRAGMENT = /^(?:##\s*\]\]|\]\]?)\s*/;

/** Strip marker fragments left around a sliced value. */
function cleanValue(raw: string, kind: Field["kind"]): string {
  let value = raw.trim().replace(LEADING_FRAGMENT, "");
  value = value.replace(COMPLETE_MARKER, "").trim();

  // Trailing "]]" can be part of a JSON array value; keep it there.
  if (kind !== FieldKind.JSON) {
    while (value.endsWith("]]")) value = value.slice(0, -2).trimEnd();
  }
  return value;
}

/** Slice the raw text belonging to `name`, or undefined when its marker is absent. */
function sliceField(text: string, name: string): string | undefined {
  const match = fieldMarkerPattern(name).exec(text);
  if (!match) return undefined;

  const start = match.index + match[0].length;
  const next = new RegExp(ANY_MARKER.source, "g");
  next.lastIndex = start;
  const end = next.exec(text)?.index ?? text.length;
  return text.slice(start, end);
}

function stripEnds(word: string): string {
  return word.replace(/^[^\w]+|[^\w]+$/g, "");
}

/**
 * Pick the class value out of a possibly chatty answer: the whole first
 * line when it names a legal value, otherwise its first word.
 */
function pickClassValue(value: string, field: Field): string {
  const firstLine = (value.split("\n")[0] ?? "").trim();
  const firstWord = stripEnds(firstLine.split(/\s+/)[0] ?? "");

  for (const candidate of [firstLine, stripEnds(firstLine), firstWord]) {
    if (field.classes?.includes(normalizeClassValue(candidate, field))) return candidate;
  }
  return firstWord || firstLine;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class MarkerAdapter implements Adapter {
  readonly name = "marker";

  format(
    signature: Signature,
    inputs: Readonly<Record<string, unknown>>,
    examples: readonly Example[] = [],
    history?: History,
  ): Message[] {
    signature.validateInputs(inputs);

    let prompt = signature.description ? `${signature.description}\n\n` : "";
    prompt += renderInputs(signature, inputs);

    if (signature.outputFields.length > 0) {
      prompt += "--- Required Output Format ---\n";
      prompt += "Respond using the following format with field markers:\n\n";
      for (const field of signature.outputFields) {
        const hints = fieldHints(field);
        const hintText = hints.length > 0 ? ` (${hints.join(", ")})` : "";
        prompt += `${marker(field.name)}${hintText}\n\n`;
      }
      prompt +=
        "IMPORTANT: Use the exact field marker format shown above. " +
        "Start each field with [[ ## field_name ## ]].\n";
    }

    return [
      ...this.formatExamples(signature, examples),
      ...(history?.get() ?? []),
      createUserMessage(prompt),
    ];
  }

  /** Each example becomes a user/assistant pair, outputs written with markers. */
  private formatExamples(signature: Signature, examples: readonly Example[]): Message[] {
    const messages: Message[] = [];

    examples.forEach((example, i) => {
      const header = `--- Example ${i + 1} (Inputs) ---`;
      messages.push(
        createUserMessage([header, ...exampleInputLines(signature, example)].join("\n")),
      );

      const blocks: string[] = [];
      for (const field of signature.outputFields) {
        const value = example.outputs[field.name];
        if (value !== undefined) blocks.push(`${marker(field.name)}\n${formatValue(value)}`);
      }
      if (blocks.length > 0) messages.push(createAssistantMessage(blocks.join("\n\n")));
    });

    return messages;
  }

  parse(text: string, signature: Signature): ParseResult {
    const raw: Record<string, unknown> = {};

    for (const field of signature.outputFields) {
      const slice = sliceField(text, field.name);
      if (slice === undefined) continue;

      const value = cleanValue(slice, field.kind);
      raw[field.name] = field.kind === FieldKind.CLASS ? pickClassValue(value, field) : value;
    }

    const { outputs, repaired } = finalizeOutputs(this.name, signature, raw);
    return { outputs, diagnostics: singleAttempt(this.name, repaired) };
  }
}
