/**
 * Structured-text repair for near-valid JSON emitted by language models.
 *
 * This is a heuristic text transform, not a parser. It fixes the mistakes
 * models actually make (single quotes, bare keys, trailing commas, Python
 * literals, comments, raw newlines in strings, unbalanced or missing
 * brackets, trailing prose) and leaves anything it does not recognise alone.
 */

import { JSONRepairError } from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Outcome of decoding a candidate string. */
export type DecodeResult =
  | { ok: true; value: unknown; repaired: boolean }
  | { ok: false; error: JSONRepairError };

type Opener = "{" | "[";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const MAX_PASSES = 4;

const CLOSER_FOR: Record<Opener, "}" | "]"> = { "{": "}", "[": "]" };

const BARE_LITERALS: Record<string, string> = {
  true: "true",
  false: "false",
  null: "null",
  True: "true",
  False: "false",
  None: "null",
};

const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

const STRUCTURAL = new Set([",", ":", "{", "}", "[", "]", '"', "'"]);

function isStrictJSON(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\r" || ch === "\t";
}

function lastSignificant(out: string): string {
  return out.trimEnd().slice(-1);
}

/** Drop a trailing comma (keeping any whitespace after it). */
function dropTrailingComma(out: string): string {
  return out.replace(/,(\s*)$/, "$1");
}

function escapeControl(ch: string): string {
  switch (ch) {
    case "\n":
      return "\\n";
    case "\r":
      return "\\r";
    case "\t":
      return "\\t";
    default:
      return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
  }
}

/**
 * Read a quoted string starting at `start` (which holds the quote) and
 * re-emit it as a valid double-quoted JSON string. Unterminated strings are
 * closed at end of input.
 */
function readString(text: string, start: number): { literal: string; end: number } {
  const quote = text[start];
  let literal = '"';
  let i = start + 1;

  while (i < text.length) {
    const ch = text.charAt(i);

    if (ch === "\\") {
      const next = text.charAt(i + 1);
      if (next === "") {
        i++;
        break;
      }
      literal += next === "'" ? "'" : `\\${next}`;
      i += 2;
      continue;
    }

    if (ch === quote) {
      return { literal: literal + '"', end: i + 1 };
    }

    if (ch === '"') {
      literal += '\\"';
    } else if (ch < " ") {
      literal += escapeControl(ch);
    } else {
      literal += ch;
    }
    i++;
  }

  return { literal: literal + '"', end: i };
}

/** Read a bare (unquoted) token: everything up to whitespace or structure. */
function readBareToken(text: string, start: number): { token: string; end: number } {
  let i = start;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (isWhitespace(ch) || STRUCTURAL.has(ch)) break;
    if (ch === "/" && (text[i + 1] === "/" || text[i + 1] === "*")) break;
    i++;
  }
  return { token: text.slice(start, i), end: i };
}

function nextNonWhitespace(text: string, from: number): string {
  let i = from;
  while (i < text.length && isWhitespace(text.charAt(i))) i++;
  return text.charAt(i);
}

/** Skip a `//` or `/* *\/` comment starting at `start`. */
function skipComment(text: string, start: number): number {
  if (text[start + 1] === "/") {
    const newline = text.indexOf("\n", start);
    return newline === -1 ? text.length : newline;
  }
  const close = text.indexOf("*/", start + 2);
  return close === -1 ? text.length : close + 2;
}

/**
 * One repair pass over text that starts with `{` or `[`.
 */
function repairPass(text: string): string {
  const stack: Opener[] = [];
  let out = "";
  let expectKey = false;
  let i = 0;

  const closeTop = (): void => {
    const opener = stack.pop();
    if (opener === undefined) return;
    if (lastSignificant(out) === ":") out += " null";
    out = dropTrailingComma(out) + CLOSER_FOR[opener];
    expectKey = false;
  };

  while (i < text.length) {
    const ch = text.charAt(i);

    if (isWhitespace(ch)) {
      out += ch;
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { literal, end } = readString(text, i);
      out += literal;
      expectKey = false;
      i = end;
      continue;
    }

    if (ch === "{" || ch === "[") {
      stack.push(ch);
      out += ch;
      expectKey = ch === "{";
      i++;
      continue;
    }

    if (ch === "}" || ch === "]") {
      const depth = stack.lastIndexOf(ch === "}" ? "{" : "[");
      if (depth !== -1) {
        // Close any containers left open inside the matched one.
        while (stack.length > depth) closeTop();
        if (stack.length === 0) return out;
      }
      i++;
      continue;
    }

    if (ch === ",") {
      const prev = lastSignificant(out);
      if (prev !== "," && prev !== "{" && prev !== "[") out += ch;
      expectKey = stack[stack.length - 1] === "{";
      i++;
      continue;
    }

    if (ch === ":") {
      out += ch;
      expectKey = false;
      i++;
      continue;
    }

    if (ch === "/" && (text[i + 1] === "/" || text[i + 1] === "*")) {
      i = skipComment(text, i);
      continue;
    }

    const { token, end } = readBareToken(text, i);
    if (token === "") {
      // A lone "/" that does not start a comment.
      out += ch;
      i++;
      continue;
    }

    if (expectKey && nextNonWhitespace(text, end) === ":") {
      out += JSON.stringify(token);
    } else if (!expectKey) {
      const literal = BARE_LITERALS[token];
      if (literal !== undefined) out += literal;
      else if (NUMBER_PATTERN.test(token)) out += token;
      else out += JSON.stringify(token);
    } else {
      out += token;
    }
    i = end;
  }

  while (stack.length > 0) closeTop();
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Narrow an unknown value to a plain JSON object. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Best-effort repair of near-valid JSON.
 *
 * Strictly valid input is returned unchanged, as is input without any `{`
 * or `[`. Otherwise the text is cut to start at the first bracket and
 * repaired until it stops changing, so `repairJSON(repairJSON(x))` equals
 * `repairJSON(x)`.
 */
export function repairJSON(text: string): string {
  if (isStrictJSON(text)) return text;

  const start = text.search(/[{[]/);
  if (start === -1) return text;

  let current = text.slice(start);
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = repairPass(current);
    if (next === current) break;
    current = next;
  }
  return current;
}

/**
 * Decode `text` strictly, falling back to {@link repairJSON}.
 *
 * When the repaired candidate still fails, the returned error carries the
 * original decode error, the original text and the repaired candidate.
 */
export function decodeJSON(text: string): DecodeResult {
  try {
    return { ok: true, value: JSON.parse(text), repaired: false };
  } catch (err) {
    const candidate = repairJSON(text);
    try {
      return { ok: true, value: JSON.parse(candidate), repaired: true };
    } catch {
      return { ok: false, error: new JSONRepairError(text, candidate, err) };
    }
  }
}

/**
 * Find the end index of the object starting at `start`, tracking quoted
 * strings (either quote character). Returns -1 when it never balances.
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let quote: string | undefined;

  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote !== undefined) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Prefer the body of a ```json (or bare ```) fence when it holds an object. */
function unfence(text: string): string {
  const fence = /```(json|JSON)?[^\S\n]*\n?([\s\S]*?)```/.exec(text);
  const body = fence?.[2];
  if (body !== undefined && body.includes("{")) return body;
  return text;
}

/**
 * Locate object-like spans inside free text, in order of appearance.
 *
 * Prose before, between and after the spans is ignored. An object that
 * never balances is returned up to the end of the text so that repair can
 * close it.
 */
export function extractJSONObjects(text: string): string[] {
  const source = unfence(text);
  const spans: string[] = [];
  let pos = source.indexOf("{");

  while (pos !== -1) {
    const end = findClosingBrace(source, pos);
    if (end === -1) {
      spans.push(source.slice(pos));
      break;
    }
    spans.push(source.slice(pos, end + 1));
    pos = source.indexOf("{", end + 1);
  }

  return spans;
}
