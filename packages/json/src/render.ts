/**
 * Render a JSON AST back to text.
 *
 * Output always re-parses to a structurally equal value. Only `"`, `\` and
 * control characters are escaped; every other character is written as is.
 */

import type { Json } from "./ast.js";

export interface RenderOptions {
  /** Spaces per nesting level; omit for compact output. */
  indent?: number;
}

const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

export function quoteString(s: string): string {
  let out = '"';
  for (const c of s) {
    const short = Object.hasOwn(SHORT_ESCAPES, c) ? SHORT_ESCAPES[c] : undefined;
    if (short !== undefined) {
      out += short;
    } else if (c < " ") {
      out += `\\u${c.charCodeAt(0).toString(16).padStart(4, "0")}`;
    } else {
      out += c;
    }
  }
  return out + '"';
}

function renderNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new RangeError(`Cannot render non-finite number ${n} as JSON`);
  }
  return String(n);
}

function render(value: Json, indent: string, depth: number): string {
  const newline = indent === "" ? "" : "\n";
  const pad = indent.repeat(depth + 1);
  const closePad = indent.repeat(depth);

  switch (value.type) {
    case "null":
      return "null";
    case "bool":
      return value.value ? "true" : "false";
    case "number":
      return renderNumber(value.value);
    case "string":
      return quoteString(value.value);
    case "array": {
      if (value.items.length === 0) return "[]";
      const items = value.items.map((item) => pad + render(item, indent, depth + 1));
      return `[${newline}${items.join(`,${newline}`)}${newline}${closePad}]`;
    }
    case "object": {
      if (value.entries.size === 0) return "{}";
      const colon = indent === "" ? ":" : ": ";
      const members = [...value.entries].map(
        ([key, item]) => pad + quoteString(key) + colon + render(item, indent, depth + 1)
      );
      return `{${newline}${members.join(`,${newline}`)}${newline}${closePad}}`;
    }
  }
}

/**
 * Render `value` as JSON text.
 *
 * Any depth is rendered, but `parseJson` only reads documents nested up to its
 * `maxDepth` (128 by default, at most `MAX_DEPTH_LIMIT`); deeper output does
 * not parse back.
 *
 * @throws RangeError for `NaN` and infinite numbers, which JSON cannot express.
 */
export function renderJson(value: Json, options: RenderOptions = {}): string {
  return render(value, " ".repeat(options.indent ?? 0), 0);
}
