/**
 * JSON driver: runs the grammar over a whole document.
 */

import { ParseFailure, run, type Parser, type RunResult } from "@skein/parser";
import type { Json } from "./ast.js";
import { config, resolveGrammarOptions } from "./config.js";
import { buildJsonGrammar, type JsonGrammarOptions } from "./grammar.js";

export type ParseJsonOptions = Partial<JsonGrammarOptions>;

/**
 * The JSON grammar for `options`, merged over configuration.
 *
 * The first call loads configuration (a `.skeinrc` file found from the
 * working directory and `SKEIN_*` environment variables), so results can
 * depend on the process environment. Use `buildJsonGrammar` for a grammar that
 * depends only on its arguments.
 */
export function jsonGrammar(options: ParseJsonOptions = {}): Parser<Json> {
  return buildJsonGrammar(resolveGrammarOptions(options));
}

/**
 * Parse a complete JSON document.
 *
 * Leading and trailing whitespace are allowed; anything else after the value
 * fails with `unexpected trailing data`.
 *
 * Options missing from `options` come from configuration, which is loaded
 * from the working directory and `SKEIN_*` environment variables on first use.
 * `run(buildJsonGrammar(options), text)` is the same parse without that
 * lookup or the debug logging.
 */
export function parseJson(text: string, options: ParseJsonOptions = {}): RunResult<Json> {
  const result = run(jsonGrammar(options), text);
  if (!result.ok && config.has("debug")) {
    console.debug(`[skein] ${result.error.toString()}`);
  }
  return result;
}

/** Like `parseJson`, but throws `ParseFailure` instead of returning the error. */
export function parseJsonOrThrow(text: string, options: ParseJsonOptions = {}): Json {
  const result = parseJson(text, options);
  if (!result.ok) {
    throw new ParseFailure(result.error);
  }
  return result.value;
}
