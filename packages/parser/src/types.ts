/**
 * Core types for @skein/parser
 *
 * Defines the per-location parse result, the public run result and the
 * parser interface every primitive and combinator implements.
 */

import type { Location } from "./location.js";
import type { ParseError } from "./parse-error.js";

/**
 * Result of attempting a parser at one location: either success with a
 * value and the location reached, or failure with a diagnostic stack.
 *
 * `committed` failures must not be backtracked past by `or`.
 */
export type ParseResult<T> =
  | { ok: true; value: T; loc: Location }
  | { ok: false; error: ParseError; committed: boolean };

/** Failure half of `ParseResult`, handy for passing failures through unchanged. */
export type ParseFailureResult = Extract<ParseResult<unknown>, { ok: false }>;

/** Result of running a parser over a whole document. */
export type RunResult<T> = { ok: true; value: T } | { ok: false; error: ParseError };

/** A composable parser producing values of type `T`. */
export interface Parser<T> {
  /** Attempt to parse a prefix of the input starting at `loc`. */
  attempt(loc: Location): ParseResult<T>;
  /** Parse the whole input; trailing characters are a failure. */
  parse(input: string): RunResult<T>;
  /** Parse the whole input, throwing `ParseFailure` on failure. */
  parseAll(input: string): T;
}
