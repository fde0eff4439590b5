/**
 * @skein/parser
 *
 * Parser combinators with structured diagnostics.
 *
 * Provides:
 * - An immutable `Location` cursor and a `ParseError` frame stack
 * - Primitive matchers (`literal`, `charClass`, `succeed`, `fail`, ...)
 * - Combinators with backtracking alternation, explicit `commit`,
 *   furthest-failure error selection and context labels
 * - A driver (`run`) that requires the whole input to be consumed
 *
 * @module
 */

// Core types
export type { ParseResult, ParseFailureResult, RunResult, Parser } from "./types.js";

export { Location } from "./location.js";
export {
  ParseError,
  ParseFailure,
  GrammarDefect,
  type Frame,
  type ParseErrorJSON,
} from "./parse-error.js";

// Combinator API
export {
  mkParser,
  run,
  literal,
  charClass,
  succeed,
  fail,
  anyChar,
  eof,
  regex,
  map,
  flatMap,
  map2,
  product,
  seq3,
  skipLeft,
  skipRight,
  between,
  as,
  slice,
  or,
  choice,
  commit,
  optional,
  notFollowedBy,
  lookahead,
  refine,
  label,
  expecting,
  many,
  many1,
  times,
  sepBy,
  sepBy1,
  lazy,
  isWhitespace,
  digit,
  hexDigit,
  whitespace,
  token,
} from "./combinators.js";
