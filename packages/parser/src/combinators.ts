/**
 * Parser combinator API for @skein/parser
 *
 * All combinators return `Parser<T>` values that can be composed freely and
 * shared between grammars. Alternation backtracks by default; `commit` marks
 * the points past which it must not.
 */

import { Location } from "./location.js";
import { GrammarDefect, ParseError, ParseFailure } from "./parse-error.js";
import type { ParseFailureResult, ParseResult, Parser, RunResult } from "./types.js";

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Create a Parser<T> from a raw attempt function. */
export function mkParser<T>(attemptFn: (loc: Location) => ParseResult<T>): Parser<T> {
  const parser: Parser<T> = {
    attempt: attemptFn,
    parse(input: string): RunResult<T> {
      return run(parser, input);
    },
    parseAll(input: string): T {
      const result = run(parser, input);
      if (!result.ok) {
        throw new ParseFailure(result.error);
      }
      return result.value;
    },
  };
  return parser;
}

function ok<T>(value: T, loc: Location): ParseResult<T> {
  return { ok: true, value, loc };
}

function failure(error: ParseError, committed = false): ParseFailureResult {
  return { ok: false, error, committed };
}

/** Leaf failure; specialised when nothing is left to match against. */
function mismatch(loc: Location, expected: string): ParseFailureResult {
  const message = loc.atEnd
    ? `unexpected end of input, expected ${expected}`
    : `expected ${expected}`;
  return failure(ParseError.at(loc, message));
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

/**
 * Run `parser` over the whole of `input`.
 *
 * A success that leaves characters unconsumed is reported as
 * `unexpected trailing data` at the first unconsumed character.
 */
export function run<T>(parser: Parser<T>, input: string): RunResult<T> {
  const result = parser.attempt(Location.start(input));
  if (!result.ok) {
    return { ok: false, error: result.error };
  }
  if (!result.loc.atEnd) {
    return { ok: false, error: ParseError.at(result.loc, "unexpected trailing data") };
  }
  return { ok: true, value: result.value };
}

// ---------------------------------------------------------------------------
// Primitive parsers
// ---------------------------------------------------------------------------

/** Match an exact string literal. */
export function literal(s: string): Parser<string> {
  return mkParser((loc) => {
    if (loc.text.startsWith(s, loc.offset)) {
      return ok(s, loc.advance(s.length));
    }
    return mismatch(loc, `'${s}'`);
  });
}

/** Match exactly one character (code point) satisfying `predicate`. */
export function charClass(
  predicate: (c: string) => boolean,
  description: string
): Parser<string> {
  return mkParser((loc) => {
    const cp = loc.text.codePointAt(loc.offset);
    if (cp !== undefined) {
      const c = String.fromCodePoint(cp);
      if (predicate(c)) {
        return ok(c, loc.advance(c.length));
      }
    }
    return mismatch(loc, description);
  });
}

/** Always succeed with `value`, consuming nothing. */
export function succeed<T>(value: T): Parser<T> {
  return mkParser((loc) => ok(value, loc));
}

/** Always fail with `message` at the current location. */
export function fail<T = never>(message: string): Parser<T> {
  return mkParser<T>((loc) => failure(ParseError.at(loc, message)));
}

/** Match any single character. */
export function anyChar(): Parser<string> {
  return charClass(() => true, "any character");
}

/** Match end of input. */
export function eof(): Parser<null> {
  return mkParser<null>((loc) => {
    if (loc.atEnd) {
      return ok(null, loc);
    }
    return failure(ParseError.at(loc, "expected end of input"));
  });
}

/** Match a regex anchored at the current position. */
export function regex(pattern: RegExp, description = `/${pattern.source}/`): Parser<string> {
  const anchored = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "") + "y");
  return mkParser((loc) => {
    anchored.lastIndex = loc.offset;
    const m = anchored.exec(loc.text);
    if (m) {
      return ok(m[0], loc.advance(m[0].length));
    }
    return mismatch(loc, description);
  });
}

// ---------------------------------------------------------------------------
// Transformation and sequencing
// ---------------------------------------------------------------------------

/** Transform a parser's result with a function. */
export function map<A, B>(p: Parser<A>, f: (a: A) => B): Parser<B> {
  return mkParser<B>((loc) => {
    const r = p.attempt(loc);
    if (!r.ok) return r;
    return ok(f(r.value), r.loc);
  });
}

/**
 * Run `p`, then the parser `f` builds from its value, from where `p` stopped.
 * This is what makes context-sensitive grammars possible.
 */
export function flatMap<A, B>(p: Parser<A>, f: (a: A) => Parser<B>): Parser<B> {
  return mkParser<B>((loc) => {
    const r = p.attempt(loc);
    if (!r.ok) return r;
    return f(r.value).attempt(r.loc);
  });
}

/** Sequence two parsers and combine their values. */
export function map2<A, B, C>(a: Parser<A>, b: Parser<B>, f: (a: A, b: B) => C): Parser<C> {
  return flatMap(a, (x) => map(b, (y) => f(x, y)));
}

/** Sequence two parsers. */
export function product<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]> {
  return map2(a, b, (x, y): [A, B] => [x, y]);
}

/** Sequence three parsers. */
export function seq3<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]> {
  return flatMap(a, (x) => map2(b, c, (y, z): [A, B, C] => [x, y, z]));
}

/** Run `a` then `b`, keeping `b`'s value. */
export function skipLeft<A, B>(a: Parser<A>, b: Parser<B>): Parser<B> {
  return map2(a, b, (_, y) => y);
}

/** Run `a` then `b`, keeping `a`'s value. */
export function skipRight<A, B>(a: Parser<A>, b: Parser<B>): Parser<A> {
  return map2(a, b, (x) => x);
}

/** Parse `p` between `open` and `close`, returning only the inner result. */
export function between<O, T, C>(open: Parser<O>, p: Parser<T>, close: Parser<C>): Parser<T> {
  return skipRight(skipLeft(open, p), close);
}

/** Replace a parser's value with a constant. */
export function as<A, B>(p: Parser<A>, value: B): Parser<B> {
  return map(p, () => value);
}

/** The exact input consumed by `p`, in place of its value. */
export function slice<T>(p: Parser<T>): Parser<string> {
  return mkParser<string>((loc) => {
    const r = p.attempt(loc);
    if (!r.ok) return r;
    return ok(loc.slice(r.loc), r.loc);
  });
}

// ---------------------------------------------------------------------------
// Alternation and commitment
// ---------------------------------------------------------------------------

/**
 * Try `a`; if it fails without being committed, try `b` from the same
 * location. When both fail, the error anchored furthest into the input is
 * reported, `a`'s on a tie.
 */
export function or<A, B>(a: Parser<A>, b: Parser<B>): Parser<A | B> {
  return mkParser<A | B>((loc) => {
    const ra = a.attempt(loc);
    if (ra.ok || ra.committed) return ra;
    const rb = b.attempt(loc);
    if (rb.ok || rb.committed) return rb;
    return rb.error.offset > ra.error.offset ? rb : ra;
  });
}

/** `or` over any number of alternatives, tried left to right. */
export function choice<T>(first: Parser<T>, ...rest: Parser<T>[]): Parser<T> {
  return rest.reduce<Parser<T>>((acc, p) => or(acc, p), first);
}

/** Forbid backtracking out of `p`: any failure of `p` is committed. */
export function commit<T>(p: Parser<T>): Parser<T> {
  return mkParser((loc) => {
    const r = p.attempt(loc);
    if (r.ok || r.committed) return r;
    return failure(r.error, true);
  });
}

/** Optional: succeed with `null` if `p` fails uncommitted. */
export function optional<T>(p: Parser<T>): Parser<T | null> {
  return mkParser<T | null>((loc) => {
    const r = p.attempt(loc);
    if (r.ok || r.committed) return r;
    return ok(null, loc);
  });
}

/**
 * Negative lookahead: succeed with null, consuming nothing, only if `p`
 * fails at the current position.
 */
export function notFollowedBy<T>(p: Parser<T>, message: string): Parser<null> {
  return mkParser<null>((loc) => {
    const r = p.attempt(loc);
    if (r.ok) return failure(ParseError.at(loc, message));
    if (r.committed) return r;
    return ok(null, loc);
  });
}

/** Positive lookahead: run `p` and keep its value, consuming nothing. */
export function lookahead<T>(p: Parser<T>): Parser<T> {
  return mkParser<T>((loc) => {
    const r = p.attempt(loc);
    if (!r.ok) return r;
    return ok(r.value, loc);
  });
}

/**
 * Accept `p`'s value only if `predicate` holds; otherwise fail at the
 * location where `p` started.
 */
export function refine<T>(
  p: Parser<T>,
  predicate: (value: T) => boolean,
  message: string | ((value: T) => string)
): Parser<T> {
  return mkParser<T>((loc) => {
    const r = p.attempt(loc);
    if (!r.ok || predicate(r.value)) return r;
    const text = typeof message === "string" ? message : message(r.value);
    return failure(ParseError.at(loc, text));
  });
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/** Add `description` as an outer context frame to any failure of `p`. */
export function label<T>(description: string, p: Parser<T>): Parser<T> {
  return mkParser((loc) => {
    const r = p.attempt(loc);
    if (r.ok) return r;
    return failure(r.error.label(loc, description), r.committed);
  });
}

/**
 * Report `expected <description>` when `p` fails uncommitted without getting
 * past its starting location. Deeper and committed failures pass through.
 */
export function expecting<T>(description: string, p: Parser<T>): Parser<T> {
  return mkParser((loc) => {
    const r = p.attempt(loc);
    if (r.ok || r.committed || r.error.offset > loc.offset) return r;
    return mismatch(loc, description);
  });
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

function repeat<T>(
  combinator: string,
  p: Parser<T>,
  from: Location,
  results: T[]
): ParseResult<T[]> {
  let cur = from;
  for (;;) {
    const r = p.attempt(cur);
    if (!r.ok) {
      return r.committed ? r : ok(results, cur);
    }
    if (r.loc.offset === cur.offset) {
      throw new GrammarDefect(combinator, cur.offset);
    }
    results.push(r.value);
    cur = r.loc;
  }
}

/**
 * Zero or more repetitions. Stops at the first uncommitted failure of `p`;
 * a committed failure propagates.
 *
 * @throws GrammarDefect if `p` succeeds without consuming input.
 */
export function many<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((loc) => repeat("many", p, loc, []));
}

/** One or more repetitions. */
export function many1<T>(p: Parser<T>): Parser<T[]> {
  return mkParser((loc) => {
    const first = p.attempt(loc);
    if (!first.ok) return first;
    if (first.loc.offset === loc.offset) {
      throw new GrammarDefect("many1", loc.offset);
    }
    return repeat("many1", p, first.loc, [first.value]);
  });
}

/** Exactly `n` repetitions. */
export function times<T>(n: number, p: Parser<T>): Parser<T[]> {
  return mkParser((loc) => {
    const results: T[] = [];
    let cur = loc;
    for (let i = 0; i < n; i++) {
      const r = p.attempt(cur);
      if (!r.ok) return r;
      results.push(r.value);
      cur = r.loc;
    }
    return ok(results, cur);
  });
}

/** One or more items separated by `sep`. */
export function sepBy1<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return map2(item, many(skipLeft(sep, item)), (x, xs) => [x, ...xs]);
}

/** Zero or more items separated by `sep`. */
export function sepBy<T, S>(item: Parser<T>, sep: Parser<S>): Parser<T[]> {
  return or(sepBy1(item, sep), succeed<T[]>([]));
}

// ---------------------------------------------------------------------------
// Recursion
// ---------------------------------------------------------------------------

/** Lazy parser for recursive grammars. `f` is called on first use. */
export function lazy<T>(f: () => Parser<T>): Parser<T> {
  let cached: Parser<T> | null = null;
  return mkParser((loc) => {
    if (!cached) cached = f();
    return cached.attempt(loc);
  });
}

// ---------------------------------------------------------------------------
// Convenience character-class parsers
// ---------------------------------------------------------------------------

/** True for the four whitespace characters JSON-like grammars skip. */
export function isWhitespace(c: string): boolean {
  return c === " " || c === "\t" || c === "\n" || c === "\r";
}

/** Match a single ASCII digit [0-9]. */
export function digit(): Parser<string> {
  return charClass((c) => c >= "0" && c <= "9", "digit");
}

/** Match a single hexadecimal digit [0-9a-fA-F]. */
export function hexDigit(): Parser<string> {
  return charClass((c) => /^[0-9a-fA-F]$/.test(c), "hex digit");
}

/** Match zero or more whitespace characters. */
export function whitespace(): Parser<string> {
  return slice(many(charClass(isWhitespace, "whitespace")));
}

/** Parse `p` and skip any whitespace after it. */
export function token<T>(p: Parser<T>): Parser<T> {
  return skipRight(p, whitespace());
}
