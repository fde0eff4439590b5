/**
 * JSON grammar built from @skein/parser combinators.
 *
 * Arrays and objects refer back to `value` through `lazy`, so the combinator
 * tree is only materialised as deep as a document actually nests. Each
 * nesting level gets its own `value` parser, which is how the depth limit is
 * enforced without any mutable state.
 */

import {
  as,
  charClass,
  choice,
  commit,
  digit,
  expecting,
  fail,
  flatMap,
  hexDigit,
  label,
  lazy,
  literal,
  lookahead,
  many,
  many1,
  map,
  map2,
  notFollowedBy,
  optional,
  or,
  refine,
  skipLeft,
  skipRight,
  slice,
  succeed,
  times,
  token,
  whitespace,
  type Parser,
} from "@skein/parser";
import {
  jsonArray,
  jsonBool,
  jsonNull,
  jsonNumber,
  jsonObject,
  jsonString,
  type Json,
} from "./ast.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** What to do when an object repeats a key. */
export type DuplicateKeyPolicy = "last-wins" | "reject";

/**
 * Largest accepted `maxDepth`. Each nesting level costs a few dozen frames of
 * the JS stack, and this keeps the deepest document well inside Node's default.
 */
export const MAX_DEPTH_LIMIT = 256;

export interface JsonGrammarOptions {
  /** Deepest allowed array/object nesting, from 1 to `MAX_DEPTH_LIMIT`. */
  maxDepth: number;
  duplicateKeys: DuplicateKeyPolicy;
}

export const DEFAULT_GRAMMAR_OPTIONS: Readonly<JsonGrammarOptions> = {
  maxDepth: 128,
  duplicateKeys: "last-wins",
};

type Entry = readonly [string, Json];

// ---------------------------------------------------------------------------
// Numbers
// ---------------------------------------------------------------------------

const digits = many1(digit());

const zero = skipLeft(
  literal("0"),
  commit(notFollowedBy(digit(), "leading zeros are not allowed"))
);

const nonZero = skipLeft(
  charClass((c) => c >= "1" && c <= "9", "digit"),
  many(digit())
);

const integerPart = expecting("digit", or(zero, nonZero));

const fraction = skipLeft(
  literal("."),
  commit(expecting("digit after decimal point", digits))
);

const exponent = skipLeft(
  charClass((c) => c === "e" || c === "E", "exponent"),
  commit(
    skipLeft(
      optional(charClass((c) => c === "+" || c === "-", "sign")),
      expecting("digit in exponent", digits)
    )
  )
);

const numberLiteral: Parser<Json> = map(
  slice(
    skipLeft(
      optional(literal("-")),
      skipLeft(integerPart, skipLeft(optional(fraction), optional(exponent)))
    )
  ),
  (text) => jsonNumber(Number(text))
);

// ---------------------------------------------------------------------------
// Strings
// ---------------------------------------------------------------------------

const SIMPLE_ESCAPES = "\"\\/bfnrt";
const DECODED_ESCAPES = "\"\\/\b\f\n\r\t";

const isHighSurrogate = (cu: number) => cu >= 0xd800 && cu <= 0xdbff;
const isLowSurrogate = (cu: number) => cu >= 0xdc00 && cu <= 0xdfff;

const simpleEscape = map(
  charClass((c) => SIMPLE_ESCAPES.includes(c), "escape sequence"),
  (c) => DECODED_ESCAPES[SIMPLE_ESCAPES.indexOf(c)]
);

const hex4 = map(slice(times(4, hexDigit())), (hex) => parseInt(hex, 16));

const lowSurrogateEscape = expecting(
  "low surrogate escape after high surrogate",
  refine(
    skipLeft(literal("\\u"), hex4),
    isLowSurrogate,
    "expected low surrogate escape after high surrogate"
  )
);

const unicodeEscape = skipLeft(
  literal("u"),
  flatMap(
    refine(hex4, (cu) => !isLowSurrogate(cu), "unpaired low surrogate"),
    (cu) =>
      isHighSurrogate(cu)
        ? map(lowSurrogateEscape, (low) => String.fromCharCode(cu, low))
        : succeed(String.fromCharCode(cu))
  )
);

const escape = skipLeft(
  literal("\\"),
  commit(expecting("escape sequence", or(simpleEscape, unicodeEscape)))
);

const noControlCharacter = commit(
  notFollowedBy(
    charClass((c) => c < " ", "control character"),
    "unescaped control character in string"
  )
);

const plainCharacter = skipLeft(
  noControlCharacter,
  charClass((c) => c !== '"' && c !== "\\", "string character")
);

const quote = literal('"');

const stringLiteral: Parser<string> = label(
  "string",
  skipLeft(
    quote,
    commit(
      skipRight(
        map(many(or(escape, plainCharacter)), (parts) => parts.join("")),
        quote
      )
    )
  )
);

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

const comma = token(literal(","));

function firstDuplicate(entries: readonly Entry[]): string | undefined {
  const seen = new Set<string>();
  for (const [key] of entries) {
    if (seen.has(key)) return key;
    seen.add(key);
  }
  return undefined;
}

/** One or more `item`s separated by commas; an item is required after each comma. */
function commaSeparated<T>(item: Parser<T>): Parser<T[]> {
  return map2(item, many(skipLeft(comma, commit(item))), (x, xs) => [x, ...xs]);
}

/**
 * Build the value grammar for one option set. `valueAt(depth)` is shared by
 * arrays and objects, so each nesting level is materialised at most once.
 */
function buildGrammar(options: JsonGrammarOptions): Parser<Json> {
  const levels = new Map<number, Parser<Json>>();

  const valueAt = (depth: number): Parser<Json> => {
    let parser = levels.get(depth);
    if (!parser) {
      parser = lazy(() => buildValue(depth));
      levels.set(depth, parser);
    }
    return parser;
  };

  const buildValue = (depth: number): Parser<Json> => {
    const containers =
      depth < options.maxDepth
        ? or(buildArray(depth), buildObject(depth))
        : skipLeft(
            lookahead(charClass((c) => c === "[" || c === "{", "'[' or '{'")),
            commit(fail<Json>(`maximum nesting depth of ${options.maxDepth} exceeded`))
          );

    return skipLeft(
      whitespace(),
      skipRight(
        expecting(
          "value",
          choice<Json>(
            as(literal("null"), jsonNull),
            as(literal("true"), jsonBool(true)),
            as(literal("false"), jsonBool(false)),
            numberLiteral,
            map(stringLiteral, jsonString),
            containers
          )
        ),
        whitespace()
      )
    );
  };

  const buildArray = (depth: number): Parser<Json> => {
    const body = or(
      as(literal("]"), []),
      skipRight(commaSeparated(valueAt(depth + 1)), expecting("',' or ']'", literal("]")))
    );
    return label(
      "array",
      map(skipLeft(token(literal("[")), commit(expecting("value or ']'", body))), jsonArray)
    );
  };

  const buildObject = (depth: number): Parser<Json> => {
    const member: Parser<Entry> = flatMap(token(stringLiteral), (key) =>
      commit(
        label(
          `value for key ${JSON.stringify(key)}`,
          map(skipLeft(token(literal(":")), valueAt(depth + 1)), (v): Entry => [key, v])
        )
      )
    );

    // A duplicate is reported at the first key, once a key has been seen.
    const members =
      options.duplicateKeys === "reject"
        ? skipLeft(
            lookahead(quote),
            commit(
              refine(
                commaSeparated(member),
                (entries) => firstDuplicate(entries) === undefined,
                (entries) => `duplicate key ${JSON.stringify(firstDuplicate(entries))}`
              )
            )
          )
        : commaSeparated(member);

    const body = or(
      as(literal("}"), []),
      skipRight(members, expecting("',' or '}'", literal("}")))
    );
    return label(
      "object",
      map(skipLeft(token(literal("{")), commit(expecting("string key or '}'", body))), jsonObject)
    );
  };

  return valueAt(0);
}

// ---------------------------------------------------------------------------
// Grammar cache
// ---------------------------------------------------------------------------

const grammars = new Map<string, Parser<Json>>();

/**
 * The JSON value grammar for `options`, built once per option set.
 * Leading and trailing whitespace are part of the value.
 *
 * Reads no configuration: `run(buildJsonGrammar(options), text)` depends only
 * on its arguments.
 *
 * @throws RangeError when `maxDepth` is not an integer from 1 to `MAX_DEPTH_LIMIT`.
 */
export function buildJsonGrammar(
  options: JsonGrammarOptions = DEFAULT_GRAMMAR_OPTIONS
): Parser<Json> {
  const { maxDepth } = options;
  if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_DEPTH_LIMIT) {
    throw new RangeError(`maxDepth must be an integer from 1 to ${MAX_DEPTH_LIMIT}, got ${maxDepth}`);
  }
  const key = `${options.maxDepth}:${options.duplicateKeys}`;
  let grammar = grammars.get(key);
  if (!grammar) {
    grammar = buildGrammar(options);
    grammars.set(key, grammar);
  }
  return grammar;
}
