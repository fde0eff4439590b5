/**
 * @skein/json
 *
 * A JSON parser assembled from @skein/parser combinators, with a structured
 * AST, a renderer and configurable limits.
 *
 * @module
 */

// AST
export type {
  Json,
  JsonNull,
  JsonBool,
  JsonNumber,
  JsonString,
  JsonArray,
  JsonObject,
  NativeJson,
} from "./ast.js";
export {
  jsonNull,
  jsonBool,
  jsonNumber,
  jsonString,
  jsonArray,
  jsonObject,
  jsonEquals,
  toNative,
  fromNative,
} from "./ast.js";

// Grammar and driver
export {
  buildJsonGrammar,
  DEFAULT_GRAMMAR_OPTIONS,
  MAX_DEPTH_LIMIT,
  type DuplicateKeyPolicy,
  type JsonGrammarOptions,
} from "./grammar.js";
export { parseJson, parseJsonOrThrow, jsonGrammar, type ParseJsonOptions } from "./parse.js";

// Rendering
export { renderJson, quoteString, type RenderOptions } from "./render.js";

// Configuration
export {
  config,
  defineConfig,
  resolveGrammarOptions,
  type SkeinConfig,
  type JsonConfig,
} from "./config.js";
