/**
 * JSON AST
 *
 * A closed variant tagged by `type`. Values are built bottom-up by the
 * grammar and never mutated afterwards.
 */

export type Json =
  | JsonNull
  | JsonBool
  | JsonNumber
  | JsonString
  | JsonArray
  | JsonObject;

export interface JsonNull {
  readonly type: "null";
}

export interface JsonBool {
  readonly type: "bool";
  readonly value: boolean;
}

export interface JsonNumber {
  readonly type: "number";
  readonly value: number;
}

export interface JsonString {
  readonly type: "string";
  readonly value: string;
}

export interface JsonArray {
  readonly type: "array";
  readonly items: readonly Json[];
}

/** Keys are unique; a duplicate key keeps its first position and its last value. */
export interface JsonObject {
  readonly type: "object";
  readonly entries: ReadonlyMap<string, Json>;
}

/** Plain JavaScript shape of a JSON value. */
export type NativeJson =
  | null
  | boolean
  | number
  | string
  | NativeJson[]
  | { [key: string]: NativeJson };

// ============================================================================
// Constructors
// ============================================================================

export const jsonNull: JsonNull = { type: "null" };

export function jsonBool(value: boolean): JsonBool {
  return { type: "bool", value };
}

export function jsonNumber(value: number): JsonNumber {
  return { type: "number", value };
}

export function jsonString(value: string): JsonString {
  return { type: "string", value };
}

export function jsonArray(items: readonly Json[]): JsonArray {
  return { type: "array", items };
}

/** Build an object from entries in order; later duplicates overwrite earlier ones. */
export function jsonObject(entries: Iterable<readonly [string, Json]>): JsonObject {
  const map = new Map<string, Json>();
  for (const [key, value] of entries) {
    map.set(key, value);
  }
  return { type: "object", entries: map };
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Structural equality. Object key order is irrelevant; numbers compare with
 * `===`, so `0` equals `-0` and `NaN` equals nothing.
 */
export function jsonEquals(a: Json, b: Json): boolean {
  switch (a.type) {
    case "null":
      return b.type === "null";
    case "bool":
      return b.type === "bool" && b.value === a.value;
    case "number":
      return b.type === "number" && b.value === a.value;
    case "string":
      return b.type === "string" && b.value === a.value;
    case "array": {
      if (b.type !== "array" || a.items.length !== b.items.length) return false;
      const others = b.items;
      return a.items.every((item, i) => jsonEquals(item, others[i]));
    }
    case "object": {
      if (b.type !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !jsonEquals(value, other)) return false;
      }
      return true;
    }
  }
}

/** Convert to plain JavaScript values (objects become plain records). */
export function toNative(value: Json): NativeJson {
  switch (value.type) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "array":
      return value.items.map(toNative);
    case "object": {
      const out: { [key: string]: NativeJson } = {};
      for (const [key, item] of value.entries) {
        Object.defineProperty(out, key, {
          value: toNative(item),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
  }
}

/** Convert plain JavaScript values into the AST. */
export function fromNative(value: NativeJson): Json {
  if (value === null) return jsonNull;
  if (typeof value === "boolean") return jsonBool(value);
  if (typeof value === "number") return jsonNumber(value);
  if (typeof value === "string") return jsonString(value);
  if (Array.isArray(value)) return jsonArray(value.map(fromNative));
  return jsonObject(Object.entries(value).map(([k, v]): [string, Json] => [k, fromNative(v)]));
}
