/**
 * Configuration for @skein/json
 *
 * Loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SKEIN_* (for CI overrides)
 * 3. Config files: .skeinrc, .skeinrc.json, .skeinrc.yaml, skein.config.cjs, ...
 * 4. package.json: "skein" key
 * 5. Defaults (lowest priority)
 *
 * Options passed directly to `parseJson` override all of these.
 *
 * @example
 * ```typescript
 * import { config } from "@skein/json";
 *
 * config.get("json.maxDepth")       // → 128
 * config.set({ json: { duplicateKeys: "reject" } });
 * ```
 *
 * @example Config file (.skeinrc.json)
 * ```json
 * { "debug": true, "json": { "maxDepth": 64 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import {
  DEFAULT_GRAMMAR_OPTIONS,
  MAX_DEPTH_LIMIT,
  type DuplicateKeyPolicy,
  type JsonGrammarOptions,
} from "./grammar.js";

// ============================================================================
// Types
// ============================================================================

export interface JsonConfig {
  /** Deepest allowed array/object nesting, at most MAX_DEPTH_LIMIT */
  maxDepth?: number;
  /** "last-wins" keeps the last value of a repeated key, "reject" fails */
  duplicateKeys?: DuplicateKeyPolicy;
}

/**
 * Full skein configuration schema.
 */
export interface SkeinConfig {
  /** Log parse failures with console.debug */
  debug?: boolean;
  /** JSON grammar configuration */
  json?: JsonConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "skein";

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      const loaded: unknown = result.config;
      if (isRecord(loaded)) return loaded;
      console.warn(`[skein] Ignoring config file ${result.filepath}: expected an object`);
    }
  } catch (error) {
    // Config file errors shouldn't crash; fall back to defaults
    console.warn(`[skein] Failed to load config file:`, error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "SKEIN_";

type ValueKind = "boolean" | "number" | "string";

/** Known dotted paths and their types, so env names (which are case-insensitive) keep their camelCase. */
const KNOWN_PATHS: ReadonlyMap<string, ValueKind> = new Map<string, ValueKind>([
  ["debug", "boolean"],
  ["json.maxDepth", "number"],
  ["json.duplicateKeys", "string"],
]);

/** Coerce an env string by the type of its path; unknown paths are guessed. */
function parseEnvValue(value: string, kind: ValueKind | undefined): unknown {
  switch (kind) {
    case "boolean":
      return value === "1" || value === "true";
    case "number":
      return /^\d+$/.test(value) ? parseInt(value, 10) : value;
    case "string":
      return value;
    default:
      if (value === "true") return true;
      if (value === "false" || value === "") return false;
      if (/^\d+$/.test(value)) return parseInt(value, 10);
      return value;
  }
}

/**
 * Load configuration from environment variables.
 * Variables prefixed with SKEIN_ are parsed into the config object.
 *
 * Examples:
 *   SKEIN_DEBUG=1                        → { debug: true }
 *   SKEIN_JSON_MAXDEPTH=64               → { json: { maxDepth: 64 } }
 *   SKEIN_JSON__DUPLICATEKEYS=reject     → { json: { duplicateKeys: "reject" } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // SKEIN_JSON_MAXDEPTH → json.maxdepth → json.maxDepth
    const lowered = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");
    const configPath = [...KNOWN_PATHS.keys()].find((p) => p.toLowerCase() === lowered) ?? lowered;
    const parsedValue = parseEnvValue(value, KNOWN_PATHS.get(configPath));

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: SkeinConfig = {
    debug: false,
    json: { ...DEFAULT_GRAMMAR_OPTIONS },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);

  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "json.maxDepth", "debug")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with existing configuration.
 *
 * @example
 * config.set({ debug: true });
 * config.set({ json: { maxDepth: 32 } });
 */
function set(values: SkeinConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again (mainly for testing).
 *
 * @param options.searchFrom - Directory to start the config file search from
 */
function reset(options: { searchFrom?: string } = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Type helper for config files.
 */
export function defineConfig(values: SkeinConfig): SkeinConfig {
  return values;
}

// ============================================================================
// Grammar options
// ============================================================================

function isDuplicateKeyPolicy(value: unknown): value is DuplicateKeyPolicy {
  return value === "last-wins" || value === "reject";
}

function isDepth(value: unknown): value is number {
  return (
    typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= MAX_DEPTH_LIMIT
  );
}

/**
 * Grammar options from configuration, with `overrides` taking precedence.
 * Invalid values fall back to the defaults with a warning; `maxDepth` must
 * be an integer from 1 to `MAX_DEPTH_LIMIT`.
 */
export function resolveGrammarOptions(
  overrides: Partial<JsonGrammarOptions> = {}
): JsonGrammarOptions {
  const maxDepth = overrides.maxDepth ?? get("json.maxDepth");
  const duplicateKeys = overrides.duplicateKeys ?? get("json.duplicateKeys");

  const resolved: JsonGrammarOptions = { ...DEFAULT_GRAMMAR_OPTIONS };
  if (isDepth(maxDepth)) {
    resolved.maxDepth = maxDepth;
  } else {
    console.warn(`[skein] Invalid json.maxDepth ${JSON.stringify(maxDepth)}, using ${resolved.maxDepth}`);
  }
  if (isDuplicateKeyPolicy(duplicateKeys)) {
    resolved.duplicateKeys = duplicateKeys;
  } else {
    console.warn(
      `[skein] Invalid json.duplicateKeys ${JSON.stringify(duplicateKeys)}, using "${resolved.duplicateKeys}"`
    );
  }
  return resolved;
}
