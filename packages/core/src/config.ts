/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the grammarkit packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: GRAMMARKIT_* (highest priority, for CI overrides)
 * 2. Config files: grammarkit.config.js, .grammarkitrc, package.json "grammarkit" key, ...
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@grammarkit/core";
 *
 * config.get("debug")                    // → boolean
 * config.get<number>("parser.maxDepth")  // → 1000
 *
 * config.set({ parser: { maxDepth: 200 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A grammar described as a configuration record rather than PEG text.
 * Field names follow the language configuration file format.
 */
export interface GrammarConfigRecord {
  /** Grammar name (defaults to "custom") */
  name?: string;
  /** Start rule name */
  start?: string;
  /** Skip whitespace and comments before every token and rule */
  skip_whitespace?: boolean;
  /** Regular expressions matching comments */
  comments?: string[];
  /** Rule name → PEG pattern text */
  rules?: Record<string, string>;
}

/**
 * Parser engine settings.
 */
export interface ParserConfig {
  /** Maximum nesting of rule invocations before a parse is aborted */
  maxDepth?: number;
  /** Packrat memoization (disable only to measure its effect) */
  memoize?: boolean;
}

/**
 * Full grammarkit configuration schema.
 */
export interface GrammarkitConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Parser engine settings */
  parser?: ParserConfig;
  /** Project grammar, in configuration-record form */
  grammar?: GrammarConfigRecord;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let loadError: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "GRAMMARKIT_";

/**
 * Load configuration from environment variables.
 *
 * A double underscore separates nesting levels; within a level, single
 * underscores camel-case the key.
 *
 * Examples:
 *   GRAMMARKIT_DEBUG=1                      → { debug: true }
 *   GRAMMARKIT_PARSER__MAX_DEPTH=200        → { parser: { maxDepth: 200 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // Reserved for the diagnostics renderer
    if (key === "GRAMMARKIT_NO_COLOR") continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map(camelCase)
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

function camelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
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
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "grammarkit";

/**
 * Load configuration from files. Uses cosmiconfig to search for config in
 * standard locations, starting at the working directory. `.mjs` files need
 * an async loader and are not searched.
 */
function loadConfigFromFiles(searchFrom?: string): Record<string, unknown> {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (e: unknown) {
    loadError = e instanceof Error ? e.message : String(e);
    createLogger("config").warn(`Ignoring unreadable config file: ${loadError}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: GrammarkitConfig = {
  debug: false,
  parser: {
    maxDepth: 1000,
    memoize: true,
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(searchFrom?: string): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  const value: unknown = getNestedValue(configStore, path);
  return value as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<GrammarkitConfig>): void {
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
 * Message of the error raised while reading the config file, if one was.
 */
function getLoadError(): string | undefined {
  initializeConfig();
  return loadError;
}

/**
 * Discard the current configuration and load it again, searching for a
 * config file from `directory` upwards.
 */
function loadFrom(directory: string): Readonly<Record<string, unknown>> {
  reset();
  initializeConfig(directory);
  return configStore;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  loadError = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  getLoadError,
  loadFrom,
  reset,
} as const;

/**
 * Identity helper for typed config files (grammarkit.config.js).
 */
export function defineConfig(cfg: GrammarkitConfig): GrammarkitConfig {
  return cfg;
}
