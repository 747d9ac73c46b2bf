/**
 * CLI configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Command-line flags (applied by the caller, see `applyOverrides`)
 * 2. Environment variables: COMBJSON_* (for CI overrides)
 * 3. Config files: package.json#combjson, .combjsonrc, .combjsonrc.json, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * const { config } = loadConfig({ cwd: process.cwd(), env: process.env });
 * config.maxDepth   // → 1000
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { DEFAULT_MAX_DEPTH } from "@combjson/json";
import type { LeadingZeros } from "@combjson/json";

// ============================================================================
// Types
// ============================================================================

export type OutputFormat = "json" | "debug";

export interface CombjsonConfig {
  /** Log progress to stderr */
  debug: boolean;
  /** Deepest nesting of arrays and objects accepted */
  maxDepth: number;
  /** Leading-zero policy for numbers */
  leadingZeros: LeadingZeros;
  /** `json` = compact JSON, `debug` = indented value tree */
  format: OutputFormat;
}

export interface LoadedConfig {
  config: CombjsonConfig;
  /** Path of the config file that was found, if any. */
  filepath?: string;
}

export const DEFAULT_CONFIG: Readonly<CombjsonConfig> = {
  debug: false,
  maxDepth: DEFAULT_MAX_DEPTH,
  leadingZeros: "reject",
  format: "json",
};

/** A configuration source held a value of the wrong shape. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const MODULE_NAME = "combjson";
const ENV_PREFIX = "COMBJSON_";

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
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

/** `MAX_DEPTH` → `maxDepth` */
function camelCase(segment: string): string {
  return segment
    .toLowerCase()
    .split("_")
    .filter((part) => part !== "")
    .map((part, i) => (i === 0 ? part : part[0].toUpperCase() + part.slice(1)))
    .join("");
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Read COMBJSON_* variables into a config object. A single underscore joins
 * the words of a camelCase key, a double underscore nests.
 *
 * Examples:
 *   COMBJSON_DEBUG=1                    → { debug: true }
 *   COMBJSON_MAX_DEPTH=64               → { maxDepth: 64 }
 *   COMBJSON_NUMBERS__LEADING_ZEROS=x   → { numbers: { leadingZeros: "x" } }
 */
export function envToConfig(env: Readonly<Record<string, string | undefined>>): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const path = key.slice(ENV_PREFIX.length).split("__").map(camelCase);

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

    let current = envConfig;
    for (const part of path.slice(0, -1)) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    current[path[path.length - 1]] = parsedValue;
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

function loadConfigFromFiles(cwd: string): { config: Record<string, unknown>; filepath?: string } {
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

  let result: { config: unknown; filepath: string; isEmpty?: boolean } | null;
  try {
    result = explorer.search(cwd);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load config file: ${reason}`);
  }
  if (result === null || result.isEmpty) return { config: {} };

  const config: unknown = result.config;
  if (!isRecord(config)) {
    throw new ConfigError(`Config in ${result.filepath} must be an object`);
  }
  return { config, filepath: result.filepath };
}

// ============================================================================
// Validation
// ============================================================================

function show(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

function validate(raw: Record<string, unknown>): CombjsonConfig {
  const { debug, maxDepth, leadingZeros, format } = raw;

  if (typeof debug !== "boolean") {
    throw new ConfigError(`Invalid config value for debug: ${show(debug)} (expected a boolean)`);
  }
  if (typeof maxDepth !== "number" || !Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new ConfigError(
      `Invalid config value for maxDepth: ${show(maxDepth)} (expected a non-negative integer)`
    );
  }
  if (leadingZeros !== "reject" && leadingZeros !== "allow") {
    throw new ConfigError(
      `Invalid config value for leadingZeros: ${show(leadingZeros)} (expected "reject" or "allow")`
    );
  }
  if (format !== "json" && format !== "debug") {
    throw new ConfigError(
      `Invalid config value for format: ${show(format)} (expected "json" or "debug")`
    );
  }

  return { debug, maxDepth, leadingZeros, format };
}

// ============================================================================
// Public API
// ============================================================================

export interface LoadConfigOptions {
  /** Directory searched for a config file. */
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
}

/**
 * Merge defaults < config file < environment and validate the result.
 */
export function loadConfig({ cwd, env }: LoadConfigOptions): LoadedConfig {
  const file = loadConfigFromFiles(cwd);
  const merged = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, file.config), envToConfig(env));
  return { config: validate(merged), filepath: file.filepath };
}

/** Apply command-line overrides on top of a loaded configuration. */
export function applyOverrides(
  config: CombjsonConfig,
  overrides: Partial<CombjsonConfig>
): CombjsonConfig {
  return {
    debug: overrides.debug ?? config.debug,
    maxDepth: overrides.maxDepth ?? config.maxDepth,
    leadingZeros: overrides.leadingZeros ?? config.leadingZeros,
    format: overrides.format ?? config.format,
  };
}
