/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: FUZZGRAPH_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@fuzzgraph/core";
 *
 * config.get("debug")                      // → boolean
 * config.get("defaults.directed")          // → boolean
 *
 * config.set({ defaults: { directed: false } });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Defaults applied when a graph is built without explicit options.
 */
export interface GraphDefaultsConfig {
  /** Directedness of graphs constructed without a `directed` flag */
  directed?: boolean;
}

/**
 * Full fuzzgraph configuration schema.
 */
export interface FuzzGraphConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Graph construction defaults */
  defaults?: GraphDefaultsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let programmatic: Record<string, unknown> = {};
let configLoaded = false;

const PREFIX = "FUZZGRAPH_";

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   FUZZGRAPH_DEBUG=1                 → { debug: true }
 *   FUZZGRAPH_DEFAULTS_DIRECTED=false → { defaults: { directed: false } }
 */
function loadConfigFromEnv(): FuzzGraphConfig {
  const envConfig: FuzzGraphConfig = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
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
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
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
    if (!isRecord(current)) return undefined;
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
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: FuzzGraphConfig = {
  debug: false,
  defaults: {
    directed: true,
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < programmatic < env
  configStore = deepMerge(deepMerge(DEFAULTS, programmatic), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Get a boolean configuration value, falling back when unset or mistyped.
 */
function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

/**
 * Set configuration values programmatically. Environment variables still
 * take precedence.
 */
function set(values: FuzzGraphConfig): void {
  programmatic = deepMerge(programmatic, values);
  configLoaded = false;
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Reset configuration to defaults (mainly for testing). The environment is
 * re-read on next access.
 */
function reset(): void {
  configStore = {};
  programmatic = {};
  configLoaded = false;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getBoolean,
  set,
  has,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration objects.
 */
export function defineConfig(cfg: FuzzGraphConfig): FuzzGraphConfig {
  return cfg;
}
