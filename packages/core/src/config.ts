/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for pullseq packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PULLSEQ_* (for CI overrides)
 * 3. Config files: pullseq.config.js, .pullseqrc, "pullseq" key in package.json
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@pullseq/core";
 *
 * config.get("debug")            // → boolean
 * config.get("contracts.mode")   // → "full" | "warn" | "none"
 *
 * config.set({ contracts: { mode: "none" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * How pipeline assembly reacts to a callback that breaks its stage contract:
 * - "full": throw a SequenceContractError (default)
 * - "warn": log a warning and keep assembling
 * - "none": skip callback checks entirely
 */
export type ContractsMode = "full" | "warn" | "none";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface ContractsConfig {
  mode?: ContractsMode;
}

export interface LogConfig {
  /** Lowest level that reaches the console */
  level?: LogLevel;
}

/**
 * Full pullseq configuration schema.
 */
export interface PullseqConfig {
  /** Enable debug mode; lowers the log threshold to "debug" */
  debug?: boolean;
  contracts?: ContractsConfig;
  log?: LogConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

const CONTRACTS_MODES: readonly ContractsMode[] = ["full", "warn", "none"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "PULLSEQ_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with PULLSEQ_ are parsed into the config object.
 *
 * Examples:
 *   PULLSEQ_DEBUG=1                → { debug: true }
 *   PULLSEQ_CONTRACTS_MODE=none    → { contracts: { mode: "none" } }
 *   PULLSEQ_LOG_LEVEL=warn         → { log: { level: "warn" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
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

    if (sourceValue === undefined) continue;

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

const MODULE_NAME = "pullseq";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search the working directory's standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    // The logger reads this store, so report through the console directly.
    console.warn(`[${MODULE_NAME}:config] ignoring unreadable config file:`, error);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): PullseqConfig {
  return {
    debug: false,
    contracts: { mode: "full" },
    log: { level: "warn" },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
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
 * Set configuration values programmatically.
 */
function set(values: Partial<PullseqConfig>): void {
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
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed accessors
// ============================================================================

/** Configured contract mode; unknown values fall back to "full". */
export function getContractsMode(): ContractsMode {
  const mode = get("contracts.mode");
  return CONTRACTS_MODES.find((m) => m === mode) ?? "full";
}

/** Effective log threshold. `debug: true` forces "debug". */
export function getLogLevel(): LogLevel {
  if (get("debug") === true) return "debug";
  const level = get("log.level");
  return LOG_LEVELS.find((l) => l === level) ?? "warn";
}

/** Identity helper that types a config file's default export. */
export function defineConfig(value: PullseqConfig): PullseqConfig {
  return value;
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
  reset,
} as const;

/** @internal exposed for tests */
export const __testing = { loadConfigFromEnv, deepMerge } as const;
