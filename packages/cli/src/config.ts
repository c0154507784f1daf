import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";

/**
 * Global CLI options that apply to all commands.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
}

/**
 * Configuration for the estimate command.
 */
export interface EstimateConfig {
  "chars-per-token"?: number;
}

/**
 * Configuration for the chunk command.
 */
export interface ChunkConfig {
  "max-tokens"?: number;
}

/**
 * Configuration for the condense command.
 */
export interface CondenseConfig {
  "target-tokens"?: number;
  "truncate-chars-per-token"?: number;
  "hard-chars-per-token"?: number;
  quiet?: boolean;
}

/**
 * Configuration for the assemble command.
 */
export interface AssembleConfig {
  "max-tokens"?: number;
  priority?: string[];
  critical?: string[];
  quiet?: boolean;
}

/**
 * Root configuration structure matching ~/.promptfit/cli.toml.
 */
export interface CLIConfig {
  global?: GlobalConfig;
  estimate?: EstimateConfig;
  chunk?: ChunkConfig;
  condense?: CondenseConfig;
  assemble?: AssembleConfig;
}

const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);
const ESTIMATE_CONFIG_KEYS = new Set(["chars-per-token"]);
const CHUNK_CONFIG_KEYS = new Set(["max-tokens"]);
const CONDENSE_CONFIG_KEYS = new Set([
  "target-tokens",
  "truncate-chars-per-token",
  "hard-chars-per-token",
  "quiet",
]);
const ASSEMBLE_CONFIG_KEYS = new Set(["max-tokens", "priority", "critical", "quiet"]);

/**
 * Returns the default config file path: ~/.promptfit/cli.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".promptfit", "cli.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a section is a table with no unknown keys.
 */
function validateTable(
  raw: unknown,
  section: string,
  allowed: ReadonlySet<string>,
): Record<string, unknown> {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
  return raw;
}

/**
 * Validates that a value is a string.
 */
function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

/**
 * Validates that a value is a number within optional bounds.
 */
function validateNumber(
  value: unknown,
  key: string,
  section: string,
  opts?: { min?: number; max?: number; integer?: boolean; exclusiveMin?: boolean },
): number {
  if (typeof value !== "number") {
    throw new ConfigError(`[${section}].${key} must be a number`);
  }
  if (opts?.integer && !Number.isInteger(value)) {
    throw new ConfigError(`[${section}].${key} must be an integer`);
  }
  if (opts?.min !== undefined) {
    if (opts.exclusiveMin ? value <= opts.min : value < opts.min) {
      throw new ConfigError(`[${section}].${key} must be ${opts.exclusiveMin ? ">" : ">="} ${opts.min}`);
    }
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new ConfigError(`[${section}].${key} must be <= ${opts.max}`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 */
function validateBoolean(value: unknown, key: string, section: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`[${section}].${key} must be a boolean`);
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 */
function validateStringArray(value: unknown, key: string, section: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`[${section}].${key} must be an array`);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== "string") {
      throw new ConfigError(`[${section}].${key}[${i}] must be a string`);
    }
    result.push(item);
  }
  return result;
}

function isLogLevel(value: string): value is CLILogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  const rawObj = validateTable(raw, section, GLOBAL_CONFIG_KEYS);
  const result: GlobalConfig = {};

  if ("log-level" in rawObj) {
    const level = validateString(rawObj["log-level"], "log-level", section).toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`[${section}].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    result["log-level"] = level;
  }

  return result;
}

function validateEstimateConfig(raw: unknown, section: string): EstimateConfig {
  const rawObj = validateTable(raw, section, ESTIMATE_CONFIG_KEYS);
  const result: EstimateConfig = {};

  if ("chars-per-token" in rawObj) {
    result["chars-per-token"] = validateNumber(rawObj["chars-per-token"], "chars-per-token", section, {
      min: 0,
      exclusiveMin: true,
    });
  }

  return result;
}

function validateChunkConfig(raw: unknown, section: string): ChunkConfig {
  const rawObj = validateTable(raw, section, CHUNK_CONFIG_KEYS);
  const result: ChunkConfig = {};

  if ("max-tokens" in rawObj) {
    result["max-tokens"] = validateNumber(rawObj["max-tokens"], "max-tokens", section, {
      integer: true,
      min: 1,
    });
  }

  return result;
}

function validateCondenseConfig(raw: unknown, section: string): CondenseConfig {
  const rawObj = validateTable(raw, section, CONDENSE_CONFIG_KEYS);
  const result: CondenseConfig = {};

  if ("target-tokens" in rawObj) {
    result["target-tokens"] = validateNumber(rawObj["target-tokens"], "target-tokens", section, {
      integer: true,
      min: 1,
    });
  }
  for (const key of ["truncate-chars-per-token", "hard-chars-per-token"] as const) {
    if (key in rawObj) {
      result[key] = validateNumber(rawObj[key], key, section, { min: 0, exclusiveMin: true });
    }
  }
  if ("quiet" in rawObj) {
    result.quiet = validateBoolean(rawObj.quiet, "quiet", section);
  }

  return result;
}

function validateAssembleConfig(raw: unknown, section: string): AssembleConfig {
  const rawObj = validateTable(raw, section, ASSEMBLE_CONFIG_KEYS);
  const result: AssembleConfig = {};

  if ("max-tokens" in rawObj) {
    result["max-tokens"] = validateNumber(rawObj["max-tokens"], "max-tokens", section, {
      integer: true,
      min: 0,
    });
  }
  if ("priority" in rawObj) {
    result.priority = validateStringArray(rawObj.priority, "priority", section);
  }
  if ("critical" in rawObj) {
    result.critical = validateStringArray(rawObj.critical, "critical", section);
  }
  if ("quiet" in rawObj) {
    result.quiet = validateBoolean(rawObj.quiet, "quiet", section);
  }

  return result;
}

/**
 * Validates and normalizes raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value, key);
      } else if (key === "estimate") {
        result.estimate = validateEstimateConfig(value, key);
      } else if (key === "chunk") {
        result.chunk = validateChunkConfig(value, key);
      } else if (key === "condense") {
        result.condense = validateCondenseConfig(value, key);
      } else if (key === "assemble") {
        result.assemble = validateAssembleConfig(value, key);
      } else {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Loads configuration from `configPath` (default ~/.promptfit/cli.toml).
 * Returns empty config if file doesn't exist.
 *
 * @throws ConfigError if file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
