/**
 * Configuration management for CLI
 *
 * Loads ~/.kubeimportrc and project .kubeimportrc files
 */
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import YAML from "yaml";
import { isLogLevel, type LogLevel } from "./logger.js";

/**
 * kubeimport CLI configuration
 */
export interface KubeimportConfig {
  /** API server base URL */
  server?: string;
  /** Bearer token sent to the API server */
  token?: string;
  /** YAML document with the per-type schemas */
  schemaFile?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Log level */
  logLevel?: LogLevel;
  /** Enable color output */
  color?: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Readonly<KubeimportConfig> = {
  timeoutMs: 30_000,
  logLevel: "info",
  color: true,
};

/**
 * Default config file name
 */
export const CONFIG_FILE_NAME = ".kubeimportrc";

/**
 * Invalid configuration file or value
 */
export class ConfigError extends Error {
  readonly source?: string;

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.source = options.source;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Get the global config file path (~/.kubeimportrc)
 */
export function getGlobalConfigPath(): string {
  return join(homedir(), CONFIG_FILE_NAME);
}

/**
 * Get the project config file path
 * Searches from cwd upward to find .kubeimportrc
 */
export function getProjectConfigPath(startDir?: string): string | undefined {
  let currentDir = startDir ?? process.cwd();
  const root = resolve("/");

  while (currentDir !== root) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses a timeout given as number or numeric string
 */
export function parseTimeoutMs(value: unknown, source?: string): number {
  const parsed = typeof value === "string" && /^\d+$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`timeoutMs must be a positive integer, got ${JSON.stringify(value)}`, {
      source,
    });
  }
  return parsed;
}

/**
 * Parse config file content (supports YAML and JSON)
 */
export function parseConfigContent(content: string, source?: string): KubeimportConfig {
  let parsed: unknown;
  try {
    // YAML also handles JSON
    parsed = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(`invalid configuration syntax${source ? ` in ${source}` : ""}`, {
      source,
      cause: err,
    });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("Configuration must be an object", { source });
  }

  const config: KubeimportConfig = {};
  for (const key of ["server", "token", "schemaFile"] as const) {
    const value = parsed[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      throw new ConfigError(`${key} must be a string`, { source });
    }
    config[key] = value;
  }

  if (parsed["timeoutMs"] !== undefined) {
    config.timeoutMs = parseTimeoutMs(parsed["timeoutMs"], source);
  }

  const logLevel = parsed["logLevel"];
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError("logLevel must be one of debug, info, warn, error", { source });
    }
    config.logLevel = logLevel;
  }

  const color = parsed["color"];
  if (color !== undefined) {
    if (typeof color !== "boolean") {
      throw new ConfigError("color must be a boolean", { source });
    }
    config.color = color;
  }

  // A relative schema file is relative to the file naming it
  if (config.schemaFile && source) {
    const expanded = expandPath(config.schemaFile);
    config.schemaFile = isAbsolute(expanded) ? expanded : resolve(dirname(source), expanded);
  }

  return config;
}

/**
 * Load configuration from a file
 */
export async function loadConfigFile(
  filePath: string
): Promise<KubeimportConfig | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    // Check if error has a code property
    if (
      err !== null &&
      typeof err === "object" &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      return undefined;
    }
    throw new ConfigError(`cannot read configuration file ${filePath}`, {
      source: filePath,
      cause: err,
    });
  }
  return parseConfigContent(content, filePath);
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandPath(inputPath: string): string {
  if (inputPath.startsWith("~/")) {
    return join(homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return homedir();
  }
  return inputPath;
}

/**
 * Merge multiple configs with priority (later configs override earlier)
 */
export function mergeConfigs(...configs: (KubeimportConfig | undefined)[]): KubeimportConfig {
  const result: KubeimportConfig = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }

    if (config.server !== undefined) result.server = config.server;
    if (config.token !== undefined) result.token = config.token;
    if (config.schemaFile !== undefined) result.schemaFile = config.schemaFile;
    if (config.timeoutMs !== undefined) result.timeoutMs = config.timeoutMs;
    if (config.logLevel !== undefined) result.logLevel = config.logLevel;
    if (config.color !== undefined) result.color = config.color;
  }

  return result;
}

/**
 * Environment variables read by {@link loadConfig}
 */
export interface ConfigEnv {
  KUBEIMPORT_SERVER?: string;
  KUBEIMPORT_TOKEN?: string;
  KUBEIMPORT_SCHEMA_FILE?: string;
  KUBEIMPORT_TIMEOUT_MS?: string;
  KUBEIMPORT_LOG_LEVEL?: string;
  NO_COLOR?: string;
}

/**
 * Configuration load options
 */
export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Global config file path, ~/.kubeimportrc by default */
  globalConfigPath?: string;
  /** Values given as command-line flags */
  cli?: KubeimportConfig;
  /** Environment variable overrides */
  env?: ConfigEnv;
}

/**
 * Build config from environment variables
 */
export function readEnvConfig(env: ConfigEnv): KubeimportConfig {
  const envConfig: KubeimportConfig = {};

  if (env.KUBEIMPORT_SERVER) {
    envConfig.server = env.KUBEIMPORT_SERVER;
  }
  if (env.KUBEIMPORT_TOKEN) {
    envConfig.token = env.KUBEIMPORT_TOKEN;
  }
  if (env.KUBEIMPORT_SCHEMA_FILE) {
    envConfig.schemaFile = env.KUBEIMPORT_SCHEMA_FILE;
  }
  if (env.KUBEIMPORT_TIMEOUT_MS) {
    envConfig.timeoutMs = parseTimeoutMs(env.KUBEIMPORT_TIMEOUT_MS, "KUBEIMPORT_TIMEOUT_MS");
  }
  if (env.KUBEIMPORT_LOG_LEVEL) {
    const level = env.KUBEIMPORT_LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      envConfig.logLevel = level;
    }
  }
  if (env.NO_COLOR) {
    envConfig.color = false;
  }

  return envConfig;
}

/**
 * Load and merge all configuration sources
 *
 * Priority (highest to lowest):
 * 1. CLI options
 * 2. Environment variables
 * 3. Project config (.kubeimportrc in project)
 * 4. Global config (~/.kubeimportrc)
 * 5. Defaults
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<KubeimportConfig> {
  const globalConfig = await loadConfigFile(options.globalConfigPath ?? getGlobalConfigPath());

  const projectConfigPath = options.configPath ?? getProjectConfigPath();
  const projectConfig = projectConfigPath
    ? await loadConfigFile(projectConfigPath)
    : undefined;

  const envConfig = readEnvConfig(options.env ?? process.env);

  // Merge all configs (priority: defaults < global < project < env < cli)
  const merged = mergeConfigs(
    DEFAULT_CONFIG,
    globalConfig,
    projectConfig,
    envConfig,
    options.cli
  );

  // Expand tilde in schemaFile
  if (merged.schemaFile) {
    merged.schemaFile = expandPath(merged.schemaFile);
  }

  return merged;
}
