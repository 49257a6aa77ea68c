/**
 * Configuration for stepline.
 *
 * Loads and validates config from ~/.stepline/config.yaml. The state
 * directory can be moved with STEPLINE_HOME or STEPLINE_STATE_DIR.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { isLogLevel, LOG_LEVELS } from "../shared/types.js";
import type { LogLevel } from "../shared/types.js";

const STATE_DIRNAME = ".stepline";
const CONFIG_FILENAME = "config.yaml";
const LOGS_DIRNAME = "logs";

export interface SteplineConfig {
  logLevel: LogLevel;
  /** Directory for JSON log files. */
  logDir: string;
  fileLogging: boolean;
  /** Global default settings, layered under each definition's settings. */
  settings: Record<string, unknown>;
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STEPLINE_HOME?.trim();
  if (override) {
    if (override.includes("..")) {
      throw new Error(
        `Invalid STEPLINE_HOME path '${override}': path must not contain '..' traversal segments`,
      );
    }
    if (!path.isAbsolute(override)) {
      throw new Error(`Invalid STEPLINE_HOME path '${override}': path must be absolute`);
    }
    return path.resolve(override);
  }
  return os.homedir();
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STEPLINE_STATE_DIR?.trim();
  if (override) {
    return path.resolve(override);
  }
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

export function resolveConfigPath(stateDir: string = resolveStateDir()): string {
  return path.join(stateDir, CONFIG_FILENAME);
}

export function defaultConfig(stateDir: string): SteplineConfig {
  return {
    logLevel: "info",
    logDir: path.join(stateDir, LOGS_DIRNAME),
    fileLogging: true,
    settings: {},
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load `<stateDir>/config.yaml`. A missing or empty file yields defaults.
 *
 * @throws ConfigError for unparseable YAML or invalid values.
 */
export function loadConfig(stateDir: string = resolveStateDir()): SteplineConfig {
  const configPath = resolveConfigPath(stateDir);
  const config = defaultConfig(stateDir);
  if (!fs.existsSync(configPath)) {
    return config;
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, "utf-8"));
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, `Config ${configPath} is not valid YAML: ${msg}`);
  }
  if (raw === null || raw === undefined) {
    return config;
  }
  if (!isRecord(raw)) {
    throw new ConfigError(configPath, `Config ${configPath} must be a mapping`);
  }

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(
        configPath,
        `Config ${configPath} has invalid "logLevel". Must be one of: ${LOG_LEVELS.join(", ")}`,
      );
    }
    config.logLevel = raw.logLevel;
  }
  if (raw.logDir !== undefined) {
    if (typeof raw.logDir !== "string" || raw.logDir.trim() === "") {
      throw new ConfigError(configPath, `Config ${configPath} has invalid "logDir". Must be a string`);
    }
    config.logDir = path.resolve(stateDir, raw.logDir);
  }
  if (raw.fileLogging !== undefined) {
    if (typeof raw.fileLogging !== "boolean") {
      throw new ConfigError(
        configPath,
        `Config ${configPath} has invalid "fileLogging". Must be a boolean`,
      );
    }
    config.fileLogging = raw.fileLogging;
  }
  if (raw.settings !== undefined && raw.settings !== null) {
    if (!isRecord(raw.settings)) {
      throw new ConfigError(configPath, `Config ${configPath} has invalid "settings". Must be a mapping`);
    }
    config.settings = raw.settings;
  }

  return config;
}
