import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { AppConfig } from "./types.js";
import type { Logger } from "./logger.js";
import { isLogLevel } from "./logger.js";
import { isRecord } from "./guards.js";
import { parseVersion, DEFAULT_MIN_INLINE_VERSION } from "./sync/capability.js";

export interface ConfigError {
  field: string;
  message: string;
  severity: "error" | "warning";
}

const DEFAULT_API_BASE_URL = "https://gitlab.com/api/v4";

export function validateConfig(config: AppConfig): ConfigError[] {
  const errors: ConfigError[] = [];

  // Credentials
  if (!config.gitlab.token) {
    errors.push({ field: "gitlab.token", message: "Required (set gitlab.token or GITLAB_TOKEN)", severity: "error" });
  }

  // glab takes a bare hostname
  if (config.gitlab.host.includes(":")) {
    errors.push({ field: "gitlab.host", message: `Port number included in "${config.gitlab.host}"`, severity: "error" });
  }
  try {
    new URL(config.gitlab.apiBaseUrl);
  } catch {
    errors.push({ field: "gitlab.apiBaseUrl", message: `Invalid URL: "${config.gitlab.apiBaseUrl}"`, severity: "error" });
  }
  if (config.gitlab.cliTimeoutMs < 1_000) {
    errors.push({ field: "gitlab.cliTimeoutMs", message: "Must be >= 1000 (1s)", severity: "error" });
  }

  if (!/^[A-Za-z0-9_.-]+$/.test(config.sync.dangerId)) {
    errors.push({ field: "sync.dangerId", message: "Must contain only letters, digits, '.', '_' or '-'", severity: "error" });
  }
  if (!parseVersion(config.sync.minInlineVersion)) {
    errors.push({ field: "sync.minInlineVersion", message: `Not a version: "${config.sync.minInlineVersion}"`, severity: "error" });
  }
  if (config.sync.newComment && config.sync.removePreviousComments) {
    errors.push({ field: "sync.newComment", message: "Redundant with removePreviousComments", severity: "warning" });
  }

  if (config.history.enabled && config.history.retentionDays < 1) {
    errors.push({ field: "history.retentionDays", message: "Must be >= 1", severity: "warning" });
  }

  return errors;
}

const DEFAULTS: AppConfig = {
  logLevel: "info",
  gitlab: { token: "", apiBaseUrl: DEFAULT_API_BASE_URL, host: "", cliTimeoutMs: 60_000 },
  sync: {
    dangerId: "danger",
    newComment: false,
    removePreviousComments: false,
    dryRun: false,
    minInlineVersion: DEFAULT_MIN_INLINE_VERSION,
  },
  history: { enabled: false, dbPath: "data/history.db", retentionDays: 90 },
  metrics: { textfilePath: "" },
};

type Section = Record<string, unknown>;

function sectionOf(file: Section, key: string): Section {
  const value = file[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) throw new Error(`Invalid config: ${key} must be a mapping`);
  return value;
}

function str(section: Section, name: string, key: string, fallback: string): string {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") throw new Error(`Invalid config: ${name}.${key} must be a string`);
  return value;
}

function num(section: Section, name: string, key: string, fallback: number): number {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || Number.isNaN(value)) throw new Error(`Invalid config: ${name}.${key} must be a number`);
  return value;
}

function bool(section: Section, name: string, key: string, fallback: boolean): boolean {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") throw new Error(`Invalid config: ${name}.${key} must be true or false`);
  return value;
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return "";
  }
}

function envFlag(value: string): boolean {
  return value === "true" || value === "1";
}

export function loadConfig(path: string = "config.yaml", logger?: Logger): AppConfig {
  let fileConfig: Section = {};

  try {
    const parsed: unknown = parse(readFileSync(path, "utf-8"));
    if (isRecord(parsed)) {
      fileConfig = parsed;
    } else if (parsed !== null && parsed !== undefined) {
      throw new Error(`Config file ${path} must contain a mapping at the top level`);
    }
  } catch (err) {
    if (!(err instanceof Error) || !("code" in err) || err.code !== "ENOENT") {
      throw err;
    }
    logger?.debug("Config file not found, using defaults + env vars", { path });
  }

  const gitlab = sectionOf(fileConfig, "gitlab");
  const sync = sectionOf(fileConfig, "sync");
  const history = sectionOf(fileConfig, "history");
  const metrics = sectionOf(fileConfig, "metrics");
  const d = DEFAULTS;

  const config: AppConfig = {
    logLevel: isLogLevel(fileConfig.logLevel) ? fileConfig.logLevel : d.logLevel,
    gitlab: {
      token: str(gitlab, "gitlab", "token", d.gitlab.token),
      apiBaseUrl: str(gitlab, "gitlab", "apiBaseUrl", d.gitlab.apiBaseUrl),
      host: str(gitlab, "gitlab", "host", d.gitlab.host),
      cliTimeoutMs: num(gitlab, "gitlab", "cliTimeoutMs", d.gitlab.cliTimeoutMs),
    },
    sync: {
      dangerId: str(sync, "sync", "dangerId", d.sync.dangerId),
      newComment: bool(sync, "sync", "newComment", d.sync.newComment),
      removePreviousComments: bool(sync, "sync", "removePreviousComments", d.sync.removePreviousComments),
      dryRun: bool(sync, "sync", "dryRun", d.sync.dryRun),
      minInlineVersion: str(sync, "sync", "minInlineVersion", d.sync.minInlineVersion),
    },
    history: {
      enabled: bool(history, "history", "enabled", d.history.enabled),
      dbPath: str(history, "history", "dbPath", d.history.dbPath),
      retentionDays: num(history, "history", "retentionDays", d.history.retentionDays),
    },
    metrics: {
      textfilePath: str(metrics, "metrics", "textfilePath", d.metrics.textfilePath),
    },
  };

  // Environment variable overrides
  const env = process.env;
  if (env.GITLAB_TOKEN) {
    config.gitlab.token = env.GITLAB_TOKEN;
  }
  if (env.GITLAB_API_BASE_URL) {
    config.gitlab.apiBaseUrl = env.GITLAB_API_BASE_URL;
  } else if (env.CI_API_V4_URL && config.gitlab.apiBaseUrl === DEFAULT_API_BASE_URL) {
    config.gitlab.apiBaseUrl = env.CI_API_V4_URL;
  }
  if (env.GITLAB_HOST) {
    config.gitlab.host = env.GITLAB_HOST;
  }
  if (!config.gitlab.host) {
    config.gitlab.host = hostOf(config.gitlab.apiBaseUrl) || "gitlab.com";
  }
  if (env.DANGER_ID) {
    config.sync.dangerId = env.DANGER_ID;
  }
  if (env.DRY_RUN) {
    config.sync.dryRun = envFlag(env.DRY_RUN);
  }
  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new Error(`Invalid LOG_LEVEL: "${env.LOG_LEVEL}". Must be one of: debug, info, warn, error`);
    }
    config.logLevel = env.LOG_LEVEL;
  }

  const validationErrors = validateConfig(config);
  const fatalErrors = validationErrors.filter((e) => e.severity === "error");
  const warnings = validationErrors.filter((e) => e.severity === "warning");

  for (const w of warnings) {
    logger?.warn(`Config warning: ${w.field}: ${w.message}`);
  }
  if (fatalErrors.length > 0) {
    const details = fatalErrors.map((e) => `  ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return config;
}
