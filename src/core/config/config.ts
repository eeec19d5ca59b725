// src/core/config/config.ts
// Configuration system for formwork

import * as fs from "fs";
import * as path from "path";
import { ConfigError } from "../errors";

// =========================================================================
// Configuration Types
// =========================================================================

export type RuntimeConfig = {
  /** Dequeue timeout per runtime-loop poll, in milliseconds */
  pollIntervalMs: number;
  /** Upper bound on waiting for the runtime loop to exit on stop */
  stopTimeoutMs: number;
  /** Namespace subtree the runtime overlays */
  mountSource: string;
  /** Where the runtime mounts it */
  mountPoint: string;
};

export type LoggingConfig = {
  /** Print pipeline diagnostics to the console */
  verbose: boolean;
};

export type FormworkConfig = {
  runtime: RuntimeConfig;
  logging: LoggingConfig;
};

export type PartialFormworkConfig = {
  runtime?: Partial<RuntimeConfig>;
  logging?: Partial<LoggingConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  pollIntervalMs: 100,
  stopTimeoutMs: 1000,
  mountSource: "/form",
  mountPoint: "/mnt/app",
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  verbose: false,
};

export const DEFAULT_CONFIG: FormworkConfig = {
  runtime: DEFAULT_RUNTIME_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

export const DEFAULT_CONFIG_FILES = [
  "formwork.config.json",
  "formwork.config.yaml",
  "formwork.config.yml",
];

// =========================================================================
// Value coercion
// =========================================================================

function intOr(raw: unknown, fallback: number): number {
  if (typeof raw === "number" && Number.isFinite(raw)) return Math.trunc(raw);
  if (typeof raw === "string" && /^-?\d+$/.test(raw.trim())) return parseInt(raw, 10);
  return fallback;
}

function boolOr(raw: unknown, fallback: boolean): boolean {
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "string") {
    const v = raw.trim().toLowerCase();
    if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
    if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  }
  return fallback;
}

function stringOr(raw: unknown, fallback: string): string {
  return typeof raw === "string" && raw.length > 0 ? raw : fallback;
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const v = data[key];
  return isRecord(v) ? v : {};
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "FORMWORK", env: NodeJS.ProcessEnv = process.env): FormworkConfig {
  return {
    runtime: {
      pollIntervalMs: intOr(env[`${prefix}_POLL_INTERVAL_MS`], DEFAULT_RUNTIME_CONFIG.pollIntervalMs),
      stopTimeoutMs: intOr(env[`${prefix}_STOP_TIMEOUT_MS`], DEFAULT_RUNTIME_CONFIG.stopTimeoutMs),
      mountSource: stringOr(env[`${prefix}_MOUNT_SOURCE`], DEFAULT_RUNTIME_CONFIG.mountSource),
      mountPoint: stringOr(env[`${prefix}_MOUNT_POINT`], DEFAULT_RUNTIME_CONFIG.mountPoint),
    },
    logging: {
      verbose: boolOr(env[`${prefix}_VERBOSE`], DEFAULT_LOGGING_CONFIG.verbose),
    },
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialFormworkConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Invalid JSON in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Partial configuration from a plain object (e.g., parsed JSON/YAML).
 * Accepts camelCase and snake_case keys; only keys present are returned.
 */
export function configFromObject(data: Record<string, unknown>): PartialFormworkConfig {
  const runtimeData = section(data, "runtime");
  const loggingData = section(data, "logging");

  const pick = (src: Record<string, unknown>, camel: string, snake: string): unknown =>
    src[camel] !== undefined ? src[camel] : src[snake];

  const runtime: Partial<RuntimeConfig> = {};
  const poll = pick(runtimeData, "pollIntervalMs", "poll_interval_ms");
  if (poll !== undefined) runtime.pollIntervalMs = intOr(poll, DEFAULT_RUNTIME_CONFIG.pollIntervalMs);
  const stop = pick(runtimeData, "stopTimeoutMs", "stop_timeout_ms");
  if (stop !== undefined) runtime.stopTimeoutMs = intOr(stop, DEFAULT_RUNTIME_CONFIG.stopTimeoutMs);
  const mountSource = pick(runtimeData, "mountSource", "mount_source");
  if (mountSource !== undefined) runtime.mountSource = stringOr(mountSource, DEFAULT_RUNTIME_CONFIG.mountSource);
  const mountPoint = pick(runtimeData, "mountPoint", "mount_point");
  if (mountPoint !== undefined) runtime.mountPoint = stringOr(mountPoint, DEFAULT_RUNTIME_CONFIG.mountPoint);

  const logging: Partial<LoggingConfig> = {};
  if (loggingData.verbose !== undefined) logging.verbose = boolOr(loggingData.verbose, DEFAULT_LOGGING_CONFIG.verbose);

  return { runtime, logging };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: FormworkConfig, ...configs: PartialFormworkConfig[]): FormworkConfig {
  let result: FormworkConfig = { runtime: { ...base.runtime }, logging: { ...base.logging } };

  for (const cfg of configs) {
    const r: Partial<RuntimeConfig> = cfg.runtime ?? {};
    result = {
      runtime: {
        pollIntervalMs: r.pollIntervalMs ?? result.runtime.pollIntervalMs,
        stopTimeoutMs: r.stopTimeoutMs ?? result.runtime.stopTimeoutMs,
        mountSource: r.mountSource ?? result.runtime.mountSource,
        mountPoint: r.mountPoint ?? result.runtime.mountPoint,
      },
      logging: {
        verbose: cfg.logging?.verbose ?? result.logging.verbose,
      },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 * Throws `ConfigError` when the merged result is invalid.
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialFormworkConfig;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): FormworkConfig {
  let config = configFromEnv("FORMWORK", options?.env ?? process.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return assertValidConfig(config);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    let top = stack[stack.length - 1];
    while (stack.length > 1 && top && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    if (!top) continue;
    const parent = top.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: FormworkConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { runtime } = config;

  if (runtime.pollIntervalMs < 1) {
    errors.push("pollIntervalMs must be at least 1");
  }
  if (runtime.stopTimeoutMs < 1) {
    errors.push("stopTimeoutMs must be at least 1");
  }
  if (!runtime.mountSource.startsWith("/")) {
    errors.push(`mountSource must be absolute: ${runtime.mountSource}`);
  }
  if (!runtime.mountPoint.startsWith("/")) {
    errors.push(`mountPoint must be absolute: ${runtime.mountPoint}`);
  }
  if (runtime.stopTimeoutMs < runtime.pollIntervalMs) {
    warnings.push("stopTimeoutMs is shorter than pollIntervalMs; stop may report a timeout while a poll is pending");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/** Throwing variant of `validateConfig`. */
export function assertValidConfig(config: FormworkConfig): FormworkConfig {
  const v = validateConfig(config);
  if (!v.valid) throw new ConfigError(`Invalid configuration: ${v.errors.join("; ")}`, v.errors);
  return config;
}
