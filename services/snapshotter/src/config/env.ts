import { ConfigError } from "../errors/snapshotErrors.js";

export const DEFAULT_CONFIG_PATH = "/config/proxmox.json";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = "pretty" | "json";

export interface EnvConfig {
  configPath: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  taskPollIntervalMs: number;
  taskTimeoutMs: number;
  requestTimeoutMs: number;
  otlpEndpoint?: string;
  serviceName: string;
}

export function parseLogLevel(raw: string, name: string): LogLevel {
  const value = raw.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigError(`${name} must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsePositiveInt = (raw: string | undefined, name: string, fallback: number) => {
    const n = Number(raw ?? String(fallback));
    if (!Number.isFinite(n) || n <= 0) {
      throw new ConfigError(`${name} must be a positive number`);
    }
    return Math.floor(n);
  };

  const configPath = (env.PROXMOX_CONFIG_PATH ?? "").trim() || DEFAULT_CONFIG_PATH;

  const logLevel = parseLogLevel(env.LOG_LEVEL ?? "info", "LOG_LEVEL");

  const logFormatRaw = (env.LOG_FORMAT ?? "pretty").toLowerCase();
  const logFormat = logFormatRaw === "pretty" || logFormatRaw === "json" ? logFormatRaw : null;
  if (!logFormat) {
    throw new ConfigError("LOG_FORMAT must be one of: pretty, json");
  }

  const taskPollIntervalMs = parsePositiveInt(env.TASK_POLL_INTERVAL_MS, "TASK_POLL_INTERVAL_MS", 2_000);
  const taskTimeoutMs = parsePositiveInt(env.TASK_TIMEOUT_MS, "TASK_TIMEOUT_MS", 120_000);
  if (taskPollIntervalMs > taskTimeoutMs) {
    throw new ConfigError("TASK_POLL_INTERVAL_MS must not exceed TASK_TIMEOUT_MS");
  }

  const otlpEndpoint = (env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "").trim() || undefined;

  return {
    configPath,
    logLevel,
    logFormat,
    taskPollIntervalMs,
    taskTimeoutMs,
    requestTimeoutMs: parsePositiveInt(env.REQUEST_TIMEOUT_MS, "REQUEST_TIMEOUT_MS", 30_000),
    otlpEndpoint,
    serviceName: env.OTEL_SERVICE_NAME ?? "pre-deploy-snapshot"
  };
}
