// config.ts
// Defaults, environment overrides and the shared pino logger.

import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export interface PipelineConfig {
  logLevel: LogLevel;
  networkName: string;
  frameIntervalMs: number;
}

export const DEFAULT_CONFIG: PipelineConfig = {
  logLevel: "info",
  networkName: "processing-network",
  frameIntervalMs: 16,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads `PIPELINE_LOG_LEVEL`, `PIPELINE_NETWORK_NAME` and
 * `PIPELINE_FRAME_INTERVAL_MS`. Unknown or malformed values fall back to the
 * defaults.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  const config = { ...DEFAULT_CONFIG };

  const level = env.PIPELINE_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  }

  const name = env.PIPELINE_NETWORK_NAME?.trim();
  if (name) {
    config.networkName = name;
  }

  const interval = Number(env.PIPELINE_FRAME_INTERVAL_MS);
  if (Number.isFinite(interval) && interval > 0) {
    config.frameIntervalMs = Math.floor(interval);
  }

  return config;
}

let defaultLogger: pino.Logger | null = null;

export function createLogger(options: { level?: LogLevel; name?: string } = {}): pino.Logger {
  const config = loadConfig();
  return pino({
    name: options.name ?? config.networkName,
    level: options.level ?? config.logLevel,
  });
}

// Shared fallback for components constructed without a logger.
export function getDefaultLogger(): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
