import { defaultProtocol, type Protocol } from "../protocol/mod.ts";
import { createLogger, isLogger } from "./logger.ts";
import type { Logger, LoggerConfig, LogLevel, RestConfig } from "./types.ts";

const LEVELS: ReadonlySet<string> = new Set<LogLevel>([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
]);

export interface ResolvedConfig {
  prefix: string;
  protocol: Protocol;
  logger: Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.has(value);
}

/**
 * Logger options taken from `RIVET_LOG_LEVEL` and `RIVET_LOG_FORMAT`.
 * Unknown values are ignored.
 */
export function loggerConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): LoggerConfig {
  const config: LoggerConfig = {};
  const level = env.RIVET_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.level = level;
  }
  const format = env.RIVET_LOG_FORMAT?.trim().toLowerCase();
  if (format === "json") config.json = true;
  if (format === "pretty") config.json = false;
  return config;
}

/**
 * Fill in defaults for a {@link RestConfig}.
 *
 * Explicit options win over the environment.
 */
export function resolveConfig(
  config: RestConfig = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedConfig {
  const logger = isLogger(config.logger) ? config.logger : createLogger({
    name: "rivet",
    ...loggerConfigFromEnv(env),
    ...config.logger,
  });

  return {
    prefix: config.prefix ?? "/",
    protocol: config.protocol ?? defaultProtocol,
    logger,
  };
}
