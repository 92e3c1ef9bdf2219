import type { HttpMethod } from "@rivet/router";
import type { AnyRouteDefinition } from "../binding/mod.ts";
import type { Protocol } from "../protocol/mod.ts";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel;
  name?: string;
  /** Prefix pretty lines with the local time */
  timestamp?: boolean;
  /** One JSON object per line instead of pretty output */
  json?: boolean;
  /** Output sink; defaults to stdout, or stderr for error and fatal */
  write?: (line: string, level: LogLevel) => void;
}

export interface RestConfig {
  /** Path prefix prepended to every route */
  prefix?: string;
  /** Wire format of requests and responses, `defaultProtocol` when unset */
  protocol?: Protocol;
  /** A logger, or options for the built-in one */
  logger?: Logger | LoggerConfig;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (params: { hostname: string; port: number }) => void;
}

/**
 * A registered route. Never changes after registration.
 */
export interface Route {
  readonly method: HttpMethod;
  readonly path: string;
  readonly definition: AnyRouteDefinition;
}
