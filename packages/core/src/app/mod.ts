export { loggerConfigFromEnv, resolveConfig } from "./config.ts";
export type { ResolvedConfig } from "./config.ts";
export { createLogger, isLogger } from "./logger.ts";
export { Rest } from "./rest.ts";
export { serve } from "./serve.ts";
export type { FetchHandler, ServerHandle } from "./serve.ts";
export type {
  ListenOptions,
  Logger,
  LoggerConfig,
  LogLevel,
  RestConfig,
  Route,
} from "./types.ts";
