import type { Logger, LoggerConfig, LogLevel } from "./types.ts";

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: Infinity,
};

const writeStd = (line: string, level: LogLevel): void => {
  const stream = level === "error" || level === "fatal"
    ? process.stderr
    : process.stdout;
  stream.write(line);
};

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const levelColors: Record<LogLevel, string> = {
  trace: colors.gray,
  debug: colors.blue,
  info: colors.green,
  warn: colors.yellow,
  error: colors.red,
  fatal: colors.magenta,
  silent: "",
};

function formatTime(timestamp: number): string {
  const date = new Date(timestamp);
  const h = date.getHours().toString().padStart(2, "0");
  const m = date.getMinutes().toString().padStart(2, "0");
  const s = date.getSeconds().toString().padStart(2, "0");
  const ms = date.getMilliseconds().toString().padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

interface LogEntry {
  level: LogLevel;
  time: number;
  msg: string;
  [key: string]: unknown;
}

function formatPretty(
  entry: LogEntry,
  name: string | undefined,
  showTimestamp: boolean,
): string {
  const { level, time, msg, ...rest } = entry;
  const color = levelColors[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let line = "";

  if (showTimestamp) {
    line += `${colors.gray}${formatTime(time)}${colors.reset} `;
  }

  if (name) {
    line += `${colors.cyan}${colors.bold}[${name}]${colors.reset} `;
  }

  line += `${color}${levelStr}${colors.reset} ${msg}`;

  const keys = Object.keys(rest);
  if (keys.length > 0) {
    const extra = keys
      .map((k) => {
        const v = rest[k];
        const val = typeof v === "string" ? v : JSON.stringify(v);
        return `${colors.dim}${k}=${colors.reset}${val}`;
      })
      .join(" ");
    line += ` ${extra}`;
  }

  return line + "\n";
}

function formatJson(entry: LogEntry, name: string | undefined): string {
  const obj: Record<string, unknown> = { ...entry };
  if (name) obj.name = name;
  return JSON.stringify(obj) + "\n";
}

function buildLogger(
  options: LoggerConfig,
  bindings: Record<string, unknown>,
): Logger {
  const currentLevel = options.level ?? "info";
  const name = options.name;
  const showTimestamp = options.timestamp ?? true;
  const jsonMode = options.json ?? false;
  const write = options.write ?? writeStd;

  const log = (
    level: LogLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void => {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

    const entry: LogEntry = {
      ...bindings,
      ...data,
      level,
      time: Date.now(),
      msg,
    };

    write(
      jsonMode
        ? formatJson(entry, name)
        : formatPretty(entry, name, showTimestamp),
      level,
    );
  };

  return {
    trace: (msg, data) => log("trace", msg, data),
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    fatal: (msg, data) => log("fatal", msg, data),
    child(childBindings: Record<string, unknown>): Logger {
      const { name: childName, ...rest } = childBindings;
      const joined = childName === undefined
        ? name
        : name
        ? `${name}:${String(childName)}`
        : String(childName);

      return buildLogger(
        { ...options, name: joined },
        { ...bindings, ...rest },
      );
    },
  };
}

/**
 * Create a leveled logger writing pretty or JSON lines.
 *
 * @example
 * ```typescript
 * const log = createLogger({ name: "api", level: "debug" });
 * log.child({ name: "users" }).info("created", { id: 1 });
 * // 12:00:00.000 [api:users] INFO  created id=1
 * ```
 */
export function createLogger(options: LoggerConfig = {}): Logger {
  return buildLogger(options, {});
}

export function isLogger(value: unknown): value is Logger {
  return (
    typeof value === "object" &&
    value !== null &&
    "info" in value &&
    "error" in value &&
    "child" in value &&
    typeof value.info === "function" &&
    typeof value.error === "function" &&
    typeof value.child === "function"
  );
}
