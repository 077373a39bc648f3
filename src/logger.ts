export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.CARRYOVER_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Scoped stderr logger.
 *
 * stdout belongs to the MCP stdio transport and to hook output, so every
 * line goes to stderr as `carryover:<scope>: <message> [json]`.
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(formatLine(scope, message, data));
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

/** @internal Exported for testing */
export function formatLine(scope: string, message: string, data?: unknown): string {
  const prefix = `carryover:${scope}: ${message}`;
  if (data === undefined) return prefix;
  const payload = data instanceof Error ? data.message : data;
  return `${prefix} ${JSON.stringify(payload)}`;
}
