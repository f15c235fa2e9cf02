/**
 * Scoped, leveled logger.
 *
 * Lines go to stderr so the assistant's answers on stdout stay readable:
 *   2026-10-19T12:00:00.000Z INFO  [invoker:gmail] Connected {"url":"..."}
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function initialLevel(): LogLevel {
  if (process.env.NODE_ENV === "test") return "silent";
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function formatLogLine(
  level: Exclude<LogLevel, "silent">,
  scope: string,
  message: string,
  data?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const tag = level.toUpperCase().padEnd(5);
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `${now.toISOString()} ${tag} [${scope}] ${message}${suffix}`;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, "silent">) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
      console.error(formatLogLine(level, scope, message, data));
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
