export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[currentLevel];
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function log(level: LogLevel, scope: string, message: string, data?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }

  const prefix = `[${scope}]`;
  const args: unknown[] = data === undefined ? [prefix, message] : [prefix, message, data];
  if (level === "error") {
    console.error(...args);
    return;
  }
  if (level === "warn") {
    console.warn(...args);
    return;
  }
  if (level === "debug") {
    console.debug(...args);
    return;
  }
  console.info(...args);
}

/** Returns a logger whose lines are tagged `[scope]`. */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, data) => log("debug", scope, message, data),
    info: (message, data) => log("info", scope, message, data),
    warn: (message, data) => log("warn", scope, message, data),
    error: (message, data) => log("error", scope, message, data),
  };
}
