// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

let currentLevel: LogLevel = "warn";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

function format(level: string, msg: unknown, source?: string) {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ""} ${level.toUpperCase()}: ${String(msg)}`;
}

export const logger = {
  debug: (msg: unknown, source?: string) => {
    if (shouldLog("debug")) console.debug(format("debug", msg, source));
  },
  info: (msg: unknown, source?: string) => {
    if (shouldLog("info")) console.info(format("info", msg, source));
  },
  warn: (msg: unknown, source?: string) => {
    if (shouldLog("warn")) console.warn(format("warn", msg, source));
  },
  error: (msg: unknown, source?: string) => {
    if (shouldLog("error")) console.error(format("error", msg, source));
  },
};
