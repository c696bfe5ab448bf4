import type { LogLevel } from "./config.js";

const levelWeights: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
}

const emit = (level: LogLevel, message: string, meta: LogMeta) => {
  const payload = JSON.stringify({
    level,
    message,
    ts: new Date().toISOString(),
    ...meta
  });
  if (level === "error") {
    console.error(payload);
  } else if (level === "warn") {
    console.warn(payload);
  } else {
    console.log(payload);
  }
};

export const createLogger = (level: LogLevel, bindings: LogMeta = {}): Logger => {
  const threshold = levelWeights[level];
  const log = (entryLevel: LogLevel) => (message: string, meta?: LogMeta) => {
    if (levelWeights[entryLevel] >= threshold) {
      emit(entryLevel, message, { ...bindings, ...meta });
    }
  };
  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
    child: (extra) => createLogger(level, { ...bindings, ...extra })
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
