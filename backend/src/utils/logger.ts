import { config, type LogLevel } from "../config";

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** Same threshold and sink, with `scope` appended to the line prefix (`controller:emitter`). */
  child: (scope: string) => Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
}

export const formatLine = (
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
  scope?: string,
  at: Date = new Date(),
) => {
  const prefix = scope ? `[${at.toISOString()}] [${level.toUpperCase()}] [${scope}]` : `[${at.toISOString()}] [${level.toUpperCase()}]`;
  const base = `${prefix} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.log(line);
};

export const createLogger = ({ scope, level = config.logLevel, sink = consoleSink }: LoggerOptions = {}): Logger => {
  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (levelPriority[entryLevel] < levelPriority[level]) return;
    sink(entryLevel, formatLine(entryLevel, message, meta, scope));
  };
  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    child: (childScope) => createLogger({ scope: scope ? `${scope}:${childScope}` : childScope, level, sink }),
  };
};

export const logger = createLogger();

/** Drops every line; for tests and offline replays. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
