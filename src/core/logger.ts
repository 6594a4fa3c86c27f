import { Layer, LogLevel, Logger } from "effect";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevelName;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

const levels: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export const parseLogLevel = (value: string | undefined): LogLevelName => {
  const normalized = value?.trim().toLowerCase();
  return levels.find((level) => level === normalized) ?? "info";
};

const shouldLog = (level: LogLevelName): boolean =>
  levels.indexOf(level) >= levels.indexOf(parseLogLevel(process.env.LOG_LEVEL));

export function log(level: LogLevelName, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };
  const write = level === "error" ? console.error : console.log;

  if (process.env.LOG_FORMAT === "json") {
    write(JSON.stringify(entry));
    return;
  }

  const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]`;
  if (data) {
    write(`${prefix} ${message}`, JSON.stringify(data));
  } else {
    write(`${prefix} ${message}`);
  }
}

export function debug(message: string, data?: Record<string, unknown>): void {
  log("debug", message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log("info", message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log("warn", message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log("error", message, data);
}

const effectLogLevels: Record<LogLevelName, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
};

export const toEffectLogLevel = (level: LogLevelName): LogLevel.LogLevel => effectLogLevels[level];

/**
 * Applies LOG_LEVEL and LOG_FORMAT to the logs emitted from inside services.
 */
export const makeLoggerLayer = (env: {
  readonly LOG_LEVEL?: string;
  readonly LOG_FORMAT?: string;
}): Layer.Layer<never> =>
  Layer.mergeAll(
    Logger.minimumLogLevel(toEffectLogLevel(parseLogLevel(env.LOG_LEVEL))),
    env.LOG_FORMAT === "json" ? Logger.json : Layer.empty
  );

export const LoggerLive = makeLoggerLayer(process.env);
