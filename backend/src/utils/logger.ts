import { config } from "../config";

type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
type LogMeta = Record<string, unknown>;

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = process.env.NODE_TEST_CONTEXT ? "silent" : config.logLevel;

export const setLogLevel = (level: LogLevel) => {
  activeLevel = level;
};

const formatMessage = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${level.toUpperCase()}] [${scope}]` : `[${level.toUpperCase()}]`;
  const base = `[${timestamp}] ${prefix} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[activeLevel];

const log = (level: Exclude<LogLevel, "silent">, scope: string | undefined, message: string, meta?: LogMeta) => {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, scope, message, meta);
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

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
}

const createLogger = (scope?: string): Logger => ({
  debug: (message: string, meta?: LogMeta) => log("debug", scope, message, meta),
  info: (message: string, meta?: LogMeta) => log("info", scope, message, meta),
  warn: (message: string, meta?: LogMeta) => log("warn", scope, message, meta),
  error: (message: string, meta?: LogMeta) => log("error", scope, message, meta),
  child: (childScope: string) => createLogger(scope ? `${scope}:${childScope}` : childScope),
});

export const logger = createLogger();
