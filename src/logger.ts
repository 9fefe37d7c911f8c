import process from "node:process";

/**
 * Log levels, most verbose first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A single log event.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

export type LogCallback = (entry: LogEntry) => void;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const callbacks = new Set<LogCallback>();

let currentLevel: LogLevel = levelFromEnv(process.env["COLLECTION_REFS_DEBUG"]);

/**
 * Map the COLLECTION_REFS_DEBUG value to a level.
 * "1" or "true" turns on debug output; "warn" and "error" quieten it.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  switch (value) {
    case "1":
    case "true":
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const line = `[collection-refs] ${message}${data ? ` ${JSON.stringify(data)}` : ""}`;
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error("[collection-refs] log callback failed:", e);
    }
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

/**
 * Subscribe to log events at or above the current level.
 *
 * @returns A function that removes the subscription
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}
