/**
 * Logger utility for the DeckBridge backend
 *
 * Module loggers writing `[time] [LEVEL] [Module] message` lines to the
 * console. Messages below the active level are dropped; the level comes
 * from LOG_LEVEL (or DEBUG) at startup and can be changed with setLogLevel.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level named by LOG_LEVEL, else debug when DEBUG is set, else info.
 * Unknown LOG_LEVEL values are ignored.
 */
export function levelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const named = env.LOG_LEVEL?.trim().toLowerCase();
  if (named && isLogLevel(named)) {
    return named;
  }
  return env.DEBUG ? "debug" : "info";
}

let activeLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  return `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}] ${entry.message}`;
}

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.log(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) {
      return;
    }
    const line = formatLog({ timestamp: new Date().toISOString(), level, module, message });
    if (data === undefined) {
      SINKS[level](line);
    } else {
      SINKS[level](line, data);
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}

export const serverLog = createLogger("Server");
export const actionLog = createLogger("Actions");
export const profileLog = createLogger("Profiles");
