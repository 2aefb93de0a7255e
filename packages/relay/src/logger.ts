/**
 * Console logging with a level threshold.
 *
 * Every line carries a `[RealtimeRelay]` prefix (or a component-specific
 * one). Credentials and payload contents are never passed to a logger.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RelayLogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createConsoleLogger(
  level: LogLevel = "info",
  prefix = "[RealtimeRelay]",
): RelayLogger {
  const threshold = LEVEL_RANK[level];
  const enabled = (l: LogLevel): boolean => LEVEL_RANK[l] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: RelayLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/** First 8 characters of a session id, as used in log lines. */
export function shortId(sessionId: string): string {
  return sessionId.slice(0, 8);
}
