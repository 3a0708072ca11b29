// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Prefix human-readable lines with timestamp and level (default true) */
  timestamps?: boolean;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * Outputs to stdout (info/debug) or stderr (warn/error).
 *
 * With `timestamps: false` human-readable lines carry only the message and
 * metadata, which is how the run's status notices are printed on a terminal.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const timestamps = options.timestamps ?? true;

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= minLevel;
  }

  function formatMessage(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {}
  ): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    if (!timestamps) {
      return `${message}${metaStr}`;
    }
    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    return `${prefix} ${message}${metaStr}`;
  }

  function log(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (!shouldLog(level)) return;

    const combinedMeta = { ...defaultMeta, ...meta };
    const formatted = formatMessage(level, message, combinedMeta);

    if (level === "warn" || level === "error") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }
  }

  function createLoggerInstance(
    defaultMeta: Record<string, unknown> = {}
  ): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Create a logger that records entries in memory, for assertions in tests.
 */
export function createMemoryLogger(): Logger & { entries: Array<Omit<LogEntry, "timestamp">> } {
  const entries: Array<Omit<LogEntry, "timestamp">> = [];

  function build(defaultMeta: Record<string, unknown>): Logger {
    const push = (level: LogLevel) => (message: string, meta: Record<string, unknown> = {}) => {
      entries.push({ ...defaultMeta, ...meta, level, message });
    };
    return {
      debug: push("debug"),
      info: push("info"),
      warn: push("warn"),
      error: push("error"),
      child: (childMeta) => build({ ...defaultMeta, ...childMeta }),
    };
  }

  return Object.assign(build({}), { entries });
}
