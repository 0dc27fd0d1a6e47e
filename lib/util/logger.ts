type LogLevel = "debug" | "info" | "warn" | "error";
type LogThreshold = LogLevel | "silent";

type LogContext = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const LOG_LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isThreshold(value: string): value is LogThreshold {
  return value in LOG_LEVELS;
}

function getMinLevel(): LogThreshold {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isThreshold(envLevel)) return envLevel;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getMinLevel()];
}

function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    return `${base} ${JSON.stringify(entry.context)}`;
  }
  return base;
}

function log(level: LogLevel, message: string, context?: LogContext) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context,
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Create a child logger with preset context
 */
export function createLogger(baseContext: LogContext): Logger {
  return {
    debug: (message, context) => log("debug", message, { ...baseContext, ...context }),
    info: (message, context) => log("info", message, { ...baseContext, ...context }),
    warn: (message, context) => log("warn", message, { ...baseContext, ...context }),
    error: (message, context) => log("error", message, { ...baseContext, ...context }),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

export const logger: Logger = createLogger({});

/**
 * Message text of an unknown thrown value, for log context and job error logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Timer utility for performance logging
 */
export function createTimer(label: string, target: Logger = logger) {
  const start = performance.now();
  return {
    end: (context?: LogContext) => {
      const duration = performance.now() - start;
      target.debug(`${label} completed`, { durationMs: duration.toFixed(2), ...context });
      return duration;
    },
  };
}
