// PitchScoop - Console logging
// Lines look like: [INFO] [PitchScorer] Scoring started event_id=demo session_id=abc

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === "string" && /^[^\s"=]+$/.test(value)) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Renders one log line. Context keys keep insertion order; undefined values
 * are dropped.
 */
export function formatLogLine(
  level: LogLevel,
  scope: string,
  message: string,
  context?: LogContext,
): string {
  let line = `[${level.toUpperCase()}] [${scope}] ${message}`;
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      line += ` ${key}=${formatValue(value)}`;
    }
  }
  return line;
}

export function createConsoleLogger(scope: string, minLevel: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  const emit = (level: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(level, scope, message, context);
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
