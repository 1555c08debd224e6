/**
 * Minimal structured logger.
 *
 * Everything goes to stderr so stdout stays free for program output.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

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
  silent: 100,
};

/** Logger that drops everything. The default wherever a logger is optional. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Create a logger writing `[sigil] level message {context}` lines to stderr,
 * dropping anything below `level`.
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (
    messageLevel: Exclude<LogLevel, "silent">,
    message: string,
    context?: LogContext,
  ): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const line = `[sigil] ${messageLevel} ${message}`;
    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
      return;
    }
    console.error(line);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}
