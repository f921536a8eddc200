/**
 * Logging collaborator for the pipeline.
 *
 * There is no module-level logger: the caller passes one in and owns its
 * lifecycle.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogContext = Record<string, unknown>;

export interface AuthLogger {
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

const noop = (): void => {};

/** Discards everything. The default when no logger is supplied. */
export const silentLogger: AuthLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface ConsoleLoggerOptions {
  /** Prepended to every line (default "[railyard-auth]") */
  prefix?: string;
  /** Lines below this level are dropped (default "info") */
  level?: LogLevel;
}

/**
 * Logger that writes through `console.debug/info/warn/error`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: "[login]", level: "debug" });
 * logger.info("Authentication succeeded", { userId: "1" });
 * // console.info("[login] Authentication succeeded", { userId: "1" })
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): AuthLogger {
  const prefix = options.prefix ?? "[railyard-auth]";
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const write =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      if (LEVEL_ORDER[level] < threshold) return;
      const line = prefix ? `${prefix} ${message}` : message;
      if (context === undefined) {
        console[level](line);
      } else {
        console[level](line, context);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

/**
 * Wraps a caller's logger so that a throwing sink cannot fail a login.
 * A fault raised while logging has nowhere left to be reported and is dropped.
 */
export function guardLogger(logger: AuthLogger): AuthLogger {
  const guard =
    (level: LogLevel) =>
    (...args: [message: string, context?: LogContext]): void => {
      try {
        logger[level](...args);
      } catch {
        // dropped
      }
    };

  return {
    debug: guard("debug"),
    info: guard("info"),
    warn: guard("warn"),
    error: guard("error"),
  };
}
