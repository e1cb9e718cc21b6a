import { Console } from "node:console";

/**
 * Logging levels.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger contract.
 */
export interface Logger {
  debug: (message: string, details?: Record<string, unknown>) => void;
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
}

/**
 * Where formatted log lines end up.
 */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

/**
 * Console bound to stderr, so log lines never land on the dashboard's stdout.
 * @returns Console writing every level to stderr.
 */
export const createStderrSink = (): LogSink =>
  new Console({ stdout: process.stderr, stderr: process.stderr });

/**
 * Create a logger with a minimum level.
 * @param level - Minimum log level.
 * @param sink - Output console.
 * @returns Logger instance.
 */
export const createLogger = (level: LogLevel, sink: LogSink = createStderrSink()): Logger => {
  const priority: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
  };

  const shouldLog = (target: LogLevel): boolean => priority[target] >= priority[level];

  const format = (message: string, details?: Record<string, unknown>): string => {
    if (!details || Object.keys(details).length === 0) {
      return message;
    }
    return `${message} ${JSON.stringify(details)}`;
  };

  return {
    debug: (message, details): void => {
      if (shouldLog("debug")) {
        sink.debug(format(message, details));
      }
    },
    info: (message, details): void => {
      if (shouldLog("info")) {
        sink.info(format(message, details));
      }
    },
    warn: (message, details): void => {
      if (shouldLog("warn")) {
        sink.warn(format(message, details));
      }
    },
    error: (message, details): void => {
      if (shouldLog("error")) {
        sink.error(format(message, details));
      }
    },
  };
};

/**
 * Sink that drops every line. Used while the dashboard owns an interactive stderr.
 */
export const silentSink: LogSink = {
  debug: (): void => undefined,
  info: (): void => undefined,
  warn: (): void => undefined,
  error: (): void => undefined,
};
