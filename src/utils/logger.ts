/**
 * Logger Module
 * Structured logging using pino, written to stderr so command output stays pipeable
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") return "silent";
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("records");
 * logger.info({ count: records.length }, "Loaded records");
 * logger.error({ err }, "Failed to load records");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (isDevelopment() && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

export type Logger = PinoLogger;
