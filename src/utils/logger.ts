/**
 * Logger Module
 * Structured logging using pino
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "schema-reconciler", "gateway", "cli")
 * @returns A configured pino logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger("schema-reconciler");
 * logger.info({ classCount: 4 }, "Reconciling schema");
 * logger.error({ err }, "Failed to post schema");
 * ```
 */
export function createLogger(component: string): PinoLogger {
  const baseOptions: pino.LoggerOptions = {
    name: component,
    level: getLogLevel(),
  };

  // Pretty printing goes to stderr so command output on stdout stays clean
  if (isDevelopment()) {
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

  return pino(baseOptions);
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
