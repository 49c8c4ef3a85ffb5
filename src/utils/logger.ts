/**
 * Logger Module
 * Structured logging using pino, written to stderr so that stdout stays free
 * for rendered graph output
 */

import pino, { type Logger as PinoLogger } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: LogLevel;
}

const STDERR_FD = 2;

const registry: PinoLogger[] = [];

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
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
 * @param component - The component name (e.g., "evaluator", "render", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("evaluator");
 * logger.debug({ zone: "example.com." }, "Evaluating zone");
 * logger.error({ err }, "Failed to render graph");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  let logger: PinoLogger;
  if (isDevelopment()) {
    logger = pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: STDERR_FD,
        },
      },
    });
  } else {
    logger = pino(baseOptions, pino.destination(STDERR_FD));
  }

  registry.push(logger);
  return logger;
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;

/**
 * Change the level of every logger created so far and of those created later
 */
export function setLogLevel(level: LogLevel): void {
  process.env.LOG_LEVEL = level;
  for (const logger of registry) {
    logger.level = level;
  }
}
