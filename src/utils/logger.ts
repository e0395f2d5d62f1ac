/**
 * Logger Module
 * Structured logging using pino, pretty-printed to stderr outside production
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "info" : "warn";
}

let rootLogger: PinoLogger | null = null;

/**
 * One pino instance per process; components get children of it so that
 * only a single pretty-print transport is ever started.
 */
function getRootLogger(): PinoLogger {
  if (rootLogger) {
    return rootLogger;
  }

  const level = getLogLevel();
  const baseOptions: pino.LoggerOptions = { name: "domain-model-nq", level };

  if (level === "silent" || !isDevelopment()) {
    rootLogger = pino(baseOptions, pino.destination(2));
    return rootLogger;
  }

  try {
    rootLogger = pino({
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
  } catch {
    // pino-pretty not installed
    rootLogger = pino(baseOptions, pino.destination(2));
  }
  return rootLogger;
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "registry", "scheduler", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("scheduler");
 * logger.info({ rounds: 4 }, "Construction sequence computed");
 * logger.warn({ uri }, "Construction pattern has no predecessor list");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const root = getRootLogger();
  return options.level
    ? root.child({ component }, { level: options.level })
    : root.child({ component });
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
