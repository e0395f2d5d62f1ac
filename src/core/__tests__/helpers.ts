/**
 * Shared test helpers
 */

import pino from "pino";
import type { Logger } from "../../utils/logger.js";

/** The error a function throws, or undefined */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

/**
 * A debug-level pino logger that keeps its records in memory
 */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(message: string) {
        records.push(JSON.parse(message));
      },
    }
  );
  return { logger, records };
}

export function messagesAt(records: readonly LogRecord[], level: number): string[] {
  return records.filter((record) => record.level === level).map((record) => record.msg);
}
