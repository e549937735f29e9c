import pino from "pino";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.VITEST !== undefined || process.env.NODE_ENV === "test";

const baseOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : "info"),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Base logger configuration.
 * - Development: pretty-printed with colors
 * - Production: JSON format for log aggregation
 *
 * Both write to stderr; stdout belongs to command output.
 */
const baseLogger =
  isProd || isTest
    ? pino(baseOptions, pino.destination(2))
    : pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });

/**
 * Create a child logger with component context.
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId }),
  });
}

/**
 * Create a run-scoped logger, one per filtering run (e.g. per account).
 */
export function createRunLogger(runId: string): pino.Logger {
  return createLogger({ component: "timeline", correlationId: runId });
}

/**
 * Re-export base logger for simple use cases.
 */
export { baseLogger as logger };

/**
 * Re-export pino types for consumers.
 */
export type { Logger } from "pino";
