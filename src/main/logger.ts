/**
 * Structured logger shared by the host and every module.
 */

import pino, { type Logger } from "pino";

const isPlainOutput = process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  formatters: {
    level: (label) => {
      return { level: label };
    }
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  ...(isPlainOutput
    ? {}
    : {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname"
        }
      }
    })
});

export type { Logger };

export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function setVerbose(verbose: boolean): void {
  if (verbose && process.env.LOG_LEVEL === undefined) {
    logger.level = "debug";
  }
}

export function logError(log: Logger, error: unknown, message: string, context?: Record<string, unknown>): void {
  log.error(
    {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...context
    },
    message
  );
}
