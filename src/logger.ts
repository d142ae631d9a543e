import pino from "pino";
import type { Logger } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    service: "lexicon-lsp",
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// stdout carries the protocol stream; logs go to stderr
export const logger = pino(baseConfig, pino.destination(2));

export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const startupLogger = createLogger("startup");
export const sessionLogger = createLogger("session");
export const lspLogger = createLogger("lsp");

export const logPerformance = (
  log: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>,
): void => {
  const duration = Date.now() - startTime;
  log.info({ operation, duration, ...metadata }, `${operation} completed in ${duration}ms`);
};

export const logError = (log: Logger, error: unknown, context?: Record<string, unknown>): void => {
  if (error instanceof Error) {
    log.error({ err: error, ...context }, error.message);
  } else {
    log.error({ error: String(error), ...context }, "Unknown error occurred");
  }
};

export type { Logger };
