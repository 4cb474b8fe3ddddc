import pino from "pino";
import type { Logger, LoggerOptions } from "pino";
import { LOG_LEVEL } from "./env.js";

/**
 * Structured JSON logger. Level comes from LOG_LEVEL unless overridden.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: LOG_LEVEL,
    base: { service: "escrow-ledger" },
    serializers: {
      err: pino.stdSerializers.err
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options
  });
}

export const logger = createLogger();

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
