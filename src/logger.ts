/**
 * Structured logging.
 *
 * Level comes from LOG_LEVEL; under NODE_ENV=test the logger is silent unless
 * LOG_LEVEL is set explicitly.
 */

import pino from "pino";
import type { Logger } from "pino";

function resolveLevel(env: NodeJS.ProcessEnv): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

function createLogger(): Logger {
  return pino({
    name: "academic-identifiers",
    level: resolveLevel(process.env),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger = createLogger();

/** Create a child logger tagged with the emitting component. */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
