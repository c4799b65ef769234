import pino from "pino";
import { env } from "./env";

/**
 * Root pino logger. Level labels are uppercased and timestamps are ISO,
 * so lines read the same in a terminal and in a log collector.
 */
export const logger: pino.Logger = pino({
  level: env.LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

/** Child logger bound to a subsystem name (e.g. "http", "db", "sweeper"). */
export function getLogger(subsystem: string): pino.Logger {
  return logger.child({ subsystem });
}
