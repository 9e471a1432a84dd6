/**
 * Shared pino logger. Level comes from LOG_LEVEL (default "info").
 */
import { pino } from "pino";

const level = process.env.LOG_LEVEL ?? "info";

const rootLogger = pino({ level });

export function createLogger(name: string) {
  return rootLogger.child({ name });
}
