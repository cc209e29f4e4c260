/**
 * Structured, leveled logging.
 */

export { createLogger, isLogger, LOG_LEVELS } from "./logger.ts";
export type {
  LogDestination,
  Logger,
  LoggerConfig,
  LogLevel,
} from "./types.ts";
