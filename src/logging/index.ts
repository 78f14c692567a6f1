/**
 * Logging utilities.
 */

export { generateSessionId, initSessionId, getSessionId } from "./session-id.js";
export {
  createLogger,
  formatLogEntry,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
