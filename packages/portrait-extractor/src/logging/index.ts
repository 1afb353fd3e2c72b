/**
 * Structured Logging Module
 *
 * @example
 * ```ts
 * import { logError, logger } from "./logging/index.js";
 * logger.info({ backend: "human" }, "Detector ready");
 * const fingerprint = logError(error, { operation: "extract" });
 * ```
 */

export { type ErrorContext, logError, logWarn } from "./error-logger.js";
export {
  createRequestLogger,
  type Logger,
  logger,
} from "./logger.js";
export { REDACT_KEYS, sanitizeForLog, sanitizeLogMessage } from "./redact.js";
