/**
 * Error Logger with Fingerprinting
 *
 * Similar errors share a fingerprint so they can be grouped, and the
 * fingerprint is returned to callers for inclusion in error responses.
 */
import { createHash } from "node:crypto";

import {
  BackendUnavailableError,
  InvalidOptionsError,
  PortraitExtractionError,
} from "../errors.js";
import { type Logger, logger } from "./logger.js";
import { sanitizeLogMessage } from "./redact.js";

/** Matches stack trace location: "at functionName (file:line:col)" or "at file:line:col" */
const STACK_LOCATION_PATTERN = /at\s+(?:(.+?)\s+\()?(.+?):(\d+):\d+\)?/;

/** Matches path prefix up to and including /src/ for normalization */
const SRC_PATH_PREFIX_PATTERN = /^.*?\/src\//;

export interface ErrorContext {
  requestId?: string;
  path?: string;
  operation?: string;
  duration?: number;
}

function extractErrorContext(error: unknown): Record<string, unknown> {
  if (error instanceof BackendUnavailableError) {
    return {
      errorType: error.name,
      issueCode: error.issueCode,
      backend: error.backend,
    };
  }
  if (error instanceof InvalidOptionsError) {
    return {
      errorType: error.name,
      issueCode: error.issueCode,
      issues: error.issues,
    };
  }
  if (error instanceof PortraitExtractionError) {
    return {
      errorType: error.name,
      issueCode: error.issueCode,
      isExpected: error.isExpected,
    };
  }
  return {};
}

/**
 * First stack frame outside node_modules and Node internals, relative to src/.
 */
function getStackLocation(err: Error): string {
  const lines = err.stack?.split("\n") ?? [];
  for (const line of lines.slice(1)) {
    if (line.includes("node_modules") || line.includes("node:")) {
      continue;
    }

    const match = line.match(STACK_LOCATION_PATTERN);
    if (match) {
      const file = match[2];
      const lineNum = match[3];
      const relativePath =
        file?.replace(SRC_PATH_PREFIX_PATTERN, "src/") ?? "unknown";
      return `${relativePath}:${lineNum}`;
    }
  }
  return "unknown";
}

function createFingerprint(err: Error): string {
  const location = getStackLocation(err);
  const messagePart = err.message.slice(0, 100);
  const input = `${err.name}:${messagePart}:${location}`;
  return createHash("sha256").update(input).digest("hex").slice(0, 12);
}

/**
 * Log an error with context and a fingerprint.
 *
 * @returns The error fingerprint (12 hex chars)
 */
export function logError(
  error: unknown,
  context: ErrorContext = {},
  log: Pick<Logger, "error"> = logger,
): string {
  const err = error instanceof Error ? error : new Error(String(error));
  const safeMessage = sanitizeLogMessage(err.message);
  const fingerprint = createFingerprint(err);
  const errorContext = extractErrorContext(error);
  const safeStack = err.stack
    ? err.stack.replace(err.message, safeMessage)
    : undefined;

  log.error(
    {
      ...context,
      ...errorContext,
      fingerprint,
      error: {
        name: err.name,
        message: safeMessage,
        stack: safeStack,
      },
    },
    `[${fingerprint}] ${safeMessage}`,
  );

  return fingerprint;
}

/**
 * Log an expected failure (bad input, nothing detected). No stack trace.
 */
export function logWarn(
  message: string,
  context: Record<string, unknown> = {},
  log: Pick<Logger, "warn"> = logger,
): void {
  log.warn(context, sanitizeLogMessage(message));
}
