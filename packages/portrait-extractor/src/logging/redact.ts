/**
 * Log Redaction Utilities
 *
 * Canonical list of field names that must never reach the logs. Image
 * payloads are large and may carry identity documents.
 */

export const REDACT_KEYS = new Set([
  // Images and biometrics
  "image",
  "imageBytes",
  "documentImage",
  "portrait",
  "mainPortrait",
  "overlay",
  "archive",
  "jpeg",
  "imageData",

  // Credentials
  "password",
  "secret",
  "token",
]);

const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi;
const LONG_DIGIT_PATTERN = /\b\d{6,}\b/g;

/**
 * Sanitize free-form log messages. Document numbers and e-mail addresses
 * can leak through error messages from image decoders and HTTP clients.
 */
export function sanitizeLogMessage(message: string): string {
  if (!message) return message;

  if (message.includes("data:image/")) {
    return "[base64-image]";
  }

  let output = message;
  output = output.replace(EMAIL_PATTERN, "[redacted-email]");
  output = output.replace(LONG_DIGIT_PATTERN, "[redacted-number]");

  if (output.length > 500) {
    output = `${output.slice(0, 200)}…[truncated:${output.length}]`;
  }

  return output;
}

/**
 * Deep sanitizes an object for logging. Binary values are reduced to
 * their size.
 */
export function sanitizeForLog(
  value: unknown,
  depth = 0,
  seen?: WeakSet<object>,
): unknown {
  if (depth > 4) return "[max-depth]";

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeLogMessage(value.message),
    };
  }

  if (value instanceof Uint8Array) {
    return `[bytes:${value.byteLength}]`;
  }

  if (typeof value === "string") {
    if (value.startsWith("data:image/")) {
      return `[base64-image:${value.length}]`;
    }
    if (value.length > 500) {
      return `[string:${value.length}]`;
    }
    return sanitizeLogMessage(value);
  }

  if (Array.isArray(value)) {
    if (value.length > 20) {
      return `[array:${value.length}]`;
    }
    return value.map((v) => sanitizeForLog(v, depth + 1, seen));
  }

  if (value && typeof value === "object") {
    const set = seen ?? new WeakSet<object>();
    if (set.has(value)) return "[circular]";
    set.add(value);

    const out: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      out[key] = REDACT_KEYS.has(key)
        ? "[REDACTED]"
        : sanitizeForLog(val, depth + 1, set);
    }
    return out;
  }

  return value;
}
