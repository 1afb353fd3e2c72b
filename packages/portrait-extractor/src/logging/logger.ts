/**
 * Pino Logger Configuration
 *
 * - JSON output in production, pretty-print in development
 * - Silent under test unless LOG_LEVEL says otherwise
 * - Image payload keys redacted via Pino's redact option
 */
import pino, { type Logger } from "pino";

import { REDACT_KEYS } from "./redact.js";

const nodeEnv = process.env.NODE_ENV || "development";
const isDev = nodeEnv === "development";
const isTest = nodeEnv === "test";

function defaultLevel(): string {
  if (isTest) return "silent";
  return isDev ? "debug" : "info";
}

const logLevel = process.env.LOG_LEVEL || defaultLevel();

const redactPaths = [
  "req.headers.authorization",
  "req.headers.cookie",
  ...Array.from(REDACT_KEYS, (key) => `*.${key}`),
];

export const logger: Logger = pino({
  level: logLevel,

  ...(isDev && {
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    },
  }),

  base: {
    service: "portrait-extractor",
    env: nodeEnv,
  },

  redact: {
    paths: redactPaths,
    censor: "[REDACTED]",
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
});

/**
 * Child logger carrying the request id, so every line of one extraction
 * can be correlated.
 */
export function createRequestLogger(requestId: string): Logger {
  return logger.child({ requestId });
}

export type { Logger };
