/**
 * Portrait Service - HTTP API for extracting ID-document portraits
 */

import { randomUUID } from "node:crypto";

import cors from "cors";
import express from "express";
import helmet from "helmet";
import {
  BackendUnavailableError,
  createRequestLogger,
  DecodeError,
  type FaceDetector,
  InvalidOptionsError,
  type Logger,
  logError,
  logger,
  logWarn,
} from "portrait-extractor";

import type { ServiceEnv } from "./env.js";
import { createExtractRouter } from "./routes/extract.js";

declare global {
  namespace Express {
    interface Locals {
      requestId: string;
      log: Logger;
    }
  }
}

export interface AppOptions {
  detector: FaceDetector;
  env: Pick<ServiceEnv, "MAX_UPLOAD_BYTES" | "JPEG_QUALITY">;
}

const IMAGE_CONTENT_TYPES = ["image/*", "application/octet-stream"];

/** Status carried by body-parser errors (413 for oversized uploads) */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) {
    return undefined;
  }
  const { status } = err;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
}

export function createApp({ detector, env }: AppOptions): express.Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(
    express.raw({ type: IMAGE_CONTENT_TYPES, limit: env.MAX_UPLOAD_BYTES }),
  );
  app.use((req, res, next) => {
    const requestId = req.get("x-request-id") || randomUUID();
    res.locals.requestId = requestId;
    res.locals.log = createRequestLogger(requestId);
    res.setHeader("x-request-id", requestId);
    next();
  });

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: "portrait-service",
      detector: detector.backend,
    });
  });

  // Routes
  app.use(
    "/extract",
    createExtractRouter({ detector, jpegQuality: env.JPEG_QUALITY }),
  );

  // Error handling
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      const log = res.locals.log ?? logger;
      const context = { requestId: res.locals.requestId, path: req.path };

      if (err instanceof InvalidOptionsError) {
        logWarn(err.message, context, log);
        res.status(400).json({
          error: err.message,
          issueCode: err.issueCode,
          issues: err.issues,
        });
        return;
      }

      if (err instanceof DecodeError) {
        logWarn(err.message, context, log);
        res.status(400).json({ error: err.message, issueCode: err.issueCode });
        return;
      }

      const clientStatus = clientErrorStatus(err);
      if (clientStatus !== undefined) {
        const message = err instanceof Error ? err.message : "Bad request";
        logWarn(message, { ...context, status: clientStatus }, log);
        res.status(clientStatus).json({ error: message });
        return;
      }

      const fingerprint = logError(err, context, log);
      if (err instanceof BackendUnavailableError) {
        res.status(503).json({
          error: err.message,
          issueCode: err.issueCode,
          fingerprint,
        });
        return;
      }

      res.status(500).json({ error: "Internal server error", fingerprint });
    },
  );

  return app;
}
