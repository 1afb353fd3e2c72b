/**
 * Portrait extraction routes
 *
 * POST /         - JSON result with base64 portraits and overlay preview
 * POST /archive  - ZIP of every portrait (portraits.zip)
 * POST /main     - JPEG of the main portrait (portrait_main.jpg)
 *
 * The request body is the raw image; options come from the query string:
 * ?minConfidence=0.6&marginPercent=10&mode=all-faces&maxFaces=5
 */

import { Router, type Request, type Response, type NextFunction } from "express";
import type { Router as RouterType } from "express";
import {
  ARCHIVE_FILENAME,
  DecodeError,
  type ExtractionOutcome,
  type ExtractionResult,
  extractPortraits,
  type FaceDetector,
  MAIN_PORTRAIT_FILENAME,
} from "portrait-extractor";

export interface ExtractRouterOptions {
  detector: FaceDetector;
  jpegQuality: number;
}

const OUTCOME_MESSAGES: Record<ExtractionOutcome, string | undefined> = {
  ok: undefined,
  no_faces_found: "No faces found in the image",
  empty_crop_set: "Faces were detected but every crop was empty",
};

function requestImage(req: Request): Buffer {
  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    throw DecodeError.empty();
  }
  return body;
}

export function toResponseBody(result: ExtractionResult) {
  return {
    outcome: result.outcome,
    width: result.width,
    height: result.height,
    detections: result.detections.map((detection, index) => ({
      box: detection.box,
      score: detection.score,
      isMain: index === 0,
      cropBox: detection.cropBox,
    })),
    portraits: result.portraits.map((portrait) => ({
      fileName: portrait.fileName,
      width: portrait.width,
      height: portrait.height,
      data: portrait.jpeg.toString("base64"),
    })),
    mainPortrait: result.mainPortrait?.toString("base64") ?? null,
    overlay: result.overlay.toString("base64"),
    message: OUTCOME_MESSAGES[result.outcome],
  };
}

export function createExtractRouter(options: ExtractRouterOptions): RouterType {
  const router: RouterType = Router();

  const run = (req: Request, res: Response) =>
    extractPortraits(requestImage(req), req.query, {
      detector: options.detector,
      jpegQuality: options.jpegQuality,
      log: res.locals.log,
    });

  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await run(req, res);
      res.json(toResponseBody(result));
    } catch (error) {
      next(error);
    }
  });

  router.post(
    "/archive",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await run(req, res);
        res
          .status(200)
          .type("application/zip")
          .attachment(ARCHIVE_FILENAME)
          .send(result.archive);
      } catch (error) {
        next(error);
      }
    },
  );

  router.post("/main", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await run(req, res);
      if (!result.mainPortrait) {
        res.status(404).json({
          error: "No portrait could be extracted",
          outcome: result.outcome,
        });
        return;
      }
      res
        .status(200)
        .type("image/jpeg")
        .attachment(MAIN_PORTRAIT_FILENAME)
        .send(result.mainPortrait);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
