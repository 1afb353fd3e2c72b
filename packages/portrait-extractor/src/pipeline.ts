/**
 * Portrait extraction pipeline.
 *
 * decode -> detect -> rank/select -> crop with margin -> encode/bundle
 *
 * Each call is independent. Errors propagate to the caller and no partial
 * result is returned.
 */
import {
  buildPortraitArchive,
  portraitFileName,
} from "./archive.js";
import { cropRegions, expandBox } from "./cropper.js";
import type { FaceDetector } from "./detectors/types.js";
import { decodeImage, DEFAULT_JPEG_QUALITY, encodeJpeg } from "./image.js";
import { type Logger, logger as rootLogger } from "./logging/logger.js";
import { parseExtractionOptions, toSelectionMode } from "./options.js";
import { drawDetections } from "./overlay.js";
import { selectDetections } from "./selection.js";
import type { BoundingBox, Detection } from "./types.js";

export type ExtractionOutcome = "ok" | "no_faces_found" | "empty_crop_set";

export interface Portrait {
  fileName: string;
  width: number;
  height: number;
  jpeg: Buffer;
}

export interface SelectedDetection extends Detection {
  /** Region actually cropped: the box grown by the margin, clipped */
  cropBox: BoundingBox;
}

export interface ExtractionResult {
  outcome: ExtractionOutcome;
  width: number;
  height: number;
  /** Selected detections, largest first */
  detections: SelectedDetection[];
  portraits: Portrait[];
  /** JPEG of portraits[0], or null when nothing was cropped */
  mainPortrait: Buffer | null;
  /** ZIP of every portrait; an empty archive when there are none */
  archive: Buffer;
  /** PNG preview of the input with the selected boxes drawn */
  overlay: Buffer;
}

export interface ExtractionDeps {
  detector: FaceDetector;
  jpegQuality?: number;
  /** Draw "main"/"face" captions on the overlay */
  overlayLabels?: boolean;
  log?: Logger;
}

export async function extractPortraits(
  bytes: Uint8Array,
  rawOptions: unknown,
  deps: ExtractionDeps,
): Promise<ExtractionResult> {
  const log = deps.log ?? rootLogger;
  const options = parseExtractionOptions(rawOptions);
  const startTime = Date.now();

  const image = await decodeImage(bytes);
  const found = await deps.detector.detect(image, options.minConfidence);
  const selected = selectDetections(found, toSelectionMode(options));

  const boxes = selected.map((detection) => detection.box);
  const crops = cropRegions(image, boxes, options.marginPercent);
  const portraits: Portrait[] = [];
  for (const [index, crop] of crops.entries()) {
    portraits.push({
      fileName: portraitFileName(index),
      width: crop.width,
      height: crop.height,
      jpeg: await encodeJpeg(crop, deps.jpegQuality ?? DEFAULT_JPEG_QUALITY),
    });
  }

  const archive = await buildPortraitArchive(portraits.map((p) => p.jpeg));
  const overlay = await drawDetections(image, boxes, {
    mainIndex: 0,
    labels: deps.overlayLabels ?? true,
  });

  let outcome: ExtractionOutcome = "ok";
  if (found.length === 0) {
    outcome = "no_faces_found";
  } else if (portraits.length === 0) {
    outcome = "empty_crop_set";
  }

  log.info(
    {
      backend: deps.detector.backend,
      width: image.width,
      height: image.height,
      detected: found.length,
      selected: selected.length,
      portraits: portraits.length,
      mode: options.mode,
      outcome,
      durationMs: Date.now() - startTime,
    },
    "Portrait extraction complete",
  );

  return {
    outcome,
    width: image.width,
    height: image.height,
    detections: selected.map((detection) => ({
      ...detection,
      cropBox: expandBox(
        detection.box,
        options.marginPercent,
        image.width,
        image.height,
      ),
    })),
    portraits,
    mainPortrait: portraits[0]?.jpeg ?? null,
    archive,
    overlay,
  };
}
