import type { Detection, DetectorBackend, RgbImage } from "../types.js";

/**
 * A face detection backend.
 *
 * Implementations return absolute, clipped boxes in whatever order the
 * backend produced them. An image without faces yields an empty array;
 * a backend that cannot run throws BackendUnavailableError.
 */
export interface FaceDetector {
  readonly backend: DetectorBackend;
  detect(image: RgbImage, minConfidence: number): Promise<Detection[]>;
}
