import { boxArea } from "./geometry.js";
import type { Detection, SelectionMode } from "./types.js";

/**
 * Rank detections by box area (largest first) and keep as many as the mode
 * allows. Index 0 of the result is the main face.
 *
 * Array.prototype.sort is stable, so equal areas keep detector order.
 */
export function selectDetections(
  detections: readonly Detection[],
  mode: SelectionMode,
): Detection[] {
  const ranked = [...detections].sort(
    (a, b) => boxArea(b.box) - boxArea(a.box),
  );

  const limit = mode.kind === "largest-only" ? 1 : Math.max(1, mode.maxFaces);
  return ranked.slice(0, limit);
}
