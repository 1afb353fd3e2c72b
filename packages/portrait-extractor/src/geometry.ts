import type { BoundingBox } from "./types.js";

function clampInt(value: number, max: number): number {
  return Math.max(0, Math.min(Math.trunc(value), max));
}

/**
 * Clamp a box to image bounds.
 *
 * Corners are clamped independently to [0, W-1] x [0, H-1] first, then a
 * collapsed edge is pushed one pixel right/down (or left/up when already on
 * the last row/column). For width and height >= 2 the result always has a
 * positive extent, even for boxes entirely outside the image.
 */
export function clipBox(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  width: number,
  height: number,
): BoundingBox {
  const maxX = width - 1;
  const maxY = height - 1;

  let cx1 = clampInt(x1, maxX);
  let cy1 = clampInt(y1, maxY);
  let cx2 = clampInt(x2, maxX);
  let cy2 = clampInt(y2, maxY);

  if (cx2 <= cx1) {
    cx2 = Math.min(maxX, cx1 + 1);
    // Pinned to the last column: grow leftwards instead
    if (cx2 <= cx1) cx1 = Math.max(0, cx2 - 1);
  }
  if (cy2 <= cy1) {
    cy2 = Math.min(maxY, cy1 + 1);
    if (cy2 <= cy1) cy1 = Math.max(0, cy2 - 1);
  }

  return { x1: cx1, y1: cy1, x2: cx2, y2: cy2 };
}

export function boxWidth(box: BoundingBox): number {
  return box.x2 - box.x1;
}

export function boxHeight(box: BoundingBox): number {
  return box.y2 - box.y1;
}

export function boxArea(box: BoundingBox): number {
  return boxWidth(box) * boxHeight(box);
}
