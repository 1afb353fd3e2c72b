import { boxHeight, boxWidth, clipBox } from "./geometry.js";
import type { BoundingBox, RgbImage } from "./types.js";

/**
 * Grow a box by a percentage of its own size on every side, then clip it to
 * the image. Margins are floored to whole pixels.
 */
export function expandBox(
  box: BoundingBox,
  marginPercent: number,
  width: number,
  height: number,
): BoundingBox {
  const margin = Math.max(0, Math.trunc(marginPercent));
  const mx = Math.floor((boxWidth(box) * margin) / 100);
  const my = Math.floor((boxHeight(box) * margin) / 100);

  return clipBox(
    box.x1 - mx,
    box.y1 - my,
    box.x2 + mx,
    box.y2 + my,
    width,
    height,
  );
}

/**
 * Copy the pixels inside `box`. The result never shares memory with the
 * source image.
 */
export function extractRegion(image: RgbImage, box: BoundingBox): RgbImage {
  const width = boxWidth(box);
  const height = boxHeight(box);
  const rowBytes = width * image.channels;
  const data = new Uint8Array(rowBytes * height);

  for (let row = 0; row < height; row++) {
    const start = ((box.y1 + row) * image.width + box.x1) * image.channels;
    data.set(image.data.subarray(start, start + rowBytes), row * rowBytes);
  }

  return { width, height, channels: 3, data };
}

/**
 * Crop every box (with margin) out of the image.
 *
 * Boxes that collapse to zero area after clipping are dropped, so the
 * result may be shorter than `boxes`.
 */
export function cropRegions(
  image: RgbImage,
  boxes: readonly BoundingBox[],
  marginPercent: number,
): RgbImage[] {
  const crops: RgbImage[] = [];
  for (const box of boxes) {
    const region = expandBox(box, marginPercent, image.width, image.height);
    if (boxWidth(region) <= 0 || boxHeight(region) <= 0) continue;
    crops.push(extractRegion(image, region));
  }
  return crops;
}
