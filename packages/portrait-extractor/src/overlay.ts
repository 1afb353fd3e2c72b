import sharp from "sharp";

import type { BoundingBox, RgbImage } from "./types.js";

const MAIN_COLOR = "rgb(0,255,0)";
const OTHER_COLOR = "rgb(0,200,255)";
const STROKE_WIDTH = 2;

export interface DrawDetectionsOptions {
  /** Box drawn in the "main" color. Defaults to 0. */
  mainIndex?: number;
  /** Draw "main"/"face" captions above each box. Defaults to true. */
  labels?: boolean;
}

function renderBoxesSvg(
  width: number,
  height: number,
  boxes: readonly BoundingBox[],
  mainIndex: number,
  labels: boolean,
): string {
  const shapes = boxes.map((box, index) => {
    const isMain = index === mainIndex;
    const color = isMain ? MAIN_COLOR : OTHER_COLOR;
    const rect = `<rect x="${box.x1}" y="${box.y1}" width="${box.x2 - box.x1}" height="${box.y2 - box.y1}" fill="none" stroke="${color}" stroke-width="${STROKE_WIDTH}"/>`;
    if (!labels) return rect;
    const textY = Math.max(box.y1 - 5, 10);
    const text = `<text x="${box.x1}" y="${textY}" fill="${color}" font-family="sans-serif" font-size="14" font-weight="bold">${isMain ? "main" : "face"}</text>`;
    return rect + text;
  });

  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${shapes.join("")}</svg>`;
}

/**
 * Render a PNG preview of the image with every box outlined.
 * The source image is not modified.
 */
export async function drawDetections(
  image: RgbImage,
  boxes: readonly BoundingBox[],
  options: DrawDetectionsOptions = {},
): Promise<Buffer> {
  const { mainIndex = 0, labels = true } = options;
  const base = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });

  if (boxes.length === 0) {
    return await base.png().toBuffer();
  }

  const svg = renderBoxesSvg(image.width, image.height, boxes, mainIndex, labels);
  return await base
    .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
    .png()
    .toBuffer();
}
