/**
 * Image codec helpers built on sharp.
 *
 * Everything inside the pipeline works on raw RGB buffers; these are the only
 * places that touch JPEG/PNG/WEBP bytes.
 */
import sharp from "sharp";

import { DecodeError } from "./errors.js";
import type { RgbImage } from "./types.js";

export const DEFAULT_JPEG_QUALITY = 95;

/**
 * Decode JPEG/PNG/WEBP bytes into a 3-channel RGB image.
 * Alpha is flattened onto white and grayscale is expanded to sRGB.
 */
export async function decodeImage(bytes: Uint8Array): Promise<RgbImage> {
  if (bytes.byteLength === 0) {
    throw DecodeError.empty();
  }

  try {
    const { data, info } = await sharp(bytes, { failOn: "error" })
      .rotate()
      .flatten({ background: "#ffffff" })
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3 || !info.width || !info.height) {
      throw new Error(`Unexpected decoded layout: ${info.channels} channels`);
    }

    return {
      width: info.width,
      height: info.height,
      channels: 3,
      data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    };
  } catch (error) {
    throw DecodeError.unreadable(error);
  }
}

function fromRaw(image: RgbImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function encodeJpeg(
  image: RgbImage,
  quality = DEFAULT_JPEG_QUALITY,
): Promise<Buffer> {
  return await fromRaw(image).jpeg({ quality }).toBuffer();
}

export async function encodePng(image: RgbImage): Promise<Buffer> {
  return await fromRaw(image).png().toBuffer();
}
