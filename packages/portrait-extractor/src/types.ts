/**
 * Shared types for the portrait extraction pipeline.
 */

/**
 * Decoded image: row-major RGB, 8 bits per channel.
 */
export interface RgbImage {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
}

/**
 * Absolute pixel box. Left/top inclusive, right/bottom exclusive.
 */
export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Detection {
  box: BoundingBox;
  /** Detector confidence (0-1). Cascade backends always report 1. */
  score: number;
}

export type SelectionMode =
  | { kind: "largest-only" }
  | { kind: "all-faces"; maxFaces: number };

export type DetectorBackend = "human" | "cascade";
