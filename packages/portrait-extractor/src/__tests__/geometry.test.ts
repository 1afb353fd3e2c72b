import { describe, expect, it } from "vitest";

import { boxArea, boxHeight, boxWidth, clipBox } from "../geometry.js";

/** Small deterministic PRNG so failures reproduce */
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(next: () => number, min: number, max: number): number {
  return Math.floor(next() * (max - min + 1)) + min;
}

describe("clipBox", () => {
  it("leaves an in-bounds box untouched", () => {
    expect(clipBox(10, 20, 30, 40, 100, 80)).toEqual({
      x1: 10,
      y1: 20,
      x2: 30,
      y2: 40,
    });
  });

  it("clamps corners to the last pixel row and column", () => {
    expect(clipBox(-5, -5, 500, 500, 100, 80)).toEqual({
      x1: 0,
      y1: 0,
      x2: 99,
      y2: 79,
    });
  });

  it("gives a wholly negative box a one-pixel extent at the origin", () => {
    expect(clipBox(-50, -40, -10, -5, 100, 80)).toEqual({
      x1: 0,
      y1: 0,
      x2: 1,
      y2: 1,
    });
  });

  it("gives a box past the far edge a one-pixel extent at the corner", () => {
    expect(clipBox(150, 100, 200, 300, 100, 80)).toEqual({
      x1: 98,
      y1: 78,
      x2: 99,
      y2: 79,
    });
  });

  it("repairs inverted corners", () => {
    expect(clipBox(40, 30, 20, 10, 100, 80)).toEqual({
      x1: 40,
      y1: 30,
      x2: 41,
      y2: 31,
    });
  });

  it("truncates fractional coordinates", () => {
    expect(clipBox(10.7, 20.2, 30.9, 40.5, 100, 80)).toEqual({
      x1: 10,
      y1: 20,
      x2: 30,
      y2: 40,
    });
  });

  it("keeps every output inside bounds with positive extent", () => {
    const next = mulberry32(42);
    for (let i = 0; i < 2000; i++) {
      const width = randomInt(next, 2, 400);
      const height = randomInt(next, 2, 400);
      const box = clipBox(
        randomInt(next, -1000, 1000),
        randomInt(next, -1000, 1000),
        randomInt(next, -1000, 1000),
        randomInt(next, -1000, 1000),
        width,
        height,
      );

      expect(box.x1).toBeGreaterThanOrEqual(0);
      expect(box.y1).toBeGreaterThanOrEqual(0);
      expect(box.x2).toBeLessThanOrEqual(width - 1);
      expect(box.y2).toBeLessThanOrEqual(height - 1);
      expect(box.x1).toBeLessThan(box.x2);
      expect(box.y1).toBeLessThan(box.y2);
    }
  });

  it("is idempotent", () => {
    const next = mulberry32(7);
    for (let i = 0; i < 500; i++) {
      const width = randomInt(next, 2, 300);
      const height = randomInt(next, 2, 300);
      const once = clipBox(
        randomInt(next, -500, 800),
        randomInt(next, -500, 800),
        randomInt(next, -500, 800),
        randomInt(next, -500, 800),
        width,
        height,
      );
      const twice = clipBox(once.x1, once.y1, once.x2, once.y2, width, height);
      expect(twice).toEqual(once);
    }
  });

  it("collapses to zero width on a one-pixel-wide image", () => {
    const box = clipBox(0, 0, 10, 10, 1, 50);
    expect(boxWidth(box)).toBe(0);
    expect(boxHeight(box)).toBe(10);
  });
});

describe("box helpers", () => {
  it("computes width, height and area", () => {
    const box = { x1: 100, y1: 100, x2: 300, y2: 250 };
    expect(boxWidth(box)).toBe(200);
    expect(boxHeight(box)).toBe(150);
    expect(boxArea(box)).toBe(30000);
  });
});
