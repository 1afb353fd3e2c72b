import JSZip from "jszip";
import { describe, expect, it } from "vitest";

import type { FaceDetector } from "../detectors/types.js";
import {
  BackendUnavailableError,
  DecodeError,
  InvalidOptionsError,
} from "../errors.js";
import { decodeImage, encodePng } from "../image.js";
import { extractPortraits } from "../pipeline.js";
import {
  detection,
  FixedFaceDetector,
  makeGradientImage,
  pixelAt,
} from "../test/image-fixtures.js";

async function entryNames(archive: Buffer): Promise<string[]> {
  const zip = await JSZip.loadAsync(archive);
  return Object.keys(zip.files);
}

describe("extractPortraits", () => {
  it("crops the single face of a 1000x800 document with a 10% margin", async () => {
    const bytes = await encodePng(makeGradientImage(1000, 800));
    const detector = new FixedFaceDetector([
      detection({ x1: 100, y1: 100, x2: 300, y2: 300 }, 0.93),
    ]);

    const result = await extractPortraits(
      bytes,
      { minConfidence: 0.6, marginPercent: 10, mode: "largest-only" },
      { detector, overlayLabels: false },
    );

    expect(detector.calls).toEqual([0.6]);
    expect(result.outcome).toBe("ok");
    expect([result.width, result.height]).toEqual([1000, 800]);
    expect(result.detections).toEqual([
      {
        box: { x1: 100, y1: 100, x2: 300, y2: 300 },
        score: 0.93,
        cropBox: { x1: 80, y1: 80, x2: 320, y2: 320 },
      },
    ]);
    expect(result.portraits.map((p) => [p.fileName, p.width, p.height])).toEqual([
      ["portrait_0.jpg", 240, 240],
    ]);
    expect(result.mainPortrait).toBe(result.portraits[0]?.jpeg);
    expect(await entryNames(result.archive)).toEqual(["portrait_0.jpg"]);

    const main = await decodeImage(result.mainPortrait ?? Buffer.alloc(0));
    expect([main.width, main.height]).toEqual([240, 240]);
  });

  it("reports no faces with zero crops and an empty archive", async () => {
    const bytes = await encodePng(makeGradientImage(200, 150));

    const result = await extractPortraits(
      bytes,
      {},
      { detector: new FixedFaceDetector([]), overlayLabels: false },
    );

    expect(result.outcome).toBe("no_faces_found");
    expect(result.detections).toEqual([]);
    expect(result.portraits).toEqual([]);
    expect(result.mainPortrait).toBeNull();
    expect(await entryNames(result.archive)).toEqual([]);

    const overlay = await decodeImage(result.overlay);
    expect(pixelAt(overlay, 10, 20)).toEqual([10, 20, 128]);
  });

  it("orders overlapping faces largest first in all-faces mode", async () => {
    const bytes = await encodePng(makeGradientImage(400, 300));
    const area500 = detection({ x1: 100, y1: 100, x2: 125, y2: 120 }, 0.9);
    const area2000 = detection({ x1: 110, y1: 105, x2: 150, y2: 155 }, 0.8);

    const result = await extractPortraits(
      bytes,
      { mode: "all-faces", maxFaces: 5, marginPercent: 0 },
      { detector: new FixedFaceDetector([area500, area2000]), overlayLabels: false },
    );

    expect(result.outcome).toBe("ok");
    expect(result.detections.map((d) => d.box)).toEqual([area2000.box, area500.box]);
    expect(result.portraits.map((p) => [p.fileName, p.width, p.height])).toEqual([
      ["portrait_0.jpg", 40, 50],
      ["portrait_1.jpg", 25, 20],
    ]);
    expect(await entryNames(result.archive)).toEqual([
      "portrait_0.jpg",
      "portrait_1.jpg",
    ]);
  });

  it("keeps only the largest face by default", async () => {
    const bytes = await encodePng(makeGradientImage(400, 300));
    const detector = new FixedFaceDetector([
      detection({ x1: 10, y1: 10, x2: 30, y2: 30 }),
      detection({ x1: 200, y1: 100, x2: 300, y2: 220 }),
      detection({ x1: 50, y1: 50, x2: 90, y2: 90 }),
    ]);

    const result = await extractPortraits(bytes, {}, { detector, overlayLabels: false });

    expect(result.detections.map((d) => d.box)).toEqual([
      { x1: 200, y1: 100, x2: 300, y2: 220 },
    ]);
    expect(result.portraits).toHaveLength(1);
  });

  it("truncates to maxFaces", async () => {
    const bytes = await encodePng(makeGradientImage(400, 300));
    const detector = new FixedFaceDetector([
      detection({ x1: 10, y1: 10, x2: 30, y2: 30 }),
      detection({ x1: 200, y1: 100, x2: 300, y2: 220 }),
      detection({ x1: 50, y1: 50, x2: 90, y2: 90 }),
    ]);

    const result = await extractPortraits(
      bytes,
      { mode: "all-faces", maxFaces: 2 },
      { detector, overlayLabels: false },
    );

    expect(result.portraits.map((p) => p.fileName)).toEqual([
      "portrait_0.jpg",
      "portrait_1.jpg",
    ]);
  });

  it("reports an empty crop set when every box degenerates", async () => {
    const bytes = await encodePng(makeGradientImage(1, 40));
    const detector = new FixedFaceDetector([
      detection({ x1: 0, y1: 0, x2: 0, y2: 10 }),
    ]);

    const result = await extractPortraits(bytes, {}, { detector, overlayLabels: false });

    expect(result.outcome).toBe("empty_crop_set");
    expect(result.detections).toHaveLength(1);
    expect(result.portraits).toEqual([]);
    expect(result.mainPortrait).toBeNull();
    expect(await entryNames(result.archive)).toEqual([]);
  });

  it("draws labelled boxes on the overlay by default", async () => {
    const bytes = await encodePng(makeGradientImage(300, 200));
    const detector = new FixedFaceDetector([
      detection({ x1: 50, y1: 60, x2: 150, y2: 160 }),
    ]);

    const result = await extractPortraits(bytes, {}, { detector });
    const overlay = await decodeImage(result.overlay);

    expect([overlay.width, overlay.height]).toEqual([300, 200]);
  });

  it("rejects undecodable input before running the detector", async () => {
    const detector = new FixedFaceDetector([]);

    await expect(
      extractPortraits(Buffer.from("not an image"), {}, { detector }),
    ).rejects.toBeInstanceOf(DecodeError);
    expect(detector.calls).toEqual([]);
  });

  it("rejects invalid options before decoding", async () => {
    const detector = new FixedFaceDetector([]);

    await expect(
      extractPortraits(Buffer.from("not an image"), { marginPercent: 90 }, { detector }),
    ).rejects.toBeInstanceOf(InvalidOptionsError);
  });

  it("propagates backend failures", async () => {
    const bytes = await encodePng(makeGradientImage(50, 50));
    const failing: FaceDetector = {
      backend: "human",
      detect: async () => {
        throw BackendUnavailableError.inferenceFailed("human", new Error("oom"));
      },
    };

    await expect(
      extractPortraits(bytes, {}, { detector: failing }),
    ).rejects.toMatchObject({
      name: "BackendUnavailableError",
      issueCode: "backend_unavailable",
      backend: "human",
    });
  });
});
