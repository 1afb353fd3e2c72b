/**
 * Classical Haar cascade face detector backed by OpenCV.js.
 *
 * Used where the pretrained model is not available. The cascade yields no
 * calibrated confidence, so every detection is reported with score 1.
 * The classifier and all matrices are created per call and released in
 * `finally`; nothing is shared between requests except the WASM runtime.
 */
import type { CV } from "@techstark/opencv-js";
import type { FS } from "@techstark/opencv-js/dist/src/types/emscripten.js";

import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";

import { BackendUnavailableError } from "../errors.js";
import { clipBox } from "../geometry.js";
import { logger } from "../logging/logger.js";
import type { Detection, RgbImage } from "../types.js";
import type { FaceDetector } from "./types.js";

const require = createRequire(import.meta.url);

export const CASCADE_SCALE_FACTOR = 1.1;
export const CASCADE_MIN_NEIGHBORS = 5;
export const CASCADE_MIN_SIZE = 60;

/**
 * The slice of OpenCV.js this detector uses. The Node build exposes the
 * Emscripten file system as `FS_*` functions on the module.
 */
export type OpenCvRuntime = Pick<
  CV,
  | "CV_8UC3"
  | "COLOR_RGB2GRAY"
  | "Mat"
  | "RectVector"
  | "Size"
  | "CascadeClassifier"
  | "cvtColor"
> & {
  FS_createDataFile: FS["createDataFile"];
  FS_unlink: FS["unlink"];
};

/**
 * The Emscripten module is a thenable whose `then` returns itself, so it
 * must never be awaited or used to resolve a promise. It travels inside
 * this wrapper instead.
 */
export interface LoadedOpenCv {
  cv: OpenCvRuntime;
}

function isOpenCvRuntime(value: unknown): value is OpenCvRuntime {
  if (!value || typeof value !== "object") return false;
  return (
    "CascadeClassifier" in value &&
    typeof value.CascadeClassifier === "function" &&
    "cvtColor" in value &&
    typeof value.cvtColor === "function" &&
    "FS_createDataFile" in value &&
    typeof value.FS_createDataFile === "function" &&
    "FS_unlink" in value &&
    typeof value.FS_unlink === "function"
  );
}

function waitForRuntime(module: object): Promise<void> {
  if (isOpenCvRuntime(module)) return Promise.resolve();
  if ("calledRun" in module && module.calledRun === true) {
    return Promise.resolve();
  }
  const previous =
    "onRuntimeInitialized" in module ? module.onRuntimeInitialized : undefined;
  return new Promise((resolve) => {
    Object.assign(module, {
      onRuntimeInitialized: () => {
        if (typeof previous === "function") previous();
        resolve();
      },
    });
  });
}

/**
 * The Emscripten Node shell registers process-wide handlers on load; the
 * `unhandledRejection` one aborts the runtime. Keep the service's own.
 */
function requireWithoutProcessHooks(id: string): unknown {
  const rejectionHandlers = new Set(process.listeners("unhandledRejection"));
  const exceptionHandlers = new Set(process.listeners("uncaughtException"));
  try {
    return require(id);
  } finally {
    for (const listener of process.listeners("unhandledRejection")) {
      if (!rejectionHandlers.has(listener)) {
        process.removeListener("unhandledRejection", listener);
      }
    }
    for (const listener of process.listeners("uncaughtException")) {
      if (!exceptionHandlers.has(listener)) {
        process.removeListener("uncaughtException", listener);
      }
    }
  }
}

/**
 * Load OpenCV.js. Depending on the build, the package exports either a
 * promise of the module or a module that signals readiness through
 * `onRuntimeInitialized`.
 */
export async function loadOpenCvRuntime(): Promise<LoadedOpenCv> {
  const exported = requireWithoutProcessHooks("@techstark/opencv-js");
  let cv: unknown = exported;
  if (exported instanceof Promise) {
    cv = await exported;
  } else if (exported && typeof exported === "object") {
    await waitForRuntime(exported);
  }

  if (!isOpenCvRuntime(cv)) {
    throw new Error("OpenCV.js did not expose a usable runtime");
  }
  return { cv };
}

export interface CascadeDetectorOptions {
  /** Path to a Haar cascade XML, e.g. haarcascade_frontalface_default.xml */
  cascadePath: string;
}

let cascadeFileCounter = 0;

export class CascadeFaceDetector implements FaceDetector {
  readonly backend = "cascade" as const;

  private runtime: Promise<LoadedOpenCv> | null = null;

  constructor(
    private readonly options: CascadeDetectorOptions,
    private readonly loadRuntime: () => Promise<LoadedOpenCv> = loadOpenCvRuntime,
  ) {}

  private getRuntime(): Promise<LoadedOpenCv> {
    if (!this.runtime) {
      this.runtime = this.loadRuntime().catch((error: unknown) => {
        this.runtime = null;
        throw BackendUnavailableError.loadFailed(this.backend, error);
      });
    }
    return this.runtime;
  }

  private async readCascade(): Promise<Uint8Array> {
    try {
      return await fs.readFile(this.options.cascadePath);
    } catch (error) {
      throw BackendUnavailableError.loadFailed(this.backend, error);
    }
  }

  /**
   * `minConfidence` is accepted for interface parity; the cascade has no
   * score to filter on.
   */
  async detect(image: RgbImage, _minConfidence: number): Promise<Detection[]> {
    const { cv } = await this.getRuntime();
    const cascadeBytes = await this.readCascade();

    cascadeFileCounter += 1;
    const fileName = `cascade-${cascadeFileCounter}${path.extname(this.options.cascadePath) || ".xml"}`;

    const owned: { delete(): unknown }[] = [];
    let cascadeWritten = false;
    try {
      cv.FS_createDataFile("/", fileName, cascadeBytes, true, false, false);
      cascadeWritten = true;

      const classifier = new cv.CascadeClassifier();
      owned.push(classifier);
      classifier.load(fileName);
      if (classifier.empty()) {
        throw new Error(`Cascade file could not be parsed: ${this.options.cascadePath}`);
      }

      const rgb = new cv.Mat(image.height, image.width, cv.CV_8UC3);
      owned.push(rgb);
      rgb.data.set(image.data);

      const gray = new cv.Mat();
      owned.push(gray);
      cv.cvtColor(rgb, gray, cv.COLOR_RGB2GRAY);

      const faces = new cv.RectVector();
      owned.push(faces);
      classifier.detectMultiScale(
        gray,
        faces,
        CASCADE_SCALE_FACTOR,
        CASCADE_MIN_NEIGHBORS,
        0,
        new cv.Size(CASCADE_MIN_SIZE, CASCADE_MIN_SIZE),
        new cv.Size(0, 0),
      );

      const detections: Detection[] = [];
      for (let i = 0; i < faces.size(); i++) {
        const rect = faces.get(i);
        detections.push({
          box: clipBox(
            rect.x,
            rect.y,
            rect.x + rect.width,
            rect.y + rect.height,
            image.width,
            image.height,
          ),
          score: 1,
        });
      }
      logger.debug(
        { backend: this.backend, faces: detections.length },
        "Cascade detection complete",
      );
      return detections;
    } catch (error) {
      throw BackendUnavailableError.inferenceFailed(this.backend, error);
    } finally {
      for (const resource of owned.reverse()) {
        resource.delete();
      }
      if (cascadeWritten) cv.FS_unlink(`/${fileName}`);
    }
  }
}
