/**
 * Pretrained-model face detector backed by Human.js (BlazeFace) on the
 * TensorFlow.js WASM backend.
 *
 * The Human instance is created once and reused. TensorFlow.js does not
 * handle concurrent inference on one model well, so detect() calls are
 * serialized through a promise-chain mutex, and every call's input tensor
 * is disposed before the lock is released.
 */
import type { Config, FaceResult, Human, Result, Tensor } from "@vladmandic/human";

import fs from "node:fs";
import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import { BackendUnavailableError } from "../errors.js";
import { clipBox } from "../geometry.js";
import { logger } from "../logging/logger.js";
import type { Detection, RgbImage } from "../types.js";
import { resolveHumanModelsDir, toModelsUrl } from "./human-models-path.js";
import type { FaceDetector } from "./types.js";

const require = createRequire(import.meta.url);

/** Relative box as returned in `boxRaw`: [xmin, ymin, width, height] in 0..1 */
type RelativeBox = FaceResult["boxRaw"];

export type HumanFace = Pick<FaceResult, "boxRaw" | "boxScore">;

export type HumanDetectResult = Pick<Result, "error"> & { face: HumanFace[] };

/**
 * The part of the Human API this detector uses. A loaded `Human` satisfies it.
 */
export interface HumanRuntime {
  tf: Human["tf"];
  detect(input: Tensor, config: Partial<Config>): Promise<HumanDetectResult>;
}

export interface HumanDetectorOptions {
  /** Directory holding the Human model files */
  modelsDir?: string;
  /** Upper bound on faces returned per image */
  maxDetected?: number;
}

function buildServerConfig(options: HumanDetectorOptions): Partial<Config> {
  const wasmEntry = require.resolve("@tensorflow/tfjs-backend-wasm");
  return {
    modelBasePath: toModelsUrl(resolveHumanModelsDir(options.modelsDir)),
    backend: "wasm",
    wasmPath: pathToFileURL(path.dirname(wasmEntry) + path.sep).href,
    async: true,
    debug: false,
    cacheModels: false,
    cacheSensitivity: 0, // Every request is a different image
    face: {
      enabled: true,
      detector: {
        enabled: true,
        rotation: false,
        return: false, // Prevents tensor leaks across detection calls
        maxDetected: options.maxDetected ?? 10,
        minConfidence: 0.6,
      },
      mesh: { enabled: false },
      iris: { enabled: false },
      description: { enabled: false },
      emotion: { enabled: false },
      attention: { enabled: false },
      antispoof: { enabled: false },
      liveness: { enabled: false },
    },
    body: { enabled: false },
    hand: { enabled: false },
    gesture: { enabled: false },
    object: { enabled: false },
    segmentation: { enabled: false },
    filter: { enabled: false },
  };
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  return input instanceof URL ? input.href : input.url;
}

/**
 * Human loads model files through the global fetch, which has no `file:`
 * scheme in Node. Serve `file:` URLs from disk while `run` is pending.
 */
export async function withFileFetch<T>(run: () => Promise<T>): Promise<T> {
  const networkFetch = globalThis.fetch;
  globalThis.fetch = async (input, init) => {
    const url = requestUrl(input);
    if (!url.startsWith("file:")) return networkFetch(input, init);
    try {
      return new Response(await readFile(fileURLToPath(url)));
    } catch {
      return new Response(null, { status: 404, statusText: `Not found: ${url}` });
    }
  };
  try {
    return await run();
  } finally {
    globalThis.fetch = networkFetch;
  }
}

/**
 * Load the WASM build of Human. The package's default Node entry needs the
 * native TensorFlow binding; the WASM build sits next to it in dist/.
 */
export async function loadHumanRuntime(
  options: HumanDetectorOptions = {},
): Promise<Human> {
  const entry = require.resolve("@vladmandic/human");
  const mod: { Human: typeof Human } = require(
    path.join(path.dirname(entry), "human.node-wasm.js"),
  );

  const human = new mod.Human(buildServerConfig(options));
  await withFileFetch(() => human.load());
  if (!human.models.models.blazeface) {
    throw new Error(
      `Face detector model did not load from ${human.config.modelBasePath}`,
    );
  }
  await human.warmup();
  return human;
}

/**
 * Check that Human and its models can be found, without loading them.
 */
export function isHumanAvailable(options: HumanDetectorOptions = {}): boolean {
  try {
    require.resolve("@vladmandic/human");
    require.resolve("@tensorflow/tfjs-backend-wasm");
  } catch {
    return false;
  }
  const modelsDir = resolveHumanModelsDir(options.modelsDir);
  return fs.existsSync(path.join(modelsDir, "blazeface.json"));
}

/**
 * Convert a relative [xmin, ymin, width, height] box to clipped absolute
 * corners.
 */
export function relativeToAbsoluteBox(
  boxRaw: RelativeBox,
  width: number,
  height: number,
) {
  const [xmin, ymin, boxW, boxH] = boxRaw;
  return clipBox(
    Math.round(xmin * width),
    Math.round(ymin * height),
    Math.round((xmin + boxW) * width),
    Math.round((ymin + boxH) * height),
    width,
    height,
  );
}

function createDeferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export class HumanFaceDetector implements FaceDetector {
  readonly backend = "human" as const;

  private runtime: Promise<HumanRuntime> | null = null;
  private detectionLock: Promise<void> = Promise.resolve();

  constructor(
    private readonly loadRuntime: () => Promise<HumanRuntime> = () =>
      loadHumanRuntime(),
  ) {}

  private getRuntime(): Promise<HumanRuntime> {
    if (!this.runtime) {
      this.runtime = this.loadRuntime().catch((error: unknown) => {
        // Allow a later call to retry the load
        this.runtime = null;
        throw BackendUnavailableError.loadFailed(this.backend, error);
      });
    }
    return this.runtime;
  }

  async detect(image: RgbImage, minConfidence: number): Promise<Detection[]> {
    const human = await this.getRuntime();

    const previousLock = this.detectionLock;
    const { promise: currentLock, resolve: releaseLock } = createDeferred();
    this.detectionLock = currentLock;
    await previousLock;

    let tensor: Tensor | null = null;
    try {
      const input: Tensor = human.tf.tensor3d(
        Int32Array.from(image.data),
        [image.height, image.width, 3],
        "int32",
      );
      tensor = input;
      const result = await human.detect(input, {
        face: { detector: { minConfidence } },
      });
      if (result.error) {
        throw new Error(result.error);
      }

      const detections = result.face.map((face) => ({
        box: relativeToAbsoluteBox(face.boxRaw, image.width, image.height),
        score: face.boxScore,
      }));
      logger.debug(
        { backend: this.backend, faces: detections.length },
        "Human detection complete",
      );
      return detections;
    } catch (error) {
      throw BackendUnavailableError.inferenceFailed(this.backend, error);
    } finally {
      tensor?.dispose();
      releaseLock();
    }
  }
}
