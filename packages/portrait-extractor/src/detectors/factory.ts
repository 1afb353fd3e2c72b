import { BackendUnavailableError } from "../errors.js";
import { logger } from "../logging/logger.js";
import type { DetectorBackend } from "../types.js";
import { CascadeFaceDetector } from "./cascade-detector.js";
import { findCascadeFile } from "./cascade-model-path.js";
import {
  HumanFaceDetector,
  type HumanDetectorOptions,
  isHumanAvailable,
  loadHumanRuntime,
} from "./human-detector.js";
import type { FaceDetector } from "./types.js";

export type DetectorBackendSetting = DetectorBackend | "auto";

export interface DetectorConfig {
  backend: DetectorBackendSetting;
  humanModelsDir?: string;
  cascadePath?: string;
  maxDetected?: number;
}

export interface DetectorChecks {
  humanAvailable: (options: HumanDetectorOptions) => boolean;
  findCascade: (override?: string) => string | undefined;
}

const defaultChecks: DetectorChecks = {
  humanAvailable: isHumanAvailable,
  findCascade: findCascadeFile,
};

/**
 * Decide which backend to use. Runs once at startup; requests never switch
 * backends on failure.
 */
export function resolveDetectorBackend(
  config: DetectorConfig,
  checks: DetectorChecks = defaultChecks,
): DetectorBackend {
  if (config.backend !== "auto") return config.backend;

  const humanOptions = { modelsDir: config.humanModelsDir };
  if (checks.humanAvailable(humanOptions)) return "human";
  if (checks.findCascade(config.cascadePath)) return "cascade";
  throw BackendUnavailableError.noneConfigured();
}

export function createFaceDetector(
  config: DetectorConfig,
  checks: DetectorChecks = defaultChecks,
): FaceDetector {
  const backend = resolveDetectorBackend(config, checks);
  logger.info({ backend, requested: config.backend }, "Face detector selected");

  if (backend === "human") {
    const options: HumanDetectorOptions = {
      modelsDir: config.humanModelsDir,
      maxDetected: config.maxDetected,
    };
    return new HumanFaceDetector(() => loadHumanRuntime(options));
  }

  const cascadePath = checks.findCascade(config.cascadePath);
  if (!cascadePath) {
    throw new BackendUnavailableError(
      config.cascadePath
        ? `Cascade file not found: ${config.cascadePath} (CASCADE_MODEL_PATH)`
        : "Cascade backend requested but no cascade file is bundled and CASCADE_MODEL_PATH is not set",
      "cascade",
    );
  }
  return new CascadeFaceDetector({ cascadePath });
}
