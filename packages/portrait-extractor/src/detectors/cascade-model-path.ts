import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_CASCADE_FILE = "haarcascade_frontalface_default.xml";

// Deployments drop the OpenCV frontal face cascade into the package's
// models/ directory; CASCADE_MODEL_PATH points anywhere else.
export const bundledCascadePath = fileURLToPath(
  new URL(`../../models/${DEFAULT_CASCADE_FILE}`, import.meta.url),
);

/**
 * Path of the cascade file to load, or undefined when neither the configured
 * nor the bundled file exists.
 */
export function findCascadeFile(override?: string): string | undefined {
  const candidate = override ? path.resolve(override) : bundledCascadePath;
  return fs.existsSync(candidate) ? candidate : undefined;
}
