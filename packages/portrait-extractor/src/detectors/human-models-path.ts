import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";

// Container images copy the models to `./human-models`.
// Local installs fall back to the @vladmandic/human-models package.
const standaloneModelsPath = path.join(process.cwd(), "human-models");
const nodeModulesModelsPath = path.join(
  process.cwd(),
  "node_modules",
  "@vladmandic",
  "human-models",
  "models",
);

export function resolveHumanModelsDir(override?: string): string {
  if (override) return path.resolve(override);
  return fs.existsSync(standaloneModelsPath)
    ? standaloneModelsPath
    : nodeModulesModelsPath;
}

/**
 * TensorFlow.js loads local models through file:// URLs; the trailing
 * slash keeps relative model paths resolving inside the directory.
 */
export function toModelsUrl(dir: string): string {
  return pathToFileURL(dir + path.sep).href;
}
