import { z } from "zod";

import { InvalidOptionsError } from "./errors.js";
import type { SelectionMode } from "./types.js";

export const extractionOptionsSchema = z.object({
  /** Detector score threshold */
  minConfidence: z.coerce.number().min(0.1).max(0.99).default(0.6),
  /** Padding added on every side, as a percentage of the box size */
  marginPercent: z.coerce.number().int().min(0).max(40).default(10),
  mode: z.enum(["largest-only", "all-faces"]).default("largest-only"),
  /** Only used in "all-faces" mode */
  maxFaces: z.coerce.number().int().min(1).max(10).default(5),
});

export type ExtractionOptionsInput = z.input<typeof extractionOptionsSchema>;
export type ExtractionOptions = z.output<typeof extractionOptionsSchema>;

// `?marginPercent=` arrives as "", which coercion would turn into 0.
function withoutBlankValues(input: unknown): unknown {
  if (!input || typeof input !== "object" || Array.isArray(input)) return input;
  return Object.fromEntries(
    Object.entries(input).filter(
      ([, value]) => !(typeof value === "string" && value.trim() === ""),
    ),
  );
}

/**
 * Validate caller-supplied options and fill defaults. Blank values count as
 * absent.
 *
 * @throws InvalidOptionsError listing every offending field
 */
export function parseExtractionOptions(input: unknown): ExtractionOptions {
  const parsed = extractionOptionsSchema.safeParse(withoutBlankValues(input) ?? {});
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}

export function toSelectionMode(options: ExtractionOptions): SelectionMode {
  return options.mode === "all-faces"
    ? { kind: "all-faces", maxFaces: options.maxFaces }
    : { kind: "largest-only" };
}
