/**
 * Service configuration, read once from the environment.
 */
import { z } from "zod";

const DEFAULT_MAX_UPLOAD_BYTES = 15 * 1024 * 1024;

const emptyToUndefined = (value: unknown) =>
  value === "" ? undefined : value;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(5003),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  DETECTOR_BACKEND: z.enum(["auto", "human", "cascade"]).default("auto"),
  HUMAN_MODELS_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  CASCADE_MODEL_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_UPLOAD_BYTES),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(95),
});

export type ServiceEnv = z.infer<typeof envSchema>;

export function loadEnv(
  source: Record<string, string | undefined> = process.env,
): ServiceEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid service configuration: ${details}`);
  }
  return parsed.data;
}
