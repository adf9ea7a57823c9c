import { z } from "zod";

export type DestructionApiConfig = ReturnType<typeof createDestructionApiConfig>;
export type BatchJobConfig = ReturnType<typeof createBatchJobConfig>;

const baseSchema = z.object({
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Left unset in deployed environments so the client picks up the project it runs in.
  GOOGLE_CLOUD_PROJECT: z
    .string()
    .optional()
    .transform((v) => (v && v.trim().length ? v.trim() : undefined)),
  BIGQUERY_LOCATION: z.string().min(1).default("US")
});

const destructionApiSchema = baseSchema.extend({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
  CORS_ALLOWED_ORIGINS: z
    .string()
    .default("")
    .transform((v) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    )
});

export function createDestructionApiConfig(env: NodeJS.ProcessEnv) {
  return destructionApiSchema.parse(env);
}

const batchJobSchema = baseSchema.extend({
  BATCH_SQL_PATH: z.string().optional()
});

export function createBatchJobConfig(env: NodeJS.ProcessEnv) {
  return batchJobSchema.parse(env);
}
