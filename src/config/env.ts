import { z } from "zod";
import { ConfigError } from "../domain/errors.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  DATABASE_URL: optionalString,
  STORE_BACKEND: z.enum(["postgres", "memory"]).default("postgres"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDING_MAX_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  EMBEDDING_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(100),
  EMBEDDING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  EMBEDDING_RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(4000),
  EMBEDDING_RETRY_MAX_MS: z.coerce.number().int().nonnegative().default(60000),
  CHUNK_STRATEGY: z.string().default("token"),
  DATASET_PATH: optionalString,
  INGEST_LIMIT: z.coerce.number().int().nonnegative().optional(),
  PROGRESS_INTERVAL: z.coerce.number().int().positive().default(500),
  COMMIT_INTERVAL: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  LOG_FILE: z.string().default("log.txt"),
});

export interface AppConfig {
  storeBackend: "postgres" | "memory";
  databaseUrl: string | null;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  vectorDimension: number;
  embeddingMaxBatchSize: number;
  embeddingBatchDelayMs: number;
  embeddingMaxAttempts: number;
  embeddingRetryBaseMs: number;
  embeddingRetryMaxMs: number;
  chunkStrategy: string;
  datasetPath: string | null;
  ingestLimit: number | null;
  progressInterval: number;
  commitInterval: number;
  logLevel: "error" | "warn" | "info" | "debug";
  logFile: string | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const parsed = result.data;

  if (parsed.STORE_BACKEND === "postgres" && !parsed.DATABASE_URL) {
    throw new ConfigError("STORE_BACKEND=postgres requires DATABASE_URL.");
  }
  if (parsed.EMBEDDING_RETRY_MAX_MS < parsed.EMBEDDING_RETRY_BASE_MS) {
    throw new ConfigError(
      "EMBEDDING_RETRY_MAX_MS must be greater than or equal to EMBEDDING_RETRY_BASE_MS.",
    );
  }

  return {
    storeBackend: parsed.STORE_BACKEND,
    databaseUrl: parsed.DATABASE_URL ?? null,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION,
    embeddingMaxBatchSize: parsed.EMBEDDING_MAX_BATCH_SIZE,
    embeddingBatchDelayMs: parsed.EMBEDDING_BATCH_DELAY_MS,
    embeddingMaxAttempts: parsed.EMBEDDING_MAX_ATTEMPTS,
    embeddingRetryBaseMs: parsed.EMBEDDING_RETRY_BASE_MS,
    embeddingRetryMaxMs: parsed.EMBEDDING_RETRY_MAX_MS,
    chunkStrategy: parsed.CHUNK_STRATEGY,
    datasetPath: parsed.DATASET_PATH ?? null,
    ingestLimit: parsed.INGEST_LIMIT ?? null,
    progressInterval: parsed.PROGRESS_INTERVAL,
    commitInterval: parsed.COMMIT_INTERVAL,
    logLevel: parsed.LOG_LEVEL,
    logFile: parsed.LOG_FILE.trim() ? parsed.LOG_FILE.trim() : null,
  };
}
