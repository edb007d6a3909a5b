import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  MAX_UPLOAD_SIZE: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  UPLOADS_DIR: z.string().default("data/uploads"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
  GENERATION_MODEL: z.string().min(1).default("llama3:8b"),
  COLLECTION_NAME: z.string().min(1).default("knowledge_base"),
  COLLECTION_PATH: z.string().default("data/collections"),
  VECTOR_STORE: z.enum(["sqlite", "memory"]).default("sqlite"),
  SETTINGS_PATH: z.string().default("data/settings.json"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  EMBEDDING_BATCH_THRESHOLD: z.coerce.number().int().positive().default(100),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EMBEDDING_FALLBACK_ENABLED: booleanFlag,
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATION_STREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RETRIEVAL_MIN_SIMILARITY: z.coerce.number().min(0).max(1).default(0.3),
  MAX_CONTEXT_LENGTH: z.coerce.number().int().positive().default(4000),
  HISTORY_LIMIT: z.coerce.number().int().min(0).default(5),
  RESPONSE_LANGUAGE: z.string().default(""),
  CANCELLATION_TOKEN_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  CANCELLATION_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  PROGRESS_MIN_INTERVAL_MS: z.coerce.number().int().min(0).default(100),
  PROGRESS_THRESHOLD_SECONDS: z.coerce.number().min(0).default(3)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
