import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { logLevelSchema, type LogLevel } from "./logger.js";

const segmentationStrategy = z.enum(["character", "sentence", "paragraph"]);
const rankingStrategy = z.enum(["similarity", "diversity", "mmr"]);

const envSchema = z.object({
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text:latest"),
  LLM_MODEL: z.string().min(1).default("llama3.1:8b"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

  VECTOR_DB_PATH: z.string().min(1).default(".data/vectorstore.sqlite"),
  COLLECTION: z.string().min(1).default("knowledge_base"),

  CHUNK_SIZE: z.coerce.number().int().positive().default(500),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
  CHUNK_STRATEGY: segmentationStrategy.default("character"),

  RANK_STRATEGY: rankingStrategy.default("similarity"),
  MMR_LAMBDA: z.coerce.number().min(0).max(1).default(0.5),
  TOP_K: z.coerce.number().int().positive().default(5),
  SIMILARITY_THRESHOLD: z.coerce.number().default(0),

  LOG_LEVEL: logLevelSchema.default("info"),
});

export type AppConfig = {
  ollama: { baseUrl: string; embeddingModel: string; llmModel: string; temperature: number };
  store: { dbPath: string; collection: string };
  segmentation: { unitSize: number; overlap: number; strategy: z.infer<typeof segmentationStrategy> };
  ranking: { strategy: z.infer<typeof rankingStrategy>; lambda: number; topK: number; threshold: number };
  logLevel: LogLevel;
};

/**
 * Reads configuration from an environment map (defaults to `process.env`).
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`, parsed.error);
  }

  const e = parsed.data;
  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    throw new ConfigurationError(
      `Invalid configuration: CHUNK_OVERLAP (${e.CHUNK_OVERLAP}) must be less than CHUNK_SIZE (${e.CHUNK_SIZE})`
    );
  }

  return {
    ollama: {
      baseUrl: e.OLLAMA_BASE_URL.replace(/\/+$/, ""),
      embeddingModel: e.EMBEDDING_MODEL,
      llmModel: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
    },
    store: { dbPath: e.VECTOR_DB_PATH, collection: e.COLLECTION },
    segmentation: {
      unitSize: e.CHUNK_SIZE,
      overlap: e.CHUNK_OVERLAP,
      strategy: e.CHUNK_STRATEGY,
    },
    ranking: {
      strategy: e.RANK_STRATEGY,
      lambda: e.MMR_LAMBDA,
      topK: e.TOP_K,
      threshold: e.SIMILARITY_THRESHOLD,
    },
    logLevel: e.LOG_LEVEL,
  };
}
