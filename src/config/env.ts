import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";
import { DistanceMetric } from "../domain/types.js";
import { LogLevel } from "../utils/logger.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z
  .object({
    COLLECTION_NAME: z
      .string({ required_error: "COLLECTION_NAME is required" })
      .regex(/^[a-z][a-z0-9_]{0,47}$/, "COLLECTION_NAME must match ^[a-z][a-z0-9_]{0,47}$"),
    VECTOR_STORE: z.enum(["memory", "file", "pgvector"]).default("file"),
    DATABASE_URL: z.string().optional(),
    INDEX_FILE_PATH: z.string().default(".data/vector-index.json"),
    MAX_INDEX_FILE_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
    VECTOR_DIMENSION: z.coerce.number().int().positive().max(16_000).default(1536),
    VECTOR_DISTANCE: z.enum(["cosine", "euclidean", "dot"]).default("cosine"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().min(1).max(2048).default(100),
    TOP_K: z.coerce.number().int().min(1).max(50).default(4),
    EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
    CHAT_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    CHAT_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
    OLLAMA_CHAT_MODEL: z.string().min(1).default("qwen2.5:7b-instruct"),
    OLLAMA_EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
    CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(4000),
    FOLLOW_UP_QUESTIONS: booleanFlag.default("true"),
    MAX_FOLLOW_UP_QUESTIONS: z.coerce.number().int().min(1).max(10).default(3),
    MCP_TRANSPORT: z.enum(["stdio", "http"]).default("http"),
    HOST: z.string().default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
    CORS_ORIGIN: z.string().default("*"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.VECTOR_STORE === "pgvector" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "VECTOR_STORE=pgvector requires DATABASE_URL",
      });
    }
    const usesOpenAi = env.EMBEDDING_PROVIDER === "openai" || env.CHAT_PROVIDER === "openai";
    if (usesOpenAi && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when EMBEDDING_PROVIDER or CHAT_PROVIDER is openai",
      });
    }
  });

export type ProviderName = "openai" | "ollama";

export interface AppConfig {
  collectionName: string;
  vectorStore: "memory" | "file" | "pgvector";
  databaseUrl: string | null;
  indexFilePath: string;
  maxIndexFileBytes: number;
  vectorDimension: number;
  vectorDistance: DistanceMetric;
  chunkSize: number;
  chunkOverlap: number;
  embeddingBatchSize: number;
  topK: number;
  embeddingProvider: ProviderName;
  chatProvider: ProviderName;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  chatTemperature: number;
  maxOutputTokens: number;
  followUpQuestions: boolean;
  maxFollowUpQuestions: number;
  transport: "stdio" | "http";
  host: string;
  port: number;
  corsOrigin: string;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutEmptyValues(env));
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "env"}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid configuration:\n- ${problems.join("\n- ")}`, {
      detail: { problems },
    });
  }

  const parsed = result.data;
  return {
    collectionName: parsed.COLLECTION_NAME,
    vectorStore: parsed.VECTOR_STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,
    indexFilePath: parsed.INDEX_FILE_PATH,
    maxIndexFileBytes: parsed.MAX_INDEX_FILE_BYTES,
    vectorDimension: parsed.VECTOR_DIMENSION,
    vectorDistance: parsed.VECTOR_DISTANCE,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    topK: parsed.TOP_K,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    chatProvider: parsed.CHAT_PROVIDER,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    embeddingModel: parsed.EMBEDDING_MODEL,
    chatModel: parsed.CHAT_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    chatTemperature: parsed.CHAT_TEMPERATURE,
    maxOutputTokens: parsed.MAX_OUTPUT_TOKENS,
    followUpQuestions: parsed.FOLLOW_UP_QUESTIONS,
    maxFollowUpQuestions: parsed.MAX_FOLLOW_UP_QUESTIONS,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    logLevel: parsed.LOG_LEVEL,
  };
}

// `FOO=` in a .env file should fall back to the default rather than fail validation.
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      out[key] = value.trim();
    }
  }
  return out;
}
