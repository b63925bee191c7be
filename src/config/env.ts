import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const envSchema = z.object({
  TRANSPORT: z.enum(["http", "stdio"]).default("http"),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().positive().default(8000),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: booleanFlag.default("false"),

  VECTOR_STORE: z.enum(["memory", "file", "pgvector"]).default("file"),
  VECTOR_INDEX_PATH: z.string().default(".data/legal-index.json"),
  VECTOR_INDEX_MAX_BYTES: z.coerce.number().int().positive().default(400 * 1024 * 1024),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1024),
  SIMILARITY_METRIC: z.enum(["cosine", "inner_product"]).default("cosine"),
  DATABASE_URL: z.string().optional(),

  EMBEDDING_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  GENERATION_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("mxbai-embed-large"),
  OLLAMA_CHAT_MODEL: z.string().default("llama3.2"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),

  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(2),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_MIN_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(8_000),

  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  CHUNK_BOUNDARY_TOLERANCE: z.coerce.number().min(0).max(1).default(0.45),
  UPSERT_BATCH_SIZE: z.coerce.number().int().positive().default(64),

  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  RETRIEVAL_OVERFETCH: z.coerce.number().int().positive().default(3),
  MAX_CHUNKS_PER_DOCUMENT: z.coerce.number().int().positive().default(2),
  MIN_SIMILARITY: z.coerce.number().default(0.2),
  CONTEXT_BUDGET_CHARS: z.coerce.number().int().positive().default(6000),
  MAX_HISTORY_MESSAGES: z.coerce.number().int().min(0).default(6),
  THIN_EVIDENCE_PENALTY: z.coerce.number().min(0).max(1).default(0.75),
  ANSWER_WITHOUT_CONTEXT: booleanFlag.default("true"),
});

export type SimilarityMetricSetting = "cosine" | "inner_product";
export type ProviderName = "ollama" | "openai";

export interface RetryPolicy {
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface AppConfig {
  transport: "http" | "stdio";
  http: {
    host: string;
    port: number;
    maxUploadBytes: number;
  };
  logging: {
    level: string;
    pretty: boolean;
  };
  index: {
    store: "memory" | "file" | "pgvector";
    path: string;
    maxBytes: number;
    dimension: number;
    metric: SimilarityMetricSetting;
    databaseUrl: string | null;
  };
  ai: {
    embeddingProvider: ProviderName;
    generationProvider: ProviderName;
    ollamaBaseUrl: string;
    ollamaEmbeddingModel: string;
    ollamaChatModel: string;
    openaiApiKey: string | null;
    openaiBaseUrl: string;
    openaiEmbeddingModel: string;
    openaiChatModel: string;
  };
  embedding: {
    batchSize: number;
    concurrency: number;
    retry: RetryPolicy;
  };
  generation: {
    retry: RetryPolicy;
    maxHistoryMessages: number;
    thinEvidencePenalty: number;
  };
  chunking: {
    chunkSize: number;
    overlap: number;
    boundaryTolerance: number;
    upsertBatchSize: number;
  };
  retrieval: {
    topK: number;
    overFetchFactor: number;
    maxChunksPerDocument: number;
    minSimilarity: number;
    contextBudget: number;
    answerWithoutContext: boolean;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.VECTOR_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("VECTOR_STORE=pgvector requires DATABASE_URL.");
  }

  const usesOpenAi =
    parsed.EMBEDDING_PROVIDER === "openai" || parsed.GENERATION_PROVIDER === "openai";
  if (usesOpenAi && !parsed.OPENAI_API_KEY) {
    throw new Error("OpenAI provider selected but OPENAI_API_KEY is not set.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const backoff = {
    attempts: parsed.RETRY_ATTEMPTS,
    minDelayMs: parsed.RETRY_MIN_DELAY_MS,
    maxDelayMs: Math.max(parsed.RETRY_MIN_DELAY_MS, parsed.RETRY_MAX_DELAY_MS),
  };

  return {
    transport: parsed.TRANSPORT,
    http: {
      host: parsed.HTTP_HOST,
      port: parsed.HTTP_PORT,
      maxUploadBytes: parsed.UPLOAD_MAX_BYTES,
    },
    logging: {
      level: parsed.LOG_LEVEL,
      pretty: parsed.LOG_PRETTY,
    },
    index: {
      store: parsed.VECTOR_STORE,
      path: parsed.VECTOR_INDEX_PATH,
      maxBytes: parsed.VECTOR_INDEX_MAX_BYTES,
      dimension: parsed.VECTOR_DIMENSION,
      metric: parsed.SIMILARITY_METRIC,
      databaseUrl: parsed.DATABASE_URL ?? null,
    },
    ai: {
      embeddingProvider: parsed.EMBEDDING_PROVIDER,
      generationProvider: parsed.GENERATION_PROVIDER,
      ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
      ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
      ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
      openaiApiKey: parsed.OPENAI_API_KEY ?? null,
      openaiBaseUrl: parsed.OPENAI_BASE_URL,
      openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
      openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    },
    embedding: {
      batchSize: parsed.EMBEDDING_BATCH_SIZE,
      concurrency: parsed.EMBEDDING_CONCURRENCY,
      retry: { ...backoff, timeoutMs: parsed.EMBEDDING_TIMEOUT_MS },
    },
    generation: {
      retry: { ...backoff, timeoutMs: parsed.GENERATION_TIMEOUT_MS },
      maxHistoryMessages: parsed.MAX_HISTORY_MESSAGES,
      thinEvidencePenalty: parsed.THIN_EVIDENCE_PENALTY,
    },
    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
      boundaryTolerance: parsed.CHUNK_BOUNDARY_TOLERANCE,
      upsertBatchSize: parsed.UPSERT_BATCH_SIZE,
    },
    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      overFetchFactor: parsed.RETRIEVAL_OVERFETCH,
      maxChunksPerDocument: parsed.MAX_CHUNKS_PER_DOCUMENT,
      minSimilarity: parsed.MIN_SIMILARITY,
      contextBudget: parsed.CONTEXT_BUDGET_CHARS,
      answerWithoutContext: parsed.ANSWER_WITHOUT_CONTEXT,
    },
  };
}
