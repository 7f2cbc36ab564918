import { z, ZodError } from "zod";
import type { AppConfig, EmbeddingConfig } from "@corpora/types";
import { ValidationError } from "@corpora/errors";
import { redactValue } from "@corpora/logger";

const intString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeIntString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

const ratioString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().min(0).max(1));

const DEFAULT_MODELS: Record<EmbeddingConfig["provider"], string> = {
  openai: "text-embedding-3-small",
  cohere: "embed-v4.0",
  deterministic: "deterministic-v1",
};

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  RUNS_DIR: z.string().min(1).default("runs"),

  // ---------- Database ----------
  DATABASE_URL: z
    .string()
    .min(1, "DATABASE_URL is required")
    .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
      message: "DATABASE_URL must start with postgresql://",
    }),
  DATABASE_POOL_MAX: intString("10"),

  // ---------- Redis ----------
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

  // ---------- Embeddings ----------
  EMBED_PROVIDER: z.enum(["openai", "cohere", "deterministic"]).default("openai"),
  EMBED_MODEL: z.string().min(1).optional(),
  EMBED_DIMENSION: intString("1536"),
  EMBED_BATCH_SIZE: intString("128"),
  EMBED_MAX_RETRIES: nonNegativeIntString("3"),
  EMBED_RETRY_BASE_MS: intString("1000"),
  EMBED_RETRY_MAX_MS: intString("30000"),
  OPENAI_API_KEY: z.string().optional(),
  COHERE_API_KEY: z.string().optional(),

  // ---------- Chunking ----------
  CHUNK_HARD_MAX_TOKENS: intString("800"),
  CHUNK_OVERLAP_TOKENS: nonNegativeIntString("60"),
  CHUNK_SOFT_MIN_TOKENS: intString("200"),
  CHUNK_HARD_MIN_TOKENS: intString("80"),
  CHUNK_MIN_COVERAGE_PCT: z
    .string()
    .default("99.5")
    .transform(Number)
    .pipe(z.number().min(0).max(100)),
  TOKENIZER: z.string().min(1).default("heuristic"),

  // ---------- Preflight ----------
  PREFLIGHT_MIN_EMBED_DOCS: intString("1"),
  PREFLIGHT_MIN_QUALITY: ratioString("0.6"),

  // ---------- Retrieval ----------
  RETRIEVAL_TOP_K: intString("8"),
  RETRIEVAL_RRF_K: intString("60"),
  RETRIEVAL_TOPK_DENSE: intString("200"),
  RETRIEVAL_TOPK_BM25: intString("200"),
  RETRIEVAL_MAX_CHUNKS_PER_DOC: intString("3"),
  RETRIEVAL_PROFILE_PATH: z.string().min(1).optional(),

  // ---------- Worker ----------
  WORKER_CONCURRENCY: intString("2"),
}).superRefine((env, ctx) => {
  // Same bounds the chunker enforces, reported at startup instead of per run.
  if (env.CHUNK_HARD_MAX_TOKENS < 16) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["CHUNK_HARD_MAX_TOKENS"], message: "must be at least 16" });
  }
  if (env.CHUNK_OVERLAP_TOKENS >= env.CHUNK_HARD_MAX_TOKENS / 2) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_OVERLAP_TOKENS"],
      message: "must be less than half of CHUNK_HARD_MAX_TOKENS",
    });
  }
  if (env.CHUNK_HARD_MIN_TOKENS > env.CHUNK_SOFT_MIN_TOKENS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_HARD_MIN_TOKENS"],
      message: "must not exceed CHUNK_SOFT_MIN_TOKENS",
    });
  }
  if (env.CHUNK_SOFT_MIN_TOKENS > env.CHUNK_HARD_MAX_TOKENS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["CHUNK_SOFT_MIN_TOKENS"],
      message: "must not exceed CHUNK_HARD_MAX_TOKENS",
    });
  }
});

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    runsDir: parsed.RUNS_DIR,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    embedding: {
      provider: parsed.EMBED_PROVIDER,
      model: parsed.EMBED_MODEL ?? DEFAULT_MODELS[parsed.EMBED_PROVIDER],
      dimension: parsed.EMBED_DIMENSION,
      batchSize: parsed.EMBED_BATCH_SIZE,
      openaiApiKey: parsed.OPENAI_API_KEY,
      cohereApiKey: parsed.COHERE_API_KEY,
      retry: {
        maxRetries: parsed.EMBED_MAX_RETRIES,
        baseDelayMs: parsed.EMBED_RETRY_BASE_MS,
        maxDelayMs: parsed.EMBED_RETRY_MAX_MS,
      },
    },

    chunking: {
      hardMaxTokens: parsed.CHUNK_HARD_MAX_TOKENS,
      overlapTokens: parsed.CHUNK_OVERLAP_TOKENS,
      softMinTokens: parsed.CHUNK_SOFT_MIN_TOKENS,
      hardMinTokens: parsed.CHUNK_HARD_MIN_TOKENS,
      minCoveragePct: parsed.CHUNK_MIN_COVERAGE_PCT,
    },
    tokenizer: parsed.TOKENIZER,

    preflight: {
      minEmbedDocs: parsed.PREFLIGHT_MIN_EMBED_DOCS,
      minQuality: parsed.PREFLIGHT_MIN_QUALITY,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      rrfK: parsed.RETRIEVAL_RRF_K,
      topkDense: parsed.RETRIEVAL_TOPK_DENSE,
      topkBm25: parsed.RETRIEVAL_TOPK_BM25,
      maxChunksPerDoc: parsed.RETRIEVAL_MAX_CHUNKS_PER_DOC,
      profilePath: parsed.RETRIEVAL_PROFILE_PATH,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
  };
}

/**
 * {@link parseEnv}, with validation failures rethrown as a ValidationError
 * whose `fields` map each offending variable to its message.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return parseEnv(env);
  } catch (error: unknown) {
    if (error instanceof ZodError) {
      const fields: Record<string, string> = {};
      for (const issue of error.issues) {
        fields[issue.path.join(".") || "env"] = issue.message;
      }
      throw new ValidationError("Invalid environment configuration", fields, { cause: error });
    }
    throw error;
  }
}

export const MAX_EMBEDDING_DIMENSION = 8192;

/**
 * Provider-specific checks that parsing alone cannot express. Returns
 * human-readable issues; an empty list means the settings are usable.
 */
export function validateEmbeddingConfig(config: EmbeddingConfig): string[] {
  const issues: string[] = [];

  if (config.dimension < 1 || config.dimension > MAX_EMBEDDING_DIMENSION) {
    issues.push(
      `embedding dimension ${String(config.dimension)} outside 1..${String(MAX_EMBEDDING_DIMENSION)}`,
    );
  }
  if (config.batchSize < 1) {
    issues.push("embedding batch size must be positive");
  }

  switch (config.provider) {
    case "openai":
      if (!config.model.startsWith("text-embedding")) {
        issues.push(`openai model "${config.model}" is not an embedding model`);
      }
      if (!config.openaiApiKey) issues.push("OPENAI_API_KEY is required for provider openai");
      break;
    case "cohere":
      if (!config.model.startsWith("embed-")) {
        issues.push(`cohere model "${config.model}" is not an embedding model`);
      }
      if (!config.cohereApiKey) issues.push("COHERE_API_KEY is required for provider cohere");
      break;
    case "deterministic":
      break;
  }

  return issues;
}

/** Config view that is safe to log. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    nodeEnv: config.nodeEnv,
    runsDir: config.runsDir,
    database: { url: redactValue("databaseUrl", config.database.url), poolMax: config.database.poolMax },
    embedding: {
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      batchSize: config.embedding.batchSize,
    },
    chunking: config.chunking,
    tokenizer: config.tokenizer,
    preflight: config.preflight,
    retrieval: config.retrieval,
    worker: config.worker,
  };
}

