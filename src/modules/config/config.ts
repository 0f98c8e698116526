import { z } from "zod";
import { ConfigError } from "../errors/errors";

const optionalInt = (schema: z.ZodNumber) =>
  z.preprocess(
    (value) => (value === "" || value === null ? undefined : value),
    z.coerce.number().pipe(schema.int()).optional()
  );

const booleanFlag = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return value;
  const lower = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(lower)) return true;
  if (["0", "false", "no", "off", ""].includes(lower)) return false;
  return value;
}, z.boolean());

const pipelineConfigObject = z.object({
  chunkSize: z.coerce.number().int().positive().default(500),
  chunkOverlap: z.coerce.number().int().nonnegative().default(50),
  topK: z.coerce.number().int().positive().default(5),
  similarityThreshold: z.coerce.number().min(0).max(1).default(0.6),
  hydeEnabled: booleanFlag.default(false),
  generationTimeoutMs: z.coerce.number().int().positive().default(600_000),
  embeddingTimeoutMs: z.coerce.number().int().positive().default(60_000),
  retrievalTimeoutMs: z.coerce.number().int().positive().default(30_000),
  randomSeed: optionalInt(z.number()),
  maxQuestions: optionalInt(z.number().positive()),
  retrieverBackend: z.enum(["local", "remote"]).default("local"),
  remoteCandidates: z.coerce.number().int().positive().default(100),
  concurrency: z.coerce.number().int().positive().default(1),
});

export const pipelineConfigSchema = pipelineConfigObject.refine(
  (config) => config.chunkOverlap < config.chunkSize,
  {
    message: "chunkOverlap must be smaller than chunkSize",
    path: ["chunkOverlap"],
  }
);

/**
 * Per-request overrides: every key optional, no defaults filled in,
 * unknown keys rejected.
 */
export const pipelineOverridesSchema = pipelineConfigObject.partial().strict();

export type PipelineOverrides = z.infer<typeof pipelineOverridesSchema>;

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type RetrieverBackend = PipelineConfig["retrieverBackend"];

const appConfigSchema = z.object({
  port: z.coerce.number().int().positive().default(4000),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  ollama: z.object({
    baseUrl: z.string().url().default("http://localhost:11434"),
    model: z.string().min(1).default("gemma2:2b"),
    embeddingModel: z.string().min(1).default("nomic-embed-text"),
  }),
  chroma: z.object({
    baseUrl: z.string().url().default("http://localhost:8000"),
    tenant: z.string().min(1).default("default_tenant"),
    database: z.string().min(1).default("default_database"),
    collection: z.string().min(1).default("rag_eval_chunks"),
    distance: z.enum(["cosine", "l2", "ip"]).default("cosine"),
  }),
  corpus: z.object({
    dir: z.string().min(1).default("data/documents"),
    encoding: z.enum(["utf8", "win1251"]).default("utf8"),
  }),
  questionsPath: z.string().min(1).optional(),
  benchmarkFile: z.string().min(1).default("data/benchmarks.json"),
  pipeline: pipelineConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${key}: ${issue.message}`;
  });
}

/**
 * Reads the service settings from environment variables.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = {
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    ollama: {
      baseUrl: env.OLLAMA_BASE_URL,
      model: env.OLLAMA_MODEL,
      embeddingModel: env.EMBEDDING_MODEL,
    },
    chroma: {
      baseUrl: env.CHROMA_BASE_URL,
      tenant: env.CHROMA_TENANT,
      database: env.CHROMA_DATABASE,
      collection: env.CHROMA_COLLECTION,
      distance: env.CHROMA_DISTANCE,
    },
    corpus: {
      dir: env.CORPUS_DIR,
      encoding: env.CORPUS_ENCODING,
    },
    questionsPath: env.QUESTIONS_PATH || undefined,
    benchmarkFile: env.BENCHMARK_FILE,
    pipeline: {
      chunkSize: env.CHUNK_SIZE,
      chunkOverlap: env.CHUNK_OVERLAP,
      topK: env.TOP_K,
      similarityThreshold: env.SIMILARITY_THRESHOLD,
      hydeEnabled: env.HYDE_ENABLED,
      generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
      embeddingTimeoutMs: env.EMBEDDING_TIMEOUT_MS,
      retrievalTimeoutMs: env.RETRIEVAL_TIMEOUT_MS,
      randomSeed: env.RANDOM_SEED,
      maxQuestions: env.MAX_QUESTIONS,
      retrieverBackend: env.RETRIEVER_BACKEND,
      remoteCandidates: env.REMOTE_CANDIDATES,
      concurrency: env.EVAL_CONCURRENCY,
    },
  };

  const parsed = appConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Invalid environment configuration", describeIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Applies per-run overrides on top of the configured defaults.
 */
export function resolvePipelineConfig(
  overrides: Partial<PipelineConfigInput> = {},
  defaults: Partial<PipelineConfigInput> = {}
): PipelineConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = pipelineConfigSchema.safeParse({ ...defaults, ...defined });
  if (!parsed.success) {
    throw new ConfigError("Invalid pipeline configuration", describeIssues(parsed.error));
  }
  return parsed.data;
}
