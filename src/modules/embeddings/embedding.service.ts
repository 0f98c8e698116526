import fetch, { FetchError, Response } from "node-fetch";
import { ConfigError, PipelineError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { EmbeddingVector } from "../rag/types";

/**
 * Turns text into fixed-length vectors. Implementations must be
 * deterministic for identical input.
 */
export interface EmbeddingProvider {
  readonly dimensionality: number;
  encode(text: string): Promise<EmbeddingVector>;
  encodeBatch(texts: string[]): Promise<EmbeddingVector[]>;
}

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  batchSize?: number;
  logger?: Logger;
}

export class EmbeddingRequestError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "EmbeddingRequestError";
  }
}

const DEFAULT_BATCH_SIZE = 16;
const DIMENSION_PROBE = "dimension probe";

/**
 * Embedding provider backed by Ollama's `/api/embeddings` endpoint.
 * Use {@link OllamaEmbeddingProvider.connect} to build one.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private readonly baseUrl: string;
  private readonly batchSize: number;
  private readonly logger: Logger;

  private constructor(
    private readonly options: OllamaEmbeddingOptions,
    readonly dimensionality: number
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Embeds a probe string once to learn the model's dimensionality.
   * An unreachable server or an empty vector is a configuration error.
   */
  static async connect(options: OllamaEmbeddingOptions): Promise<OllamaEmbeddingProvider> {
    let probe: EmbeddingVector;
    try {
      probe = await requestEmbedding(options, DIMENSION_PROBE);
    } catch (error) {
      throw new ConfigError(
        `Embedding model "${options.model}" is not reachable at ${options.baseUrl}`,
        [],
        error
      );
    }

    if (probe.length === 0) {
      throw new ConfigError(`Embedding model "${options.model}" returned zero-dimension vectors`);
    }

    const provider = new OllamaEmbeddingProvider(options, probe.length);
    provider.logger.info(
      `[Embeddings] ${options.model} ready (${probe.length} dimensions)`
    );
    return provider;
  }

  async encode(text: string): Promise<EmbeddingVector> {
    const embedding = await requestEmbedding({ ...this.options, baseUrl: this.baseUrl }, text);
    if (embedding.length !== this.dimensionality) {
      throw new EmbeddingRequestError(
        `Expected ${this.dimensionality} dimensions, received ${embedding.length}`
      );
    }
    return embedding;
  }

  async encodeBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const embeddings: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const vectors = await Promise.all(batch.map((text) => this.encode(text)));
      embeddings.push(...vectors);
      this.logger.debug(`[Embeddings] Encoded ${embeddings.length}/${texts.length} texts`);
    }
    return embeddings;
  }
}

async function requestEmbedding(
  options: Pick<OllamaEmbeddingOptions, "baseUrl" | "model" | "timeoutMs">,
  text: string
): Promise<EmbeddingVector> {
  if (!text || text.trim().length === 0) {
    throw new EmbeddingRequestError("Text cannot be empty");
  }

  let response: Response;
  try {
    response = await fetch(`${options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        prompt: text,
      }),
      timeout: options.timeoutMs,
    });
  } catch (error) {
    const message =
      error instanceof FetchError && error.type === "request-timeout"
        ? `Ollama embedding request timed out after ${options.timeoutMs}ms`
        : "Ollama embedding request failed";
    throw new EmbeddingRequestError(message, error);
  }

  if (!response.ok) {
    const body = await response.text();
    throw new EmbeddingRequestError(`Ollama embedding error (${response.status}): ${body}`);
  }

  const data = (await response.json()) as { embedding?: unknown };
  if (!isNumberArray(data.embedding)) {
    throw new EmbeddingRequestError("Ollama returned an empty embedding.");
  }

  return data.embedding;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number");
}
