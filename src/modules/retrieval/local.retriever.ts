import { EmbeddingProvider } from "../embeddings/embedding.service";
import { BackendUnavailableError, ConfigError, NotInitializedError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { cosineSimilarity } from "../evaluation/similarity.service";
import { Chunk, EmbeddingVector, RetrievalMatch } from "../rag/types";
import { rankCandidates } from "./ranking";
import { Retriever } from "./retriever.types";

/**
 * Brute-force retriever over an in-memory corpus. Chunk embeddings are
 * computed once in {@link LocalRetriever.create} and reused for every query.
 */
export class LocalRetriever implements Retriever {
  readonly backend = "local" as const;

  private constructor(
    private readonly chunks: Chunk[],
    private readonly chunkEmbeddings: EmbeddingVector[],
    private readonly embeddings: EmbeddingProvider,
    private readonly logger: Logger
  ) {}

  static async create(
    chunks: Chunk[],
    embeddings: EmbeddingProvider,
    logger: Logger = new NullLogger()
  ): Promise<LocalRetriever> {
    if (chunks.length === 0) {
      throw new NotInitializedError("Local retriever needs at least one chunk");
    }

    logger.info(`[Retriever] Local mode: embedding ${chunks.length} chunks...`);
    const started = Date.now();
    let vectors: EmbeddingVector[];
    try {
      vectors = await embeddings.encodeBatch(chunks.map((chunk) => chunk.text));
    } catch (error) {
      throw new ConfigError("Embedding provider failed while indexing the corpus", [], error);
    }
    if (vectors.length !== chunks.length) {
      throw new NotInitializedError(
        `Embedding provider returned ${vectors.length} vectors for ${chunks.length} chunks`
      );
    }
    logger.info(`[Retriever] Chunks embedded in ${Date.now() - started}ms`);

    return new LocalRetriever(chunks, vectors, embeddings, logger);
  }

  get size(): number {
    return this.chunks.length;
  }

  async retrieve(query: string, topK: number): Promise<RetrievalMatch[]> {
    let queryEmbedding: EmbeddingVector;
    try {
      queryEmbedding = await this.embeddings.encode(query);
    } catch (error) {
      throw new BackendUnavailableError("embeddings", "query embedding failed", error);
    }

    const candidates = this.chunks.map((chunk, index) => ({
      chunkText: chunk.text,
      sourceName: chunk.sourceName,
      score: cosineSimilarity(queryEmbedding, this.chunkEmbeddings[index]),
    }));

    const matches = rankCandidates(candidates, topK);
    this.logger.debug(`[Retriever] ${matches.length} local matches`, {
      topScore: matches[0]?.score,
    });
    return matches;
  }
}
