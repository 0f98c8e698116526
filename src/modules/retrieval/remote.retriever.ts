import { EmbeddingProvider } from "../embeddings/embedding.service";
import { BackendUnavailableError, ConfigError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { EmbeddingVector, RetrievalMatch } from "../rag/types";
import { rankCandidates } from "./ranking";
import { IndexHit, Retriever, VectorIndex } from "./retriever.types";
import { normalizeRemoteScore } from "./score.normalization";

export const DEFAULT_REMOTE_CANDIDATES = 100;

export interface RemoteRetrieverOptions {
  /** Lower bound on the candidate count requested from the index. */
  minCandidates?: number;
  logger?: Logger;
}

/**
 * Delegates ranking to an external nearest-neighbour index. Raw scores are
 * normalised per the index's scale so that matches read like the local
 * backend's ("higher is more similar").
 */
export class RemoteRetriever implements Retriever {
  readonly backend = "remote" as const;
  private readonly minCandidates: number;
  private readonly logger: Logger;

  constructor(
    private readonly index: VectorIndex,
    private readonly embeddings: EmbeddingProvider,
    options: RemoteRetrieverOptions = {}
  ) {
    this.minCandidates = options.minCandidates ?? DEFAULT_REMOTE_CANDIDATES;
    this.logger = options.logger ?? new NullLogger();
  }

  /**
   * Builds the retriever after checking the index answers. An unreachable
   * index at this point is a configuration error, not a mid-run failure.
   */
  static async create(
    index: VectorIndex,
    embeddings: EmbeddingProvider,
    options: RemoteRetrieverOptions = {}
  ): Promise<RemoteRetriever> {
    const logger = options.logger ?? new NullLogger();
    let documentCount: number;
    try {
      documentCount = await index.count();
    } catch (error) {
      throw new ConfigError("Vector index is not reachable", [], error);
    }

    if (documentCount === 0) {
      logger.warn("[Retriever] Remote index is empty, every retrieval will return no matches");
    } else {
      logger.info(`[Retriever] Remote mode: ${documentCount} indexed chunks`);
    }
    return new RemoteRetriever(index, embeddings, options);
  }

  candidatesFor(topK: number): number {
    return Math.max(this.minCandidates, topK);
  }

  async retrieve(query: string, topK: number): Promise<RetrievalMatch[]> {
    let queryEmbedding: EmbeddingVector;
    try {
      queryEmbedding = await this.embeddings.encode(query);
    } catch (error) {
      throw new BackendUnavailableError("embeddings", "query embedding failed", error);
    }

    let hits: IndexHit[];
    try {
      hits = await this.index.search(queryEmbedding, topK, this.candidatesFor(topK));
    } catch (error) {
      if (error instanceof BackendUnavailableError) throw error;
      throw new BackendUnavailableError("vector index", "search failed", error);
    }

    const candidates = hits.map((hit) => ({
      chunkText: hit.text,
      sourceName: hit.source,
      score: normalizeRemoteScore(hit.rawScore, this.index.scale),
    }));

    const matches = rankCandidates(candidates, topK);
    this.logger.debug(`[Retriever] ${matches.length} remote matches of ${hits.length} hits`);
    return matches;
  }
}
