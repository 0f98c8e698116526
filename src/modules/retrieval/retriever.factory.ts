import { chunkDocuments } from "../chunking/chunker";
import { PipelineConfig } from "../config/config";
import { EmbeddingProvider } from "../embeddings/embedding.service";
import { ConfigError } from "../errors/errors";
import { Logger, NullLogger } from "../logging/logger";
import { Document } from "../rag/types";
import { LocalRetriever } from "./local.retriever";
import { RemoteRetriever } from "./remote.retriever";
import { Retriever, VectorIndex } from "./retriever.types";

export interface RetrieverDependencies {
  embeddings: EmbeddingProvider;
  vectorIndex?: VectorIndex;
  logger?: Logger;
}

/**
 * Picks the retrieval backend named by `config.retrieverBackend`.
 * The local backend chunks and embeds `documents`; the remote one ignores
 * them and searches the already populated index.
 */
export async function createRetriever(
  documents: Document[],
  config: Pick<PipelineConfig, "retrieverBackend" | "chunkSize" | "chunkOverlap" | "remoteCandidates">,
  deps: RetrieverDependencies
): Promise<Retriever> {
  const logger = deps.logger ?? new NullLogger();

  switch (config.retrieverBackend) {
    case "local": {
      const chunks = chunkDocuments(documents, config.chunkSize, config.chunkOverlap);
      logger.info(`[Retriever] ${documents.length} documents split into ${chunks.length} chunks`);
      return LocalRetriever.create(chunks, deps.embeddings, logger);
    }
    case "remote": {
      if (!deps.vectorIndex) {
        throw new ConfigError("Remote retrieval selected but no vector index is configured");
      }
      return RemoteRetriever.create(deps.vectorIndex, deps.embeddings, {
        minCandidates: config.remoteCandidates,
        logger,
      });
    }
  }
}
