import { chunkDocuments } from "../chunking/chunker";
import { EmbeddingProvider } from "../embeddings/embedding.service";
import { Logger, NullLogger } from "../logging/logger";
import { Chunk, Document } from "../rag/types";
import { IndexRecord, WritableVectorIndex } from "../retrieval/retriever.types";

export const INDEX_BATCH_SIZE = 16;

export interface IndexCorpusOptions {
  index: WritableVectorIndex;
  embeddings: EmbeddingProvider;
  chunkSize: number;
  chunkOverlap: number;
  batchSize?: number;
  logger?: Logger;
}

export interface IndexCorpusSummary {
  documents: number;
  chunks: number;
}

export function chunkRecordId(chunk: Chunk): string {
  return `${chunk.documentId}_${chunk.sequenceIndex}`;
}

/**
 * Chunks `documents` the same way local retrieval does and writes the
 * chunks with their embeddings into the index, `batchSize` at a time.
 */
export async function indexCorpus(
  documents: Document[],
  options: IndexCorpusOptions
): Promise<IndexCorpusSummary> {
  const logger = options.logger ?? new NullLogger();
  const batchSize = options.batchSize ?? INDEX_BATCH_SIZE;
  const chunks = chunkDocuments(documents, options.chunkSize, options.chunkOverlap);

  await options.index.ensureCollection();

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);
    const embeddings = await options.embeddings.encodeBatch(batch.map((chunk) => chunk.text));

    const records: IndexRecord[] = batch.map((chunk, index) => ({
      id: chunkRecordId(chunk),
      text: chunk.text,
      embedding: embeddings[index],
      metadata: {
        sourceName: chunk.sourceName,
        documentId: chunk.documentId,
        sequenceIndex: chunk.sequenceIndex,
      },
    }));

    await options.index.add(records);
    logger.info(`[Indexer] Indexed ${Math.min(i + batchSize, chunks.length)}/${chunks.length} chunks`);
  }

  logger.info("[Indexer] Indexing complete.", { documents: documents.length, chunks: chunks.length });
  return { documents: documents.length, chunks: chunks.length };
}
