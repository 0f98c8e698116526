import { EmbeddingVector, RetrievalMatch } from "../rag/types";
import { RetrieverBackend } from "../config/config";

/**
 * Common contract of both retrieval backends: matches ordered by descending
 * score, ties in candidate order, `min(topK, candidates)` long.
 */
export interface Retriever {
  readonly backend: RetrieverBackend;
  retrieve(query: string, topK: number): Promise<RetrievalMatch[]>;
}

/**
 * Numeric scale of the raw score an index reports.
 * - `cosine_distance`: `1 - cos`, lower is better
 * - `l2_distance`: squared euclidean distance, lower is better
 * - `inner_product_distance`: `1 - dot`, lower is better
 * - `relevance`: unbounded non-negative relevance, higher is better
 */
export type ScoreScale =
  | "cosine_distance"
  | "l2_distance"
  | "inner_product_distance"
  | "relevance";

export interface IndexHit {
  text: string;
  source: string;
  rawScore: number;
}

/**
 * Approximate nearest-neighbour search delegated to an external service.
 * Hits come back in the service's own relevance order.
 */
export interface VectorIndex {
  readonly scale: ScoreScale;
  search(vector: EmbeddingVector, k: number, candidateHint: number): Promise<IndexHit[]>;
  count(): Promise<number>;
}

export interface IndexRecord {
  id: string;
  text: string;
  embedding: EmbeddingVector;
  metadata: Record<string, string | number | boolean>;
}

/**
 * Write side of an index, used to load a corpus before remote evaluation.
 */
export interface WritableVectorIndex extends VectorIndex {
  ensureCollection(): Promise<void>;
  add(records: IndexRecord[]): Promise<void>;
}
