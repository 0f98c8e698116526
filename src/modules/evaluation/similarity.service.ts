import { EmbeddingProvider } from "../embeddings/embedding.service";
import { ScoringError } from "../errors/errors";
import { Settled, ok, recoverable } from "../errors/outcome";
import { EmbeddingVector } from "../rag/types";
import { clampSimilarity } from "../retrieval/score.normalization";

/**
 * Raw cosine similarity in [-1, 1]. A zero vector has no direction, so any
 * comparison with one yields 0.
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length !== b.length) {
    throw new ScoringError(`Vectors differ in dimensionality (${a.length} vs ${b.length})`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class SimilarityScorer {
  constructor(private readonly embeddings: EmbeddingProvider) {}

  score(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }

  /**
   * Embeds both texts and returns their similarity clamped to [0, 1].
   * Blank input scores 0 without touching the provider; a provider failure
   * is reported as a recoverable {@link ScoringError} with 0 as fallback.
   */
  async scoreText(first: string, second: string): Promise<Settled<number>> {
    if (first.trim().length === 0 || second.trim().length === 0) {
      return ok(0);
    }

    try {
      const [firstEmbedding, secondEmbedding] = await this.embeddings.encodeBatch([first, second]);
      return ok(clampSimilarity(cosineSimilarity(firstEmbedding, secondEmbedding)));
    } catch (error) {
      const cause =
        error instanceof ScoringError ? error : new ScoringError("Failed to embed texts for scoring", error);
      return recoverable(cause, 0);
    }
  }
}
