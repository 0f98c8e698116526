import { RetrievalMatch } from "../rag/types";

export interface Candidate {
  chunkText: string;
  sourceName: string;
  score: number;
}

/**
 * Orders candidates by descending score and assigns 1-based ranks.
 * `Array.prototype.sort` is stable, so equal scores keep their original
 * order (first seen wins).
 */
export function rankCandidates(candidates: Candidate[], topK: number): RetrievalMatch[] {
  if (topK <= 0) return [];

  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => b.candidate.score - a.candidate.score || a.index - b.index)
    .slice(0, topK)
    .map(({ candidate }, position) => ({
      chunkText: candidate.chunkText,
      sourceName: candidate.sourceName,
      score: candidate.score,
      rank: position + 1,
    }));
}
