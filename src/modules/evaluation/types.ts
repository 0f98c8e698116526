import { RetrievalMatch } from "../rag/types";

export interface EvaluationResult {
  question: string;
  expectedAnswer: string;
  /** Query actually sent to the retriever (differs from `question` under HyDE). */
  retrievalQuery: string;
  generatedAnswer: string;
  /** Clamped to [0, 1]. */
  similarity: number;
  isCorrect: boolean;
  retrievalMatches: RetrievalMatch[];
  elapsedMs: number;
  /** Set on degraded results. */
  error?: string;
}

export interface QualityBuckets {
  high: number;
  medium: number;
  low: number;
}

export interface SourceCount {
  sourceName: string;
  matches: number;
}

export interface AggregateStats {
  totalCount: number;
  correctCount: number;
  incorrectCount: number;
  degradedCount: number;
  /** correct / total, 0 when empty. */
  accuracy: number;
  meanSimilarity: number;
  matchCount: number;
  meanMatchScore: number;
  /** Most used sources first. */
  sourceCounts: SourceCount[];
  qualityBuckets: QualityBuckets;
  meanElapsedMs: number;
  p95ElapsedMs: number;
}

export interface EvaluationRun {
  results: EvaluationResult[];
  stats: AggregateStats;
  /** Present when the batch was aborted; `results` then holds what completed before. */
  fatalError?: Error;
}
