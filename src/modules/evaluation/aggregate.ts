import { AggregateStats, EvaluationResult, QualityBuckets, SourceCount } from "./types";

export const HIGH_QUALITY_THRESHOLD = 0.7;
export const MEDIUM_QUALITY_THRESHOLD = 0.5;

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function percentile(values: number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.floor(p * (sorted.length - 1));
  return sorted[Math.max(0, Math.min(index, sorted.length - 1))];
}

export function qualityBucket(score: number): keyof QualityBuckets {
  if (score >= HIGH_QUALITY_THRESHOLD) return "high";
  if (score >= MEDIUM_QUALITY_THRESHOLD) return "medium";
  return "low";
}

/**
 * Summary over a (possibly partial) result list. Pure; recomputed from
 * scratch on every call.
 */
export function aggregate(results: EvaluationResult[]): AggregateStats {
  const totalCount = results.length;
  const correctCount = results.filter((result) => result.isCorrect).length;
  const degradedCount = results.filter((result) => result.error !== undefined).length;

  const matches = results.flatMap((result) => result.retrievalMatches);
  const qualityBuckets: QualityBuckets = { high: 0, medium: 0, low: 0 };
  const perSource = new Map<string, number>();

  for (const match of matches) {
    qualityBuckets[qualityBucket(match.score)]++;
    perSource.set(match.sourceName, (perSource.get(match.sourceName) ?? 0) + 1);
  }

  // Map keeps first-seen order, and the sort is stable.
  const sourceCounts: SourceCount[] = Array.from(perSource, ([sourceName, count]) => ({
    sourceName,
    matches: count,
  })).sort((a, b) => b.matches - a.matches);

  const elapsed = results.map((result) => result.elapsedMs);

  return {
    totalCount,
    correctCount,
    incorrectCount: totalCount - correctCount,
    degradedCount,
    accuracy: totalCount > 0 ? correctCount / totalCount : 0,
    meanSimilarity: mean(results.map((result) => result.similarity)),
    matchCount: matches.length,
    meanMatchScore: mean(matches.map((match) => match.score)),
    sourceCounts,
    qualityBuckets,
    meanElapsedMs: mean(elapsed),
    p95ElapsedMs: percentile(elapsed, 0.95),
  };
}
