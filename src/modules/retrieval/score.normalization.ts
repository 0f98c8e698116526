import { ScoreScale } from "./retriever.types";

/**
 * Maps a backend's raw score onto "higher is more similar", roughly in
 * [0, 1], preserving the backend's own ordering.
 *
 * | scale                    | formula        |
 * | ------------------------ | -------------- |
 * | `cosine_distance`        | `1 - d`        |
 * | `inner_product_distance` | `1 - d`        |
 * | `l2_distance`            | `1 / (1 + d)`  |
 * | `relevance`              | `s / (1 + s)`  |
 *
 * Non-finite raw scores map to 0. Negative l2 distances and relevances are
 * read as 0.
 */
export function normalizeRemoteScore(raw: number, scale: ScoreScale): number {
  if (!Number.isFinite(raw)) return 0;

  switch (scale) {
    case "cosine_distance":
    case "inner_product_distance":
      return 1 - raw;
    case "l2_distance": {
      const distance = Math.max(0, raw);
      return 1 / (1 + distance);
    }
    case "relevance": {
      const relevance = Math.max(0, raw);
      return relevance / (1 + relevance);
    }
  }
}

/**
 * Folds a similarity into [0, 1] for pass/fail decisions.
 */
export function clampSimilarity(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}
