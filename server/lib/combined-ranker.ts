/**
 * Ranking of per-job scores
 *
 * Single-algorithm rankings and the weighted combination share one ordering
 * rule: score descending, ties broken by ascending job id, so the same input
 * always yields the same order.
 */

import type { ScoringWeights } from "@shared/schema";
import type { JobId, ScoringAlgorithm } from "@shared/api-contracts";
import { AppValidationError } from "@shared/errors";
import { DEFAULT_SCORING_WEIGHTS } from "./unified-scoring-config";

export interface ScoreResult {
  jobId: JobId;
  score: number;
  algorithm: ScoringAlgorithm;
}

export interface CombinedScoreResult {
  jobId: JobId;
  cosineScore: number;
  llrScore: number;
  /** LLR after min-max scaling across the current job set */
  llrNormalized: number;
  combinedScore: number;
  weights: ScoringWeights;
}

function byScoreThenId(
  a: { jobId: JobId; score: number },
  b: { jobId: JobId; score: number }
): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.jobId - b.jobId;
}

export function rankScores(results: readonly ScoreResult[]): ScoreResult[] {
  return [...results].sort(byScoreThenId);
}

/**
 * Reject weights that are negative, not finite, or both zero
 *
 * @throws {AppValidationError}
 */
export function validateWeights(weights: ScoringWeights): ScoringWeights {
  const { cosine, llr } = weights;
  if (!Number.isFinite(cosine) || !Number.isFinite(llr)) {
    throw AppValidationError.invalidWeights("weights must be finite numbers", weights);
  }
  if (cosine < 0 || llr < 0) {
    throw AppValidationError.invalidWeights("weights must be non-negative", weights);
  }
  if (cosine === 0 && llr === 0) {
    throw AppValidationError.invalidWeights("at least one weight must be positive", weights);
  }
  return { cosine, llr };
}

/**
 * Min-max scale scores to [0, 1]. When every score is equal (including a
 * single job) all scaled values are 0.
 */
export function minMaxNormalize(scores: ReadonlyMap<JobId, number>): Map<JobId, number> {
  const normalized = new Map<JobId, number>();
  if (scores.size === 0) {
    return normalized;
  }

  let min = Infinity;
  let max = -Infinity;
  for (const value of scores.values()) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const range = max - min;

  for (const [jobId, value] of scores) {
    normalized.set(jobId, range > 0 ? (value - min) / range : 0);
  }
  return normalized;
}

/**
 * Merge cosine and LLR results into one ranked list.
 * A job missing from one list scores 0 for that algorithm.
 */
export function rankCombined(
  cosineResults: readonly ScoreResult[],
  llrResults: readonly ScoreResult[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): CombinedScoreResult[] {
  const validWeights = validateWeights(weights);

  const cosineByJob = new Map<JobId, number>();
  for (const result of cosineResults) {
    cosineByJob.set(result.jobId, result.score);
  }

  const llrByJob = new Map<JobId, number>();
  for (const result of llrResults) {
    llrByJob.set(result.jobId, result.score);
  }

  const jobIds = new Set<JobId>([...cosineByJob.keys(), ...llrByJob.keys()]);
  for (const jobId of jobIds) {
    if (!llrByJob.has(jobId)) llrByJob.set(jobId, 0);
  }
  const llrNormalized = minMaxNormalize(llrByJob);

  const combined: CombinedScoreResult[] = [];
  for (const jobId of jobIds) {
    const cosineScore = cosineByJob.get(jobId) ?? 0;
    const llrScore = llrByJob.get(jobId) ?? 0;
    const llrNorm = llrNormalized.get(jobId) ?? 0;
    combined.push({
      jobId,
      cosineScore,
      llrScore,
      llrNormalized: llrNorm,
      combinedScore: validWeights.cosine * cosineScore + validWeights.llr * llrNorm,
      weights: validWeights,
    });
  }

  return combined.sort((a, b) =>
    byScoreThenId(
      { jobId: a.jobId, score: a.combinedScore },
      { jobId: b.jobId, score: b.combinedScore }
    )
  );
}
