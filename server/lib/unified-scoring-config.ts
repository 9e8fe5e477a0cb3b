/**
 * UNIFIED SCORING CONFIGURATION
 *
 * Default weights and neighbourhood sizes for the recommendation engine.
 * Every value here can be overridden through the RECOMMENDER_* environment
 * variables (see server/config/unified-config.ts) or per request.
 *
 * @fileoverview Single source of truth for recommender defaults.
 */

import type { ScoringWeights } from "@shared/schema";

// ===== SCORING WEIGHTS =====

/**
 * Weights of the normalized cosine and LLR scores in the combined ranking.
 * They do not have to sum to 1; only their ratio changes the order.
 */
export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  cosine: 0.6,
  llr: 0.4,
});

// ===== RECOMMENDER SETTINGS =====

export interface RecommenderSettings {
  weights: ScoringWeights;
  /** Number of top-ranked other jobs mined for recommended skills */
  neighbourhoodSize: number;
  /** Cap on recommended skills in a gap report */
  maxRecommendedSkills: number;
  /** Number of most similar users consulted by the peer recommender */
  peerLimit: number;
}

export const DEFAULT_RECOMMENDER_SETTINGS: Readonly<RecommenderSettings> = Object.freeze({
  weights: DEFAULT_SCORING_WEIGHTS,
  neighbourhoodSize: 5,
  maxRecommendedSkills: 10,
  peerLimit: 5,
});

// ===== ROUNDING =====

/** Decimal places kept for scores in responses */
export const SCORE_PRECISION = 4;

export function roundScore(value: number, precision = SCORE_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function roundPercentage(value: number): number {
  return Math.round(value * 10) / 10;
}
