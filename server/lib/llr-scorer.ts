/**
 * Log-likelihood ratio scoring
 *
 * Dunning's G² statistic over a 2×2 contingency table of skills:
 *
 * |               | job requires | job does not |
 * |---------------|--------------|--------------|
 * | user has      | k11          | k21          |
 * | user has not  | k12          | k22          |
 *
 * counted over the skill universe. G² itself is unsigned, so only tables whose
 * overlap exceeds the independence expectation are scored; a high score then
 * means the overlap is unlikely to be coincidental. The same statistic
 * compares two users in the peer recommender.
 */

import type { Job } from "@shared/schema";
import type { SkillId } from "@shared/api-contracts";
import type { SkillUniverse, SkillVector } from "./skill-universe";

export interface ContingencyTable {
  /** skills in both sets */
  k11: number;
  /** skills only in the second set (the job) */
  k12: number;
  /** skills only in the first set (the user) */
  k21: number;
  /** universe skills in neither set */
  k22: number;
}

/**
 * Read-only aggregate over the job corpus, built once per scoring pass and
 * shared by every per-job computation.
 */
export interface CorpusStatistics {
  readonly universeSize: number;
  readonly jobCount: number;
  /** Number of jobs requiring each universe skill */
  readonly jobFrequency: ReadonlyMap<SkillId, number>;
}

export function buildCorpusStatistics(
  jobs: readonly Job[],
  universe: SkillUniverse
): CorpusStatistics {
  const jobFrequency = new Map<SkillId, number>();
  for (const job of jobs) {
    // a job listing the same skill twice still counts once
    const seen = new Set<SkillId>();
    for (const skill of job.requiredSkills) {
      if (!universe.indexOf.has(skill.id) || seen.has(skill.id)) continue;
      seen.add(skill.id);
      jobFrequency.set(skill.id, (jobFrequency.get(skill.id) ?? 0) + 1);
    }
  }

  return Object.freeze({
    universeSize: universe.skillIds.length,
    jobCount: jobs.length,
    jobFrequency,
  });
}

/**
 * Σ c·ln(c / total), skipping empty cells (0·ln 0 := 0)
 */
export function entropy(...counts: number[]): number {
  const total = counts.reduce((sum, c) => sum + c, 0);
  let result = 0;
  for (const c of counts) {
    if (c > 0) {
      result += c * Math.log(c / total);
    }
  }
  return result;
}

/**
 * G² = 2·Σ observed·ln(observed / expected), computed in entropy form.
 * Clamped at 0 to absorb floating-point drift.
 */
export function logLikelihoodRatio({ k11, k12, k21, k22 }: ContingencyTable): number {
  const matrixEntropy = entropy(k11, k12, k21, k22);
  const rowEntropy = entropy(k11 + k12, k21 + k22);
  const columnEntropy = entropy(k11 + k21, k12 + k22);
  return Math.max(0, 2 * (matrixEntropy - rowEntropy - columnEntropy));
}

/**
 * k11 above its expected count (k11 + k12)(k11 + k21) / N. False whenever the
 * sets share nothing.
 */
export function isPositivelyAssociated({ k11, k12, k21, k22 }: ContingencyTable): boolean {
  const total = k11 + k12 + k21 + k22;
  return k11 * total > (k11 + k12) * (k11 + k21);
}

export function contingencyTable(
  userVector: SkillVector,
  jobVector: SkillVector,
  universeSize: number
): ContingencyTable {
  if (userVector.length !== jobVector.length) {
    throw new Error(`Vector length mismatch: ${userVector.length} vs ${jobVector.length}`);
  }

  let k11 = 0;
  let k12 = 0;
  let k21 = 0;
  for (let i = 0; i < userVector.length; i++) {
    if (userVector[i] === 1 && jobVector[i] === 1) k11++;
    else if (jobVector[i] === 1) k12++;
    else if (userVector[i] === 1) k21++;
  }

  return { k11, k12, k21, k22: Math.max(0, universeSize - k11 - k12 - k21) };
}

/**
 * LLR score of one job for one user. 0 unless they share more skills than
 * independence predicts.
 */
export function llrScore(
  userVector: SkillVector,
  jobVector: SkillVector,
  corpus: CorpusStatistics
): number {
  const table = contingencyTable(userVector, jobVector, corpus.universeSize);
  if (!isPositivelyAssociated(table)) {
    return 0;
  }
  return logLikelihoodRatio(table);
}
