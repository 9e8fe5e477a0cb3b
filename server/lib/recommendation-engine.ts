/**
 * RECOMMENDATION ENGINE: one scoring pass over a job corpus
 *
 * @fileoverview Builds the universe, corpus statistics and every vector once,
 * scores each job with cosine similarity and LLR, then ranks both and their
 * weighted combination. The pass is pure and synchronous: it reads only its
 * arguments and returns a new value, so concurrent requests never share
 * mutable state.
 *
 * @example
 * ```typescript
 * const pass = runScoringPass(user.skills, jobs, { weights: { cosine: 0.7, llr: 0.3 } });
 * const best = pass.combined[0];
 * const report = explainJob(pass, best.jobId);
 * ```
 */

import type { Job, ScoringWeights, Skill } from "@shared/schema";
import type { JobId } from "@shared/api-contracts";
import { logger } from "../config/logger";
import {
  buildSkillUniverse,
  toSkillSet,
  vectorize,
  type SkillUniverse,
} from "./skill-universe";
import { cosineScore } from "./cosine-scorer";
import { buildCorpusStatistics, llrScore, type CorpusStatistics } from "./llr-scorer";
import {
  rankCombined,
  rankScores,
  validateWeights,
  type CombinedScoreResult,
  type ScoreResult,
} from "./combined-ranker";
import { analyzeSkillGap, type SkillGapReport } from "./skill-gap-analyzer";
import { DEFAULT_RECOMMENDER_SETTINGS } from "./unified-scoring-config";

export interface ScoringPassOptions {
  weights?: ScoringWeights;
  /** Extra skills to include in the universe besides those the jobs require */
  catalog?: readonly Skill[];
  clock?: () => Date;
}

export interface ScoringPass {
  userSkills: Skill[];
  jobs: readonly Job[];
  jobsById: ReadonlyMap<JobId, Job>;
  universe: SkillUniverse;
  corpus: CorpusStatistics;
  /** Ranked by cosine score */
  cosine: ScoreResult[];
  /** Ranked by LLR score */
  llr: ScoreResult[];
  /** Ranked by combined score */
  combined: CombinedScoreResult[];
  weights: ScoringWeights;
  completedAt: Date;
}

export interface ExplainOptions {
  neighbourhoodSize?: number;
  maxRecommendedSkills?: number;
}

function dedupeSkills(skills: readonly Skill[]): Skill[] {
  const byId = new Map<number, Skill>();
  for (const skill of skills) {
    if (!byId.has(skill.id)) byId.set(skill.id, skill);
  }
  return Array.from(byId.values()).sort((a, b) => a.id - b.id);
}

/**
 * First job wins when ids repeat
 */
function dedupeJobs(jobs: readonly Job[]): Job[] {
  const byId = new Map<JobId, Job>();
  for (const job of jobs) {
    if (!byId.has(job.id)) byId.set(job.id, job);
  }
  return Array.from(byId.values());
}

/**
 * Score every job in the corpus for one user. Jobs sharing an id are scored
 * once.
 *
 * @throws {AppValidationError} for invalid weights, before any scoring runs
 */
export function runScoringPass(
  userSkills: readonly Skill[],
  jobs: readonly Job[],
  options: ScoringPassOptions = {}
): ScoringPass {
  const weights = validateWeights(options.weights ?? DEFAULT_RECOMMENDER_SETTINGS.weights);
  const clock = options.clock ?? (() => new Date());
  const startTime = Date.now();

  const corpusJobs = dedupeJobs(jobs);
  const universe = buildSkillUniverse(corpusJobs, options.catalog);
  const corpus = buildCorpusStatistics(corpusJobs, universe);
  const userVector = vectorize(toSkillSet(userSkills), universe);

  const cosineResults: ScoreResult[] = [];
  const llrResults: ScoreResult[] = [];
  const jobsById = new Map<JobId, Job>();

  for (const job of corpusJobs) {
    jobsById.set(job.id, job);
    const jobVector = vectorize(toSkillSet(job.requiredSkills), universe);
    cosineResults.push({
      jobId: job.id,
      score: cosineScore(userVector, jobVector),
      algorithm: "cosine_similarity",
    });
    llrResults.push({
      jobId: job.id,
      score: llrScore(userVector, jobVector, corpus),
      algorithm: "llr_similarity",
    });
  }

  const combined = rankCombined(cosineResults, llrResults, weights);

  logger.debug({
    jobs: corpusJobs.length,
    duplicateJobs: jobs.length - corpusJobs.length,
    universeSize: universe.skillIds.length,
    userSkills: userSkills.length,
    durationMs: Date.now() - startTime,
  }, "Scoring pass completed");

  return {
    userSkills: dedupeSkills(userSkills),
    jobs: corpusJobs,
    jobsById,
    universe,
    corpus,
    cosine: rankScores(cosineResults),
    llr: rankScores(llrResults),
    combined,
    weights,
    completedAt: clock(),
  };
}

/**
 * Skill gap report for one job of a pass, with recommended skills drawn from
 * the pass's combined ranking. Undefined when the job is not in the corpus.
 */
export function explainJob(
  pass: ScoringPass,
  jobId: JobId,
  options: ExplainOptions = {}
): SkillGapReport | undefined {
  const job = pass.jobsById.get(jobId);
  if (!job) {
    return undefined;
  }
  return analyzeSkillGap(pass.userSkills, job, {
    ranking: pass.combined,
    jobsById: pass.jobsById,
    corpus: pass.corpus,
    neighbourhoodSize: options.neighbourhoodSize,
    maxRecommendedSkills: options.maxRecommendedSkills,
  });
}
