/**
 * Skill gap analysis
 *
 * Explains a recommendation by comparing the user's raw skill set with one
 * job's required skills. This step works on skill ids directly, not on
 * vectors, so skills missing from the current universe are still reported.
 *
 * Recommended skills look past the job itself: they are the skills most often
 * required by the other top-ranked jobs that the user does not have yet.
 */

import type { Job, Skill } from "@shared/schema";
import type { JobId, SkillId } from "@shared/api-contracts";
import type { CombinedScoreResult } from "./combined-ranker";
import type { CorpusStatistics } from "./llr-scorer";
import { DEFAULT_RECOMMENDER_SETTINGS, roundPercentage } from "./unified-scoring-config";

export interface SkillGapStats {
  totalUserSkills: number;
  totalJobSkills: number;
  matchingCount: number;
  missingCount: number;
  recommendedCount: number;
  /** matching / total job skills × 100, one decimal; 0 for a job without skills */
  matchPercentage: number;
}

export interface SkillGapReport {
  job: Job;
  matchingSkills: Skill[];
  missingSkills: Skill[];
  recommendedSkills: Skill[];
  stats: SkillGapStats;
}

/**
 * Ranking context used to derive recommended skills. Without it the report
 * has no recommendations.
 */
export interface SkillGapContext {
  ranking: readonly CombinedScoreResult[];
  jobsById: ReadonlyMap<JobId, Job>;
  corpus?: CorpusStatistics;
  neighbourhoodSize?: number;
  maxRecommendedSkills?: number;
}

function uniqueById(skills: readonly Skill[]): Skill[] {
  const byId = new Map<SkillId, Skill>();
  for (const skill of skills) {
    if (!byId.has(skill.id)) byId.set(skill.id, skill);
  }
  return Array.from(byId.values()).sort((a, b) => a.id - b.id);
}

function recommendFromNeighbourhood(
  job: Job,
  userSkillIds: ReadonlySet<SkillId>,
  jobSkillIds: ReadonlySet<SkillId>,
  context: SkillGapContext
): Skill[] {
  const neighbourhoodSize = context.neighbourhoodSize ?? DEFAULT_RECOMMENDER_SETTINGS.neighbourhoodSize;
  const maxRecommended = context.maxRecommendedSkills ?? DEFAULT_RECOMMENDER_SETTINGS.maxRecommendedSkills;

  const neighbours: Job[] = [];
  for (const entry of context.ranking) {
    if (neighbours.length >= neighbourhoodSize) break;
    // zero-scored jobs share nothing with the user and are not "highly ranked"
    if (entry.jobId === job.id || entry.combinedScore <= 0) continue;
    const neighbour = context.jobsById.get(entry.jobId);
    if (neighbour) neighbours.push(neighbour);
  }

  const counts = new Map<SkillId, { skill: Skill; count: number }>();
  for (const neighbour of neighbours) {
    for (const skill of uniqueById(neighbour.requiredSkills)) {
      if (userSkillIds.has(skill.id) || jobSkillIds.has(skill.id)) continue;
      const entry = counts.get(skill.id);
      if (entry) {
        entry.count++;
      } else {
        counts.set(skill.id, { skill, count: 1 });
      }
    }
  }

  const frequency = (id: SkillId) => context.corpus?.jobFrequency.get(id) ?? 0;

  return Array.from(counts.values())
    .sort((a, b) =>
      b.count - a.count ||
      frequency(b.skill.id) - frequency(a.skill.id) ||
      a.skill.id - b.skill.id
    )
    .slice(0, maxRecommended)
    .map((entry) => entry.skill);
}

export function analyzeSkillGap(
  userSkills: readonly Skill[],
  job: Job,
  context?: SkillGapContext
): SkillGapReport {
  const user = uniqueById(userSkills);
  const required = uniqueById(job.requiredSkills);
  const userSkillIds = new Set(user.map((skill) => skill.id));
  const jobSkillIds = new Set(required.map((skill) => skill.id));

  const matchingSkills = required.filter((skill) => userSkillIds.has(skill.id));
  const missingSkills = required.filter((skill) => !userSkillIds.has(skill.id));
  const recommendedSkills = context
    ? recommendFromNeighbourhood(job, userSkillIds, jobSkillIds, context)
    : [];

  const matchPercentage = required.length > 0
    ? roundPercentage((matchingSkills.length / required.length) * 100)
    : 0;

  return {
    job,
    matchingSkills,
    missingSkills,
    recommendedSkills,
    stats: {
      totalUserSkills: user.length,
      totalJobSkills: required.length,
      matchingCount: matchingSkills.length,
      missingCount: missingSkills.length,
      recommendedCount: recommendedSkills.length,
      matchPercentage,
    },
  };
}
