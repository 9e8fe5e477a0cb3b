/**
 * Response mappers
 *
 * Pure functions turning a ScoringPass into the response records of
 * @shared/api-contracts. Scores are rounded here and only here; ranking
 * always uses the unrounded values.
 */

import type { Job, Skill } from "@shared/schema";
import type {
  CombinedRecommendation,
  CombinedRecommendationResponse,
  CosineRecommendation,
  CosineRecommendationResponse,
  LlrRecommendation,
  LlrRecommendationResponse,
  PeerSkillRecommendationResponse,
  SkillSummary,
  SkillsAnalysisResponse,
  UserId,
} from "@shared/api-contracts";
import type { ScoringPass } from "./recommendation-engine";
import type { SkillGapReport } from "./skill-gap-analyzer";
import type { PeerSkillRecommendation } from "./peer-skill-recommender";
import { roundScore } from "./unified-scoring-config";

export const ALGORITHM_DESCRIPTIONS = {
  cosine_similarity:
    "Cosine similarity between the user's skill vector and each job's required-skill vector",
  llr_similarity:
    "Log-likelihood ratio of the overlap between the user's skills and each job's required skills",
  combined:
    "Weighted combination of cosine similarity and min-max normalized log-likelihood ratio",
} as const;

export function toSkillSummary(skill: Skill): SkillSummary {
  return { skill_id: skill.id, skill_name: skill.name };
}

function skillNames(job: Job): string[] {
  return job.requiredSkills.map((skill) => skill.name);
}

function takeLimit<T>(items: T[], limit?: number): T[] {
  return limit === undefined ? items : items.slice(0, limit);
}

/**
 * The best entry, or null when nothing scored above zero
 */
function topOf<T>(recommendations: T[], ranked: readonly { score: number }[]): T | null {
  const first = recommendations[0];
  return first !== undefined && (ranked[0]?.score ?? 0) > 0 ? first : null;
}

function requireJob(pass: ScoringPass, jobId: number): Job {
  const job = pass.jobsById.get(jobId);
  if (!job) {
    throw new Error(`Scored job ${jobId} is missing from the scoring pass`);
  }
  return job;
}

export function toCosineResponse(pass: ScoringPass, limit?: number): CosineRecommendationResponse {
  const recommendations = pass.cosine.map((result): CosineRecommendation => {
    const job = requireJob(pass, result.jobId);
    return {
      job_id: job.id,
      title: job.title,
      skills: skillNames(job),
      cosine_score: roundScore(result.score),
      algorithm: "cosine_similarity",
    };
  });

  return {
    algorithm: "cosine_similarity",
    description: ALGORITHM_DESCRIPTIONS.cosine_similarity,
    top_recommendation: topOf(recommendations, pass.cosine),
    all_recommendations: takeLimit(recommendations, limit),
    user_skills: pass.userSkills.map(toSkillSummary),
    total_jobs_analyzed: pass.jobs.length,
    recommendation_date: pass.completedAt.toISOString(),
  };
}

export function toLlrResponse(pass: ScoringPass, limit?: number): LlrRecommendationResponse {
  const recommendations = pass.llr.map((result): LlrRecommendation => {
    const job = requireJob(pass, result.jobId);
    return {
      job_id: job.id,
      title: job.title,
      skills: skillNames(job),
      llr_score: roundScore(result.score),
      algorithm: "llr_similarity",
    };
  });

  return {
    algorithm: "llr_similarity",
    description: ALGORITHM_DESCRIPTIONS.llr_similarity,
    top_recommendation: topOf(recommendations, pass.llr),
    all_recommendations: takeLimit(recommendations, limit),
    user_skills: pass.userSkills.map(toSkillSummary),
    total_jobs_analyzed: pass.jobs.length,
    recommendation_date: pass.completedAt.toISOString(),
  };
}

export function toCombinedResponse(pass: ScoringPass, limit?: number): CombinedRecommendationResponse {
  const recommendations = pass.combined.map((result): CombinedRecommendation => {
    const job = requireJob(pass, result.jobId);
    return {
      job_id: job.id,
      title: job.title,
      skills: skillNames(job),
      cosine_score: roundScore(result.cosineScore),
      llr_score: roundScore(result.llrScore),
      llr_normalized: roundScore(result.llrNormalized),
      combined_score: roundScore(result.combinedScore),
    };
  });

  return {
    algorithm: "combined",
    description: ALGORITHM_DESCRIPTIONS.combined,
    cosine_similarity: toCosineResponse(pass, limit),
    llr_similarity: toLlrResponse(pass, limit),
    combined_recommendations: {
      weights: { cosine: pass.weights.cosine, llr: pass.weights.llr },
      top_recommendation: topOf(
        recommendations,
        pass.combined.map((result) => ({ score: result.combinedScore }))
      ),
      all_recommendations: takeLimit(recommendations, limit),
    },
    summary: {
      total_jobs_analyzed: pass.jobs.length,
      user_skills_count: pass.userSkills.length,
    },
    user_skills: pass.userSkills.map(toSkillSummary),
    recommendation_date: pass.completedAt.toISOString(),
  };
}

export function toSkillsAnalysisResponse(pass: ScoringPass, report: SkillGapReport): SkillsAnalysisResponse {
  const combined = pass.combined.find((result) => result.jobId === report.job.id);

  return {
    job: {
      job_id: report.job.id,
      title: report.job.title,
      description: report.job.description,
      skills: report.job.requiredSkills.map(toSkillSummary),
    },
    similarity_scores: {
      cosine_similarity: roundScore(combined?.cosineScore ?? 0),
      llr_similarity: roundScore(combined?.llrScore ?? 0),
    },
    skills_analysis: {
      matching_skills: report.matchingSkills.map(toSkillSummary),
      recommended_skills: report.recommendedSkills.map(toSkillSummary),
      missing_skills: report.missingSkills.map(toSkillSummary),
    },
    stats: {
      total_user_skills: report.stats.totalUserSkills,
      total_job_skills: report.stats.totalJobSkills,
      matching_count: report.stats.matchingCount,
      missing_count: report.stats.missingCount,
      recommended_count: report.stats.recommendedCount,
      match_percentage: report.stats.matchPercentage,
    },
  };
}

export function toPeerSkillResponse(
  userId: UserId,
  recommendation: PeerSkillRecommendation
): PeerSkillRecommendationResponse {
  return {
    user_id: userId,
    similar_users: recommendation.similarUsers.map((user) => ({
      user_id: user.userId,
      username: user.username,
      llr_score: roundScore(user.score),
    })),
    recommended_skills: recommendation.recommendedSkills.map(toSkillSummary),
  };
}
