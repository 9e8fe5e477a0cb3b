/**
 * Single Source of Truth for API Routes and Response Records
 *
 * Route paths and the record types every recommendation endpoint returns.
 * Response records keep snake_case keys: they are the wire format of the
 * recommendation API and are assembled only by the mappers in
 * server/lib/recommendation-mappers.ts.
 */

export type SkillId = number;
export type JobId = number;
export type UserId = number;

export type ScoringAlgorithm = 'cosine_similarity' | 'llr_similarity';

// API Response wrapper types
export interface ApiResponse<T = unknown> {
  data: T;
  success: true;
  timestamp: string;
}

export interface ApiError {
  error: string;
  message: string;
  success: false;
  timestamp: string;
  details?: Record<string, unknown>;
}

export const API_BASE = '/api/v1';

export const API_ROUTES = {
  HEALTH: `${API_BASE}/health`,
  SKILLS: {
    LIST: `${API_BASE}/skills`,
    CREATE: `${API_BASE}/skills`,
  },
  JOBS: {
    LIST: `${API_BASE}/jobs`,
    CREATE: `${API_BASE}/jobs`,
    GET_BY_ID: `${API_BASE}/jobs/:id`,
  },
  USERS: {
    GET_BY_ID: `${API_BASE}/users/:id`,
    UPDATE_SKILLS: `${API_BASE}/users/:id/skills`,
    SKILL_RECOMMENDATIONS: `${API_BASE}/users/:id/skill-recommendations`,
  },
  RECOMMENDATIONS: {
    COSINE: `${API_BASE}/recommendations/cosine`,
    LLR: `${API_BASE}/recommendations/llr`,
    COMBINED: `${API_BASE}/recommendations/combined`,
    SKILLS_ANALYSIS: `${API_BASE}/recommendations/jobs/:jobId/skills-analysis`,
  },
} as const;

export function buildRoute(template: string, params: Record<string, string | number>): string {
  return Object.entries(params).reduce(
    (route, [key, value]) => route.replace(`:${key}`, String(value)),
    template
  );
}

// ==================== RESPONSE RECORDS ====================

export interface SkillSummary {
  skill_id: SkillId;
  skill_name: string;
}

interface RecommendationBase {
  job_id: JobId;
  title: string;
  skills: string[];
}

export interface CosineRecommendation extends RecommendationBase {
  cosine_score: number;
  algorithm: 'cosine_similarity';
}

export interface LlrRecommendation extends RecommendationBase {
  llr_score: number;
  algorithm: 'llr_similarity';
}

export interface CombinedRecommendation extends RecommendationBase {
  cosine_score: number;
  llr_score: number;
  llr_normalized: number;
  combined_score: number;
}

interface SingleAlgorithmResponse<A extends ScoringAlgorithm, R> {
  algorithm: A;
  description: string;
  top_recommendation: R | null;
  all_recommendations: R[];
  user_skills: SkillSummary[];
  total_jobs_analyzed: number;
  recommendation_date: string;
}

export type CosineRecommendationResponse = SingleAlgorithmResponse<'cosine_similarity', CosineRecommendation>;
export type LlrRecommendationResponse = SingleAlgorithmResponse<'llr_similarity', LlrRecommendation>;

export interface CombinedRecommendationResponse {
  algorithm: 'combined';
  description: string;
  cosine_similarity: CosineRecommendationResponse;
  llr_similarity: LlrRecommendationResponse;
  combined_recommendations: {
    weights: { cosine: number; llr: number };
    top_recommendation: CombinedRecommendation | null;
    all_recommendations: CombinedRecommendation[];
  };
  summary: {
    total_jobs_analyzed: number;
    user_skills_count: number;
  };
  user_skills: SkillSummary[];
  recommendation_date: string;
}

export interface SkillsAnalysisStats {
  total_user_skills: number;
  total_job_skills: number;
  matching_count: number;
  missing_count: number;
  recommended_count: number;
  match_percentage: number;
}

export interface SkillsAnalysisResponse {
  job: {
    job_id: JobId;
    title: string;
    description: string;
    skills: SkillSummary[];
  };
  similarity_scores: {
    cosine_similarity: number;
    llr_similarity: number;
  };
  skills_analysis: {
    matching_skills: SkillSummary[];
    recommended_skills: SkillSummary[];
    missing_skills: SkillSummary[];
  };
  stats: SkillsAnalysisStats;
}

export interface PeerSkillRecommendationResponse {
  user_id: UserId;
  similar_users: Array<{ user_id: UserId; username: string; llr_score: number }>;
  recommended_skills: SkillSummary[];
}
