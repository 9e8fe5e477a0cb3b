/**
 * BUSINESS LOGIC: Recommendation Service Layer
 * Resolves request input against storage, runs the engine and maps the result
 *
 * @fileoverview The service is the only place where the engine meets storage.
 * It loads the user's skills, the job corpus and the skill catalogue, runs a
 * single scoring pass and returns the response record as a Result.
 *
 * @example
 * ```typescript
 * const service = createRecommendationService(storage, config.recommender);
 *
 * const result = await service.recommendCombined({ userId: 7, limit: 10 });
 * if (isSuccess(result)) {
 *   console.log(result.data.combined_recommendations.top_recommendation);
 * }
 * ```
 */

import type { ScoringWeights, Skill } from '@shared/schema';
import type {
  CombinedRecommendationResponse,
  CosineRecommendationResponse,
  JobId,
  LlrRecommendationResponse,
  PeerSkillRecommendationResponse,
  SkillId,
  SkillsAnalysisResponse,
  UserId
} from '@shared/api-contracts';
import {
  failure,
  mapResult,
  success,
  type RecommendationResult
} from '@shared/result-types';
import { AppNotFoundError, AppValidationError } from '@shared/errors';
import { logger } from '../config/logger';
import type { IStorage } from '../storage';
import { explainJob, runScoringPass, type ScoringPass } from '../lib/recommendation-engine';
import {
  toCombinedResponse,
  toCosineResponse,
  toLlrResponse,
  toPeerSkillResponse,
  toSkillsAnalysisResponse
} from '../lib/recommendation-mappers';
import { recommendSkillsFromPeers } from '../lib/peer-skill-recommender';
import { buildSkillUniverse } from '../lib/skill-universe';
import {
  DEFAULT_RECOMMENDER_SETTINGS,
  type RecommenderSettings
} from '../lib/unified-scoring-config';

// ===== SERVICE INTERFACES =====

/**
 * Who to recommend for: a stored user, or an explicit list of skill ids
 */
export type UserSelector =
  | { userId: UserId; skillIds?: undefined }
  | { userId?: undefined; skillIds: SkillId[] };

export type RecommendationOptions = UserSelector & {
  weights?: ScoringWeights;
  limit?: number;
};

// ===== RECOMMENDATION SERVICE IMPLEMENTATION =====

export class RecommendationService {
  constructor(
    private storageProvider: IStorage,
    private settings: RecommenderSettings = DEFAULT_RECOMMENDER_SETTINGS
  ) {}

  /**
   * Skills of the selected user. Explicit ids missing from the catalogue are
   * kept under a placeholder name: vectorization ignores them, the gap
   * analysis still reports them.
   */
  private async resolveUserSkills(selector: UserSelector): Promise<RecommendationResult<Skill[]>> {
    if (selector.userId !== undefined) {
      const user = await this.storageProvider.getUser(selector.userId);
      if (!user) {
        return failure(AppNotFoundError.user(selector.userId));
      }
      return success(user.skills);
    }

    const known = await this.storageProvider.getSkillsByIds(selector.skillIds);
    const knownIds = new Set(known.map((skill) => skill.id));
    const unknown = Array.from(new Set(selector.skillIds)).filter((id) => !knownIds.has(id));
    if (unknown.length > 0) {
      logger.warn({ skillIds: unknown }, 'Recommendation requested with unknown skill ids');
    }

    return success([
      ...known,
      ...unknown.map((id) => ({ id, name: `Unknown skill #${id}` }))
    ]);
  }

  private async score(options: RecommendationOptions): Promise<RecommendationResult<ScoringPass>> {
    const userSkills = await this.resolveUserSkills(options);
    if (!userSkills.success) {
      return userSkills;
    }

    const [jobs, catalog] = await Promise.all([
      this.storageProvider.getJobs(),
      this.storageProvider.getSkills()
    ]);

    try {
      return success(runScoringPass(userSkills.data, jobs, {
        weights: options.weights ?? this.settings.weights,
        catalog
      }));
    } catch (error) {
      if (error instanceof AppValidationError) {
        logger.warn({ error: error.message, weights: options.weights }, 'Scoring pass rejected');
        return failure(error);
      }
      throw error;
    }
  }

  async recommendByCosine(options: RecommendationOptions): Promise<RecommendationResult<CosineRecommendationResponse>> {
    const pass = await this.score(options);
    return mapResult(pass, (data) => toCosineResponse(data, options.limit));
  }

  async recommendByLlr(options: RecommendationOptions): Promise<RecommendationResult<LlrRecommendationResponse>> {
    const pass = await this.score(options);
    return mapResult(pass, (data) => toLlrResponse(data, options.limit));
  }

  async recommendCombined(options: RecommendationOptions): Promise<RecommendationResult<CombinedRecommendationResponse>> {
    const pass = await this.score(options);
    return mapResult(pass, (data) => toCombinedResponse(data, options.limit));
  }

  /**
   * Skill gap analysis of one job, with recommended skills drawn from the
   * other top-ranked jobs of the same pass
   */
  async analyzeJobSkills(
    jobId: JobId,
    options: RecommendationOptions
  ): Promise<RecommendationResult<SkillsAnalysisResponse>> {
    const job = await this.storageProvider.getJob(jobId);
    if (!job) {
      return failure(AppNotFoundError.job(jobId));
    }

    const pass = await this.score(options);
    if (!pass.success) {
      return pass;
    }

    const report = explainJob(pass.data, jobId, {
      neighbourhoodSize: this.settings.neighbourhoodSize,
      maxRecommendedSkills: this.settings.maxRecommendedSkills
    });
    if (!report) {
      return failure(AppNotFoundError.job(jobId));
    }

    return success(toSkillsAnalysisResponse(pass.data, report));
  }

  /**
   * Skills held by the users most similar to the given one
   */
  async recommendSkillsForUser(
    userId: UserId,
    limit: number = this.settings.peerLimit
  ): Promise<RecommendationResult<PeerSkillRecommendationResponse>> {
    const user = await this.storageProvider.getUser(userId);
    if (!user) {
      return failure(AppNotFoundError.user(userId));
    }

    const [users, catalog] = await Promise.all([
      this.storageProvider.getUsers(),
      this.storageProvider.getSkills()
    ]);
    const universe = buildSkillUniverse([], catalog);

    return success(toPeerSkillResponse(userId, recommendSkillsFromPeers(user, users, universe, limit)));
  }
}

export function createRecommendationService(
  storage: IStorage,
  settings?: RecommenderSettings
): RecommendationService {
  return new RecommendationService(storage, settings);
}
