/**
 * Unit Tests for response mappers
 */

import { describe, test, expect } from '@jest/globals';
import { explainJob, runScoringPass } from '../../../server/lib/recommendation-engine';
import {
  toCombinedResponse,
  toCosineResponse,
  toLlrResponse,
  toPeerSkillResponse,
  toSkillsAnalysisResponse,
} from '../../../server/lib/recommendation-mappers';
import { BACKEND_JOB, SKILLS, TWO_JOB_CORPUS } from '../../helpers/catalog-fixtures';

const clock = () => new Date('2026-03-01T12:00:00.000Z');

describe('recommendation mappers', () => {
  const pass = runScoringPass([SKILLS.python, SKILLS.sql], TWO_JOB_CORPUS, { clock });

  test('maps the cosine ranking with rounded scores', () => {
    const response = toCosineResponse(pass);

    expect(response.algorithm).toBe('cosine_similarity');
    expect(response.top_recommendation).toEqual({
      job_id: 1,
      title: 'Backend Engineer',
      skills: ['Python', 'SQL', 'FastAPI'],
      cosine_score: 0.8165,
      algorithm: 'cosine_similarity',
    });
    expect(response.all_recommendations.map((r) => r.cosine_score)).toEqual([0.8165, 0]);
    expect(response.user_skills).toEqual([
      { skill_id: 1, skill_name: 'Python' },
      { skill_id: 2, skill_name: 'SQL' },
    ]);
    expect(response.total_jobs_analyzed).toBe(2);
    expect(response.recommendation_date).toBe('2026-03-01T12:00:00.000Z');
  });

  test('maps the LLR ranking', () => {
    const response = toLlrResponse(pass);

    expect(response.top_recommendation?.job_id).toBe(1);
    expect(response.top_recommendation?.llr_score).toBe(2.911);
    expect(response.all_recommendations[1].llr_score).toBe(0);
  });

  test('nests both single-algorithm views in the combined response', () => {
    const response = toCombinedResponse(pass);

    expect(response.algorithm).toBe('combined');
    expect(response.cosine_similarity.algorithm).toBe('cosine_similarity');
    expect(response.llr_similarity.algorithm).toBe('llr_similarity');
    expect(response.combined_recommendations.weights).toEqual({ cosine: 0.6, llr: 0.4 });
    expect(response.combined_recommendations.top_recommendation).toEqual({
      job_id: 1,
      title: 'Backend Engineer',
      skills: ['Python', 'SQL', 'FastAPI'],
      cosine_score: 0.8165,
      llr_score: 2.911,
      llr_normalized: 1,
      combined_score: 0.8899,
    });
    expect(response.summary).toEqual({ total_jobs_analyzed: 2, user_skills_count: 2 });
  });

  test('truncates only the list when a limit is given', () => {
    const response = toCombinedResponse(pass, 1);

    expect(response.combined_recommendations.all_recommendations).toHaveLength(1);
    expect(response.cosine_similarity.all_recommendations).toHaveLength(1);
    expect(response.summary.total_jobs_analyzed).toBe(2);
  });

  test('has no top recommendation when nothing scores', () => {
    const empty = runScoringPass([], TWO_JOB_CORPUS);
    const response = toCombinedResponse(empty);

    expect(response.combined_recommendations.top_recommendation).toBeNull();
    expect(response.cosine_similarity.top_recommendation).toBeNull();
    expect(response.llr_similarity.top_recommendation).toBeNull();
    expect(response.combined_recommendations.all_recommendations.map((r) => r.combined_score)).toEqual([0, 0]);
  });

  test('has no top recommendation for an empty corpus', () => {
    const response = toCosineResponse(runScoringPass([SKILLS.python], []));

    expect(response.top_recommendation).toBeNull();
    expect(response.all_recommendations).toEqual([]);
    expect(response.total_jobs_analyzed).toBe(0);
  });

  test('maps a gap report with the job similarity scores', () => {
    const report = explainJob(pass, BACKEND_JOB.id);
    if (!report) throw new Error('expected a report');

    const response = toSkillsAnalysisResponse(pass, report);

    expect(response.job).toEqual({
      job_id: 1,
      title: 'Backend Engineer',
      description: '',
      skills: [
        { skill_id: 1, skill_name: 'Python' },
        { skill_id: 2, skill_name: 'SQL' },
        { skill_id: 3, skill_name: 'FastAPI' },
      ],
    });
    expect(response.similarity_scores).toEqual({ cosine_similarity: 0.8165, llr_similarity: 2.911 });
    expect(response.skills_analysis.missing_skills).toEqual([{ skill_id: 3, skill_name: 'FastAPI' }]);
    expect(response.stats).toEqual({
      total_user_skills: 2,
      total_job_skills: 3,
      matching_count: 2,
      missing_count: 1,
      recommended_count: 0,
      match_percentage: 66.7,
    });
  });

  test('maps peer recommendations', () => {
    const response = toPeerSkillResponse(1, {
      similarUsers: [{ userId: 2, username: 'linus', score: 1.234567 }],
      recommendedSkills: [SKILLS.fastapi],
    });

    expect(response).toEqual({
      user_id: 1,
      similar_users: [{ user_id: 2, username: 'linus', llr_score: 1.2346 }],
      recommended_skills: [{ skill_id: 3, skill_name: 'FastAPI' }],
    });
  });
});
