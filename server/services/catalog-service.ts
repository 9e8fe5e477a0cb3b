/**
 * BUSINESS LOGIC: Catalogue Service Layer
 * Skills, jobs and user profiles that feed the recommendation engine
 *
 * @fileoverview Thin rules on top of storage: skill names are unique
 * (case-insensitive), jobs and user profiles may only reference skills that
 * exist in the catalogue, and every operation returns a Result.
 *
 * @example
 * ```typescript
 * const catalog = createCatalogService(getStorage());
 *
 * const result = await catalog.createJob({
 *   title: 'Backend Developer',
 *   description: 'APIs and data pipelines',
 *   skillIds: [1, 2, 3]
 * });
 * ```
 */

import type { InsertJob, InsertSkill, Job, Skill, UserProfile } from '@shared/schema';
import type { JobId, SkillId, UserId } from '@shared/api-contracts';
import { failure, success, type CatalogResult } from '@shared/result-types';
import { AppConflictError, AppNotFoundError, AppValidationError } from '@shared/errors';
import { logger } from '../config/logger';
import type { IStorage } from '../storage';

export class CatalogService {
  constructor(private storageProvider: IStorage) {}

  private async findUnknownSkillIds(skillIds: readonly SkillId[]): Promise<SkillId[]> {
    const known = await this.storageProvider.getSkillsByIds(skillIds);
    const knownIds = new Set(known.map((skill) => skill.id));
    return Array.from(new Set(skillIds))
      .filter((id) => !knownIds.has(id))
      .sort((a, b) => a - b);
  }

  // ==================== SKILLS ====================

  async listSkills(): Promise<CatalogResult<Skill[]>> {
    return success(await this.storageProvider.getSkills());
  }

  async createSkill(input: InsertSkill): Promise<CatalogResult<Skill>> {
    const existing = await this.storageProvider.getSkillByName(input.name);
    if (existing) {
      return failure(AppConflictError.duplicateSkill(existing.name));
    }

    const skill = await this.storageProvider.createSkill(input);
    logger.info({ skillId: skill.id, name: skill.name }, 'Skill created');
    return success(skill);
  }

  // ==================== JOBS ====================

  async listJobs(): Promise<CatalogResult<Job[]>> {
    return success(await this.storageProvider.getJobs());
  }

  async getJob(id: JobId): Promise<CatalogResult<Job>> {
    const job = await this.storageProvider.getJob(id);
    return job ? success(job) : failure(AppNotFoundError.job(id));
  }

  async createJob(input: InsertJob): Promise<CatalogResult<Job>> {
    const unknown = await this.findUnknownSkillIds(input.skillIds);
    if (unknown.length > 0) {
      return failure(AppValidationError.unknownSkills(unknown));
    }

    const job = await this.storageProvider.createJob(input);
    logger.info({ jobId: job.id, skills: job.requiredSkills.length }, 'Job created');
    return success(job);
  }

  // ==================== USERS ====================

  async getUser(id: UserId): Promise<CatalogResult<UserProfile>> {
    const user = await this.storageProvider.getUser(id);
    return user ? success(user) : failure(AppNotFoundError.user(id));
  }

  /**
   * Replace a user's skills. Unknown skill ids reject the whole update.
   */
  async setUserSkills(id: UserId, skillIds: readonly SkillId[]): Promise<CatalogResult<UserProfile>> {
    const unknown = await this.findUnknownSkillIds(skillIds);
    if (unknown.length > 0) {
      return failure(AppValidationError.unknownSkills(unknown));
    }

    const user = await this.storageProvider.setUserSkills(id, skillIds);
    if (!user) {
      return failure(AppNotFoundError.user(id));
    }

    logger.info({ userId: id, skills: user.skills.length }, 'User skills updated');
    return success(user);
  }
}

export function createCatalogService(storage: IStorage): CatalogService {
  return new CatalogService(storage);
}
