import fs from "fs";
import path from "path";
import {
  seedDataSchema,
  type InsertJob,
  type InsertSkill,
  type Job,
  type SeedData,
  type Skill,
  type UserProfile,
} from "@shared/schema";
import type { JobId, SkillId, UserId } from "@shared/api-contracts";
import { logger } from "./config/logger";

/**
 * Storage interface for the skill recommender.
 *
 * Supplies the skill catalogue, job corpus and user profiles to the
 * recommendation engine. Methods are asynchronous so that a database-backed
 * implementation can replace the in-memory one without touching callers.
 *
 * @example
 * ```typescript
 * const storage = getStorage();
 * const job = await storage.getJob(12);
 * if (job) {
 *   console.log(`${job.title} requires ${job.requiredSkills.length} skills`);
 * }
 * ```
 */
export interface IStorage {
  // ==================== SKILL METHODS ====================

  getSkills(): Promise<Skill[]>;

  /**
   * Resolves the given ids against the catalogue.
   *
   * @returns the skills found, in ascending id order; unknown ids are left out
   */
  getSkillsByIds(_ids: readonly SkillId[]): Promise<Skill[]>;

  getSkillByName(_name: string): Promise<Skill | undefined>;

  createSkill(_skill: InsertSkill): Promise<Skill>;

  // ==================== JOB METHODS ====================

  getJobs(): Promise<Job[]>;

  getJob(_id: JobId): Promise<Job | undefined>;

  /**
   * Creates a job. Skill ids must already have been checked against the
   * catalogue; unknown ids are dropped.
   */
  createJob(_job: InsertJob): Promise<Job>;

  // ==================== USER METHODS ====================

  getUsers(): Promise<UserProfile[]>;

  getUser(_id: UserId): Promise<UserProfile | undefined>;

  /**
   * Replaces a user's skills.
   *
   * @returns the updated profile, or undefined when the user does not exist
   */
  setUserSkills(_id: UserId, _skillIds: readonly SkillId[]): Promise<UserProfile | undefined>;
}

interface StoredJob {
  id: JobId;
  title: string;
  description: string;
  skillIds: SkillId[];
}

interface StoredUser {
  id: UserId;
  username: string;
  jobTitle: string;
  skillIds: SkillId[];
}

/**
 * In-memory storage. Records are copied on the way in and out so callers can
 * never mutate stored state.
 */
export class MemStorage implements IStorage {
  private skills = new Map<SkillId, Skill>();
  private jobs = new Map<JobId, StoredJob>();
  private users = new Map<UserId, StoredUser>();
  private nextSkillId = 1;
  private nextJobId = 1;

  constructor(seed?: SeedData) {
    if (seed) {
      this.load(seed);
    }
  }

  private load(seed: SeedData): void {
    for (const skill of seed.skills) {
      this.skills.set(skill.id, { id: skill.id, name: skill.name });
      this.nextSkillId = Math.max(this.nextSkillId, skill.id + 1);
    }
    for (const job of seed.jobs) {
      this.jobs.set(job.id, {
        id: job.id,
        title: job.title,
        description: job.description,
        skillIds: this.knownIds(job.skillIds),
      });
      this.nextJobId = Math.max(this.nextJobId, job.id + 1);
    }
    for (const user of seed.users) {
      this.users.set(user.id, {
        id: user.id,
        username: user.username,
        jobTitle: user.jobTitle,
        skillIds: this.knownIds(user.skillIds),
      });
    }
  }

  private knownIds(ids: readonly SkillId[]): SkillId[] {
    return Array.from(new Set(ids))
      .filter((id) => this.skills.has(id))
      .sort((a, b) => a - b);
  }

  private hydrateSkills(ids: readonly SkillId[]): Skill[] {
    const skills: Skill[] = [];
    for (const id of ids) {
      const skill = this.skills.get(id);
      if (skill) skills.push({ ...skill });
    }
    return skills;
  }

  private hydrateJob(job: StoredJob): Job {
    return {
      id: job.id,
      title: job.title,
      description: job.description,
      requiredSkills: this.hydrateSkills(job.skillIds),
    };
  }

  private hydrateUser(user: StoredUser): UserProfile {
    return {
      id: user.id,
      username: user.username,
      jobTitle: user.jobTitle,
      skills: this.hydrateSkills(user.skillIds),
    };
  }

  async getSkills(): Promise<Skill[]> {
    return Array.from(this.skills.values())
      .sort((a, b) => a.id - b.id)
      .map((skill) => ({ ...skill }));
  }

  async getSkillsByIds(ids: readonly SkillId[]): Promise<Skill[]> {
    return this.hydrateSkills(this.knownIds(ids));
  }

  async getSkillByName(name: string): Promise<Skill | undefined> {
    const wanted = name.trim().toLowerCase();
    for (const skill of this.skills.values()) {
      if (skill.name.toLowerCase() === wanted) {
        return { ...skill };
      }
    }
    return undefined;
  }

  async createSkill(insert: InsertSkill): Promise<Skill> {
    const skill: Skill = { id: this.nextSkillId++, name: insert.name.trim() };
    this.skills.set(skill.id, skill);
    return { ...skill };
  }

  async getJobs(): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .sort((a, b) => a.id - b.id)
      .map((job) => this.hydrateJob(job));
  }

  async getJob(id: JobId): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? this.hydrateJob(job) : undefined;
  }

  async createJob(insert: InsertJob): Promise<Job> {
    const job: StoredJob = {
      id: this.nextJobId++,
      title: insert.title.trim(),
      description: insert.description,
      skillIds: this.knownIds(insert.skillIds),
    };
    this.jobs.set(job.id, job);
    return this.hydrateJob(job);
  }

  async getUsers(): Promise<UserProfile[]> {
    return Array.from(this.users.values())
      .sort((a, b) => a.id - b.id)
      .map((user) => this.hydrateUser(user));
  }

  async getUser(id: UserId): Promise<UserProfile | undefined> {
    const user = this.users.get(id);
    return user ? this.hydrateUser(user) : undefined;
  }

  async setUserSkills(id: UserId, skillIds: readonly SkillId[]): Promise<UserProfile | undefined> {
    const user = this.users.get(id);
    if (!user) {
      return undefined;
    }
    user.skillIds = this.knownIds(skillIds);
    return this.hydrateUser(user);
  }
}

/**
 * Read and validate a seed file
 *
 * @throws {Error} when the file is missing or does not match the seed schema
 */
export function loadSeedData(filePath: string): SeedData {
  const resolved = path.resolve(filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  const parsed = seedDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((err) => `${err.path.join(".")}: ${err.message}`)
      .join(", ");
    throw new Error(`Seed file ${resolved} is invalid: ${issues}`);
  }
  return parsed.data;
}

let storage: IStorage | null = null;

/**
 * Create the process-wide storage, seeded from a file when a path is given
 */
export function initializeStorage(seedDataPath: string | null): IStorage {
  if (seedDataPath) {
    const seed = loadSeedData(seedDataPath);
    storage = new MemStorage(seed);
    logger.info({
      seedDataPath,
      skills: seed.skills.length,
      jobs: seed.jobs.length,
      users: seed.users.length,
    }, "Storage seeded");
  } else {
    storage = new MemStorage();
    logger.info("Storage initialized empty");
  }
  return storage;
}

/**
 * Install an existing storage instance, e.g. a pre-seeded MemStorage in tests
 */
export function setStorage(instance: IStorage): IStorage {
  storage = instance;
  return storage;
}

export function getStorage(): IStorage {
  if (!storage) {
    throw new Error("Storage has not been initialized");
  }
  return storage;
}
