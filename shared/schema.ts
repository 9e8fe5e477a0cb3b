import { z } from "zod";
import type { SkillId, JobId, UserId } from './api-contracts';

// ==================== DOMAIN RECORDS ====================

export interface Skill {
  id: SkillId;
  name: string;
}

export interface Job {
  id: JobId;
  title: string;
  description: string;
  requiredSkills: Skill[];
}

export interface UserProfile {
  id: UserId;
  username: string;
  jobTitle: string;
  skills: Skill[];
}

/**
 * Weights applied to the normalized cosine and LLR scores.
 * Any non-negative pair is accepted as long as both are not zero.
 */
export interface ScoringWeights {
  cosine: number;
  llr: number;
}

// ==================== VALIDATION SCHEMAS ====================

const idSchema = z.number().int().positive();

export const skillSchema = z.object({
  id: idSchema,
  name: z.string().min(1).max(255),
});

export const insertSkillSchema = z.object({
  name: z.string().trim().min(1, "Skill name is required").max(255),
});

export const insertJobSchema = z.object({
  title: z.string().trim().min(1, "Job title is required").max(255),
  description: z.string().max(10000).default(""),
  skillIds: z.array(idSchema).max(500).default([]),
});

export const updateUserSkillsSchema = z.object({
  skillIds: z.array(idSchema).max(500),
});

export const scoringWeightsSchema = z.object({
  cosine: z.number().finite().min(0, "Weights must be non-negative"),
  llr: z.number().finite().min(0, "Weights must be non-negative"),
});

/**
 * Body accepted by every recommendation endpoint. The user is given either
 * by id (skills loaded from storage) or by an explicit list of skill ids.
 */
export const recommendationRequestSchema = z
  .object({
    userId: idSchema.optional(),
    skillIds: z.array(idSchema).max(500).optional(),
    weights: scoringWeightsSchema.optional(),
    limit: z.number().int().min(1).max(100).optional(),
  })
  .refine((body) => (body.userId === undefined) !== (body.skillIds === undefined), {
    message: "Provide exactly one of userId or skillIds",
    path: ["userId"],
  });

export const seedDataSchema = z.object({
  skills: z.array(skillSchema),
  jobs: z.array(
    z.object({
      id: idSchema,
      title: z.string().min(1),
      description: z.string().default(""),
      skillIds: z.array(idSchema),
    })
  ),
  users: z
    .array(
      z.object({
        id: idSchema,
        username: z.string().min(1),
        jobTitle: z.string().default(""),
        skillIds: z.array(idSchema),
      })
    )
    .default([]),
});

export type InsertSkill = z.infer<typeof insertSkillSchema>;
export type InsertJob = z.infer<typeof insertJobSchema>;
export type UpdateUserSkills = z.infer<typeof updateUserSkillsSchema>;
export type RecommendationRequest = z.infer<typeof recommendationRequestSchema>;
export type SeedData = z.infer<typeof seedDataSchema>;
