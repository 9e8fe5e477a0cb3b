/**
 * Skill recommendations from similar users
 *
 * Users are compared with the same set-level LLR used for jobs. Only users
 * whose overlap with the target exceeds the independence expectation count as
 * similar; the skills of the top N similar users that the target lacks are
 * recommended.
 */

import type { Skill, UserProfile } from "@shared/schema";
import type { SkillId, UserId } from "@shared/api-contracts";
import { logger } from "../config/logger";
import { toSkillSet, vectorize, type SkillUniverse } from "./skill-universe";
import { contingencyTable, isPositivelyAssociated, logLikelihoodRatio } from "./llr-scorer";
import { DEFAULT_RECOMMENDER_SETTINGS } from "./unified-scoring-config";

export interface SimilarUser {
  userId: UserId;
  username: string;
  score: number;
}

export interface PeerSkillRecommendation {
  similarUsers: SimilarUser[];
  recommendedSkills: Skill[];
}

export function recommendSkillsFromPeers(
  target: UserProfile,
  users: readonly UserProfile[],
  universe: SkillUniverse,
  topN: number = DEFAULT_RECOMMENDER_SETTINGS.peerLimit
): PeerSkillRecommendation {
  const targetSkills = toSkillSet(target.skills);
  const targetVector = vectorize(targetSkills, universe);
  const universeSize = universe.skillIds.length;

  const scored: Array<SimilarUser & { skills: Skill[] }> = [];
  for (const other of users) {
    if (other.id === target.id) continue;

    const table = contingencyTable(targetVector, vectorize(toSkillSet(other.skills), universe), universeSize);
    if (!isPositivelyAssociated(table)) continue;

    scored.push({
      userId: other.id,
      username: other.username,
      score: logLikelihoodRatio(table),
      skills: other.skills,
    });
  }

  scored.sort((a, b) => b.score - a.score || a.userId - b.userId);
  const neighbours = scored.slice(0, topN);

  const recommended = new Map<SkillId, Skill>();
  for (const neighbour of neighbours) {
    for (const skill of neighbour.skills) {
      if (!targetSkills.has(skill.id) && !recommended.has(skill.id)) {
        recommended.set(skill.id, skill);
      }
    }
  }

  logger.debug({
    userId: target.id,
    candidates: users.length,
    similar: scored.length,
    recommended: recommended.size,
  }, "Peer skill recommendation computed");

  return {
    similarUsers: neighbours.map(({ userId, username, score }) => ({ userId, username, score })),
    recommendedSkills: Array.from(recommended.values()).sort((a, b) => a.id - b.id),
  };
}
