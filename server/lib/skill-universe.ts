/**
 * Skill universe and vectorization
 *
 * The universe is the ordered coordinate space every skill vector is built
 * against. It is an immutable snapshot: a new one is built whenever the job
 * corpus changes, and vectors built against different universes must never
 * be compared.
 */

import type { Job, Skill } from "@shared/schema";
import type { SkillId } from "@shared/api-contracts";

export interface SkillUniverse {
  /** Distinct skill ids in ascending order; position i is coordinate i */
  readonly skillIds: readonly SkillId[];
  readonly indexOf: ReadonlyMap<SkillId, number>;
}

/** Presence vector aligned to a SkillUniverse */
export type SkillVector = readonly (0 | 1)[];

export type SkillSet = ReadonlySet<SkillId>;

export function toSkillSet(skills: readonly Skill[]): SkillSet {
  return new Set(skills.map((skill) => skill.id));
}

/**
 * Build the universe from every skill required by the corpus, optionally
 * widened with a catalogue of additional skills.
 */
export function buildSkillUniverse(
  jobs: readonly Job[],
  catalog: readonly Skill[] = []
): SkillUniverse {
  const ids = new Set<SkillId>();
  for (const job of jobs) {
    for (const skill of job.requiredSkills) {
      ids.add(skill.id);
    }
  }
  for (const skill of catalog) {
    ids.add(skill.id);
  }

  const skillIds = Object.freeze(Array.from(ids).sort((a, b) => a - b));
  const indexOf = new Map<SkillId, number>();
  skillIds.forEach((id, index) => indexOf.set(id, index));

  return Object.freeze({ skillIds, indexOf });
}

/**
 * Convert a skill set into a presence vector over the universe.
 * Skills outside the universe contribute nothing.
 */
export function vectorize(skillSet: SkillSet, universe: SkillUniverse): SkillVector {
  return universe.skillIds.map((id): 0 | 1 => (skillSet.has(id) ? 1 : 0));
}
