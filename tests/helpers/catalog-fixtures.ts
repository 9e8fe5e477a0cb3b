/**
 * Shared test data: a small skill catalogue and job builders
 */

import type { Job, Skill, UserProfile, SeedData } from '../../shared/schema';

export const SKILLS = {
  python: { id: 1, name: 'Python' },
  sql: { id: 2, name: 'SQL' },
  fastapi: { id: 3, name: 'FastAPI' },
  java: { id: 4, name: 'Java' },
  spring: { id: 5, name: 'Spring' },
  docker: { id: 6, name: 'Docker' },
  react: { id: 7, name: 'React' },
  kafka: { id: 8, name: 'Kafka' },
} satisfies Record<string, Skill>;

export function makeJob(id: number, title: string, requiredSkills: Skill[], description = ''): Job {
  return { id, title, description, requiredSkills };
}

export function makeUser(id: number, username: string, skills: Skill[]): UserProfile {
  return { id, username, jobTitle: '', skills };
}

/** Job A needs Python, SQL and FastAPI; Job B needs Java and Spring */
export const BACKEND_JOB = makeJob(1, 'Backend Engineer', [SKILLS.python, SKILLS.sql, SKILLS.fastapi]);
export const JAVA_JOB = makeJob(2, 'Java Developer', [SKILLS.java, SKILLS.spring]);
export const TWO_JOB_CORPUS = [BACKEND_JOB, JAVA_JOB];

/**
 * Seed with the five first skills, the two-job corpus and two users
 */
export function twoJobSeed(): SeedData {
  return {
    skills: [SKILLS.python, SKILLS.sql, SKILLS.fastapi, SKILLS.java, SKILLS.spring],
    jobs: [
      { id: 1, title: 'Backend Engineer', description: 'APIs', skillIds: [1, 2, 3] },
      { id: 2, title: 'Java Developer', description: 'Services', skillIds: [4, 5] },
    ],
    users: [
      { id: 1, username: 'ada', jobTitle: 'Analyst', skillIds: [1, 2] },
      { id: 2, username: 'linus', jobTitle: 'Developer', skillIds: [1, 3] },
    ],
  };
}
