import type { SkillVector } from "./skill-universe";

/**
 * Cosine similarity between two presence vectors built on the same universe.
 *
 * Returns 0 when either vector is all zeros (an empty skill set after
 * universe filtering). The result is clamped to [0, 1].
 *
 * @throws {Error} when the vectors have different lengths, which means they
 * were built against different universes
 */
export function cosineScore(a: SkillVector, b: SkillVector): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  const similarity = dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, similarity));
}
