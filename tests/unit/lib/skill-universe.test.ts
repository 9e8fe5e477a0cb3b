/**
 * Unit Tests for the skill universe and vectorization
 */

import { describe, test, expect } from '@jest/globals';
import { buildSkillUniverse, toSkillSet, vectorize } from '../../../server/lib/skill-universe';
import { makeJob, SKILLS, TWO_JOB_CORPUS } from '../../helpers/catalog-fixtures';

describe('buildSkillUniverse', () => {
  test('collects distinct job skills in ascending id order', () => {
    const universe = buildSkillUniverse([
      makeJob(1, 'A', [SKILLS.fastapi, SKILLS.python]),
      makeJob(2, 'B', [SKILLS.python, SKILLS.sql]),
    ]);

    expect(universe.skillIds).toEqual([1, 2, 3]);
    expect(universe.indexOf.get(3)).toBe(2);
  });

  test('widens the universe with catalogue skills', () => {
    const universe = buildSkillUniverse([makeJob(1, 'A', [SKILLS.sql])], [SKILLS.kafka, SKILLS.python]);

    expect(universe.skillIds).toEqual([1, 2, 8]);
  });

  test('is empty for an empty corpus', () => {
    expect(buildSkillUniverse([]).skillIds).toEqual([]);
  });

  test('returns a frozen snapshot', () => {
    const universe = buildSkillUniverse(TWO_JOB_CORPUS);

    expect(Object.isFrozen(universe)).toBe(true);
    expect(Object.isFrozen(universe.skillIds)).toBe(true);
  });
});

describe('vectorize', () => {
  const universe = buildSkillUniverse(TWO_JOB_CORPUS);

  test('marks present skills with 1 at their coordinate', () => {
    expect(vectorize(toSkillSet([SKILLS.sql, SKILLS.spring]), universe)).toEqual([0, 1, 0, 0, 1]);
  });

  test('ignores skills outside the universe', () => {
    expect(vectorize(toSkillSet([SKILLS.react, SKILLS.python]), universe)).toEqual([1, 0, 0, 0, 0]);
  });

  test('produces a zero vector for an empty skill set', () => {
    expect(vectorize(new Set(), universe)).toEqual([0, 0, 0, 0, 0]);
  });

  test('always matches the universe length', () => {
    const vector = vectorize(toSkillSet([SKILLS.java]), universe);
    expect(vector).toHaveLength(universe.skillIds.length);
  });
});
