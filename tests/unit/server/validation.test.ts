import { describe, test, expect } from '@jest/globals';
import { parseIdParam, validateRequest } from '../../../server/middleware/validation';
import { insertJobSchema, recommendationRequestSchema } from '../../../shared/schema';
import { AppValidationError } from '../../../shared/errors';

describe('validateRequest', () => {
  test('returns the parsed value with defaults applied', () => {
    expect(validateRequest(insertJobSchema, { title: '  Analyst ' })).toEqual({
      title: 'Analyst',
      description: '',
      skillIds: [],
    });
  });

  test('throws a validation error listing each failing path', () => {
    let caught: unknown;
    try {
      validateRequest(recommendationRequestSchema, { skillIds: [0], limit: 500 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppValidationError);
    if (!(caught instanceof AppValidationError)) return;
    expect(caught.field).toBe('skillIds.0');
    expect(caught.details).toEqual({
      issues: [
        { path: 'skillIds.0', message: 'Number must be greater than 0' },
        { path: 'limit', message: 'Number must be less than or equal to 100' },
      ],
    });
  });
});

describe('parseIdParam', () => {
  test('accepts positive integers', () => {
    expect(parseIdParam('17', 'id')).toBe(17);
  });

  test.each(['0', '-3', '1.5', 'abc', undefined])('rejects %p', (value) => {
    expect(() => parseIdParam(value, 'id')).toThrow("Field 'id' has invalid format. Expected: positive integer");
  });
});
