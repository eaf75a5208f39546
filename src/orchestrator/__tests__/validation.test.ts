/**
 * Request Validation Tests
 */

import { ValidationError } from '../../errors';
import {
  parseDocument,
  validateFilters,
  validateLimit,
  validateMaxLength,
  validateQuery,
  validateTemperature,
} from '../validation';

describe('request validation', () => {
  it('should trim valid queries and reject empty ones', () => {
    expect(validateQuery('  hello ')).toBe('hello');
    expect(() => validateQuery('   ')).toThrow(ValidationError);
    expect(() => validateQuery(42)).toThrow('Query must be a string');
  });

  it('should bound the search limit', () => {
    expect(validateLimit(10, 100)).toBe(10);
    expect(() => validateLimit(0, 100)).toThrow(ValidationError);
    expect(() => validateLimit(2.5, 100)).toThrow(ValidationError);
    expect(() => validateLimit(101, 100)).toThrow('Limit must be at most 100, got 101');
  });

  it('should require a positive integer maxLength', () => {
    expect(validateMaxLength(500)).toBe(500);
    expect(() => validateMaxLength(-1)).toThrow(ValidationError);
  });

  it('should keep temperature within [0, 2]', () => {
    expect(validateTemperature(0)).toBe(0);
    expect(validateTemperature(2)).toBe(2);
    expect(() => validateTemperature(2.01)).toThrow(ValidationError);
    expect(() => validateTemperature(NaN)).toThrow(ValidationError);
  });

  it('should accept flat exact-match filters', () => {
    expect(validateFilters(undefined)).toBeUndefined();
    expect(validateFilters({})).toBeUndefined();
    expect(validateFilters({ level: 'intro', rank: 2, draft: false })).toEqual({ level: 'intro', rank: 2, draft: false });
    expect(() => validateFilters(['level'])).toThrow('Filters must be an object');
    expect(() => validateFilters('level=intro')).toThrow(ValidationError);
    expect(() => validateFilters({ tags: ['a'] })).toThrow('Filter tags must be a string, finite number or boolean');
    expect(() => validateFilters({ rank: Infinity })).toThrow(ValidationError);
  });
});

describe('parseDocument', () => {
  const valid = { title: 'ML Intro', content: 'Machine learning', url: 'https://x/ml' };

  it('should accept a complete document', () => {
    expect(parseDocument({ ...valid, id: 'ml', metadata: { level: 1 } })).toEqual({
      ...valid,
      id: 'ml',
      metadata: { level: 1 },
    });
  });

  it('should name the missing field', () => {
    try {
      parseDocument({ ...valid, url: '' });
      throw new Error('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'url', message: 'Document url must be a non-empty string' });
    }
  });

  it('should reject invalid metadata with its path', () => {
    expect(() => parseDocument({ ...valid, metadata: { tags: ['a'] } })).toThrow(
      'Invalid metadata at metadata.tags: unsupported value type: array'
    );
  });

  it('should reject non-objects', () => {
    expect(() => parseDocument('text')).toThrow('Document must be an object');
    expect(() => parseDocument(null)).toThrow(ValidationError);
  });
});
