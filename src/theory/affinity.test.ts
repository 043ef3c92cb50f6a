import { describe, it, expect } from 'vitest';
import {
  AffinityDataError,
  UNIFORM_VECTOR,
  categoryVector,
  cosineSimilarity,
  getDefaultAffinityTables,
  parseAffinityTables,
} from './affinity.js';

describe('bundled affinity tables', () => {
  const tables = getDefaultAffinityTables();

  it('should carry all sixteen personality types', () => {
    expect(tables.personality.size).toBe(16);
    expect(tables.personality.get('INTJ')?.get('qimen')).toBe(0.9);
  });

  it('should carry category vectors and arbitration lists', () => {
    expect(tables.categories.get('wealth')).toEqual([0.6, 0.4, 0.5, 1.0, 0.1, 0.8, 0.4, 0.7]);
    expect(tables.arbitration.byCategory.get('career')).toEqual([
      'liuyao',
      'meihua',
      'xiaoliu',
      'qimen',
    ]);
    expect(tables.arbitration.fallback[0]).toBe('liuyao');
  });

  it('should fall back to a uniform vector for unlisted categories', () => {
    expect(categoryVector(tables, 'other')).toBe(UNIFORM_VECTOR);
  });
});

describe('parseAffinityTables', () => {
  const minimal = {
    categories: { career: [1, 0, 0, 0, 0, 0, 0, 0] },
    theories: { a: [0, 1, 0, 0, 0, 0, 0, 0] },
    personality: { ENFP: { a: 0.4 } },
    arbitration: { default: ['a'] },
  };

  it('should accept a minimal document', () => {
    const tables = parseAffinityTables(minimal);
    expect(tables.theories.get('a')).toEqual([0, 1, 0, 0, 0, 0, 0, 0]);
    expect(tables.arbitration.fallback).toEqual(['a']);
  });

  it('should reject short vectors with the failing path', () => {
    expect(() => parseAffinityTables({ ...minimal, theories: { a: [1, 2] } })).toThrow(
      "Invalid affinity data at 'theories.a': expected an array of 8 numbers"
    );
  });

  it('should reject unknown categories and personality types', () => {
    expect(() =>
      parseAffinityTables({ ...minimal, categories: { hobbies: minimal.categories.career } })
    ).toThrow(AffinityDataError);
    expect(() => parseAffinityTables({ ...minimal, personality: { XXXX: {} } })).toThrow(
      AffinityDataError
    );
  });

  it('should reject scores outside [0,1]', () => {
    expect(() => parseAffinityTables({ ...minimal, personality: { ENFP: { a: 2 } } })).toThrow(
      "Invalid affinity data at 'personality.ENFP.a': expected a number in [0,1]"
    );
  });
});

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should be 0 when a vector has zero length', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});
