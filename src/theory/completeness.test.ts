import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  checkEligibility,
  computeCompleteness,
  missingFieldsByWeight,
  missingRequiredFields,
} from './completeness.js';
import type { TheoryDescriptor, UserInput } from './types.js';

const BIRTH_CHART: TheoryDescriptor = {
  id: 'chart',
  displayName: 'Chart',
  requiredFields: ['birthYear', 'birthMonth'],
  optionalFields: ['birthHour', 'gender'],
  fieldWeights: { birthYear: 0.4, birthMonth: 0.4, birthHour: 0.15, gender: 0.05 },
  minCompleteness: 0.8,
  tier: 'foundational',
  affinity: [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5],
};

describe('computeCompleteness', () => {
  it('should divide present weight by declared weight', () => {
    expect(computeCompleteness({ birthYear: 1990 }, BIRTH_CHART)).toBeCloseTo(0.4);
    expect(computeCompleteness({ birthYear: 1990, birthHour: 7 }, BIRTH_CHART)).toBeCloseTo(0.55);
  });

  it('should ignore fields the theory does not declare', () => {
    expect(computeCompleteness({ character: 'a', favoriteColor: 'red' }, BIRTH_CHART)).toBe(0);
  });

  it('should treat a weightless theory as complete', () => {
    const weightless: TheoryDescriptor = { ...BIRTH_CHART, fieldWeights: {} };
    expect(computeCompleteness({}, weightless)).toBe(1);
  });

  it('should stay within [0,1] for any subset of fields', () => {
    fc.assert(
      fc.property(fc.boolean(), fc.boolean(), fc.boolean(), fc.boolean(), (y, m, h, g) => {
        const input: UserInput = {
          ...(y ? { birthYear: 1990 } : {}),
          ...(m ? { birthMonth: 5 } : {}),
          ...(h ? { birthHour: 3 } : {}),
          ...(g ? { gender: 'female' as const } : {}),
        };
        const value = computeCompleteness(input, BIRTH_CHART);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      })
    );
  });
});

describe('missing fields', () => {
  it('should list missing required fields in declaration order', () => {
    expect(missingRequiredFields({ birthMonth: 2 }, BIRTH_CHART)).toEqual(['birthYear']);
  });

  it('should order missing declared fields by weight', () => {
    expect(missingFieldsByWeight({ birthYear: 1990 }, BIRTH_CHART)).toEqual([
      'birthMonth',
      'birthHour',
      'gender',
    ]);
  });
});

describe('checkEligibility', () => {
  it('should require every required field', () => {
    const result = checkEligibility({ birthYear: 1990, birthHour: 1, gender: 'male' }, BIRTH_CHART);
    expect(result.eligible).toBe(false);
    expect(result.missingRequired).toEqual(['birthMonth']);
  });

  it('should require the minimum completeness', () => {
    expect(checkEligibility({ birthYear: 1990, birthMonth: 4 }, BIRTH_CHART).eligible).toBe(true);
    const strict: TheoryDescriptor = { ...BIRTH_CHART, minCompleteness: 0.9 };
    const result = checkEligibility({ birthYear: 1990, birthMonth: 4 }, strict);
    expect(result.eligible).toBe(false);
    expect(result.missingRequired).toEqual([]);
  });
});
