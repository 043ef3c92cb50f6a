import { describe, it, expect } from 'vitest';
import { validateField, withField, withoutField } from './validators.js';

describe('validateField', () => {
  it('should accept three numbers from 1 to 9', () => {
    expect(validateField('numbers', [1, 5, 9])).toEqual({ ok: true, value: [1, 5, 9] });
  });

  it.each([
    [[1, 2], 'Exactly three numbers are needed'],
    [[1, 2, 10], 'Each number must be between 1 and 9'],
    [[1, 2.5, 3], 'Each number must be a whole number'],
    ['123', 'Exactly three numbers are needed'],
  ])('should reject numbers %j', (raw, message) => {
    expect(validateField('numbers', raw)).toEqual({ ok: false, message });
  });

  it('should accept exactly one letter as a character', () => {
    expect(validateField('character', ' 福 ')).toEqual({ ok: true, value: '福' });
    expect(validateField('character', 'ab').ok).toBe(false);
    expect(validateField('character', '7').ok).toBe(false);
  });

  it('should bound the birth fields', () => {
    expect(validateField('birthYear', 1899).ok).toBe(false);
    expect(validateField('birthYear', 1900).ok).toBe(true);
    expect(validateField('birthMonth', 12).ok).toBe(true);
    expect(validateField('birthDay', 32)).toEqual({
      ok: false,
      message: 'The birth day must be between 1 and 31',
    });
    expect(validateField('birthHour', 0).ok).toBe(true);
    expect(validateField('birthHour', 24).ok).toBe(false);
  });

  it('should reject a birth year in the future', () => {
    expect(validateField('birthYear', new Date().getFullYear() + 1).ok).toBe(false);
  });

  it('should check enumerated fields', () => {
    expect(validateField('gender', 'female').ok).toBe(true);
    expect(validateField('gender', 'other').ok).toBe(false);
    expect(validateField('mbtiType', 'ENFP').ok).toBe(true);
    expect(validateField('mbtiType', 'ABCD').ok).toBe(false);
    expect(validateField('currentDirection', 'southwest').ok).toBe(true);
    expect(validateField('currentDirection', 'up').ok).toBe(false);
    expect(validateField('questionCategory', 'career').ok).toBe(true);
    expect(validateField('questionCategory', 'astrology').ok).toBe(false);
  });

  it('should trim text fields and enforce their lengths', () => {
    expect(validateField('questionDescription', '  a new job  ')).toEqual({
      ok: true,
      value: 'a new job',
    });
    expect(validateField('questionDescription', 'job')).toEqual({
      ok: false,
      message: 'The description needs at least 5 characters',
    });
    expect(validateField('favoriteColor', 'x'.repeat(31)).ok).toBe(false);
  });

  it('should require a parseable timestamp', () => {
    expect(validateField('currentTime', '2026-03-01T09:00:00Z').ok).toBe(true);
    expect(validateField('currentTime', 'teatime').ok).toBe(false);
  });
});

describe('withField and withoutField', () => {
  it('should copy the input instead of mutating it', () => {
    const input = { questionText: 'Will it work out?' };

    const added = withField(input, 'birthYear', 1990);
    const removed = withoutField(added, 'questionText');

    expect(input).toEqual({ questionText: 'Will it work out?' });
    expect(added).toEqual({ questionText: 'Will it work out?', birthYear: 1990 });
    expect(removed).toEqual({ birthYear: 1990 });
  });
});
