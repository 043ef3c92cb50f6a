import { describe, it, expect } from 'vitest';
import {
  BUILTIN_DEFINITIONS,
  InvalidDescriptorError,
  TheoryNotFoundError,
  TheoryRegistry,
  createBuiltinRegistry,
} from './registry.js';
import { BUILTIN_THEORY_IDS, type TheoryDescriptor } from './types.js';

const VECTOR = [0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5, 0.5];

function descriptor(id: string, overrides: Partial<TheoryDescriptor> = {}): TheoryDescriptor {
  return {
    id,
    displayName: id,
    requiredFields: [],
    optionalFields: ['numbers'],
    fieldWeights: { numbers: 1 },
    minCompleteness: 0,
    tier: 'fast',
    affinity: VECTOR,
    ...overrides,
  };
}

describe('createBuiltinRegistry', () => {
  it('should register the eight shipped theories', () => {
    const registry = createBuiltinRegistry();
    expect(registry.size).toBe(8);
    expect([...registry.list().map((d) => d.id)].sort()).toEqual([...BUILTIN_THEORY_IDS].sort());
  });

  it('should attach affinity vectors from the tables', () => {
    const registry = createBuiltinRegistry();
    expect(registry.get('qimen').affinity).toEqual([0.9, 0.8, 0.6, 0.85, 0.7, 0.9, 0.4, 0.6]);
  });

  it('should group theories by tier', () => {
    const registry = createBuiltinRegistry();
    expect(registry.listByTier('fast').map((d) => d.id)).toEqual(['meihua', 'xiaoliu', 'cezi']);
    expect(registry.listByTier('foundational').map((d) => d.id)).toEqual(['bazi', 'ziwei']);
    expect(registry.listByTier('deep').map((d) => d.id)).toEqual(['qimen', 'daliuren', 'liuyao']);
  });

  it('should declare weights in [0,1] for every builtin', () => {
    for (const definition of BUILTIN_DEFINITIONS) {
      for (const weight of Object.values(definition.fieldWeights)) {
        expect(weight).toBeGreaterThanOrEqual(0);
        expect(weight).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('TheoryRegistry', () => {
  it('should throw TheoryNotFoundError for unknown ids', () => {
    const registry = new TheoryRegistry([descriptor('a')]);
    expect(() => registry.get('b')).toThrow(TheoryNotFoundError);
    expect(registry.tryGet('b')).toBeUndefined();
    expect(registry.has('a')).toBe(true);
  });

  it('should reject duplicate ids', () => {
    expect(() => new TheoryRegistry([descriptor('a'), descriptor('a')])).toThrow(
      InvalidDescriptorError
    );
  });

  it('should reject out-of-range weights and thresholds', () => {
    expect(() => new TheoryRegistry([descriptor('a', { fieldWeights: { numbers: 1.5 } })])).toThrow(
      "weight of 'numbers' must be in [0,1]"
    );
    expect(() => new TheoryRegistry([descriptor('a', { minCompleteness: -0.1 })])).toThrow(
      'minCompleteness must be in [0,1]'
    );
  });

  it('should reject affinity vectors of the wrong length', () => {
    expect(() => new TheoryRegistry([descriptor('a', { affinity: [1, 0] })])).toThrow(
      InvalidDescriptorError
    );
  });

  it('should freeze stored descriptors', () => {
    const registry = new TheoryRegistry([descriptor('a')]);
    expect(Object.isFrozen(registry.get('a'))).toBe(true);
  });
});
