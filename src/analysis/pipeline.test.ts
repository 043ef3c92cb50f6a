import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_SELECTION } from '../config/defaults.js';
import type { Config } from '../config/types.js';
import { InsufficientTheoriesError } from '../errors.js';
import { FakeRunner } from '../testing/fakes.js';
import { makeDescriptor, makeResult } from '../testing/fixtures.js';
import type { AffinityTables } from '../theory/affinity.js';
import { TheoryRegistry } from '../theory/registry.js';
import type { AffinityVector, QuestionCategory, TheoryId, UserInput } from '../theory/types.js';
import { SilentLogger } from '../utils/logger.js';
import { AnalysisPipeline } from './pipeline.js';
import { ResultCache } from './result-cache.js';

const ALIGNED: AffinityVector = [1, 0, 0, 0, 0, 0, 0, 0];
const ORTHOGONAL: AffinityVector = [0, 1, 0, 0, 0, 0, 0, 0];

const tables: AffinityTables = {
  categories: new Map<QuestionCategory, AffinityVector>([['career', ALIGNED]]),
  theories: new Map(),
  personality: new Map(),
  arbitration: {
    byCategory: new Map<QuestionCategory, readonly TheoryId[]>([['career', ['arb1', 'arb2', 'arb3']]]),
    fallback: [],
  },
};

const registry = new TheoryRegistry([
  makeDescriptor('a', { affinity: ALIGNED }),
  makeDescriptor('b', { affinity: ALIGNED }),
  makeDescriptor('arb1', {
    affinity: ORTHOGONAL,
    tier: 'deep',
    requiredFields: ['birthYear'],
    optionalFields: [],
    fieldWeights: { birthYear: 1 },
  }),
  makeDescriptor('arb2', { affinity: ORTHOGONAL, tier: 'deep' }),
  makeDescriptor('arb3', { affinity: ORTHOGONAL, tier: 'deep' }),
]);

const config: Config = {
  ...DEFAULT_CONFIG,
  selection: { ...DEFAULT_SELECTION, max_theories: 2 },
};

const input: UserInput = { questionCategory: 'career', numbers: [1, 2, 3] };

function pipelineFor(runner: FakeRunner, theories: TheoryRegistry = registry): AnalysisPipeline {
  return new AnalysisPipeline({
    registry: theories,
    runner,
    config,
    tables,
    logger: new SilentLogger(),
  });
}

describe('AnalysisPipeline', () => {
  describe('analyze', () => {
    it('should run the selection and resolve agreeing results', async () => {
      const runner = new FakeRunner({
        a: makeResult('a', 0.8, 0.6),
        b: makeResult('b', 0.7, 0.6),
      });

      const analysis = await pipelineFor(runner).analyze(input, new ResultCache());

      expect(analysis.selection.selected).toEqual(['a', 'b']);
      expect(analysis.results.map((r) => r.theoryId)).toEqual(['a', 'b']);
      expect(analysis.resolution.strategy).toBe('consensus');
      expect(analysis.resolution.judgmentLevel).toBeCloseTo(0.75);
      expect(analysis.reused).toEqual([]);
    });

    it('should reuse cached results computed from the same input', async () => {
      const runner = new FakeRunner({
        a: makeResult('a', 0.8, 0.6),
        b: makeResult('b', 0.7, 0.6),
      });
      const pipeline = pipelineFor(runner);
      const cache = new ResultCache();

      await pipeline.analyze(input, cache);
      const second = await pipeline.analyze({ ...input, gender: 'female' }, cache);

      expect(second.reused).toEqual(['a', 'b']);
      expect(runner.callsFor('a')).toBe(1);
    });

    it('should drop a failing theory and keep the rest', async () => {
      const runner = new FakeRunner({
        a: new Error('table lookup failed'),
        b: makeResult('b', 0.7, 0.6),
      });

      const analysis = await pipelineFor(runner).analyze(input, new ResultCache());

      expect(analysis.results.map((r) => r.theoryId)).toEqual(['b']);
      expect(analysis.failures.map((f) => f.theoryId)).toEqual(['a']);
      expect(analysis.resolution.weights).toEqual({ b: 1 });
    });

    it('should fail when every selected theory fails', async () => {
      const runner = new FakeRunner({ a: new Error('x'), b: new Error('y') });

      await expect(pipelineFor(runner).analyze(input, new ResultCache())).rejects.toThrow(
        'Every selected theory failed to produce a reading'
      );
    });

    it('should name the missing fields when nothing is eligible', async () => {
      const natalOnly = new TheoryRegistry([
        makeDescriptor('natal', {
          affinity: ALIGNED,
          requiredFields: ['birthYear'],
          optionalFields: [],
          fieldWeights: { birthYear: 1 },
        }),
      ]);

      const failure = await pipelineFor(new FakeRunner(), natalOnly)
        .analyze(input, new ResultCache())
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(InsufficientTheoriesError);
      expect(failure).toMatchObject({ missingFields: ['birthYear'] });
    });
  });

  describe('arbitration', () => {
    const opposed = {
      a: makeResult('a', 0.9, 0.6),
      b: makeResult('b', 0.2, 0.6),
    };

    it('should skip ineligible and failing arbitrators until one runs', async () => {
      const runner = new FakeRunner({
        ...opposed,
        arb2: new Error('arbitrator crashed'),
        arb3: makeResult('arb3', 0.8, 0.7),
      });

      const { resolution } = await pipelineFor(runner).analyze(input, new ResultCache());

      expect(resolution.strategy).toBe('arbitration');
      expect(resolution.arbitration?.arbitratorId).toBe('arb3');
      expect(resolution.arbitration?.matchedSide).toBe('a');
      expect(resolution.judgment).toBe('very-favorable');
      expect(resolution.confidence).toBe(0.75);
      expect(runner.callsFor('arb1')).toBe(0);
      expect(runner.callsFor('arb2')).toBe(1);
    });

    it('should reuse a cached arbitrator result when resolving again', async () => {
      const runner = new FakeRunner({
        ...opposed,
        arb2: new Error('arbitrator crashed'),
        arb3: makeResult('arb3', 0.8, 0.7),
      });
      const pipeline = pipelineFor(runner);
      const cache = new ResultCache();
      const analysis = await pipeline.analyze(input, cache);

      const again = await pipeline.resolve(analysis.results, input, analysis.selection, cache);

      expect(again.arbitration?.arbitratorId).toBe('arb3');
      expect(again.arbitration?.matchedSide).toBe('a');
      expect(cache.has('arb3')).toBe(true);
      expect(runner.callsFor('arb3')).toBe(1);
      expect(runner.callsFor('arb2')).toBe(2);
    });

    it('should fall back conservatively when every arbitrator fails', async () => {
      const runner = new FakeRunner({
        ...opposed,
        arb2: new Error('arbitrator crashed'),
        arb3: new Error('arbitrator crashed'),
      });

      const { resolution } = await pipelineFor(runner).analyze(input, new ResultCache());

      expect(resolution.strategy).toBe('conservative-fallback');
      expect(resolution.judgmentLevel).toBeCloseTo(0.525);
      expect(resolution.judgment).toBe('neutral');
      expect(resolution.confidence).toBe(0.5);
    });
  });

  describe('quickReadings', () => {
    it('should run eligible fast theories once', async () => {
      const runner = new FakeRunner({
        a: makeResult('a', 0.8, 0.6),
        b: makeResult('b', 0.3, 0.4),
      });
      const pipeline = pipelineFor(runner);
      const cache = new ResultCache();

      const first = await pipeline.quickReadings(input, cache);
      const second = await pipeline.quickReadings(input, cache);

      expect(first.map((r) => r.theoryId)).toEqual(['a', 'b']);
      expect(second.map((r) => r.theoryId)).toEqual(['a', 'b']);
      expect(runner.calls.map((call) => call.theoryId)).toEqual(['a', 'b']);
    });

    it('should leave a failing fast theory out', async () => {
      const runner = new FakeRunner({ a: makeResult('a', 0.8, 0.6), b: new Error('boom') });

      const readings = await pipelineFor(runner).quickReadings(input, new ResultCache());

      expect(readings.map((r) => r.theoryId)).toEqual(['a']);
    });
  });
});
