import { describe, it, expect } from 'vitest';
import { CalculationError } from '../errors.js';
import type { ConflictResolution } from '../resolver/conflict-resolver.js';
import { makeResult } from '../testing/fixtures.js';
import { buildReport, summarizeVerdict, type ReportInput } from './report.js';

function resolution(overrides: Partial<ConflictResolution> = {}): ConflictResolution {
  return {
    strategy: 'consensus',
    judgment: 'favorable',
    judgmentLevel: 0.72,
    confidence: 0.8,
    tier: 1,
    records: [],
    weights: { a: 0.5, b: 0.5 },
    theoryIds: ['a', 'b'],
    ...overrides,
  };
}

describe('summarizeVerdict', () => {
  it('should describe agreement and confidence', () => {
    expect(summarizeVerdict(resolution(), 2).summary).toBe(
      'The signs lean in your favour (high confidence, across 2 readings).'
    );
  });

  it('should mention a disagreement settled by fallback', () => {
    const verdict = summarizeVerdict(
      resolution({ strategy: 'conservative-fallback', judgment: 'neutral', confidence: 0.5, tier: 4 }),
      3
    );

    expect(verdict.summary).toBe(
      'The signs are balanced; the outcome depends on how you act (moderate confidence, although the readings disagree).'
    );
  });

  it('should mention arbitration', () => {
    const verdict = summarizeVerdict(
      resolution({ strategy: 'arbitration', judgment: 'very-unfavorable', confidence: 0.3, tier: 4 }),
      2
    );

    expect(verdict).toEqual({
      judgment: 'very-unfavorable',
      judgmentLevel: 0.72,
      confidence: 0.3,
      summary:
        'The signs are strongly against this for now (low confidence, after arbitrating a disagreement).',
    });
  });
});

describe('buildReport', () => {
  it('should aggregate the session and take the verdict from the final resolution', () => {
    const input: ReportInput = {
      sessionId: 'session-1',
      question: 'Should I move abroad?',
      category: 'decision',
      selectedTheories: ['a', 'b', 'c'],
      executionOrder: ['a', 'b', 'c'],
      results: [makeResult('a', 0.7, 0.9), makeResult('b', 0.75, 0.7)],
      failures: [
        {
          theoryId: 'c',
          reason: 'Runner failed: timeout',
          error: new CalculationError('c', 'Runner failed: timeout'),
        },
      ],
      initialResolution: resolution({ confidence: 0.6 }),
      finalResolution: resolution(),
      verificationQuestions: [],
      verificationFeedback: [],
      adjustments: [],
      skippedFields: ['birthHour'],
      generatedAt: new Date('2026-03-01T09:00:00Z'),
    };

    const report = buildReport(input);

    expect(report.droppedTheories).toEqual([{ theoryId: 'c', reason: 'Runner failed: timeout' }]);
    expect(report.verdict.confidence).toBe(0.8);
    expect(report.verdict.summary).toBe(
      'The signs lean in your favour (high confidence, across 2 readings).'
    );
    expect(report.generatedAt).toBe('2026-03-01T09:00:00.000Z');
    expect(report.skippedFields).toEqual(['birthHour']);
    expect(JSON.parse(JSON.stringify(report))).toMatchObject({ sessionId: 'session-1' });
  });
});
