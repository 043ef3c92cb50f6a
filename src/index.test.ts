import { describe, it, expect } from 'vitest';
import { FakeRunner } from './testing/fakes.js';
import { makeDescriptor, makeResult } from './testing/fixtures.js';
import {
  VERSION,
  SessionManager,
  TheoryRegistry,
  SessionError,
  SilentLogger,
  formatReport,
  type AffinityTables,
  type AffinityVector,
  type QuestionCategory,
} from './index.js';

const ALIGNED: AffinityVector = [1, 0, 0, 0, 0, 0, 0, 0];

const tables: AffinityTables = {
  categories: new Map<QuestionCategory, AffinityVector>([['career', ALIGNED]]),
  theories: new Map(),
  personality: new Map(),
  arbitration: { byCategory: new Map(), fallback: [] },
};

describe('augury', () => {
  it('should follow semver', () => {
    expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('should carry a session from question to formatted report', async () => {
    const manager = new SessionManager({
      runner: new FakeRunner({
        quick: makeResult('quick', 0.8, 0.7),
        ether: makeResult('ether', 0.75, 0.6),
        natal: makeResult('natal', 0.7, 0.8),
      }),
      registry: new TheoryRegistry([
        makeDescriptor('quick', { affinity: ALIGNED }),
        makeDescriptor('ether', { affinity: ALIGNED, tier: 'foundational' }),
        makeDescriptor('natal', {
          affinity: ALIGNED,
          tier: 'deep',
          requiredFields: ['birthYear'],
          optionalFields: ['gender'],
          fieldWeights: { birthYear: 0.8, gender: 0.2 },
        }),
      ]),
      tables,
      logger: new SilentLogger(),
      now: () => new Date('2026-03-01T09:00:00Z'),
    });

    const { sessionId } = await manager.startSession('Should I accept the job offer?');
    for (const text of [
      'My numbers are 3, 7 and 9',
      'I have two offers and cannot decide. "福"',
      'I was born on 1990-05-17 at 08:00, I am female',
      'Yes',
      'No',
    ]) {
      await manager.submitTurn(sessionId, text);
    }
    const last = await manager.submitTurn(sessionId, 'Not sure');

    expect(last.kind).toBe('report');
    expect(last.stage).toBe('QA');
    const { report } = manager.inspect(sessionId);
    expect(report?.verdict.summary).toBe(
      'The signs lean in your favour (high confidence, across 3 readings).'
    );
    const lines = report === undefined ? [] : formatReport(report).split('\n');
    expect(lines[0]).toBe('# Reading: Should I accept the job offer?');
    expect(lines.at(-1)).toBe('_Generated 2026-03-01T09:00:00.000Z_');

    const closing = await manager.submitTurn(sessionId, 'goodbye');
    expect(closing.stage).toBe('COMPLETED');
    await expect(manager.submitTurn(sessionId, 'one more thing')).rejects.toBeInstanceOf(
      SessionError
    );
  });
});
