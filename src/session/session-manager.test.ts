import { describe, it, expect } from 'vitest';
import { SessionError } from '../errors.js';
import { FakeRunner, HANG } from '../testing/fakes.js';
import { makeDescriptor, makeResult } from '../testing/fixtures.js';
import type { AffinityTables } from '../theory/affinity.js';
import { TheoryRegistry } from '../theory/registry.js';
import type { AffinityVector, QuestionCategory } from '../theory/types.js';
import { SilentLogger } from '../utils/logger.js';
import { SessionManager } from './session-manager.js';

const ALIGNED: AffinityVector = [1, 0, 0, 0, 0, 0, 0, 0];
const NOW = new Date('2026-03-01T09:00:00Z');

const tables: AffinityTables = {
  categories: new Map<QuestionCategory, AffinityVector>([['career', ALIGNED]]),
  theories: new Map(),
  personality: new Map(),
  arbitration: { byCategory: new Map(), fallback: [] },
};

const registry = new TheoryRegistry([
  makeDescriptor('quick', { affinity: ALIGNED }),
  makeDescriptor('natal', {
    affinity: ALIGNED,
    tier: 'deep',
    requiredFields: ['birthYear'],
    optionalFields: [],
    fieldWeights: { birthYear: 1 },
  }),
]);

function createManager(runner: FakeRunner): SessionManager {
  let next = 0;
  return new SessionManager({
    runner,
    registry,
    tables,
    logger: new SilentLogger(),
    now: () => NOW,
    generateId: () => {
      next += 1;
      return `session-${String(next)}`;
    },
  });
}

function createRunner(): FakeRunner {
  return new FakeRunner({
    quick: makeResult('quick', 0.8, 0.7),
    natal: makeResult('natal', 0.7, 0.8),
  });
}

async function reachCollect(manager: SessionManager, sessionId: string): Promise<void> {
  await manager.submitTurn(sessionId, 'My numbers are 3, 7 and 9');
  await manager.submitTurn(sessionId, 'I have two offers and cannot decide. "福"');
}

describe('SessionManager', () => {
  it('should start a session in ICEBREAK', async () => {
    const manager = createManager(createRunner());

    const started = await manager.startSession('Should I accept the job offer?');

    expect(started.sessionId).toBe('session-1');
    expect(started.turn.stage).toBe('ICEBREAK');
    expect(manager.activeSessions).toBe(1);
    expect(manager.inspect('session-1')).toMatchObject({
      stage: 'ICEBREAK',
      completedStages: ['INIT'],
      startedAt: '2026-03-01T09:00:00.000Z',
      input: { questionText: 'Should I accept the job offer?', questionCategory: 'career' },
    });
  });

  it('should keep sessions independent', async () => {
    const manager = createManager(createRunner());
    const first = await manager.startSession('Should I accept the job offer?');
    const second = await manager.startSession('Will my job interview go well?');

    await manager.submitTurn(first.sessionId, 'My numbers are 3, 7 and 9');

    expect(manager.inspect(first.sessionId).stage).toBe('DEEPEN');
    expect(manager.inspect(second.sessionId).stage).toBe('ICEBREAK');
    expect(manager.inspect(second.sessionId).input.numbers).toBeUndefined();
  });

  it('should apply turns of one session in submission order', async () => {
    const manager = createManager(createRunner());
    const { sessionId } = await manager.startSession('Should I accept the job offer?');

    const [first, second] = await Promise.all([
      manager.submitTurn(sessionId, 'My numbers are 3, 7 and 9'),
      manager.submitTurn(sessionId, 'I have two offers and cannot decide. "福"'),
    ]);

    expect(first.stage).toBe('DEEPEN');
    expect(second.stage).toBe('COLLECT');
  });

  it('should reject turns for an unknown session', async () => {
    const manager = createManager(createRunner());

    await expect(manager.submitTurn('missing', 'hello')).rejects.toMatchObject({
      name: 'SessionError',
      code: 'SESSION_NOT_FOUND',
      sessionId: 'missing',
    });
  });

  describe('modifyField', () => {
    it('should acknowledge a change without moving the stage', async () => {
      const manager = createManager(createRunner());
      const { sessionId } = await manager.startSession('Should I accept the job offer?');
      await manager.submitTurn(sessionId, 'My numbers are 3, 7 and 9');

      const ack = await manager.modifyField(sessionId, 'numbers', [2, 4, 6]);

      expect(ack).toEqual({
        status: 'applied',
        sessionId,
        field: 'numbers',
        previous: [3, 7, 9],
        value: [2, 4, 6],
        invalidated: ['quick'],
        turn: undefined,
      });
      expect(manager.inspect(sessionId).stage).toBe('DEEPEN');
    });

    it('should report a rejected value', async () => {
      const manager = createManager(createRunner());
      const { sessionId } = await manager.startSession('Should I accept the job offer?');

      const ack = await manager.modifyField(sessionId, 'birthDay', 40);

      expect(ack.status).toBe('rejected');
      expect(ack.status === 'rejected' ? ack.error.field : undefined).toBe('birthDay');
    });
  });

  describe('abandonSession', () => {
    it('should discard the session', async () => {
      const manager = createManager(createRunner());
      const { sessionId } = await manager.startSession('Should I accept the job offer?');

      const ack = manager.abandonSession(sessionId);

      expect(ack).toEqual({ sessionId, abandoned: true, stage: 'ICEBREAK' });
      expect(manager.activeSessions).toBe(0);
      await expect(manager.submitTurn(sessionId, 'hello')).rejects.toBeInstanceOf(SessionError);
    });

    it('should cancel in-flight analysis and discard its results', async () => {
      const runner = createRunner();
      runner.set('natal', HANG);
      const manager = createManager(runner);
      const { sessionId } = await manager.startSession('Should I accept the job offer?');
      await reachCollect(manager, sessionId);

      const pending = manager.submitTurn(sessionId, 'I was born on 1990-05-17, I am male');
      manager.abandonSession(sessionId);

      await expect(pending).rejects.toMatchObject({ code: 'SESSION_CLOSED' });
      expect(() => manager.inspect(sessionId)).toThrow(SessionError);
    });

    it('should throw for an unknown session', () => {
      const manager = createManager(createRunner());

      expect(() => manager.abandonSession('missing')).toThrow(SessionError);
    });
  });
});
