import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger, SilentLogger } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  describe('serialization failures', () => {
    it('should degrade circular payloads to a serializationError entry', () => {
      const logger = new Logger({ component: 'ConflictResolver' });
      const circular: Record<string, unknown> = { pair: ['bazi', 'meihua'] };
      circular.self = circular;

      expect(() => {
        logger.warn('conflict_detected', circular);
      }).not.toThrow();

      expect(capturedOutput).toHaveLength(1);
      const parsed = parseOutput(0);
      expect(parsed.level).toBe('warn');
      expect(parsed.component).toBe('ConflictResolver');
      expect(parsed.event).toBe('conflict_detected');
      expect(typeof parsed.serializationError).toBe('string');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should degrade BigInt payloads to a serializationError entry', () => {
      const logger = new Logger({ component: 'TheoryRunner' });

      logger.info('theory_completed', { elapsed: BigInt(12) });

      const parsed = parseOutput(0);
      expect(parsed.event).toBe('theory_completed');
      expect(parsed.originalData).toBe('[unserializable]');
    });

    it('should always emit one parseable line (property-based)', () => {
      const logger = new Logger({ component: 'FlowGuard' });

      fc.assert(
        fc.property(fc.anything(), (payload) => {
          capturedOutput = [];
          logger.info('turn_processed', { payload });

          expect(capturedOutput).toHaveLength(1);
          const line = capturedOutput[0] ?? '';
          expect(line.endsWith('\n')).toBe(true);
          const parsed = JSON.parse(line.trim()) as Record<string, unknown>;
          expect(parsed.component).toBe('FlowGuard');
          if (parsed.serializationError !== undefined) {
            expect(parsed.originalData).toBe('[unserializable]');
          }
        })
      );
    });
  });

  describe('levels', () => {
    it('should write info entries with data', () => {
      const logger = new Logger({ component: 'TheorySelector' });

      logger.info('theories_selected', { count: 3 });

      const parsed = parseOutput(0);
      expect(parsed.level).toBe('info');
      expect(parsed.data).toEqual({ count: 3 });
      expect(parsed.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'TheorySelector' });

      logger.error('selection_failed');

      expect(parseOutput(0)).not.toHaveProperty('data');
    });

    it('should drop debug entries unless debug mode is on', () => {
      new Logger({ component: 'Quiet' }).debug('hidden');
      new Logger({ component: 'Loud', debugMode: true }).debug('shown');

      expect(capturedOutput).toHaveLength(1);
      expect(parseOutput(0).component).toBe('Loud');
    });

    it('should pass debug mode on to child loggers', () => {
      const parent = new Logger({ component: 'SessionManager', debugMode: true });

      parent.child('FlowGuard').debug('stage_entered', { stage: 'ICEBREAK' });

      const parsed = parseOutput(0);
      expect(parsed.component).toBe('FlowGuard');
      expect(parsed.level).toBe('debug');
    });
  });

  describe('SilentLogger', () => {
    it('should write nothing at any level', () => {
      const logger = new SilentLogger();

      logger.info('a');
      logger.warn('b');
      logger.error('c');
      logger.child('X').info('d');

      expect(capturedOutput).toHaveLength(0);
    });
  });
});
