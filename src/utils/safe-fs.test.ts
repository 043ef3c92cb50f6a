import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  safeExists,
  safeReadTextFile,
  safeReadTextFileSync,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'augury-safe-fs-'));
    file = path.join(dir, 'augury.toml');
    await fs.writeFile(file, '[logging]\ndebug = true\n', 'utf-8');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should reject an empty path', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
    });

    it('should reject null bytes', () => {
      expect(() => validatePath('a\0b')).toThrow('Path cannot contain null bytes');
    });

    it('should resolve relative paths to absolute ones', () => {
      expect(path.isAbsolute(validatePath('data/affinity.json'))).toBe(true);
    });
  });

  it('should read text files asynchronously and synchronously', async () => {
    await expect(safeReadTextFile(file)).resolves.toBe('[logging]\ndebug = true\n');
    expect(safeReadTextFileSync(file)).toBe('[logging]\ndebug = true\n');
  });

  it('should report existence', async () => {
    await expect(safeExists(file)).resolves.toBe(true);
    await expect(safeExists(path.join(dir, 'missing.toml'))).resolves.toBe(false);
  });
});
