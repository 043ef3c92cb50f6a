import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigValidationError, DEFAULT_CONFIG, loadConfig } from './index.js';

describe('loadConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'augury-config-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', async () => {
    await expect(loadConfig(path.join(dir, 'missing.toml'), {})).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('should combine file values and environment overrides', async () => {
    const file = path.join(dir, 'augury.toml');
    await fs.writeFile(file, '[conversation]\nmax_reprompts = 5\n', 'utf-8');

    const config = await loadConfig(file, { AUGURY_DEBUG: '1' });

    expect(config.conversation.max_reprompts).toBe(5);
    expect(config.logging.debug).toBe(true);
  });

  it('should reject semantically invalid files', async () => {
    const file = path.join(dir, 'invalid.toml');
    await fs.writeFile(file, '[conflict]\nconfidence_boost = 0.9\n', 'utf-8');

    await expect(loadConfig(file, {})).rejects.toThrow(ConfigValidationError);
  });
});
