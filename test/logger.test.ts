import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

const LOGGER_VARIABLES = ['LOG_LEVEL', 'LOG_PRETTY'] as const;

describe('logger', () => {
  let dir: string;
  let saved: Record<string, string | undefined>;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'relnotes-logger-'));
    saved = {};
    for (const name of LOGGER_VARIABLES) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    vi.spyOn(process, 'cwd').mockReturnValue(dir);
    vi.resetModules();
  });

  afterEach(async () => {
    for (const name of LOGGER_VARIABLES) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should take LOG_LEVEL from the .env file when loaded first', async () => {
    await fs.writeFile(join(dir, '.env'), 'LOG_LEVEL=debug\n');

    const { logger } = await import('../src/utils/logger.js');

    expect(logger.level).toBe('debug');
  });

  it('should fall back to silent under test without a configured level', async () => {
    const { logger } = await import('../src/utils/logger.js');

    expect(logger.level).toBe('silent');
  });
});
