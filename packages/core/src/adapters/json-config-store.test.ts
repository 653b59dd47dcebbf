import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigError } from '../shared/errors.js';
import { JsonConfigStore } from './json-config-store.js';

describe('JsonConfigStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flywheel-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should start with empty preferences', async () => {
    expect(await new JsonConfigStore(join(dir, 'missing')).getPreferences()).toEqual({});
  });

  it('should save and read preferences', async () => {
    const store = new JsonConfigStore(join(dir, 'nested'));
    await store.savePreferences({ promotion: { tolerance: 0.1 } });

    expect(await store.getPreferences()).toEqual({ promotion: { tolerance: 0.1 } });
    expect(store.configPath).toBe(join(dir, 'nested', 'config.json'));
  });

  it('should reject files that are not a JSON object', async () => {
    const store = new JsonConfigStore(dir);
    await writeFile(store.configPath, '[1, 2]', 'utf-8');
    await expect(store.getPreferences()).rejects.toBeInstanceOf(ConfigError);

    await writeFile(store.configPath, '{ broken', 'utf-8');
    await expect(store.getPreferences()).rejects.toThrow(/is not valid JSON/);
  });
});
