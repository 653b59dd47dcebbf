import { describe, it, expect } from 'vitest';
import { ConfigError } from '../shared/errors.js';
import { MemoryConfigStore } from '../testing/fakes.js';
import { ConfigService, mergePreferences, parsePreferenceValue } from './config-service.js';

describe('ConfigService', () => {
  it('should fall back to documented defaults', async () => {
    const config = await new ConfigService(new MemoryConfigStore(), {}).resolve();

    expect(config.llm_judge).toEqual({ enabled: false, type: 'local', model_id: 'meta/llama-3.1-70b-instruct' });
    expect(config.model_serving.url).toBe('http://localhost:8000/v1');
    expect(config.customizer.url).toBe('http://localhost:8001');
    expect(config.customizer.hyperparameters.epochs).toBe(2);
    expect(config.data_split).toEqual({ val_ratio: 0.1, min_total_records: 1, random_seed: 42 });
    expect(config.promotion.tolerance).toBe(0.05);
    expect(config.execution.max_concurrent_candidates).toBe(2);
    expect(config.execution.call_timeout_ms).toBe(120_000);
  });

  it('should let the environment override stored preferences', async () => {
    const store = new MemoryConfigStore({ promotion: { tolerance: 0.2 }, data_split: { eval_size: 50, random_seed: 7 } });
    const service = new ConfigService(store, {
      FLYWHEEL_PROMOTION_TOLERANCE: '0.01',
      FLYWHEEL_JUDGE_ENABLED: 'true',
      FLYWHEEL_JUDGE_TYPE: 'remote',
      FLYWHEEL_JUDGE_URL: 'https://judge.test/v1',
    });

    const config = await service.resolve();

    expect(config.promotion.tolerance).toBe(0.01);
    expect(config.data_split.eval_size).toBe(50);
    expect(config.data_split.random_seed).toBe(7);
    expect(config.llm_judge).toMatchObject({ enabled: true, type: 'remote', url: 'https://judge.test/v1' });
  });

  it('should apply explicit overrides last', async () => {
    const service = new ConfigService(new MemoryConfigStore(), { FLYWHEEL_EVAL_SIZE: '100' });

    const config = await service.resolve({ data_split: { eval_size: 10 } });

    expect(config.data_split.eval_size).toBe(10);
  });

  it('should list every invalid field', async () => {
    const service = new ConfigService(new MemoryConfigStore({ promotion: { tolerance: 2 } }), {
      FLYWHEEL_JUDGE_TYPE: 'remote',
    });

    await expect(service.resolve()).rejects.toBeInstanceOf(ConfigError);
    await expect(service.resolve()).rejects.toThrow(/llm_judge\.url: a remote judge needs a url/);
    await expect(service.resolve()).rejects.toThrow(/promotion\.tolerance: /);
  });

  it('should store dotted keys and refuse invalid values', async () => {
    const store = new MemoryConfigStore({ customizer: { namespace: 'team-a' } });
    const service = new ConfigService(store, {});

    await service.set('customizer.hyperparameters.epochs', 5);
    expect(store.prefs).toEqual({ customizer: { namespace: 'team-a', hyperparameters: { epochs: 5 } } });

    await expect(service.set('promotion.tolerance', 'lots')).rejects.toBeInstanceOf(ConfigError);
    expect(store.prefs).not.toHaveProperty('promotion');
  });

  it('should unset keys and drop emptied sections', async () => {
    const store = new MemoryConfigStore({ promotion: { tolerance: 0.1 }, customizer: { namespace: 'x', url: 'http://c.test' } });
    const service = new ConfigService(store, {});

    await service.unset('promotion.tolerance');
    await service.unset('customizer.url');

    expect(store.prefs).toEqual({ customizer: { namespace: 'x' } });

    await service.reset();
    expect(store.prefs).toEqual({});
  });
});

describe('mergePreferences', () => {
  it('should merge objects and replace everything else', () => {
    expect(mergePreferences({ a: { b: 1, c: [1] }, d: 1 }, { a: { c: [2] }, d: { e: 1 } })).toEqual({
      a: { b: 1, c: [2] },
      d: { e: 1 },
    });
  });
});

describe('parsePreferenceValue', () => {
  it('should decode JSON literals and keep other text', () => {
    expect(parsePreferenceValue('0.1')).toBe(0.1);
    expect(parsePreferenceValue('true')).toBe(true);
    expect(parsePreferenceValue('http://localhost:9000')).toBe('http://localhost:9000');
  });
});
