import { describe, it, expect } from 'vitest';
import { DatasetError } from '../../shared/errors.js';
import { makeRecord, makeRecords } from '../../testing/fakes.js';
import { DataSplitConfigSchema, type DataSplitConfig } from '../config/flywheel-config.js';
import { recordId } from './interaction-record.js';
import { seededShuffle, splitDataset, summarizeSplit } from './data-split.js';

function config(overrides: Partial<DataSplitConfig> = {}): DataSplitConfig {
  return DataSplitConfigSchema.parse(overrides);
}

const ids = (records: { workload_id: string; client_id: string; timestamp: number }[]) => records.map(recordId);

describe('splitDataset', () => {
  it('should evaluate and train on every record when no eval size is set', () => {
    const records = makeRecords(50);
    const split = splitDataset(records, config());

    expect(split.evaluation).toHaveLength(50);
    expect(split.validation).toHaveLength(5);
    expect(split.training).toHaveLength(45);
    expect(new Set([...ids(split.training), ...ids(split.validation)]).size).toBe(50);
    expect(summarizeSplit(split)).toEqual({ total: 50, evaluation: 50, training: 45, validation: 5 });
  });

  it('should hold out a disjoint evaluation slice when an eval size is set', () => {
    const split = splitDataset(makeRecords(50), config({ eval_size: 10 }));

    expect(split.evaluation).toHaveLength(10);
    expect(split.validation).toHaveLength(4);
    expect(split.training).toHaveLength(36);
    const evaluation = new Set(ids(split.evaluation));
    expect([...split.training, ...split.validation].some((r) => evaluation.has(recordId(r)))).toBe(false);
  });

  it('should give the same split for the same records and seed', () => {
    const records = makeRecords(40);
    const first = splitDataset(records, config({ eval_size: 8 }));
    const second = splitDataset([...records].reverse(), config({ eval_size: 8 }));

    expect(ids(second.evaluation)).toEqual(ids(first.evaluation));
    expect(ids(second.training)).toEqual(ids(first.training));
  });

  it('should keep every slice in timestamp order', () => {
    const split = splitDataset(makeRecords(30), config({ eval_size: 12 }));
    for (const slice of [split.evaluation, split.training, split.validation]) {
      const timestamps = slice.map((r) => r.timestamp);
      expect(timestamps).toEqual([...timestamps].sort((a, b) => a - b));
    }
  });

  it('should keep only the newest records under a limit', () => {
    const split = splitDataset(makeRecords(50), config({ limit: 20 }));

    expect(split.all).toHaveLength(20);
    expect(split.all[0].timestamp).toBe(1_030);
    expect(split.all[19].timestamp).toBe(1_049);
  });

  it('should drop repeated records before splitting', () => {
    const records = [makeRecord({ timestamp: 5 }), makeRecord({ timestamp: 5, answer: 'other' }), makeRecord({ timestamp: 6 })];
    const split = splitDataset(records, config());

    expect(split.all).toHaveLength(2);
    expect(split.all[0].response.choices[0].message.content).toBe('answer 5');
  });

  it('should fail on an empty dataset', () => {
    expect(() => splitDataset([], config())).toThrow(DatasetError);
    expect(() => splitDataset([], config())).toThrow('No records to evaluate');
  });

  it('should fail below the minimum record count', () => {
    expect(() => splitDataset(makeRecords(5), config({ min_total_records: 10 }))).toThrow(
      'Found 5 records, at least 10 are required',
    );
  });

  it('should fail when the eval size exceeds the records', () => {
    expect(() => splitDataset(makeRecords(5), config({ eval_size: 6 }))).toThrow(DatasetError);
  });
});

describe('seededShuffle', () => {
  it('should permute without losing items and repeat for a seed', () => {
    const items = Array.from({ length: 20 }, (_, i) => i);
    const shuffled = seededShuffle(items, 3);

    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(seededShuffle(items, 3)).toEqual(shuffled);
    expect(items[0]).toBe(0);
  });
});
