import type { DataSplitConfig } from '../config/flywheel-config.js';
import { DatasetError } from '../../shared/errors.js';
import { compareByTimestamp, normalizeRecords, type InteractionRecord } from './interaction-record.js';

export interface DatasetSplit {
  /** Every record considered by the job after dedup and limit. */
  all: InteractionRecord[];
  evaluation: InteractionRecord[];
  training: InteractionRecord[];
  validation: InteractionRecord[];
}

export interface DatasetSummary {
  total: number;
  evaluation: number;
  training: number;
  validation: number;
}

// mulberry32
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const random = seededRandom(seed);
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

function splitTraining(records: InteractionRecord[], config: DataSplitConfig): [InteractionRecord[], InteractionRecord[]] {
  const shuffled = seededShuffle(records, config.random_seed + 1);
  const validationSize = Math.floor(records.length * config.val_ratio);
  const validation = shuffled.slice(0, validationSize).sort(compareByTimestamp);
  const training = shuffled.slice(validationSize).sort(compareByTimestamp);
  return [training, validation];
}

/**
 * Turns the records a job fetched into evaluation and customization slices.
 * The same input and config always give the same split.
 */
export function splitDataset(records: readonly InteractionRecord[], config: DataSplitConfig): DatasetSplit {
  let all = normalizeRecords(records);
  if (config.limit !== undefined && all.length > config.limit) {
    all = all.slice(all.length - config.limit);
  }

  if (all.length === 0) {
    throw new DatasetError('No records to evaluate');
  }
  if (all.length < config.min_total_records) {
    throw new DatasetError(
      `Found ${all.length} records, at least ${config.min_total_records} are required`,
    );
  }

  if (config.eval_size === undefined) {
    const [training, validation] = splitTraining(all, config);
    return { all, evaluation: all, training, validation };
  }

  if (config.eval_size > all.length) {
    throw new DatasetError(`eval_size ${config.eval_size} exceeds the ${all.length} available records`);
  }

  const shuffled = seededShuffle(all, config.random_seed);
  const evaluation = shuffled.slice(0, config.eval_size).sort(compareByTimestamp);
  const [training, validation] = splitTraining(shuffled.slice(config.eval_size), config);
  return { all, evaluation, training, validation };
}

export function summarizeSplit(split: DatasetSplit): DatasetSummary {
  return {
    total: split.all.length,
    evaluation: split.evaluation.length,
    training: split.training.length,
    validation: split.validation.length,
  };
}
