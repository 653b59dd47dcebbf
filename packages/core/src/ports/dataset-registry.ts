import type { InteractionRecord } from '../domain/records/interaction-record.js';

export interface TrainingDataset {
  training: readonly InteractionRecord[];
  validation: readonly InteractionRecord[];
}

/** Makes a training slice addressable by the customization backend. */
export interface DatasetRegistry {
  /** Returns the reference the backend should train from. */
  register(name: string, dataset: TrainingDataset): Promise<string>;
}
