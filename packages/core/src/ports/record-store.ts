import type { InteractionRecord } from '../domain/records/interaction-record.js';

/** Inclusive bounds in epoch seconds. */
export interface TimeRange {
  from?: number;
  to?: number;
}

export interface AppendResult {
  inserted: number;
  duplicates: number;
}

export interface RecordStore {
  /**
   * Records for one workload/client, oldest first. Throws `NotFoundError` when
   * none match and `BackendUnavailableError` when the store cannot be read.
   */
  fetch(workloadId: string, clientId: string, range?: TimeRange): Promise<InteractionRecord[]>;
  /** Stores new records; records whose identity is already stored are skipped. */
  append(records: readonly InteractionRecord[]): Promise<AppendResult>;
}

export function inRange(timestamp: number, range?: TimeRange): boolean {
  if (!range) return true;
  if (range.from !== undefined && timestamp < range.from) return false;
  if (range.to !== undefined && timestamp > range.to) return false;
  return true;
}
