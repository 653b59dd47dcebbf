import { normalizeRecords, recordId, type InteractionRecord } from '../domain/records/interaction-record.js';
import { inRange, type AppendResult, type RecordStore, type TimeRange } from '../ports/record-store.js';
import { NotFoundError } from '../shared/errors.js';

/** Process-local record store for embedding and tests. */
export class InMemoryRecordStore implements RecordStore {
  private readonly records = new Map<string, InteractionRecord>();

  constructor(initial: readonly InteractionRecord[] = []) {
    for (const record of initial) this.records.set(recordId(record), record);
  }

  async fetch(workloadId: string, clientId: string, range?: TimeRange): Promise<InteractionRecord[]> {
    const matching = [...this.records.values()].filter(
      (r) => r.workload_id === workloadId && r.client_id === clientId && inRange(r.timestamp, range),
    );
    if (matching.length === 0) {
      throw new NotFoundError(`No records for workload ${workloadId}, client ${clientId}`);
    }
    return normalizeRecords(matching);
  }

  async append(records: readonly InteractionRecord[]): Promise<AppendResult> {
    let inserted = 0;
    for (const record of records) {
      const id = recordId(record);
      if (this.records.has(id)) continue;
      this.records.set(id, record);
      inserted++;
    }
    return { inserted, duplicates: records.length - inserted };
  }

  get size(): number {
    return this.records.size;
  }
}
