import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { parseInteractionRecords, serializeRecords } from '../domain/records/ndjson.js';
import { normalizeRecords, recordId, type InteractionRecord } from '../domain/records/interaction-record.js';
import { inRange, type AppendResult, type RecordStore, type TimeRange } from '../ports/record-store.js';
import { BackendUnavailableError, NotFoundError, errorMessage } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { isMissingFile } from '../shared/fs.js';

const log = createLogger('jsonl-record-store');

/**
 * Stores captured traffic as one newline-delimited JSON file per
 * workload/client pair under `<dataDir>/records/`.
 */
export class JsonlRecordStore implements RecordStore {
  constructor(private readonly dataDir: string) {}

  private get recordsDir(): string {
    return join(this.dataDir, 'records');
  }

  private filePath(workloadId: string, clientId: string): string {
    return join(this.recordsDir, encodeURIComponent(workloadId), `${encodeURIComponent(clientId)}.jsonl`);
  }

  private async readFileRecords(path: string): Promise<InteractionRecord[] | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new BackendUnavailableError(`Could not read ${path}: ${errorMessage(err)}`, err);
    }
    const { records, errors } = parseInteractionRecords(text);
    if (errors.length > 0) {
      log.warn(`readFileRecords: ignoring ${errors.length} malformed lines in ${path} (first: line ${errors[0].line}, ${errors[0].message})`);
    }
    return records;
  }

  async fetch(workloadId: string, clientId: string, range?: TimeRange): Promise<InteractionRecord[]> {
    const path = this.filePath(workloadId, clientId);
    const stored = await this.readFileRecords(path);
    const matching = (stored ?? []).filter((r) => inRange(r.timestamp, range));
    if (matching.length === 0) {
      throw new NotFoundError(`No records for workload ${workloadId}, client ${clientId}`);
    }
    log.debug(`fetch: ${matching.length} records from ${path}`);
    return normalizeRecords(matching);
  }

  async append(records: readonly InteractionRecord[]): Promise<AppendResult> {
    const groups = new Map<string, InteractionRecord[]>();
    for (const record of records) {
      const path = this.filePath(record.workload_id, record.client_id);
      const group = groups.get(path);
      if (group) group.push(record);
      else groups.set(path, [record]);
    }

    let inserted = 0;
    for (const [path, group] of groups) {
      const existing = await this.readFileRecords(path);
      const known = new Set((existing ?? []).map(recordId));
      const fresh: InteractionRecord[] = [];
      for (const record of group) {
        const id = recordId(record);
        if (known.has(id)) continue;
        known.add(id);
        fresh.push(record);
      }
      if (fresh.length === 0) continue;

      try {
        await mkdir(dirname(path), { recursive: true });
        await appendFile(path, serializeRecords(fresh), 'utf-8');
      } catch (err) {
        throw new BackendUnavailableError(`Could not write ${path}: ${errorMessage(err)}`, err);
      }
      inserted += fresh.length;
    }

    log.info(`append: stored ${inserted} of ${records.length} records`);
    return { inserted, duplicates: records.length - inserted };
  }
}
