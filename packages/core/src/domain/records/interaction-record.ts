import { z } from 'zod';
import { ChatCompletionRequestSchema, ChatCompletionResponseSchema } from './chat-completion.js';

export const InteractionRecordSchema = z.object({
  timestamp: z.number().int().nonnegative(),
  workload_id: z.string().min(1),
  client_id: z.string().min(1),
  request: ChatCompletionRequestSchema,
  response: ChatCompletionResponseSchema,
});

export type InteractionRecord = z.infer<typeof InteractionRecordSchema>;

/** Records are unique per (workload, client, timestamp). */
export function recordId(record: Pick<InteractionRecord, 'workload_id' | 'client_id' | 'timestamp'>): string {
  return `${record.workload_id}:${record.client_id}:${record.timestamp}`;
}

export function compareByTimestamp(a: InteractionRecord, b: InteractionRecord): number {
  return a.timestamp - b.timestamp;
}

/** Drops repeated identities (first occurrence wins) and orders by timestamp. */
export function normalizeRecords(records: readonly InteractionRecord[]): InteractionRecord[] {
  const seen = new Set<string>();
  const unique: InteractionRecord[] = [];
  for (const record of records) {
    const id = recordId(record);
    if (seen.has(id)) continue;
    seen.add(id);
    unique.push(record);
  }
  return unique.sort(compareByTimestamp);
}

/** The model most requests were addressed to, i.e. the incumbent serving this workload. */
export function dominantModel(records: readonly InteractionRecord[]): string | undefined {
  const counts = new Map<string, number>();
  for (const record of records) {
    counts.set(record.request.model, (counts.get(record.request.model) ?? 0) + 1);
  }
  let best: string | undefined;
  let bestCount = 0;
  for (const [model, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== undefined && model < best)) {
      best = model;
      bestCount = count;
    }
  }
  return best;
}
