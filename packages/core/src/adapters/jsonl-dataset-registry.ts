import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { serializeRecords } from '../domain/records/ndjson.js';
import type { ChatMessage, ToolDefinition } from '../domain/records/chat-completion.js';
import type { InteractionRecord } from '../domain/records/interaction-record.js';
import type { DatasetRegistry, TrainingDataset } from '../ports/dataset-registry.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('dataset-registry');

export interface TrainingExample {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
}

/** Chat-format example: the replayed conversation followed by the recorded answer. */
export function toTrainingExample(record: InteractionRecord): TrainingExample {
  const answer = record.response.choices[0].message;
  const example: TrainingExample = {
    messages: [...record.request.messages, { ...answer, role: 'assistant' }],
  };
  if (record.request.tools && record.request.tools.length > 0) {
    example.tools = record.request.tools;
  }
  return example;
}

/** Writes training and validation files under `<dataDir>/datasets/<name>/`. */
export class JsonlDatasetRegistry implements DatasetRegistry {
  constructor(private readonly dataDir: string) {}

  async register(name: string, dataset: TrainingDataset): Promise<string> {
    const dir = join(this.dataDir, 'datasets', name);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'training.jsonl'), serializeRecords(dataset.training.map(toTrainingExample)), 'utf-8');
    await writeFile(join(dir, 'validation.jsonl'), serializeRecords(dataset.validation.map(toTrainingExample)), 'utf-8');
    log.info(`register: ${name} (${dataset.training.length} training, ${dataset.validation.length} validation)`);
    return name;
  }
}
