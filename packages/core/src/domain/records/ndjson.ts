import { InteractionRecordSchema, type InteractionRecord } from './interaction-record.js';

export interface NdjsonLineError {
  line: number;
  message: string;
}

export interface NdjsonParseResult {
  records: InteractionRecord[];
  errors: NdjsonLineError[];
}

/**
 * Parses newline-delimited interaction records. Blank lines are ignored; a bad
 * line is reported by its 1-based number and does not stop the rest.
 */
export function parseInteractionRecords(text: string): NdjsonParseResult {
  const records: InteractionRecord[] = [];
  const errors: NdjsonLineError[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      errors.push({ line: index + 1, message: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` });
      return;
    }

    const parsed = InteractionRecordSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      errors.push({ line: index + 1, message: `${path}: ${issue.message}` });
      return;
    }
    records.push(parsed.data);
  });

  return { records, errors };
}

export function serializeRecords(records: readonly unknown[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n') + (records.length > 0 ? '\n' : '');
}
