export const SKIPPED = 'SKIPPED';

export type RecordScore = number | typeof SKIPPED;

export interface ScoredRecord {
  recordId: string;
  score: RecordScore;
  /** Last failure for a skipped record. */
  error?: string;
}

export interface EvaluationResult {
  modelIdentifier: string;
  datasetSliceRef: string;
  /** One entry per evaluated record, in input order; skipped entries stay in place. */
  perRecordScores: ScoredRecord[];
  aggregateScore: number;
  skippedCount: number;
  computedAt: string;
}

export function isScored(entry: ScoredRecord): entry is ScoredRecord & { score: number } {
  return entry.score !== SKIPPED;
}

/** Mean of the non-skipped scores, or undefined when every record was skipped. */
export function meanScore(scores: readonly ScoredRecord[]): number | undefined {
  const scored = scores.filter(isScored);
  if (scored.length === 0) return undefined;
  return scored.reduce((sum, entry) => sum + entry.score, 0) / scored.length;
}
