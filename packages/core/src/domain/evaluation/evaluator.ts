import type { Judge } from '../../ports/judge.js';
import type { ModelGateway } from '../../ports/model-gateway.js';
import { mapWithConcurrency, retryWithBackoff, withTimeout } from '../../shared/async.js';
import {
  DatasetError,
  EvaluatorUnavailableError,
  PerRecordEvaluationError,
  errorMessage,
} from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import { extractCompletion, replayRequest } from '../records/chat-completion.js';
import { recordId, type InteractionRecord } from '../records/interaction-record.js';
import { SKIPPED, meanScore, type EvaluationResult, type ScoredRecord } from './evaluation-result.js';
import { tokenF1, toolCallSimilarity } from './similarity.js';

const log = createLogger('evaluator');

export interface EvaluatorOptions {
  callTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  concurrency: number;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

export class Evaluator {
  constructor(
    private readonly gateway: ModelGateway,
    private readonly options: EvaluatorOptions,
    private readonly judge?: Judge,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Replays every record against `modelIdentifier` and scores the output
   * against the recorded response. Records whose calls keep failing are
   * skipped; if all of them are, the model is considered unreachable.
   */
  async evaluate(
    modelIdentifier: string,
    records: readonly InteractionRecord[],
    datasetSliceRef: string,
    options: EvaluateOptions = {},
  ): Promise<EvaluationResult> {
    if (records.length === 0) {
      throw new DatasetError(`Nothing to evaluate for ${modelIdentifier} on ${datasetSliceRef}`);
    }
    log.info(`evaluate: ${modelIdentifier} on ${records.length} records (${datasetSliceRef})`);

    let completed = 0;
    const perRecordScores = await mapWithConcurrency(records, this.options.concurrency, async (record) => {
      const scored = await this.scoreRecord(modelIdentifier, record, options.signal);
      completed++;
      options.onProgress?.(completed, records.length);
      return scored;
    });

    const aggregateScore = meanScore(perRecordScores);
    if (aggregateScore === undefined) {
      const lastError = perRecordScores[perRecordScores.length - 1]?.error ?? 'unknown error';
      throw new EvaluatorUnavailableError(
        `Every call to ${modelIdentifier} failed (last error: ${lastError})`,
        modelIdentifier,
      );
    }

    const skippedCount = perRecordScores.filter((entry) => entry.score === SKIPPED).length;
    if (skippedCount > 0) {
      log.warn(`evaluate: ${modelIdentifier} skipped ${skippedCount}/${records.length} records`);
    }
    log.info(`evaluate: ${modelIdentifier} scored ${aggregateScore.toFixed(4)}`);

    return {
      modelIdentifier,
      datasetSliceRef,
      perRecordScores,
      aggregateScore,
      skippedCount,
      computedAt: this.now().toISOString(),
    };
  }

  private async scoreRecord(
    modelIdentifier: string,
    record: InteractionRecord,
    signal?: AbortSignal,
  ): Promise<ScoredRecord> {
    const id = recordId(record);
    try {
      const score = await retryWithBackoff(
        () => withTimeout((callSignal) => this.scoreOnce(modelIdentifier, record, callSignal), this.options.callTimeoutMs, signal),
        {
          retries: this.options.maxRetries,
          baseDelayMs: this.options.retryBaseDelayMs,
          signal,
          onRetry: (attempt, err, delayMs) =>
            log.debug(`scoreRecord: ${id} attempt ${attempt} after ${delayMs}ms: ${errorMessage(err)}`),
        },
      );
      return { recordId: id, score };
    } catch (err) {
      // Cancellation is not a per-record failure.
      if (signal?.aborted) throw err;
      const failure = new PerRecordEvaluationError(errorMessage(err), id);
      log.warn(`scoreRecord: skipping ${id} for ${modelIdentifier}: ${failure.message}`);
      return { recordId: id, score: SKIPPED, error: failure.message };
    }
  }

  private async scoreOnce(modelIdentifier: string, record: InteractionRecord, signal: AbortSignal): Promise<number> {
    const response = await this.gateway.complete(replayRequest(record.request, modelIdentifier), { signal });
    const expected = extractCompletion(record.response);
    const actual = extractCompletion(response);

    if (expected.toolCalls.length > 0 || actual.toolCalls.length > 0) {
      return toolCallSimilarity(expected.toolCalls, actual.toolCalls);
    }
    if (expected.content === actual.content) return 1;
    if (this.judge) {
      const rating = await this.judge.rate(
        { messages: record.request.messages, reference: expected.content, candidate: actual.content },
        { signal },
      );
      return Math.min(1, Math.max(0, rating));
    }
    return tokenF1(expected.content, actual.content);
  }
}
