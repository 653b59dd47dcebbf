import type { CustomizationBackend } from '../../ports/customization-backend.js';
import { sleep, withTimeout } from '../../shared/async.js';
import {
  CustomizationFailedError,
  CustomizationSubmitError,
  CustomizationTimeoutError,
  errorMessage,
} from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { CandidateConfig } from '../candidate/candidate-config.js';
import type { Hyperparameters } from '../config/flywheel-config.js';
import { isTerminalCustomization, type CustomizationJobHandle } from './customization-job.js';

const log = createLogger('customization');

export interface PollOptions {
  deadlineMs: number;
  initialIntervalMs: number;
  maxIntervalMs: number;
  multiplier: number;
  signal?: AbortSignal;
  onUpdate?: (handle: CustomizationJobHandle) => void;
}

export class CustomizationTrigger {
  constructor(
    private readonly backend: CustomizationBackend,
    private readonly hyperparameters: Hyperparameters,
    private readonly callTimeoutMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async submit(
    candidate: CandidateConfig,
    trainingDatasetRef: string,
    signal?: AbortSignal,
  ): Promise<CustomizationJobHandle> {
    log.info(`submit: ${candidate.modelName} on ${trainingDatasetRef}`);
    let jobId: string;
    try {
      ({ jobId } = await withTimeout(
        (callSignal) =>
          this.backend.createJob(
            {
              baseModelIdentifier: candidate.modelName,
              trainingDatasetRef,
              hyperparameters: this.hyperparameters,
            },
            { signal: callSignal },
          ),
        this.callTimeoutMs,
        signal,
      ));
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new CustomizationSubmitError(`Could not start customization of ${candidate.modelName}: ${errorMessage(err)}`);
    }

    const at = this.now().toISOString();
    log.info(`submit: ${candidate.modelName} accepted as ${jobId}`);
    return {
      candidateModelIdentifier: candidate.modelName,
      trainingDatasetRef,
      externalJobId: jobId,
      state: 'SUBMITTED',
      submittedAt: at,
      updatedAt: at,
    };
  }

  /** Fetches the current backend state. Terminal handles are returned as they are. */
  async poll(handle: CustomizationJobHandle, signal?: AbortSignal): Promise<CustomizationJobHandle> {
    if (isTerminalCustomization(handle.state)) return handle;

    const status = await withTimeout(
      (callSignal) => this.backend.getStatus(handle.externalJobId, { signal: callSignal }),
      this.callTimeoutMs,
      signal,
    );
    const updatedAt = this.now().toISOString();

    if (status.state === 'SUCCEEDED' && !status.resultModelIdentifier) {
      return {
        ...handle,
        state: 'FAILED',
        message: 'Backend reported success without a result model',
        updatedAt,
      };
    }

    return {
      ...handle,
      state: status.state,
      resultModelIdentifier: status.state === 'SUCCEEDED' ? status.resultModelIdentifier : undefined,
      message: status.message ?? handle.message,
      updatedAt,
    };
  }

  /**
   * Polls with exponential backoff until the job is terminal. Resolves with the
   * SUCCEEDED handle; throws `CustomizationFailedError` or, once the deadline
   * passes, `CustomizationTimeoutError`. Aborting stops polling only.
   */
  async waitForCompletion(handle: CustomizationJobHandle, options: PollOptions): Promise<CustomizationJobHandle> {
    const startedAt = Date.now();
    let interval = options.initialIntervalMs;
    let current = handle;
    let pollFailures = 0;

    for (;;) {
      try {
        const next = await this.poll(current, options.signal);
        if (next.state !== current.state) {
          log.info(`waitForCompletion: ${current.externalJobId} ${current.state} -> ${next.state}`);
          options.onUpdate?.(next);
        }
        current = next;
        pollFailures = 0;
      } catch (err) {
        if (options.signal?.aborted) throw err;
        pollFailures++;
        log.warn(`waitForCompletion: poll ${pollFailures} of ${current.externalJobId} failed: ${errorMessage(err)}`);
      }

      if (current.state === 'SUCCEEDED') return current;
      if (current.state === 'FAILED') {
        throw new CustomizationFailedError(
          `Customization ${current.externalJobId} of ${current.candidateModelIdentifier} failed${current.message ? `: ${current.message}` : ''}`,
          current.externalJobId,
        );
      }

      const remaining = options.deadlineMs - (Date.now() - startedAt);
      if (remaining <= 0) {
        throw new CustomizationTimeoutError(
          `Customization ${current.externalJobId} of ${current.candidateModelIdentifier} did not finish within ${options.deadlineMs}ms`,
          current.externalJobId,
        );
      }
      await sleep(Math.min(interval, remaining), options.signal);
      interval = Math.min(interval * options.multiplier, options.maxIntervalMs);
    }
  }
}
