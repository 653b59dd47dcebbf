import type { DatasetRegistry } from '../../ports/dataset-registry.js';
import { mapWithConcurrency } from '../../shared/async.js';
import { CustomizationSubmitError, FlywheelError, toFlywheelError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';
import type { CustomizationJobHandle } from '../customization/customization-job.js';
import type { CustomizationTrigger, PollOptions } from '../customization/customization-trigger.js';
import type { EvaluationResult } from '../evaluation/evaluation-result.js';
import type { Evaluator } from '../evaluation/evaluator.js';
import type { DatasetSplit } from '../records/data-split.js';
import type { CandidateIssue } from '../scoring/report.js';
import type { CandidateResult, CandidateState, FlywheelJob } from './flywheel-job.js';

const log = createLogger('candidate-pipeline');

export interface CandidatePipelineCallbacks {
  onCandidateState?: (key: string, state: CandidateState) => void;
  onEvaluationProgress?: (label: string, completed: number, total: number) => void;
  onCustomizationUpdate?: (key: string, handle: CustomizationJobHandle) => void;
}

export interface CandidatePipelineContext {
  job: FlywheelJob;
  split: DatasetSplit;
  evaluator: Evaluator;
  trigger: CustomizationTrigger;
  datasetRegistry: DatasetRegistry;
  polling: Omit<PollOptions, 'signal' | 'onUpdate'>;
  signal: AbortSignal;
  callbacks?: CandidatePipelineCallbacks;
}

function issueFrom(err: unknown, stage: CandidateState): CandidateIssue {
  const flywheelError = toFlywheelError(err);
  return { code: flywheelError.code, message: flywheelError.message, stage };
}

/** Dataset name a candidate's training slice is registered under. */
export function trainingDatasetName(jobId: string, key: string): string {
  return `${jobId}-${key}`.replace(/[^A-Za-z0-9._-]+/g, '-');
}

/**
 * EVAL_PRE -> (CUSTOMIZING -> EVAL_POST)? -> DONE for one candidate. Failures
 * stay local to the candidate and end up in its issues; only cancellation
 * escapes, and even then the candidate is left in FAILED first.
 */
export async function runCandidatePipeline(ctx: CandidatePipelineContext, key: string): Promise<CandidateResult> {
  const { job, split, evaluator, signal, callbacks } = ctx;
  const { config } = job.candidate(key);
  const issues: CandidateIssue[] = [];
  let pre: EvaluationResult | undefined;
  let customization: CustomizationJobHandle | undefined;
  let post: EvaluationResult | undefined;

  const enter = (state: CandidateState) => {
    job.setCandidateState(key, state);
    callbacks?.onCandidateState?.(key, state);
  };
  const finish = (state: 'DONE' | 'FAILED'): CandidateResult => {
    enter(state);
    const result: CandidateResult = { pre, customization, post, issues };
    job.publishCandidateResult(key, result);
    return result;
  };
  const progress = (label: string) => (completed: number, total: number) =>
    callbacks?.onEvaluationProgress?.(label, completed, total);

  enter('EVAL_PRE');
  try {
    pre = await evaluator.evaluate(config.modelName, split.evaluation, `${job.id}/evaluation`, {
      signal,
      onProgress: progress(`${key} (pre)`),
    });
  } catch (err) {
    issues.push(issueFrom(err, 'EVAL_PRE'));
    log.warn(`candidate ${key}: pre-customization evaluation failed: ${issues[issues.length - 1].message}`);
    const result = finish('FAILED');
    if (signal.aborted) throw err;
    return result;
  }

  if (!config.customizationEnabled) {
    return finish('DONE');
  }

  enter('CUSTOMIZING');
  try {
    if (split.training.length === 0) {
      throw new CustomizationSubmitError('No training records left after the evaluation split');
    }
    job.claimCustomization(key);
    const datasetRef = await ctx.datasetRegistry.register(trainingDatasetName(job.id, key), {
      training: split.training,
      validation: split.validation,
    });
    customization = await ctx.trigger.submit(config, datasetRef, signal);
    job.updateCustomization(key, customization);
    callbacks?.onCustomizationUpdate?.(key, customization);

    customization = await ctx.trigger.waitForCompletion(customization, {
      ...ctx.polling,
      signal,
      onUpdate: (handle) => {
        customization = handle;
        job.updateCustomization(key, handle);
        callbacks?.onCustomizationUpdate?.(key, handle);
      },
    });
  } catch (err) {
    issues.push(issueFrom(err, 'CUSTOMIZING'));
    log.warn(`candidate ${key}: customization failed: ${issues[issues.length - 1].message}`);
    const result = finish('FAILED');
    if (signal.aborted) throw err;
    return result;
  }

  const customizedModel = customization?.resultModelIdentifier;
  enter('EVAL_POST');
  try {
    if (!customizedModel) {
      throw new FlywheelError(`Customization of ${key} finished without a result model`);
    }
    post = await evaluator.evaluate(customizedModel, split.evaluation, `${job.id}/evaluation`, {
      signal,
      onProgress: progress(`${key} (post)`),
    });
  } catch (err) {
    issues.push(issueFrom(err, 'EVAL_POST'));
    log.warn(`candidate ${key}: post-customization evaluation failed: ${issues[issues.length - 1].message}`);
    const result = finish('FAILED');
    if (signal.aborted) throw err;
    return result;
  }

  return finish('DONE');
}

/**
 * Runs every candidate's pipeline with at most `limit` in flight; the rest
 * wait their turn. Resolves once each candidate reached DONE or FAILED.
 */
export async function runCandidatesParallel(
  ctx: CandidatePipelineContext,
  limit: number,
): Promise<Map<string, CandidateResult>> {
  const keys = ctx.job.candidateKeys();
  log.info(`runCandidatesParallel: ${keys.length} candidates, ${limit} at a time`);

  const results = await mapWithConcurrency(keys, limit, async (key) => {
    if (ctx.signal.aborted) throw ctx.signal.reason;
    return [key, await runCandidatePipeline(ctx, key)] as const;
  });

  const byKey = new Map(results);
  const done = [...byKey.values()].filter((r) => r.issues.length === 0).length;
  log.info(`runCandidatesParallel: completed - ${done}/${keys.length} without issues`);
  return byKey;
}
