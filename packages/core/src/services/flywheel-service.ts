import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CandidateConfigSchema } from '../domain/candidate/candidate-config.js';
import type { FlywheelConfig } from '../domain/config/flywheel-config.js';
import { CustomizationTrigger } from '../domain/customization/customization-trigger.js';
import { Evaluator } from '../domain/evaluation/evaluator.js';
import { runCandidatesParallel } from '../domain/job/candidate-pipeline.js';
import { FlywheelJob, outcomesOf, type FlywheelJobSnapshot, type JobState } from '../domain/job/flywheel-job.js';
import { JobController } from '../domain/job/job-controller.js';
import { splitDataset, summarizeSplit } from '../domain/records/data-split.js';
import { dominantModel } from '../domain/records/interaction-record.js';
import { aggregate } from '../domain/scoring/aggregator.js';
import type { ReportArtifact } from '../domain/scoring/report.js';
import type { CustomizationBackend } from '../ports/customization-backend.js';
import type { DatasetRegistry } from '../ports/dataset-registry.js';
import type { FlywheelEvents } from '../ports/flywheel-events.js';
import type { JobRepository, JobSummary } from '../ports/job-repository.js';
import type { Judge } from '../ports/judge.js';
import type { ModelGateway } from '../ports/model-gateway.js';
import type { RecordStore, TimeRange } from '../ports/record-store.js';
import {
  AggregationError,
  CandidatesExhaustedError,
  ConfigError,
  DatasetError,
  FlywheelError,
  errorMessage,
  toFlywheelError,
} from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('flywheel-service');

export const JobSubmissionSchema = z.object({
  workload_id: z.string().min(1),
  client_id: z.string().min(1),
  configs: z.array(CandidateConfigSchema).min(1),
  /** Defaults to the model most of the records were sent to. */
  baseline_model: z.string().min(1).optional(),
  time_range: z
    .object({
      from: z.number().int().optional(),
      to: z.number().int().optional(),
    })
    .optional(),
});

export type JobSubmission = z.input<typeof JobSubmissionSchema>;

export interface FlywheelDeps {
  recordStore: RecordStore;
  gateway: ModelGateway;
  judge?: Judge;
  customizationBackend: CustomizationBackend;
  datasetRegistry: DatasetRegistry;
  jobRepository: JobRepository;
  events: FlywheelEvents;
  config: FlywheelConfig;
  now?: () => Date;
  generateId?: () => string;
}

interface ActiveJob {
  job: FlywheelJob;
  controller: JobController;
  done: Promise<void>;
}

export class FlywheelService {
  private readonly activeJobs = new Map<string, ActiveJob>();
  private readonly evaluator: Evaluator;
  private readonly trigger: CustomizationTrigger;
  private readonly now: () => Date;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly deps: FlywheelDeps) {
    const { execution, customizer } = deps.config;
    this.now = deps.now ?? (() => new Date());
    this.evaluator = new Evaluator(
      deps.gateway,
      {
        callTimeoutMs: execution.call_timeout_ms,
        maxRetries: execution.max_record_retries,
        retryBaseDelayMs: execution.retry_base_delay_ms,
        concurrency: execution.record_concurrency,
      },
      deps.judge,
      this.now,
    );
    this.trigger = new CustomizationTrigger(
      deps.customizationBackend,
      customizer.hyperparameters,
      execution.call_timeout_ms,
      this.now,
    );
  }

  /** Validates and persists a new job, starts it in the background and returns its id. */
  async submit(input: JobSubmission): Promise<string> {
    const parsed = JobSubmissionSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError(`Invalid job submission: ${issues.join('; ')}`);
    }
    const submission = parsed.data;

    const job = new FlywheelJob(
      {
        id: (this.deps.generateId ?? randomUUID)(),
        workloadId: submission.workload_id,
        clientId: submission.client_id,
        configs: submission.configs,
        baselineModel: submission.baseline_model,
      },
      this.now,
    );
    await this.persist(job);
    log.info(`submit: job ${job.id} for ${job.workloadId}/${job.clientId} with ${submission.configs.length} candidates`);
    this.deps.events.onJobState(job.id, job.state);

    const controller = new JobController();
    const active: ActiveJob = { job, controller, done: Promise.resolve() };
    this.activeJobs.set(job.id, active);
    active.done = this.execute(job, controller, submission.time_range);
    return job.id;
  }

  async getStatus(jobId: string): Promise<FlywheelJobSnapshot> {
    const active = this.activeJobs.get(jobId);
    if (active) return active.job.toSnapshot();
    return this.deps.jobRepository.load(jobId);
  }

  /** Resolves with the terminal snapshot. Jobs started by another process are only read back. */
  async waitForCompletion(jobId: string): Promise<FlywheelJobSnapshot> {
    const active = this.activeJobs.get(jobId);
    if (!active) return this.deps.jobRepository.load(jobId);
    await active.done;
    return active.job.toSnapshot();
  }

  async getReport(jobId: string): Promise<ReportArtifact> {
    const snapshot = await this.getStatus(jobId);
    if (snapshot.state !== 'COMPLETE') {
      throw new FlywheelError(`Job ${jobId} has no report (state ${snapshot.state})`, 'REPORT_UNAVAILABLE');
    }
    return this.deps.jobRepository.loadReport(jobId);
  }

  /**
   * Cancels a job running in this process. Returns false when the job is not
   * running here. Customizations already submitted keep running remotely.
   */
  cancel(jobId: string, reason = 'Cancelled by user'): boolean {
    const active = this.activeJobs.get(jobId);
    if (!active) return false;
    log.info(`cancel: ${jobId} (${reason})`);
    active.controller.cancel(reason);
    return true;
  }

  async list(): Promise<JobSummary[]> {
    return this.deps.jobRepository.list();
  }

  /**
   * Rebuilds a report from a job's stored results without calling any model.
   * `tolerance` overrides the configured promotion tolerance.
   */
  async regenerateReport(jobId: string, tolerance = this.deps.config.promotion.tolerance): Promise<ReportArtifact> {
    const snapshot = await this.deps.jobRepository.load(jobId);
    if (!snapshot.baselineResult) {
      throw new AggregationError(`Job ${jobId} has no baseline result to compare against`);
    }
    const report = aggregate({
      jobId: snapshot.id,
      workloadId: snapshot.workloadId,
      clientId: snapshot.clientId,
      baseline: snapshot.baselineResult,
      candidates: outcomesOf(snapshot),
      tolerance,
    });
    await this.deps.jobRepository.saveReport(report);
    log.info(`regenerateReport: ${jobId} recommendation ${report.recommendation ?? 'none'}`);
    return report;
  }

  /** Cancels every running job and waits for each to settle. */
  async shutdown(reason = 'Service shutting down'): Promise<void> {
    const running = [...this.activeJobs.values()];
    for (const { controller } of running) controller.cancel(reason);
    await Promise.all(running.map(({ done }) => done));
    await this.writes;
  }

  private async execute(job: FlywheelJob, controller: JobController, range?: TimeRange): Promise<void> {
    controller.armDeadline(this.deps.config.execution.job_deadline_ms);
    try {
      await Promise.race([this.runStages(job, controller, range), controller.interrupted]);
    } catch (err) {
      const error = toFlywheelError(err);
      // Stops whatever is still in flight when a stage failed on its own.
      controller.interrupt(error);
      if (job.fail(error)) {
        log.error(`execute: job ${job.id} failed in ${job.toSnapshot().error?.stage ?? job.state}: [${error.code}] ${error.message}`);
        this.deps.events.onJobState(job.id, 'FAILED');
      }
      this.deps.events.onError(job.id, error.message);
      await this.persist(job).catch((persistErr) =>
        log.error(`execute: could not persist failed job ${job.id}: ${errorMessage(persistErr)}`),
      );
    } finally {
      controller.dispose();
      this.activeJobs.delete(job.id);
    }
  }

  private async runStages(job: FlywheelJob, controller: JobController, range?: TimeRange): Promise<void> {
    const { config, events } = this.deps;
    const { signal } = controller;

    await this.advance(job, 'LOADING_DATA');
    const records = await this.deps.recordStore.fetch(job.workloadId, job.clientId, range);
    const split = splitDataset(records, config.data_split);
    job.setDataset(summarizeSplit(split));
    if (!job.baselineModel) {
      const model = dominantModel(split.all);
      if (!model) throw new DatasetError('Records do not name the model that served them');
      job.setBaselineModel(model);
    }
    const baselineModel = job.baselineModel ?? '';
    log.info(
      `runStages: ${job.id} loaded ${split.all.length} records (eval ${split.evaluation.length}, train ${split.training.length}, val ${split.validation.length})`,
    );
    signal.throwIfAborted();

    await this.advance(job, 'BASELINE_EVAL');
    const baseline = await this.evaluator.evaluate(baselineModel, split.evaluation, `${job.id}/evaluation`, {
      signal,
      onProgress: (completed, total) => events.onEvaluationProgress(job.id, 'baseline', completed, total),
    });
    job.setBaselineResult(baseline);
    signal.throwIfAborted();

    await this.advance(job, 'PER_CANDIDATE');
    const { execution } = config;
    await runCandidatesParallel(
      {
        job,
        split,
        evaluator: this.evaluator,
        trigger: this.trigger,
        datasetRegistry: this.deps.datasetRegistry,
        polling: {
          deadlineMs: execution.customization_deadline_ms,
          initialIntervalMs: execution.poll_initial_interval_ms,
          maxIntervalMs: execution.poll_max_interval_ms,
          multiplier: execution.poll_multiplier,
        },
        signal,
        callbacks: {
          onCandidateState: (key, state) => {
            events.onCandidateState(job.id, key, state);
            this.persist(job).catch((err) =>
              log.warn(`runStages: could not persist ${job.id} after ${key} -> ${state}: ${errorMessage(err)}`),
            );
          },
          onEvaluationProgress: (label, completed, total) =>
            events.onEvaluationProgress(job.id, label, completed, total),
          onCustomizationUpdate: (key, handle) => events.onCustomizationUpdate(job.id, key, handle),
        },
      },
      execution.max_concurrent_candidates,
    );
    signal.throwIfAborted();

    if (!job.allCandidatesPublished()) {
      throw new FlywheelError(`Job ${job.id} reached aggregation with unfinished candidates`);
    }
    const outcomes = job.outcomes();
    if (outcomes.every((outcome) => !outcome.pre)) {
      throw new CandidatesExhaustedError(`All ${outcomes.length} candidates failed pre-customization evaluation`);
    }

    await this.advance(job, 'AGGREGATING');
    const report = aggregate({
      jobId: job.id,
      workloadId: job.workloadId,
      clientId: job.clientId,
      baseline,
      candidates: outcomes,
      tolerance: config.promotion.tolerance,
    });
    const ref = await this.deps.jobRepository.saveReport(report);
    signal.throwIfAborted();

    job.complete(ref);
    await this.persist(job);
    log.info(`runStages: ${job.id} complete, recommendation ${report.recommendation ?? 'none'}`);
    events.onJobState(job.id, 'COMPLETE');
    events.onComplete(job.toSnapshot(), report);
  }

  private async advance(job: FlywheelJob, next: JobState): Promise<void> {
    job.transition(next);
    log.info(`job ${job.id} -> ${next}`);
    await this.persist(job);
    this.deps.events.onJobState(job.id, next);
  }

  /** Snapshot writes go out one at a time, in the order they were requested. */
  private persist(job: FlywheelJob): Promise<void> {
    const snapshot = job.toSnapshot();
    const write = this.writes.then(() => this.deps.jobRepository.save(snapshot));
    this.writes = write.catch((err) => log.warn(`persist: ${snapshot.id} not saved: ${errorMessage(err)}`));
    return write;
  }
}
