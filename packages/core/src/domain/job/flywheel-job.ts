import { ConfigError, FlywheelError, InvalidTransitionError } from '../../shared/errors.js';
import { assignCandidateKeys, type CandidateConfig } from '../candidate/candidate-config.js';
import type { CustomizationJobHandle } from '../customization/customization-job.js';
import type { EvaluationResult } from '../evaluation/evaluation-result.js';
import type { DatasetSummary } from '../records/data-split.js';
import type { CandidateOutcome } from '../scoring/aggregator.js';
import type { CandidateIssue } from '../scoring/report.js';

export type JobState =
  | 'CREATED'
  | 'LOADING_DATA'
  | 'BASELINE_EVAL'
  | 'PER_CANDIDATE'
  | 'AGGREGATING'
  | 'COMPLETE'
  | 'FAILED';

export type CandidateState = 'QUEUED' | 'EVAL_PRE' | 'CUSTOMIZING' | 'EVAL_POST' | 'DONE' | 'FAILED';

const JOB_TRANSITIONS: Record<JobState, readonly JobState[]> = {
  CREATED: ['LOADING_DATA', 'FAILED'],
  LOADING_DATA: ['BASELINE_EVAL', 'FAILED'],
  BASELINE_EVAL: ['PER_CANDIDATE', 'FAILED'],
  PER_CANDIDATE: ['AGGREGATING', 'FAILED'],
  AGGREGATING: ['COMPLETE', 'FAILED'],
  COMPLETE: [],
  FAILED: [],
};

const CANDIDATE_TRANSITIONS: Record<CandidateState, readonly CandidateState[]> = {
  QUEUED: ['EVAL_PRE', 'FAILED'],
  EVAL_PRE: ['CUSTOMIZING', 'DONE', 'FAILED'],
  CUSTOMIZING: ['EVAL_POST', 'FAILED'],
  EVAL_POST: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export function isTerminalJobState(state: JobState): boolean {
  return state === 'COMPLETE' || state === 'FAILED';
}

export function isTerminalCandidateState(state: CandidateState): boolean {
  return state === 'DONE' || state === 'FAILED';
}

export interface JobFailure {
  code: string;
  message: string;
  /** State the job was in when it failed. */
  stage: JobState;
}

export interface CandidateEntry {
  key: string;
  config: CandidateConfig;
  state: CandidateState;
  pre?: EvaluationResult;
  customization?: CustomizationJobHandle;
  post?: EvaluationResult;
  issues: CandidateIssue[];
}

/** What a candidate task hands back once it reaches a terminal state. */
export interface CandidateResult {
  pre?: EvaluationResult;
  customization?: CustomizationJobHandle;
  post?: EvaluationResult;
  issues: CandidateIssue[];
}

export interface FlywheelJobSnapshot {
  id: string;
  workloadId: string;
  clientId: string;
  baselineModel: string | null;
  state: JobState;
  candidates: CandidateEntry[];
  baselineResult: EvaluationResult | null;
  dataset: DatasetSummary | null;
  error: JobFailure | null;
  reportArtifactRef: string | null;
  history: Array<{ state: JobState; at: string }>;
  createdAt: string;
  updatedAt: string;
}

export interface NewJob {
  id: string;
  workloadId: string;
  clientId: string;
  configs: readonly CandidateConfig[];
  baselineModel?: string;
}

/**
 * Aggregate root of one flywheel run. Owns the job state machine, one entry
 * per candidate, and the results candidate tasks publish into it.
 */
export class FlywheelJob {
  private jobState: JobState = 'CREATED';
  private readonly entries = new Map<string, CandidateEntry>();
  private readonly published = new Set<string>();
  private readonly submittedCustomizations = new Set<string>();
  private baseline: EvaluationResult | null = null;
  private datasetSummary: DatasetSummary | null = null;
  private failure: JobFailure | null = null;
  private reportRef: string | null = null;
  private resolvedBaselineModel: string | null;
  private readonly history: Array<{ state: JobState; at: string }> = [];
  private readonly createdAt: string;
  private updatedAt: string;

  readonly id: string;
  readonly workloadId: string;
  readonly clientId: string;

  constructor(init: NewJob, private readonly now: () => Date = () => new Date()) {
    if (init.configs.length === 0) {
      throw new ConfigError('A job needs at least one candidate config');
    }
    this.id = init.id;
    this.workloadId = init.workloadId;
    this.clientId = init.clientId;
    this.resolvedBaselineModel = init.baselineModel ?? null;

    const keys = assignCandidateKeys(init.configs);
    init.configs.forEach((config, index) => {
      const key = keys[index];
      this.entries.set(key, { key, config, state: 'QUEUED', issues: [] });
    });

    this.createdAt = this.now().toISOString();
    this.updatedAt = this.createdAt;
    this.history.push({ state: 'CREATED', at: this.createdAt });
  }

  get state(): JobState {
    return this.jobState;
  }

  get baselineModel(): string | null {
    return this.resolvedBaselineModel;
  }

  get baselineResult(): EvaluationResult | null {
    return this.baseline;
  }

  get isTerminal(): boolean {
    return isTerminalJobState(this.jobState);
  }

  candidateKeys(): string[] {
    return [...this.entries.keys()];
  }

  candidate(key: string): CandidateEntry {
    const entry = this.entries.get(key);
    if (!entry) throw new FlywheelError(`Unknown candidate ${key}`);
    return entry;
  }

  transition(next: JobState): void {
    if (!JOB_TRANSITIONS[this.jobState].includes(next)) {
      throw new InvalidTransitionError(this.jobState, next);
    }
    this.jobState = next;
    this.touch();
    this.history.push({ state: next, at: this.updatedAt });
  }

  /** Moves a non-terminal job to FAILED. Returns false when it was already terminal. */
  fail(error: FlywheelError): boolean {
    if (this.isTerminal) return false;
    this.failure = { code: error.code, message: error.message, stage: this.jobState };
    this.transition('FAILED');
    return true;
  }

  setBaselineModel(model: string): void {
    this.resolvedBaselineModel = model;
    this.touch();
  }

  setDataset(summary: DatasetSummary): void {
    this.datasetSummary = summary;
    this.touch();
  }

  setBaselineResult(result: EvaluationResult): void {
    if (this.baseline) throw new FlywheelError(`Baseline of job ${this.id} is already set`);
    this.baseline = result;
    this.touch();
  }

  setCandidateState(key: string, next: CandidateState): void {
    const entry = this.candidate(key);
    if (!CANDIDATE_TRANSITIONS[entry.state].includes(next)) {
      throw new InvalidTransitionError(`${key}:${entry.state}`, next);
    }
    entry.state = next;
    this.touch();
  }

  /** Claims the single customization submission a candidate is allowed. */
  claimCustomization(key: string): void {
    this.candidate(key);
    if (this.submittedCustomizations.has(key)) {
      throw new FlywheelError(`Customization for ${key} was already submitted`, 'DUPLICATE_CUSTOMIZATION');
    }
    this.submittedCustomizations.add(key);
  }

  /** Progress view of an in-flight customization; the final handle arrives with the published result. */
  updateCustomization(key: string, handle: CustomizationJobHandle): void {
    this.candidate(key).customization = handle;
    this.touch();
  }

  /** Write-once: each candidate task publishes its result exactly one time. */
  publishCandidateResult(key: string, result: CandidateResult): void {
    const entry = this.candidate(key);
    if (this.published.has(key)) {
      throw new FlywheelError(`Result for ${key} was already published`, 'DUPLICATE_RESULT');
    }
    if (!isTerminalCandidateState(entry.state)) {
      throw new FlywheelError(`Candidate ${key} published while still ${entry.state}`);
    }
    this.published.add(key);
    entry.pre = result.pre;
    entry.customization = result.customization ?? entry.customization;
    entry.post = result.post;
    entry.issues = [...result.issues];
    this.touch();
  }

  allCandidatesPublished(): boolean {
    return this.published.size === this.entries.size;
  }

  complete(reportArtifactRef: string): void {
    this.reportRef = reportArtifactRef;
    this.transition('COMPLETE');
  }

  outcomes(): CandidateOutcome[] {
    return outcomesOf(this.toSnapshot());
  }

  toSnapshot(): FlywheelJobSnapshot {
    return {
      id: this.id,
      workloadId: this.workloadId,
      clientId: this.clientId,
      baselineModel: this.resolvedBaselineModel,
      state: this.jobState,
      candidates: [...this.entries.values()].map((entry) => ({ ...entry, issues: [...entry.issues] })),
      baselineResult: this.baseline,
      dataset: this.datasetSummary,
      error: this.failure,
      reportArtifactRef: this.reportRef,
      history: [...this.history],
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  private touch(): void {
    this.updatedAt = this.now().toISOString();
  }
}

export function outcomesOf(snapshot: FlywheelJobSnapshot): CandidateOutcome[] {
  return snapshot.candidates.map((entry) => ({
    key: entry.key,
    config: entry.config,
    pre: entry.pre,
    customization: entry.customization,
    post: entry.post,
    issues: entry.issues,
  }));
}
