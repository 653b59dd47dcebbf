import { AggregationError } from '../../shared/errors.js';
import type { CandidateConfig } from '../candidate/candidate-config.js';
import type { CustomizationJobHandle } from '../customization/customization-job.js';
import { isScored, type EvaluationResult } from '../evaluation/evaluation-result.js';
import type {
  CandidateIssue,
  CandidateReport,
  CandidateReportStatus,
  ComparisonPlot,
  ReportArtifact,
  ScoreSummary,
} from './report.js';

// Absorbs float noise in `best >= baseline - tolerance`.
const SCORE_EPSILON = 1e-9;

export interface CandidateOutcome {
  key: string;
  config: CandidateConfig;
  pre?: EvaluationResult;
  customization?: CustomizationJobHandle;
  post?: EvaluationResult;
  issues: CandidateIssue[];
}

export interface AggregationInput {
  jobId: string;
  workloadId: string;
  clientId: string;
  baseline: EvaluationResult;
  candidates: readonly CandidateOutcome[];
  tolerance: number;
}

function checkResult(result: EvaluationResult, label: string): void {
  if (result.perRecordScores.length === 0) {
    throw new AggregationError(`${label} has no per-record scores`);
  }
  if (!result.perRecordScores.some(isScored)) {
    throw new AggregationError(`${label} has no scored records`);
  }
  const { aggregateScore } = result;
  if (!Number.isFinite(aggregateScore) || aggregateScore < 0 || aggregateScore > 1) {
    throw new AggregationError(`${label} aggregate score ${aggregateScore} is outside [0, 1]`);
  }
}

function summarize(result: EvaluationResult): ScoreSummary {
  return {
    modelIdentifier: result.modelIdentifier,
    aggregateScore: result.aggregateScore,
    recordCount: result.perRecordScores.length,
    skippedCount: result.skippedCount,
  };
}

function reportCandidate(outcome: CandidateOutcome, baseline: EvaluationResult, tolerance: number): CandidateReport {
  const { pre, post, customization, config } = outcome;
  if (pre) checkResult(pre, `${outcome.key} pre-customization result`);
  if (post) checkResult(post, `${outcome.key} post-customization result`);

  const missing: string[] = [];
  let status: CandidateReportStatus = 'complete';
  if (!pre) {
    status = 'not_evaluable';
    missing.push('pre');
  }
  if (config.customizationEnabled && !post) {
    if (status === 'complete') status = 'partial';
    missing.push('post');
  }

  const bestScore = post?.aggregateScore ?? pre?.aggregateScore ?? null;
  const promotable = bestScore !== null && bestScore + SCORE_EPSILON >= baseline.aggregateScore - tolerance;

  return {
    key: outcome.key,
    config,
    status,
    pre: pre ? summarize(pre) : null,
    post: post ? summarize(post) : null,
    deltaPre: pre ? pre.aggregateScore - baseline.aggregateScore : null,
    deltaPost: post ? post.aggregateScore - baseline.aggregateScore : null,
    bestScore,
    promotable,
    customization: customization
      ? {
          state: customization.state,
          externalJobId: customization.externalJobId,
          resultModelIdentifier: customization.resultModelIdentifier ?? null,
        }
      : null,
    missing,
    issues: outcome.issues,
  };
}

/** Cheapest first; among equal cost the higher best score; then key for a stable order. */
export function comparePromotable(a: CandidateReport, b: CandidateReport): number {
  const byCost = a.config.computeUnitCount - b.config.computeUnitCount;
  if (byCost !== 0) return byCost;
  const byScore = (b.bestScore ?? 0) - (a.bestScore ?? 0);
  if (byScore !== 0) return byScore;
  return a.key < b.key ? -1 : a.key > b.key ? 1 : 0;
}

function buildPlot(workloadId: string, baseline: EvaluationResult, candidates: CandidateReport[]): ComparisonPlot {
  return {
    kind: 'grouped-bar',
    title: `${workloadId}: candidate scores vs ${baseline.modelIdentifier}`,
    categories: candidates.map((c) => c.key),
    series: [
      { name: 'baseline', values: candidates.map(() => baseline.aggregateScore) },
      { name: 'pre', values: candidates.map((c) => c.pre?.aggregateScore ?? null) },
      { name: 'post', values: candidates.map((c) => c.post?.aggregateScore ?? null) },
    ],
    yDomain: [0, 1],
  };
}

function latestComputedAt(input: AggregationInput): string {
  let latest = input.baseline.computedAt;
  for (const candidate of input.candidates) {
    for (const result of [candidate.pre, candidate.post]) {
      if (result && result.computedAt > latest) latest = result.computedAt;
    }
  }
  return latest;
}

/**
 * Builds the comparative report. Pure: the same input always yields the same
 * artifact, so a report can be regenerated from stored results at any time.
 */
export function aggregate(input: AggregationInput): ReportArtifact {
  checkResult(input.baseline, 'baseline result');
  if (!Number.isFinite(input.tolerance) || input.tolerance < 0) {
    throw new AggregationError(`Invalid promotion tolerance ${input.tolerance}`);
  }

  const seen = new Set<string>();
  for (const candidate of input.candidates) {
    if (seen.has(candidate.key)) {
      throw new AggregationError(`Duplicate candidate ${candidate.key}`);
    }
    seen.add(candidate.key);
  }

  const candidates = input.candidates.map((c) => reportCandidate(c, input.baseline, input.tolerance));
  const ranking = candidates
    .filter((c) => c.promotable)
    .sort(comparePromotable)
    .map((c) => c.key);

  return {
    jobId: input.jobId,
    workloadId: input.workloadId,
    clientId: input.clientId,
    generatedAt: latestComputedAt(input),
    tolerance: input.tolerance,
    baseline: summarize(input.baseline),
    candidates,
    ranking,
    recommendation: ranking[0] ?? null,
    plot: buildPlot(input.workloadId, input.baseline, candidates),
  };
}
