import type { CandidateConfig } from '../candidate/candidate-config.js';
import type { CustomizationState } from '../customization/customization-job.js';

export interface ScoreSummary {
  modelIdentifier: string;
  aggregateScore: number;
  recordCount: number;
  skippedCount: number;
}

export interface CandidateIssue {
  code: string;
  message: string;
  stage: string;
}

/**
 * complete: every requested stage produced a score.
 * partial: pre score only, customization or post evaluation failed.
 * not_evaluable: not even the pre score exists.
 */
export type CandidateReportStatus = 'complete' | 'partial' | 'not_evaluable';

export interface CandidateReport {
  key: string;
  config: CandidateConfig;
  status: CandidateReportStatus;
  pre: ScoreSummary | null;
  post: ScoreSummary | null;
  deltaPre: number | null;
  deltaPost: number | null;
  bestScore: number | null;
  promotable: boolean;
  customization: {
    state: CustomizationState;
    externalJobId: string;
    resultModelIdentifier: string | null;
  } | null;
  missing: string[];
  issues: CandidateIssue[];
}

export interface PlotSeries {
  name: 'baseline' | 'pre' | 'post';
  values: Array<number | null>;
}

/** Grouped bar chart: one group per candidate, one bar per series. */
export interface ComparisonPlot {
  kind: 'grouped-bar';
  title: string;
  categories: string[];
  series: PlotSeries[];
  yDomain: [number, number];
}

export interface ReportArtifact {
  jobId: string;
  workloadId: string;
  clientId: string;
  generatedAt: string;
  tolerance: number;
  baseline: ScoreSummary;
  candidates: CandidateReport[];
  /** Promotable candidate keys, most preferred first. */
  ranking: string[];
  recommendation: string | null;
  plot: ComparisonPlot;
}
