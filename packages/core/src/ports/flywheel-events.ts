import type { CustomizationJobHandle } from '../domain/customization/customization-job.js';
import type { CandidateState, FlywheelJobSnapshot, JobState } from '../domain/job/flywheel-job.js';
import type { ReportArtifact } from '../domain/scoring/report.js';

export interface FlywheelEvents {
  onJobState(jobId: string, state: JobState): void;
  onCandidateState(jobId: string, key: string, state: CandidateState): void;
  onEvaluationProgress(jobId: string, label: string, completed: number, total: number): void;
  onCustomizationUpdate(jobId: string, key: string, handle: CustomizationJobHandle): void;
  onComplete(job: FlywheelJobSnapshot, report: ReportArtifact): void;
  onError(jobId: string, error: string): void;
}
