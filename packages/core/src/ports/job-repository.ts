import type { FlywheelJobSnapshot, JobState } from '../domain/job/flywheel-job.js';
import type { ReportArtifact } from '../domain/scoring/report.js';

export interface JobSummary {
  id: string;
  workloadId: string;
  clientId: string;
  state: JobState;
  candidateCount: number;
  createdAt: string;
  updatedAt: string;
  recommendation: string | null;
}

export interface JobRepository {
  save(job: FlywheelJobSnapshot): Promise<void>;
  /** Throws `JobNotFoundError` for unknown ids. */
  load(id: string): Promise<FlywheelJobSnapshot>;
  /** Newest first. */
  list(): Promise<JobSummary[]>;
  /** Stores the report and returns the reference recorded on the job. */
  saveReport(report: ReportArtifact): Promise<string>;
  loadReport(jobId: string): Promise<ReportArtifact>;
}
