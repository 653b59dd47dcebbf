import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FlywheelJobSnapshot } from '../domain/job/flywheel-job.js';
import type { ReportArtifact } from '../domain/scoring/report.js';
import type { JobRepository, JobSummary } from '../ports/job-repository.js';
import { JobNotFoundError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { isMissingFile } from '../shared/fs.js';

const log = createLogger('job-repository');

export class JsonJobRepository implements JobRepository {
  constructor(private readonly dataDir: string) {}

  private get jobsDir(): string {
    return join(this.dataDir, 'jobs');
  }

  private get reportsDir(): string {
    return join(this.dataDir, 'reports');
  }

  private async readJson<T>(path: string, id: string): Promise<T> {
    try {
      return JSON.parse(await readFile(path, 'utf-8'));
    } catch (err) {
      if (isMissingFile(err)) throw new JobNotFoundError(id);
      throw err;
    }
  }

  async save(job: FlywheelJobSnapshot): Promise<void> {
    await mkdir(this.jobsDir, { recursive: true });
    await writeFile(join(this.jobsDir, `${job.id}.json`), JSON.stringify(job, null, 2), 'utf-8');
  }

  async load(id: string): Promise<FlywheelJobSnapshot> {
    return this.readJson<FlywheelJobSnapshot>(join(this.jobsDir, `${id}.json`), id);
  }

  async list(): Promise<JobSummary[]> {
    let files: string[];
    try {
      files = (await readdir(this.jobsDir)).filter((f) => f.endsWith('.json')).sort();
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const summaries: JobSummary[] = [];
    for (const file of files) {
      try {
        const job: FlywheelJobSnapshot = JSON.parse(await readFile(join(this.jobsDir, file), 'utf-8'));
        let recommendation: string | null = null;
        if (job.state === 'COMPLETE') {
          recommendation = (await this.loadReport(job.id).catch(() => null))?.recommendation ?? null;
        }
        summaries.push({
          id: job.id,
          workloadId: job.workloadId,
          clientId: job.clientId,
          state: job.state,
          candidateCount: job.candidates.length,
          createdAt: job.createdAt,
          updatedAt: job.updatedAt,
          recommendation,
        });
      } catch (err) {
        log.warn(`list: skipping unreadable ${file}:`, err instanceof Error ? err.message : String(err));
      }
    }

    summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return summaries;
  }

  async saveReport(report: ReportArtifact): Promise<string> {
    await mkdir(this.reportsDir, { recursive: true });
    const filePath = join(this.reportsDir, `${report.jobId}.json`);
    await writeFile(filePath, JSON.stringify(report, null, 2), 'utf-8');
    return filePath;
  }

  async loadReport(jobId: string): Promise<ReportArtifact> {
    return this.readJson<ReportArtifact>(join(this.reportsDir, `${jobId}.json`), jobId);
  }
}
