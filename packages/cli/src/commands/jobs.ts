import type { Command } from 'commander';
import { JobNotFoundError, JsonJobRepository, type FlywheelJobSnapshot } from '@flywheel/core';
import { getDataDir } from '../adapters/xdg-paths.js';
import { formatScore } from '../ui/format.js';

export function describeJob(job: FlywheelJobSnapshot): string[] {
  const lines = [
    `Job: ${job.id}`,
    `Workload: ${job.workloadId} / ${job.clientId}`,
    `State: ${job.state}`,
    `Created: ${job.createdAt}`,
    `Baseline: ${job.baselineModel ?? '(not resolved)'} ${formatScore(job.baselineResult?.aggregateScore)}`,
  ];
  if (job.dataset) {
    const d = job.dataset;
    lines.push(`Records: ${d.total} (evaluation ${d.evaluation}, training ${d.training}, validation ${d.validation})`);
  }
  lines.push('Candidates:');
  for (const c of job.candidates) {
    const scores = `pre ${formatScore(c.pre?.aggregateScore)} post ${formatScore(c.post?.aggregateScore)}`;
    lines.push(`  ${c.key.padEnd(30)} ${c.state.padEnd(12)} ${scores}`);
    for (const issue of c.issues) lines.push(`    [${issue.code}] ${issue.message}`);
  }
  if (job.error) lines.push(`Error: [${job.error.code}] in ${job.error.stage}: ${job.error.message}`);
  if (job.reportArtifactRef) lines.push(`Report: ${job.reportArtifactRef}`);
  return lines;
}

export function registerJobsCommand(program: Command): void {
  program
    .command('jobs')
    .description('List or view flywheel jobs')
    .argument('[job-id]', 'View a specific job by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent job')
    .action(async (jobId: string | undefined, opts: { json?: boolean; last?: boolean }) => {
      const repo = new JsonJobRepository(getDataDir());

      if (opts.last) {
        const jobs = await repo.list();
        if (jobs.length === 0) {
          console.log('No jobs found.');
          return;
        }
        jobId = jobs[0].id;
      }

      if (jobId) {
        try {
          const job = await repo.load(jobId);
          console.log(opts.json ? JSON.stringify(job, null, 2) : describeJob(job).join('\n'));
        } catch (err) {
          if (!(err instanceof JobNotFoundError)) throw err;
          console.error(`Job not found: ${jobId}`);
          process.exit(1);
        }
        return;
      }

      const jobs = await repo.list();
      if (jobs.length === 0) {
        console.log('No jobs found.');
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(jobs, null, 2));
        return;
      }

      console.log(`\n  ${'ID'.padEnd(38)} ${'Created'.padEnd(22)} ${'State'.padEnd(14)} ${'Workload'.padEnd(24)} Recommendation`);
      console.log(`  ${'-'.repeat(38)} ${'-'.repeat(22)} ${'-'.repeat(14)} ${'-'.repeat(24)} ${'-'.repeat(20)}`);
      for (const job of jobs) {
        const date = new Date(job.createdAt).toLocaleString();
        const workload = `${job.workloadId}/${job.clientId}`;
        console.log(
          `  ${job.id.padEnd(38)} ${date.padEnd(22)} ${job.state.padEnd(14)} ${workload.padEnd(24)} ${job.recommendation ?? '-'}`,
        );
      }
      console.log();
    });
}
