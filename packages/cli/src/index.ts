import {
  ConfigService,
  JsonConfigStore,
  createFlywheelRuntime,
  type CandidateSpec,
  type ConfigPreferences,
  type FlywheelJobSnapshot,
  type ReportArtifact,
  type TimeRange,
} from '@flywheel/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export interface FlywheelRunOptions {
  workloadId: string;
  clientId: string;
  candidates: CandidateSpec[];
  baselineModel?: string;
  timeRange?: TimeRange;
  /** Applied over the config file and FLYWHEEL_* variables. */
  config?: ConfigPreferences;
  dataDir?: string;
  onProgress?: EventHandler;
}

export interface FlywheelRunResult {
  job: FlywheelJobSnapshot;
  /** Null when the job failed. */
  report: ReportArtifact | null;
}

/**
 * Runs one flywheel job to completion with the same configuration and
 * storage the CLI uses. Suitable for scripts and agent skills.
 */
export async function runFlywheel(options: FlywheelRunOptions): Promise<FlywheelRunResult> {
  const configService = new ConfigService(new JsonConfigStore(getConfigDir()));
  const config = await configService.resolve(options.config ?? {});

  const { service } = createFlywheelRuntime({
    config,
    dataDir: options.dataDir ?? getDataDir(),
    events: createCallbackEventBridge(options.onProgress ?? {}),
  });

  const jobId = await service.submit({
    workload_id: options.workloadId,
    client_id: options.clientId,
    configs: options.candidates,
    baseline_model: options.baselineModel,
    time_range: options.timeRange,
  });
  const job = await service.waitForCompletion(jobId);
  const report = job.state === 'COMPLETE' ? await service.getReport(jobId) : null;
  return { job, report };
}

export { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
export { createFormatter, type OutputFormatter } from './formatters/formatter.js';
export { renderBarPlot } from './formatters/plot.js';

// Re-export everything from core for advanced usage
export * from '@flywheel/core';
