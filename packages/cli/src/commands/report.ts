import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Command } from 'commander';
import {
  ConfigError,
  ConfigService,
  JsonConfigStore,
  createFlywheelRuntime,
  errorMessage,
} from '@flywheel/core';
import { createCallbackEventBridge } from '../adapters/callback-event-bridge.js';
import { getConfigDir, getDataDir } from '../adapters/xdg-paths.js';
import { createFormatter } from '../formatters/formatter.js';

interface ReportOptions {
  regenerate?: boolean;
  tolerance?: string;
  format?: string;
  output?: string;
}

function parseTolerance(value: string): number {
  const tolerance = Number(value);
  if (!Number.isFinite(tolerance) || tolerance < 0 || tolerance > 1) {
    throw new ConfigError(`--tolerance must be a number between 0 and 1, got "${value}"`);
  }
  return tolerance;
}

export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Show the report of a completed job')
    .argument('<job-id>', 'Job ID')
    .option('--regenerate', 'Rebuild the report from stored results without calling any model')
    .option('--tolerance <n>', 'Promotion tolerance to use when regenerating')
    .option('--format <type>', 'Output format: plain (default), md, json')
    .option('--output <file>', 'Save the report to a file instead of printing it')
    .action(async (jobId: string, opts: ReportOptions) => {
      const formatter = createFormatter(opts.format);
      try {
        const config = await new ConfigService(new JsonConfigStore(getConfigDir())).resolve();
        const { service } = createFlywheelRuntime({
          config,
          dataDir: getDataDir(),
          events: createCallbackEventBridge({}),
        });

        const report = opts.regenerate
          ? await service.regenerateReport(
              jobId,
              opts.tolerance === undefined ? config.promotion.tolerance : parseTolerance(opts.tolerance),
            )
          : await service.getReport(jobId);

        const text = formatter.formatReport(report);
        if (opts.output) {
          writeFileSync(resolve(opts.output), text, 'utf-8');
          console.log(`Report saved to: ${opts.output}`);
        } else {
          console.log(text);
        }
      } catch (err) {
        console.error(formatter.formatError(errorMessage(err)));
        process.exit(1);
      }
    });
}
