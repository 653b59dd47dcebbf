import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import {
  ConfigService,
  JsonConfigStore,
  createFlywheelRuntime,
  errorMessage,
  setLogLevel,
  type CandidateSpec,
  type CandidateState,
  type FlywheelJobSnapshot,
  type FlywheelRuntime,
  type ReportArtifact,
  type TimeRange,
} from '@flywheel/core';
import { createCallbackEventBridge, type EventHandler } from '../adapters/callback-event-bridge.js';
import { getConfigDir, getDataDir } from '../adapters/xdg-paths.js';
import { createFormatter } from '../formatters/formatter.js';
import { parseCandidatesFile, parseTimestamp, readInput } from '../input/read-input.js';
import { App } from '../ui/App.js';
import { initialState, jobViewHandlers, jobViewReducer, type Action, type JobViewState } from '../ui/state/job-view.js';

interface RunOptions {
  workload: string;
  client: string;
  candidates: string;
  baselineModel?: string;
  from?: string;
  to?: string;
  json?: boolean;
  format?: string;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const CANDIDATE_ICONS: Record<CandidateState, string> = {
  QUEUED: '○',
  EVAL_PRE: '▶',
  CUSTOMIZING: '⚙',
  EVAL_POST: '▶',
  DONE: '✓',
  FAILED: '✗',
};

/** Line-per-event progress for terminals without the interactive view. */
function consoleHandlers(): EventHandler {
  return {
    onJobState: (jobId, state) => console.log(`\n  Job ${jobId}: ${state}`),
    onCandidateState: (_jobId, key, state) => console.log(`  ${CANDIDATE_ICONS[state]} ${key}: ${state}`),
    onEvaluationProgress: (_jobId, label, completed, total) => {
      if (completed === total) console.log(`    ${label}: ${total} records evaluated`);
    },
    onCustomizationUpdate: (_jobId, key, handle) =>
      console.log(`    ${key} customization ${handle.externalJobId}: ${handle.state}`),
    onError: (_jobId, error) => console.error(`\n  Error: ${error}\n`),
  };
}

function timeRange(opts: RunOptions): TimeRange | undefined {
  if (!opts.from && !opts.to) return undefined;
  return {
    from: opts.from ? parseTimestamp(opts.from, '--from') : undefined,
    to: opts.to ? parseTimestamp(opts.to, '--to') : undefined,
  };
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Evaluate, customize and score candidate models against recorded traffic')
    .requiredOption('--workload <id>', 'Workload id of the recorded traffic')
    .requiredOption('--client <id>', 'Client id of the recorded traffic')
    .requiredOption('--candidates <file>', 'JSON file listing candidate configs (- for stdin)')
    .option('--baseline-model <model>', 'Model to compare against (default: the model named in the records)')
    .option('--from <time>', 'Only use records at or after this time (epoch seconds or date)')
    .option('--to <time>', 'Only use records at or before this time (epoch seconds or date)')
    .option('--json', 'Output job and report as JSON to stdout')
    .option('--format <type>', 'Report format: plain (default), md, json')
    .option('--output <file>', 'Save the report to a file')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (opts: RunOptions) => {
      if (opts.verbose) setLogLevel('debug');
      if (opts.quiet) setLogLevel('error');

      const isJson = opts.json ?? false;
      const isQuiet = opts.quiet ?? false;
      const isInteractive = process.stdout.isTTY && !isJson && !isQuiet;
      const formatter = createFormatter(isJson ? 'json' : opts.format);

      let runtime: FlywheelRuntime;
      let configs: CandidateSpec[];
      let range: TimeRange | undefined;
      let state: JobViewState = { ...initialState };
      let ink: ReturnType<typeof inkRender> | undefined;
      const renderApp = () => React.createElement(App, { state, workloadId: opts.workload, clientId: opts.client });

      try {
        configs = parseCandidatesFile(readInput(opts.candidates), opts.candidates);
        range = timeRange(opts);
        const configService = new ConfigService(new JsonConfigStore(getConfigDir()));
        const config = await configService.resolve();

        let handlers: EventHandler = {};
        if (isInteractive) {
          // Info logs on stderr would tear Ink's frames.
          if (!opts.verbose) setLogLevel('error');
          const dispatch = (action: Action) => {
            state = jobViewReducer(state, action);
            ink?.rerender(renderApp());
          };
          handlers = jobViewHandlers(dispatch);
        } else if (!isJson && !isQuiet) {
          handlers = consoleHandlers();
        }

        runtime = createFlywheelRuntime({ config, dataDir: getDataDir(), events: createCallbackEventBridge(handlers) });
      } catch (err) {
        console.error(formatter.formatError(errorMessage(err)));
        process.exit(1);
      }

      if (isInteractive) ink = inkRender(renderApp());

      let job: FlywheelJobSnapshot;
      let report: ReportArtifact | null = null;
      try {
        const jobId = await runtime.service.submit({
          workload_id: opts.workload,
          client_id: opts.client,
          configs,
          baseline_model: opts.baselineModel,
          time_range: range,
        });
        process.once('SIGINT', () => runtime.service.cancel(jobId, 'Interrupted'));
        job = await runtime.service.waitForCompletion(jobId);
        if (job.state === 'COMPLETE') report = await runtime.service.getReport(jobId);
      } catch (err) {
        ink?.unmount();
        console.error(formatter.formatError(errorMessage(err)));
        process.exit(1);
      }

      if (ink) {
        // Lets the final frame render before unmount.
        await new Promise((done) => setTimeout(done, 100));
        ink.unmount();
        await ink.waitUntilExit();
      }

      if (!report) {
        const message = job.error ? `[${job.error.code}] ${job.error.message}` : `Job ended in ${job.state}`;
        if (isJson) console.log(JSON.stringify({ job, report: null }, null, 2));
        else if (!isInteractive) console.error(formatter.formatError(message));
        process.exitCode = 1;
        return;
      }

      if (isJson) {
        console.log(JSON.stringify({ job, report }, null, 2));
      } else if (!isInteractive) {
        console.log('\n' + formatter.formatReport(report));
      }

      if (opts.output) {
        const outputFormatter = opts.format ? formatter : createFormatter(opts.output.endsWith('.md') ? 'md' : 'json');
        writeFileSync(resolve(opts.output), outputFormatter.formatReport(report), 'utf-8');
        if (!isJson) console.log(`  Report saved to: ${opts.output}`);
      }
    });
}
