import type { Command } from 'commander';
import { JsonlRecordStore, parseInteractionRecords } from '@flywheel/core';
import { getDataDir } from '../adapters/xdg-paths.js';
import { readInput } from '../input/read-input.js';

interface IngestOptions {
  dryRun?: boolean;
  json?: boolean;
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Store captured interaction records from an NDJSON file')
    .argument('<file>', 'NDJSON file with one interaction record per line (- for stdin)')
    .option('--dry-run', 'Validate the file without storing anything')
    .option('--json', 'Output as JSON')
    .action(async (file: string, opts: IngestOptions) => {
      const { records, errors } = parseInteractionRecords(readInput(file));

      const result = opts.dryRun
        ? { inserted: 0, duplicates: 0 }
        : await new JsonlRecordStore(getDataDir()).append(records);

      if (opts.json) {
        console.log(JSON.stringify({ valid: records.length, invalid: errors, ...result, dryRun: opts.dryRun ?? false }, null, 2));
      } else {
        console.log(`  Valid records:   ${records.length}`);
        console.log(`  Invalid lines:   ${errors.length}`);
        for (const error of errors.slice(0, 10)) {
          console.log(`    line ${error.line}: ${error.message}`);
        }
        if (errors.length > 10) console.log(`    ... ${errors.length - 10} more`);
        if (opts.dryRun) {
          console.log('  Dry run, nothing stored.');
        } else {
          console.log(`  Stored:          ${result.inserted}`);
          console.log(`  Already present: ${result.duplicates}`);
        }
      }

      if (records.length === 0) process.exitCode = 1;
    });
}
