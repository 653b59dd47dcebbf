import { createRequire } from 'node:module';
import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerJobsCommand } from './commands/jobs.js';
import { registerReportCommand } from './commands/report.js';
import { registerRunCommand } from './commands/run.js';

loadDotenv();

const require = createRequire(import.meta.url);
const { version } = require('../package.json');

const program = new Command();

program
  .name('flywheel')
  .description('Find cheaper models that match production quality by replaying recorded traffic')
  .version(version);

registerIngestCommand(program);
registerRunCommand(program);
registerJobsCommand(program);
registerReportCommand(program);
registerConfigCommand(program);

await program.parseAsync();
