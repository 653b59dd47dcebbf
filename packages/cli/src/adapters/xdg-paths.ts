import { join } from 'node:path';
import { homedir } from 'node:os';

const APP_DIR = 'flywheel';

export function getConfigDir(): string {
  return process.env.XDG_CONFIG_HOME
    ? join(process.env.XDG_CONFIG_HOME, APP_DIR)
    : join(homedir(), '.config', APP_DIR);
}

/** Records, job snapshots, reports and registered datasets live here. */
export function getDataDir(): string {
  if (process.env.FLYWHEEL_DATA_DIR) return process.env.FLYWHEEL_DATA_DIR;
  return process.env.XDG_DATA_HOME
    ? join(process.env.XDG_DATA_HOME, APP_DIR)
    : join(homedir(), '.local', 'share', APP_DIR);
}
