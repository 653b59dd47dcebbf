import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isPlainRecord, type ConfigPreferences, type ConfigStore } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { isMissingFile } from '../shared/fs.js';

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get configPath(): string {
    return join(this.configDir, 'config.json');
  }

  async getPreferences(): Promise<ConfigPreferences> {
    let data: string;
    try {
      data = await readFile(this.configPath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (err) {
      throw new ConfigError(`${this.configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!isPlainRecord(parsed)) {
      throw new ConfigError(`${this.configPath} must contain a JSON object`);
    }
    return parsed;
  }

  async savePreferences(prefs: ConfigPreferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.configPath, JSON.stringify(prefs, null, 2), 'utf-8');
  }
}
