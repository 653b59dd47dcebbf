/** Stored preferences; validated only after merging with defaults and the environment. */
export type ConfigPreferences = Record<string, unknown>;

export interface ConfigStore {
  getPreferences(): Promise<ConfigPreferences>;
  savePreferences(prefs: ConfigPreferences): Promise<void>;
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
