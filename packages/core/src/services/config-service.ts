import { FlywheelConfigSchema, type FlywheelConfig } from '../domain/config/flywheel-config.js';
import { isPlainRecord, type ConfigPreferences, type ConfigStore } from '../ports/config-store.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

/** Environment variables that override a single preference each. */
export const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['FLYWHEEL_JUDGE_ENABLED', ['llm_judge', 'enabled']],
  ['FLYWHEEL_JUDGE_TYPE', ['llm_judge', 'type']],
  ['FLYWHEEL_JUDGE_URL', ['llm_judge', 'url']],
  ['FLYWHEEL_JUDGE_MODEL', ['llm_judge', 'model_id']],
  ['FLYWHEEL_JUDGE_API_KEY_ENV', ['llm_judge', 'api_key_env']],
  ['FLYWHEEL_SERVING_URL', ['model_serving', 'url']],
  ['FLYWHEEL_SERVING_API_KEY_ENV', ['model_serving', 'api_key_env']],
  ['FLYWHEEL_CUSTOMIZER_URL', ['customizer', 'url']],
  ['FLYWHEEL_CUSTOMIZER_API_KEY_ENV', ['customizer', 'api_key_env']],
  ['FLYWHEEL_EVAL_SIZE', ['data_split', 'eval_size']],
  ['FLYWHEEL_RANDOM_SEED', ['data_split', 'random_seed']],
  ['FLYWHEEL_PROMOTION_TOLERANCE', ['promotion', 'tolerance']],
  ['FLYWHEEL_MAX_CONCURRENT_CANDIDATES', ['execution', 'max_concurrent_candidates']],
  ['FLYWHEEL_JOB_DEADLINE_MS', ['execution', 'job_deadline_ms']],
];

function setPath(target: ConfigPreferences, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const existing = target[head];
  const child: ConfigPreferences = isPlainRecord(existing) ? { ...existing } : {};
  setPath(child, rest, value);
  target[head] = child;
}

function deletePath(target: ConfigPreferences, path: readonly string[]): void {
  const [head, ...rest] = path;
  if (head === undefined) return;
  if (rest.length === 0) {
    delete target[head];
    return;
  }
  const existing = target[head];
  if (!isPlainRecord(existing)) return;
  const child: ConfigPreferences = { ...existing };
  deletePath(child, rest);
  if (Object.keys(child).length === 0) delete target[head];
  else target[head] = child;
}

/** Objects merge key by key; anything else in `override` replaces what `base` has. */
export function mergePreferences(base: ConfigPreferences, override: ConfigPreferences): ConfigPreferences {
  const merged: ConfigPreferences = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isPlainRecord(current) && isPlainRecord(value) ? mergePreferences(current, value) : value;
  }
  return merged;
}

/** Command-line values arrive as strings; JSON literals are decoded, the rest kept as text. */
export function parsePreferenceValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function parseFlywheelConfig(input: unknown): FlywheelConfig {
  const parsed = FlywheelConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export class ConfigService {
  constructor(
    private readonly configStore: ConfigStore,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  envOverrides(): ConfigPreferences {
    const overrides: ConfigPreferences = {};
    for (const [name, path] of ENV_OVERRIDES) {
      const value = this.env[name];
      if (value) setPath(overrides, path, value);
    }
    return overrides;
  }

  /** Defaults, then stored preferences, then the environment, then `overrides`. */
  async resolve(overrides: ConfigPreferences = {}): Promise<FlywheelConfig> {
    const prefs = await this.configStore.getPreferences();
    const env = this.envOverrides();
    const envKeys = Object.keys(env);
    if (envKeys.length > 0) log.debug(`resolve: environment overrides ${envKeys.join(', ')}`);
    return parseFlywheelConfig(mergePreferences(mergePreferences(prefs, env), overrides));
  }

  async getPreferences(): Promise<ConfigPreferences> {
    return this.configStore.getPreferences();
  }

  /** Stores one dotted key, e.g. `promotion.tolerance`. Rejected values leave the file untouched. */
  async set(key: string, value: unknown): Promise<FlywheelConfig> {
    const path = key.split('.').filter(Boolean);
    if (path.length === 0) throw new ConfigError('A configuration key is required');

    const prefs = { ...(await this.configStore.getPreferences()) };
    setPath(prefs, path, value);
    const config = parseFlywheelConfig(prefs);
    await this.configStore.savePreferences(prefs);
    log.info(`set: ${path.join('.')}`);
    return config;
  }

  async unset(key: string): Promise<void> {
    const prefs = { ...(await this.configStore.getPreferences()) };
    deletePath(prefs, key.split('.').filter(Boolean));
    await this.configStore.savePreferences(prefs);
    log.info(`unset: ${key}`);
  }

  async reset(): Promise<void> {
    await this.configStore.savePreferences({});
    log.info('reset: preferences cleared');
  }
}
