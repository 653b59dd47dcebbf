import { HttpCustomizationBackend } from '../adapters/http-customization-backend.js';
import { JsonJobRepository } from '../adapters/json-job-repository.js';
import { JsonlDatasetRegistry } from '../adapters/jsonl-dataset-registry.js';
import { JsonlRecordStore } from '../adapters/jsonl-record-store.js';
import { LlmJudge } from '../adapters/llm-judge.js';
import { OpenAiCompatibleGateway } from '../adapters/openai-compatible-gateway.js';
import { EnvSecretResolver } from '../adapters/env-secret-resolver.js';
import { judgeUrl, type FlywheelConfig } from '../domain/config/flywheel-config.js';
import type { FlywheelEvents } from '../ports/flywheel-events.js';
import type { Judge } from '../ports/judge.js';
import type { SecretResolver } from '../ports/secret-resolver.js';
import { ConfigError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { FlywheelService } from './flywheel-service.js';

const log = createLogger('runtime');

export interface RuntimeOptions {
  config: FlywheelConfig;
  dataDir: string;
  events: FlywheelEvents;
  secrets?: SecretResolver;
}

export interface FlywheelRuntime {
  service: FlywheelService;
  recordStore: JsonlRecordStore;
  jobRepository: JsonJobRepository;
}

function secretFor(secrets: SecretResolver, envName: string | undefined, purpose: string): string | undefined {
  if (!envName) return undefined;
  const value = secrets.resolve(envName);
  if (!value) throw new ConfigError(`${purpose} key variable ${envName} is not set`);
  return value;
}

/** Wires the file and HTTP adapters behind a `FlywheelService`. */
export function createFlywheelRuntime(options: RuntimeOptions): FlywheelRuntime {
  const { config, dataDir, events } = options;
  const secrets = options.secrets ?? new EnvSecretResolver();

  const gateway = new OpenAiCompatibleGateway(
    config.model_serving.url,
    secretFor(secrets, config.model_serving.api_key_env, 'Model serving'),
  );

  let judge: Judge | undefined;
  if (config.llm_judge.enabled) {
    const url = judgeUrl(config);
    const judgeGateway =
      config.llm_judge.type === 'local' && url === config.model_serving.url
        ? gateway
        : new OpenAiCompatibleGateway(url, secretFor(secrets, config.llm_judge.api_key_env, 'Judge'));
    judge = new LlmJudge(judgeGateway, config.llm_judge.model_id);
    log.info(`createFlywheelRuntime: ${config.llm_judge.type} judge ${config.llm_judge.model_id} at ${url}`);
  }

  const recordStore = new JsonlRecordStore(dataDir);
  const jobRepository = new JsonJobRepository(dataDir);
  const service = new FlywheelService({
    recordStore,
    gateway,
    judge,
    customizationBackend: new HttpCustomizationBackend(
      config.customizer.url,
      config.customizer.namespace,
      secretFor(secrets, config.customizer.api_key_env, 'Customizer'),
    ),
    datasetRegistry: new JsonlDatasetRegistry(dataDir),
    jobRepository,
    events,
    config,
  });

  return { service, recordStore, jobRepository };
}
