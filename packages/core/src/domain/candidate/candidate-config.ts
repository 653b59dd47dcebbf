import { z } from 'zod';
import { ConfigError } from '../../shared/errors.js';

/** A candidate as submitters write it; field names follow the deployment config. */
export const CandidateSpecSchema = z.object({
  model_name: z.string().min(1),
  context_length: z.number().int().positive().default(8192),
  gpus: z.number().int().positive().default(1),
  pvc_size: z.string().min(1).default('25Gi'),
  tag: z.string().min(1).default('latest'),
  customization_enabled: z.boolean().default(false),
});

export type CandidateSpec = z.input<typeof CandidateSpecSchema>;

export interface CandidateConfig {
  modelName: string;
  contextLength: number;
  /** Accelerators the candidate needs to serve; the cost axis for promotion. */
  computeUnitCount: number;
  storageSize: string;
  runtimeTag: string;
  customizationEnabled: boolean;
}

export const CandidateConfigSchema = CandidateSpecSchema.transform(
  (spec): CandidateConfig => ({
    modelName: spec.model_name,
    contextLength: spec.context_length,
    computeUnitCount: spec.gpus,
    storageSize: spec.pvc_size,
    runtimeTag: spec.tag,
    customizationEnabled: spec.customization_enabled,
  }),
);

export function candidateKey(config: Pick<CandidateConfig, 'modelName' | 'runtimeTag'>): string {
  return `${config.modelName}:${config.runtimeTag}`;
}

/** Every field of the config, e.g. `m:latest@4gpu/8192ctx/25Gi+ft`. */
export function deploymentKey(config: CandidateConfig): string {
  const deployment = `${config.computeUnitCount}gpu/${config.contextLength}ctx/${config.storageSize}`;
  return `${candidateKey(config)}@${deployment}${config.customizationEnabled ? '+ft' : ''}`;
}

/**
 * Keys for the configs of one job, in order. A config keeps its short
 * `model:tag` key unless another config shares it, in which case both use
 * their deployment key. Fully identical configs are rejected.
 */
export function assignCandidateKeys(configs: readonly CandidateConfig[]): string[] {
  const seen = new Set<string>();
  const shortKeyCount = new Map<string, number>();
  for (const config of configs) {
    const full = deploymentKey(config);
    if (seen.has(full)) {
      throw new ConfigError(`Candidate ${candidateKey(config)} is listed more than once`);
    }
    seen.add(full);
    const short = candidateKey(config);
    shortKeyCount.set(short, (shortKeyCount.get(short) ?? 0) + 1);
  }
  return configs.map((config) => {
    const short = candidateKey(config);
    return shortKeyCount.get(short) === 1 ? short : deploymentKey(config);
  });
}
