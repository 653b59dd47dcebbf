import { z } from 'zod';

export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:8000/v1';
export const DEFAULT_CUSTOMIZER_URL = 'http://localhost:8001';
export const DEFAULT_JUDGE_MODEL = 'meta/llama-3.1-70b-instruct';

/** Accepts `true`/`false` as written in the environment or on the command line. */
const BooleanFlagSchema = z.union([z.boolean(), z.enum(['true', 'false']).transform((flag) => flag === 'true')]);

export const LlmJudgeConfigSchema = z
  .object({
    /** Off: free-text answers are scored by token overlap. */
    enabled: BooleanFlagSchema.default(false),
    type: z.enum(['local', 'remote']).default('local'),
    url: z.string().url().optional(),
    model_id: z.string().min(1).default(DEFAULT_JUDGE_MODEL),
    /** Name of the environment variable holding the key, never the key itself. */
    api_key_env: z.string().min(1).optional(),
  })
  .refine((judge) => judge.type === 'local' || judge.url !== undefined, {
    message: 'a remote judge needs a url',
    path: ['url'],
  });

export const EndpointConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_LOCAL_ENDPOINT),
  api_key_env: z.string().min(1).optional(),
});

export const HyperparametersSchema = z.object({
  training_type: z.string().default('sft'),
  finetuning_type: z.string().default('lora'),
  epochs: z.coerce.number().int().positive().default(2),
  batch_size: z.coerce.number().int().positive().default(16),
  learning_rate: z.coerce.number().positive().default(0.0001),
  lora_adapter_dim: z.coerce.number().int().positive().default(32),
  lora_adapter_dropout: z.coerce.number().min(0).max(1).default(0.1),
});

export const CustomizerConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_CUSTOMIZER_URL),
  api_key_env: z.string().min(1).optional(),
  namespace: z.string().min(1).default('flywheel'),
  hyperparameters: HyperparametersSchema.default({}),
});

export const DataSplitConfigSchema = z
  .object({
    /** Held-out evaluation records; unset evaluates on every fetched record. */
    eval_size: z.coerce.number().int().positive().optional(),
    val_ratio: z.coerce.number().min(0).lt(1).default(0.1),
    min_total_records: z.coerce.number().int().positive().default(1),
    random_seed: z.coerce.number().int().default(42),
    /** Keep only the newest `limit` records. */
    limit: z.coerce.number().int().positive().optional(),
  })
  .refine((split) => split.limit === undefined || split.limit >= split.min_total_records, {
    message: 'limit must not be below min_total_records',
    path: ['limit'],
  });

export const PromotionConfigSchema = z.object({
  /** ε: a candidate is promotable when its best score is at least baseline − ε. */
  tolerance: z.coerce.number().min(0).max(1).default(0.05),
});

export const ExecutionConfigSchema = z.object({
  max_concurrent_candidates: z.coerce.number().int().positive().default(2),
  record_concurrency: z.coerce.number().int().positive().default(8),
  max_record_retries: z.coerce.number().int().min(0).default(3),
  retry_base_delay_ms: z.coerce.number().int().min(0).default(500),
  call_timeout_ms: z.coerce.number().int().positive().default(120_000),
  job_deadline_ms: z.coerce.number().int().positive().default(6 * 60 * 60 * 1000),
  customization_deadline_ms: z.coerce.number().int().positive().default(2 * 60 * 60 * 1000),
  poll_initial_interval_ms: z.coerce.number().int().positive().default(5_000),
  poll_max_interval_ms: z.coerce.number().int().positive().default(60_000),
  poll_multiplier: z.coerce.number().min(1).default(2),
});

export const FlywheelConfigSchema = z.object({
  llm_judge: LlmJudgeConfigSchema.default({}),
  model_serving: EndpointConfigSchema.default({}),
  customizer: CustomizerConfigSchema.default({}),
  data_split: DataSplitConfigSchema.default({}),
  promotion: PromotionConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
});

export type LlmJudgeConfig = z.infer<typeof LlmJudgeConfigSchema>;
export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;
export type Hyperparameters = z.infer<typeof HyperparametersSchema>;
export type CustomizerConfig = z.infer<typeof CustomizerConfigSchema>;
export type DataSplitConfig = z.infer<typeof DataSplitConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type FlywheelConfig = z.infer<typeof FlywheelConfigSchema>;
/** Anything `FlywheelConfigSchema` accepts; every field may be left out. */
export type FlywheelConfigInput = z.input<typeof FlywheelConfigSchema>;

/** A local judge without its own url is served by the model-serving gateway. */
export function judgeUrl(config: Pick<FlywheelConfig, 'llm_judge' | 'model_serving'>): string {
  return config.llm_judge.url ?? config.model_serving.url;
}
