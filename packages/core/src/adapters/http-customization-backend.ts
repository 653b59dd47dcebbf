import { z } from 'zod';
import type { CustomizationState } from '../domain/customization/customization-job.js';
import type {
  CustomizationBackend,
  CustomizationRequest,
  CustomizationStatus,
} from '../ports/customization-backend.js';
import { FlywheelError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('customizer');

const CreatedJobSchema = z.object({ id: z.string().min(1) }).passthrough();

const JobStatusSchema = z
  .object({
    status: z.string(),
    output_model: z.string().optional(),
    status_details: z.object({ message: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const STATE_BY_STATUS = new Map<string, CustomizationState>([
  ['created', 'SUBMITTED'],
  ['pending', 'SUBMITTED'],
  ['running', 'RUNNING'],
  ['completed', 'SUCCEEDED'],
  ['failed', 'FAILED'],
  ['cancelled', 'FAILED'],
]);

/**
 * REST client for a fine-tuning service exposing
 * `POST /v1/customization/jobs` and `GET /v1/customization/jobs/{id}/status`.
 */
export class HttpCustomizationBackend implements CustomizationBackend {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly namespace: string,
    private readonly apiKey?: string,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  private async send(path: string, init: RequestInit): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${path}`, { ...init, headers: this.headers() });
    if (!response.ok) {
      const errorText = await response.text().catch(() => 'could not read response body');
      log.warn(`send: HTTP ${response.status} for ${path}`, errorText.slice(0, 500));
      throw new FlywheelError(`Customizer returned HTTP ${response.status} for ${path}`, 'CUSTOMIZER_HTTP_ERROR');
    }
    return response.json();
  }

  async createJob(request: CustomizationRequest, options: { signal?: AbortSignal } = {}): Promise<{ jobId: string }> {
    const { hyperparameters } = request;
    const body = {
      config: request.baseModelIdentifier,
      dataset: { name: request.trainingDatasetRef, namespace: this.namespace },
      hyperparameters: {
        training_type: hyperparameters.training_type,
        finetuning_type: hyperparameters.finetuning_type,
        epochs: hyperparameters.epochs,
        batch_size: hyperparameters.batch_size,
        learning_rate: hyperparameters.learning_rate,
        lora: {
          adapter_dim: hyperparameters.lora_adapter_dim,
          adapter_dropout: hyperparameters.lora_adapter_dropout,
        },
      },
    };
    const created = CreatedJobSchema.parse(
      await this.send('/v1/customization/jobs', { method: 'POST', body: JSON.stringify(body), signal: options.signal }),
    );
    return { jobId: created.id };
  }

  async getStatus(jobId: string, options: { signal?: AbortSignal } = {}): Promise<CustomizationStatus> {
    const status = JobStatusSchema.parse(
      await this.send(`/v1/customization/jobs/${encodeURIComponent(jobId)}/status`, {
        method: 'GET',
        signal: options.signal,
      }),
    );
    const state = STATE_BY_STATUS.get(status.status.toLowerCase());
    if (!state) {
      throw new FlywheelError(`Unknown customization status "${status.status}" for ${jobId}`, 'CUSTOMIZER_HTTP_ERROR');
    }
    return {
      state,
      resultModelIdentifier: status.output_model,
      message: status.status_details?.message,
    };
  }
}
