import type { Hyperparameters } from '../domain/config/flywheel-config.js';
import type { CustomizationState } from '../domain/customization/customization-job.js';

export interface CustomizationRequest {
  baseModelIdentifier: string;
  trainingDatasetRef: string;
  hyperparameters: Hyperparameters;
}

export interface CustomizationStatus {
  state: CustomizationState;
  resultModelIdentifier?: string;
  message?: string;
}

/** A fine-tuning service. Submitted jobs run remotely and cannot be retracted. */
export interface CustomizationBackend {
  createJob(request: CustomizationRequest, options?: { signal?: AbortSignal }): Promise<{ jobId: string }>;
  getStatus(jobId: string, options?: { signal?: AbortSignal }): Promise<CustomizationStatus>;
}
