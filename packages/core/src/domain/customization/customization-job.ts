export type CustomizationState = 'SUBMITTED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED';

export interface CustomizationJobHandle {
  candidateModelIdentifier: string;
  trainingDatasetRef: string;
  externalJobId: string;
  state: CustomizationState;
  /** Set only once the backend reports SUCCEEDED. */
  resultModelIdentifier?: string;
  message?: string;
  submittedAt: string;
  updatedAt: string;
}

export function isTerminalCustomization(state: CustomizationState): boolean {
  return state === 'SUCCEEDED' || state === 'FAILED';
}
