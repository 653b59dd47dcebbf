import type {
  CandidateState,
  CustomizationJobHandle,
  FlywheelEvents,
  FlywheelJobSnapshot,
  JobState,
  ReportArtifact,
} from '@flywheel/core';

export type EventHandler = {
  onJobState?: (jobId: string, state: JobState) => void;
  onCandidateState?: (jobId: string, key: string, state: CandidateState) => void;
  onEvaluationProgress?: (jobId: string, label: string, completed: number, total: number) => void;
  onCustomizationUpdate?: (jobId: string, key: string, handle: CustomizationJobHandle) => void;
  onComplete?: (job: FlywheelJobSnapshot, report: ReportArtifact) => void;
  onError?: (jobId: string, error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): FlywheelEvents {
  return {
    onJobState: (jobId, state) => handlers.onJobState?.(jobId, state),
    onCandidateState: (jobId, key, state) => handlers.onCandidateState?.(jobId, key, state),
    onEvaluationProgress: (jobId, label, completed, total) =>
      handlers.onEvaluationProgress?.(jobId, label, completed, total),
    onCustomizationUpdate: (jobId, key, handle) => handlers.onCustomizationUpdate?.(jobId, key, handle),
    onComplete: (job, report) => handlers.onComplete?.(job, report),
    onError: (jobId, error) => handlers.onError?.(jobId, error),
  };
}
