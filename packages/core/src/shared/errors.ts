export class FlywheelError extends Error {
  constructor(message: string, public readonly code: string = 'FLYWHEEL_ERROR') {
    super(message);
    this.name = 'FlywheelError';
  }
}

export class ConfigError extends FlywheelError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Missing, empty or too-small dataset. Always fatal for a job. */
export class DatasetError extends FlywheelError {
  constructor(message: string, code = 'DATASET_ERROR') {
    super(message, code);
    this.name = 'DatasetError';
  }
}

export class NotFoundError extends DatasetError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class BackendUnavailableError extends FlywheelError {
  constructor(message: string, public readonly reason?: unknown) {
    super(message, 'BACKEND_UNAVAILABLE');
    this.name = 'BackendUnavailableError';
  }
}

export class ModelCallError extends FlywheelError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'MODEL_CALL_ERROR');
    this.name = 'ModelCallError';
  }
}

export class EvaluatorUnavailableError extends FlywheelError {
  constructor(message: string, public readonly modelIdentifier?: string) {
    super(message, 'EVALUATOR_UNAVAILABLE');
    this.name = 'EvaluatorUnavailableError';
  }
}

export class PerRecordEvaluationError extends FlywheelError {
  constructor(message: string, public readonly recordId: string) {
    super(message, 'PER_RECORD_EVALUATION_ERROR');
    this.name = 'PerRecordEvaluationError';
  }
}

export class CustomizationSubmitError extends FlywheelError {
  constructor(message: string) {
    super(message, 'CUSTOMIZATION_SUBMIT_ERROR');
    this.name = 'CustomizationSubmitError';
  }
}

export class CustomizationTimeoutError extends FlywheelError {
  constructor(message: string, public readonly externalJobId?: string) {
    super(message, 'CUSTOMIZATION_TIMEOUT');
    this.name = 'CustomizationTimeoutError';
  }
}

export class CustomizationFailedError extends FlywheelError {
  constructor(message: string, public readonly externalJobId?: string) {
    super(message, 'CUSTOMIZATION_FAILED');
    this.name = 'CustomizationFailedError';
  }
}

export class AggregationError extends FlywheelError {
  constructor(message: string) {
    super(message, 'AGGREGATION_ERROR');
    this.name = 'AggregationError';
  }
}

export class CandidatesExhaustedError extends FlywheelError {
  constructor(message: string) {
    super(message, 'CANDIDATES_EXHAUSTED');
    this.name = 'CandidatesExhaustedError';
  }
}

export class JobTimeoutError extends FlywheelError {
  constructor(message: string) {
    super(message, 'JOB_TIMEOUT');
    this.name = 'JobTimeoutError';
  }
}

export class JobCancelledError extends FlywheelError {
  constructor(message = 'Job cancelled') {
    super(message, 'JOB_CANCELLED');
    this.name = 'JobCancelledError';
  }
}

export class JobNotFoundError extends FlywheelError {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`, 'JOB_NOT_FOUND');
    this.name = 'JobNotFoundError';
  }
}

export class InvalidTransitionError extends FlywheelError {
  constructor(from: string, to: string) {
    super(`Illegal transition ${from} -> ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

export class CallTimeoutError extends FlywheelError {
  constructor(timeoutMs: number) {
    super(`Call timed out after ${timeoutMs}ms`, 'CALL_TIMEOUT');
    this.name = 'CallTimeoutError';
  }
}

export function toFlywheelError(err: unknown): FlywheelError {
  if (err instanceof FlywheelError) return err;
  if (err instanceof Error) return new FlywheelError(err.message);
  return new FlywheelError(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
