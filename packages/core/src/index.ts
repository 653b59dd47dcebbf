// Domain types
export {
  ChatCompletionRequestSchema,
  ChatCompletionResponseSchema,
  ChatMessageSchema,
  extractCompletion,
  messageText,
} from './domain/records/chat-completion.js';
export type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  Completion,
  ParsedToolCall,
  ToolDefinition,
} from './domain/records/chat-completion.js';
export {
  InteractionRecordSchema,
  recordId,
  compareByTimestamp,
  normalizeRecords,
  dominantModel,
} from './domain/records/interaction-record.js';
export type { InteractionRecord } from './domain/records/interaction-record.js';
export { parseInteractionRecords, serializeRecords } from './domain/records/ndjson.js';
export type { NdjsonLineError, NdjsonParseResult } from './domain/records/ndjson.js';
export { splitDataset, summarizeSplit, seededShuffle } from './domain/records/data-split.js';
export type { DatasetSplit, DatasetSummary } from './domain/records/data-split.js';

export {
  FlywheelConfigSchema,
  DEFAULT_LOCAL_ENDPOINT,
  DEFAULT_CUSTOMIZER_URL,
  DEFAULT_JUDGE_MODEL,
  judgeUrl,
} from './domain/config/flywheel-config.js';
export type {
  FlywheelConfig,
  FlywheelConfigInput,
  LlmJudgeConfig,
  EndpointConfig,
  CustomizerConfig,
  Hyperparameters,
  DataSplitConfig,
  ExecutionConfig,
} from './domain/config/flywheel-config.js';
export {
  CandidateSpecSchema,
  CandidateConfigSchema,
  assignCandidateKeys,
  candidateKey,
  deploymentKey,
} from './domain/candidate/candidate-config.js';
export type { CandidateSpec, CandidateConfig } from './domain/candidate/candidate-config.js';

export { SKIPPED, isScored, meanScore } from './domain/evaluation/evaluation-result.js';
export type { EvaluationResult, RecordScore, ScoredRecord } from './domain/evaluation/evaluation-result.js';
export { Evaluator } from './domain/evaluation/evaluator.js';
export type { EvaluatorOptions, EvaluateOptions } from './domain/evaluation/evaluator.js';
export { toolCallSimilarity, tokenF1 } from './domain/evaluation/similarity.js';

export { isTerminalCustomization } from './domain/customization/customization-job.js';
export type { CustomizationJobHandle, CustomizationState } from './domain/customization/customization-job.js';
export { CustomizationTrigger } from './domain/customization/customization-trigger.js';
export type { PollOptions } from './domain/customization/customization-trigger.js';

export { aggregate, comparePromotable } from './domain/scoring/aggregator.js';
export type { AggregationInput, CandidateOutcome } from './domain/scoring/aggregator.js';
export type {
  CandidateIssue,
  CandidateReport,
  CandidateReportStatus,
  ComparisonPlot,
  PlotSeries,
  ReportArtifact,
  ScoreSummary,
} from './domain/scoring/report.js';

export { FlywheelJob, outcomesOf, isTerminalJobState, isTerminalCandidateState } from './domain/job/flywheel-job.js';
export type {
  JobState,
  CandidateState,
  CandidateEntry,
  CandidateResult,
  FlywheelJobSnapshot,
  JobFailure,
} from './domain/job/flywheel-job.js';
export { JobController } from './domain/job/job-controller.js';

// Port interfaces
export type { RecordStore, TimeRange, AppendResult } from './ports/record-store.js';
export type { ModelGateway, ModelCallOptions } from './ports/model-gateway.js';
export type { Judge, JudgeRequest } from './ports/judge.js';
export type { CustomizationBackend, CustomizationRequest, CustomizationStatus } from './ports/customization-backend.js';
export type { DatasetRegistry, TrainingDataset } from './ports/dataset-registry.js';
export type { JobRepository, JobSummary } from './ports/job-repository.js';
export type { ConfigStore, ConfigPreferences } from './ports/config-store.js';
export type { SecretResolver } from './ports/secret-resolver.js';
export type { FlywheelEvents } from './ports/flywheel-events.js';

// Adapters
export { JsonlRecordStore } from './adapters/jsonl-record-store.js';
export { InMemoryRecordStore } from './adapters/in-memory-record-store.js';
export { OpenAiCompatibleGateway } from './adapters/openai-compatible-gateway.js';
export { LlmJudge } from './adapters/llm-judge.js';
export { HttpCustomizationBackend } from './adapters/http-customization-backend.js';
export { JsonlDatasetRegistry, toTrainingExample } from './adapters/jsonl-dataset-registry.js';
export { JsonJobRepository } from './adapters/json-job-repository.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { EnvSecretResolver } from './adapters/env-secret-resolver.js';

// Application services
export { FlywheelService, JobSubmissionSchema } from './services/flywheel-service.js';
export type { FlywheelDeps, JobSubmission } from './services/flywheel-service.js';
export {
  ConfigService,
  ENV_OVERRIDES,
  mergePreferences,
  parseFlywheelConfig,
  parsePreferenceValue,
} from './services/config-service.js';
export { createFlywheelRuntime } from './services/runtime.js';
export type { FlywheelRuntime, RuntimeOptions } from './services/runtime.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, parseLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  FlywheelError,
  ConfigError,
  DatasetError,
  NotFoundError,
  BackendUnavailableError,
  ModelCallError,
  EvaluatorUnavailableError,
  PerRecordEvaluationError,
  CustomizationSubmitError,
  CustomizationTimeoutError,
  CustomizationFailedError,
  AggregationError,
  CandidatesExhaustedError,
  JobTimeoutError,
  JobCancelledError,
  JobNotFoundError,
  InvalidTransitionError,
  CallTimeoutError,
  toFlywheelError,
  errorMessage,
} from './shared/errors.js';
