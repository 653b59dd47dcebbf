import type { CustomizationJobHandle } from '../domain/customization/customization-job.js';
import type { CandidateState, FlywheelJobSnapshot, JobState } from '../domain/job/flywheel-job.js';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
} from '../domain/records/chat-completion.js';
import type { InteractionRecord } from '../domain/records/interaction-record.js';
import type { ReportArtifact } from '../domain/scoring/report.js';
import type { ConfigPreferences, ConfigStore } from '../ports/config-store.js';
import type { CustomizationBackend, CustomizationRequest, CustomizationStatus } from '../ports/customization-backend.js';
import type { DatasetRegistry, TrainingDataset } from '../ports/dataset-registry.js';
import type { FlywheelEvents } from '../ports/flywheel-events.js';
import type { JobRepository, JobSummary } from '../ports/job-repository.js';
import type { ModelCallOptions, ModelGateway } from '../ports/model-gateway.js';
import { JobNotFoundError } from '../shared/errors.js';

export function completion(content: string | null, toolCalls: Array<{ name: string; arguments: unknown }> = []): ChatCompletionResponse {
  const message: ChatMessage = { role: 'assistant', content };
  if (toolCalls.length > 0) {
    message.tool_calls = toolCalls.map((call, index) => ({
      id: `call_${index}`,
      type: 'function',
      function: { name: call.name, arguments: JSON.stringify(call.arguments) },
    }));
  }
  return { choices: [{ index: 0, message, finish_reason: toolCalls.length > 0 ? 'tool_calls' : 'stop' }] };
}

export interface RecordOptions {
  timestamp: number;
  workloadId?: string;
  clientId?: string;
  model?: string;
  prompt?: string;
  answer?: string | null;
  toolCalls?: Array<{ name: string; arguments: unknown }>;
}

export function makeRecord(options: RecordOptions): InteractionRecord {
  return {
    timestamp: options.timestamp,
    workload_id: options.workloadId ?? 'wl-support',
    client_id: options.clientId ?? 'client-a',
    request: {
      model: options.model ?? 'big-model',
      messages: [{ role: 'user', content: options.prompt ?? `question ${options.timestamp}` }],
    },
    response: completion(options.answer === undefined ? `answer ${options.timestamp}` : options.answer, options.toolCalls),
  };
}

export function makeRecords(count: number, options: Omit<RecordOptions, 'timestamp'> = {}, start = 1_000): InteractionRecord[] {
  return Array.from({ length: count }, (_, i) => makeRecord({ ...options, timestamp: start + i }));
}

export type Responder = (request: ChatCompletionRequest, callIndex: number) => ChatCompletionResponse | Promise<ChatCompletionResponse>;

/** Gateway answering from a function; records every request it receives. */
export class ScriptedGateway implements ModelGateway {
  readonly calls: ChatCompletionRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async complete(request: ChatCompletionRequest, options: ModelCallOptions = {}): Promise<ChatCompletionResponse> {
    options.signal?.throwIfAborted();
    const index = this.calls.length;
    this.calls.push(request);
    return this.responder(request, index);
  }

  callsFor(model: string): ChatCompletionRequest[] {
    return this.calls.filter((call) => call.model === model);
  }
}

/** Text of the request's last message. */
export function lastMessageText(request: ChatCompletionRequest): string {
  const last = request.messages[request.messages.length - 1];
  return typeof last?.content === 'string' ? last.content : '';
}

/**
 * Customization backend that walks each job through `script`, one entry per
 * status call; the last entry repeats.
 */
export class FakeCustomizationBackend implements CustomizationBackend {
  readonly requests: CustomizationRequest[] = [];
  readonly statusCalls = new Map<string, number>();
  failSubmit = false;

  constructor(private readonly script: (request: CustomizationRequest) => CustomizationStatus[]) {}

  async createJob(request: CustomizationRequest): Promise<{ jobId: string }> {
    if (this.failSubmit) throw new Error('customizer rejected the job');
    this.requests.push(request);
    return { jobId: `ft-job-${this.requests.length}` };
  }

  async getStatus(jobId: string): Promise<CustomizationStatus> {
    const index = Number(jobId.replace('ft-job-', '')) - 1;
    const request = this.requests[index];
    if (!request) throw new Error(`unknown job ${jobId}`);
    const calls = this.statusCalls.get(jobId) ?? 0;
    this.statusCalls.set(jobId, calls + 1);
    const steps = this.script(request);
    return steps[Math.min(calls, steps.length - 1)];
  }
}

export class MemoryDatasetRegistry implements DatasetRegistry {
  readonly datasets = new Map<string, TrainingDataset>();

  async register(name: string, dataset: TrainingDataset): Promise<string> {
    this.datasets.set(name, dataset);
    return `datasets/${name}`;
  }
}

export class MemoryJobRepository implements JobRepository {
  readonly jobs = new Map<string, FlywheelJobSnapshot>();
  readonly reports = new Map<string, ReportArtifact>();
  saves = 0;

  async save(job: FlywheelJobSnapshot): Promise<void> {
    this.saves++;
    this.jobs.set(job.id, structuredClone(job));
  }

  async load(id: string): Promise<FlywheelJobSnapshot> {
    const job = this.jobs.get(id);
    if (!job) throw new JobNotFoundError(id);
    return structuredClone(job);
  }

  async list(): Promise<JobSummary[]> {
    return [...this.jobs.values()]
      .map((job) => ({
        id: job.id,
        workloadId: job.workloadId,
        clientId: job.clientId,
        state: job.state,
        candidateCount: job.candidates.length,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt,
        recommendation: this.reports.get(job.id)?.recommendation ?? null,
      }))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async saveReport(report: ReportArtifact): Promise<string> {
    this.reports.set(report.jobId, structuredClone(report));
    return `reports/${report.jobId}.json`;
  }

  async loadReport(jobId: string): Promise<ReportArtifact> {
    const report = this.reports.get(jobId);
    if (!report) throw new JobNotFoundError(jobId);
    return structuredClone(report);
  }
}

export class MemoryConfigStore implements ConfigStore {
  constructor(public prefs: ConfigPreferences = {}) {}

  async getPreferences(): Promise<ConfigPreferences> {
    return structuredClone(this.prefs);
  }

  async savePreferences(prefs: ConfigPreferences): Promise<void> {
    this.prefs = structuredClone(prefs);
  }
}

/** Collects every event the service emits, in order. */
export class RecordingEvents implements FlywheelEvents {
  readonly jobStates: JobState[] = [];
  readonly candidateStates: Array<{ key: string; state: CandidateState }> = [];
  readonly customizationUpdates: Array<{ key: string; handle: CustomizationJobHandle }> = [];
  readonly errors: string[] = [];
  progressEvents = 0;
  completed: { job: FlywheelJobSnapshot; report: ReportArtifact } | undefined;

  onJobState(_jobId: string, state: JobState): void {
    this.jobStates.push(state);
  }

  onCandidateState(_jobId: string, key: string, state: CandidateState): void {
    this.candidateStates.push({ key, state });
  }

  onEvaluationProgress(): void {
    this.progressEvents++;
  }

  onCustomizationUpdate(_jobId: string, key: string, handle: CustomizationJobHandle): void {
    this.customizationUpdates.push({ key, handle });
  }

  onComplete(job: FlywheelJobSnapshot, report: ReportArtifact): void {
    this.completed = { job, report };
  }

  onError(_jobId: string, error: string): void {
    this.errors.push(error);
  }
}
