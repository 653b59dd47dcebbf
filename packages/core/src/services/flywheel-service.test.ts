import { describe, it, expect, vi } from 'vitest';
import { InMemoryRecordStore } from '../adapters/in-memory-record-store.js';
import { FlywheelConfigSchema, type FlywheelConfigInput } from '../domain/config/flywheel-config.js';
import type { ChatCompletionRequest } from '../domain/records/chat-completion.js';
import type { InteractionRecord } from '../domain/records/interaction-record.js';
import type { CustomizationStatus } from '../ports/customization-backend.js';
import type { RecordStore } from '../ports/record-store.js';
import { BackendUnavailableError, ConfigError } from '../shared/errors.js';
import {
  FakeCustomizationBackend,
  MemoryDatasetRegistry,
  MemoryJobRepository,
  RecordingEvents,
  ScriptedGateway,
  completion,
  lastMessageText,
  makeRecords,
} from '../testing/fakes.js';
import { sleep } from '../shared/async.js';
import { FlywheelService } from './flywheel-service.js';

/** Decides per model whether it reproduces the recorded answer for a timestamp. */
type Behaviour = Record<string, (timestamp: number) => boolean | 'slow' | 'hang' | 'error'>;

function behaviourGateway(behaviour: Behaviour): ScriptedGateway {
  return new ScriptedGateway((request: ChatCompletionRequest) => {
    const timestamp = Number(lastMessageText(request).replace('question ', ''));
    const outcome = behaviour[request.model]?.(timestamp) ?? 'error';
    if (outcome === 'hang') return new Promise(() => undefined);
    if (outcome === 'error') throw new Error(`model ${request.model} is not deployed`);
    if (outcome === 'slow') return sleep(20).then(() => completion(`answer ${timestamp}`));
    return completion(outcome ? `answer ${timestamp}` : 'nonsense reply');
  });
}

interface HarnessOptions {
  records: InteractionRecord[];
  behaviour: Behaviour;
  customization?: (model: string) => CustomizationStatus[];
  config?: FlywheelConfigInput;
  recordStore?: RecordStore;
}

function harness(options: HarnessOptions) {
  const gateway = behaviourGateway(options.behaviour);
  const backend = new FakeCustomizationBackend((request) =>
    options.customization ? options.customization(request.baseModelIdentifier) : [{ state: 'FAILED' }],
  );
  const registry = new MemoryDatasetRegistry();
  const repository = new MemoryJobRepository();
  const events = new RecordingEvents();
  const store = new InMemoryRecordStore(options.records);
  const recordStore = options.recordStore ?? store;
  let nextId = 0;

  const config = FlywheelConfigSchema.parse({
    ...options.config,
    execution: {
      retry_base_delay_ms: 1,
      max_record_retries: 1,
      poll_initial_interval_ms: 1,
      poll_max_interval_ms: 2,
      call_timeout_ms: 1_000,
      ...options.config?.execution,
    },
  });

  const service = new FlywheelService({
    recordStore,
    gateway,
    customizationBackend: backend,
    datasetRegistry: registry,
    jobRepository: repository,
    events,
    config,
    generateId: () => `job-${++nextId}`,
  });

  return { service, gateway, backend, registry, repository, events, store };
}

const everyTenthWrong = (timestamp: number) => timestamp % 10 !== 0;
const always = () => true;

describe('FlywheelService', () => {
  it('should score a candidate without customization and leave post results absent', async () => {
    const { service, backend, events, repository } = harness({
      records: makeRecords(300),
      behaviour: { 'big-model': always, 'small-model': everyTenthWrong },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model', gpus: 1 }],
    });
    const job = await service.waitForCompletion(jobId);
    const report = await service.getReport(jobId);

    expect(job.state).toBe('COMPLETE');
    expect(job.baselineModel).toBe('big-model');
    expect(job.dataset).toEqual({ total: 300, evaluation: 300, training: 270, validation: 30 });
    expect(report.baseline.aggregateScore).toBe(1);
    expect(report.candidates).toHaveLength(1);
    const [candidate] = report.candidates;
    expect(candidate.pre?.aggregateScore).toBeCloseTo(0.9);
    expect(candidate.pre?.recordCount).toBe(300);
    expect(candidate.customization).toBeNull();
    expect(candidate.post).toBeNull();
    expect(candidate.status).toBe('complete');
    expect(candidate.promotable).toBe(false);
    expect(report.recommendation).toBeNull();
    expect(backend.requests).toHaveLength(0);
    expect(events.jobStates).toEqual(['CREATED', 'LOADING_DATA', 'BASELINE_EVAL', 'PER_CANDIDATE', 'AGGREGATING', 'COMPLETE']);
    expect(events.completed?.report.jobId).toBe(jobId);
    expect((await repository.load(jobId)).reportArtifactRef).toBe(`reports/${jobId}.json`);
  });

  it('should customize a candidate and score the customized model', async () => {
    const { service, backend, registry, events } = harness({
      records: makeRecords(1_000),
      behaviour: {
        'big-model': always,
        'small-model': (ts) => ts % 10 < 6,
        'small-model-ft': (ts) => ts % 20 !== 0,
      },
      customization: (model) => [{ state: 'RUNNING' }, { state: 'SUCCEEDED', resultModelIdentifier: `${model}-ft` }],
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model', customization_enabled: true }],
    });
    await service.waitForCompletion(jobId);
    const report = await service.getReport(jobId);

    const [candidate] = report.candidates;
    expect(candidate.customization).toEqual({
      state: 'SUCCEEDED',
      externalJobId: 'ft-job-1',
      resultModelIdentifier: 'small-model-ft',
    });
    expect(candidate.pre?.aggregateScore).toBeCloseTo(0.6);
    expect(candidate.post?.aggregateScore).toBeCloseTo(0.95);
    expect(candidate.post?.modelIdentifier).toBe('small-model-ft');
    expect(candidate.post?.aggregateScore ?? 0).toBeGreaterThan(candidate.pre?.aggregateScore ?? 1);
    expect(candidate.status).toBe('complete');
    expect(report.recommendation).toBe('small-model:latest');

    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0].trainingDatasetRef).toBe(`datasets/${jobId}-small-model-latest`);
    const dataset = registry.datasets.get(`${jobId}-small-model-latest`);
    expect(dataset?.training).toHaveLength(900);
    expect(dataset?.validation).toHaveLength(100);
    expect(events.candidateStates.map((s) => s.state)).toEqual(['EVAL_PRE', 'CUSTOMIZING', 'EVAL_POST', 'DONE']);
    expect(events.customizationUpdates.map((u) => u.handle.state)).toEqual(['SUBMITTED', 'RUNNING', 'SUCCEEDED']);
  });

  it('should give a resubmitted workload a new job that sees the grown dataset', async () => {
    const { service, store, repository } = harness({
      records: makeRecords(300),
      behaviour: {
        'big-model': always,
        'small-model': (ts) => ts % 10 < 6,
        'small-model-ft': (ts) => ts % 20 !== 0,
      },
      customization: (model) => [{ state: 'SUCCEEDED', resultModelIdentifier: `${model}-ft` }],
    });

    const firstId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
    });
    await service.waitForCompletion(firstId);
    const firstReport = await service.getReport(firstId);

    await store.append(makeRecords(700, {}, 1_300));
    const secondId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model', customization_enabled: true }],
    });
    const second = await service.waitForCompletion(secondId);
    const secondReport = await service.getReport(secondId);

    expect(secondId).not.toBe(firstId);
    expect(second.state).toBe('COMPLETE');
    expect(second.dataset?.total).toBe(1_000);
    const [candidate] = secondReport.candidates;
    expect(candidate.pre?.aggregateScore).toBeCloseTo(0.6);
    expect(candidate.post?.aggregateScore).toBeCloseTo(0.95);

    const first = await repository.load(firstId);
    expect(first.state).toBe('COMPLETE');
    expect(first.dataset?.total).toBe(300);
    expect(await service.getReport(firstId)).toEqual(firstReport);
    expect(firstReport.candidates[0].post).toBeNull();
  });

  it('should keep configs of one model that differ only in deployment apart', async () => {
    const { service } = harness({
      records: makeRecords(10),
      behaviour: { 'big-model': always, m: always },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [
        { model_name: 'm', gpus: 1 },
        { model_name: 'm', gpus: 4 },
      ],
    });
    const job = await service.waitForCompletion(jobId);
    const report = await service.getReport(jobId);

    expect(job.state).toBe('COMPLETE');
    expect(report.candidates.map((c) => [c.key, c.config.computeUnitCount, c.status])).toEqual([
      ['m:latest@1gpu/8192ctx/25Gi', 1, 'complete'],
      ['m:latest@4gpu/8192ctx/25Gi', 4, 'complete'],
    ]);
    expect(report.recommendation).toBe('m:latest@1gpu/8192ctx/25Gi');
  });

  it('should fail in LOADING_DATA when the record store cannot be read', async () => {
    const unreadable: RecordStore = {
      fetch: async () => {
        throw new BackendUnavailableError('Could not read records: EISDIR');
      },
      append: async () => ({ inserted: 0, duplicates: 0 }),
    };
    const { service, gateway } = harness({ records: [], behaviour: { 'big-model': always }, recordStore: unreadable });

    const jobId = await service.submit({ workload_id: 'wl-support', client_id: 'client-a', configs: [{ model_name: 'x' }] });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('FAILED');
    expect(job.error).toEqual({
      code: 'BACKEND_UNAVAILABLE',
      message: 'Could not read records: EISDIR',
      stage: 'LOADING_DATA',
    });
    expect(gateway.calls).toHaveLength(0);
  });

  it('should fail an empty dataset before any model call', async () => {
    const { service, gateway, events } = harness({ records: [], behaviour: { 'big-model': always } });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
    });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('FAILED');
    expect(job.error).toEqual({
      code: 'NOT_FOUND',
      message: 'No records for workload wl-support, client client-a',
      stage: 'LOADING_DATA',
    });
    expect(gateway.calls).toHaveLength(0);
    expect(events.errors).toEqual(['No records for workload wl-support, client client-a']);
    await expect(service.getReport(jobId)).rejects.toThrow(`Job ${jobId} has no report (state FAILED)`);
  });

  it('should fail when fewer records than required are found', async () => {
    const { service, gateway } = harness({
      records: makeRecords(5),
      behaviour: { 'big-model': always },
      config: { data_split: { min_total_records: 10 } },
    });

    const jobId = await service.submit({ workload_id: 'wl-support', client_id: 'client-a', configs: [{ model_name: 'x' }] });
    const job = await service.waitForCompletion(jobId);

    expect(job.error?.code).toBe('DATASET_ERROR');
    expect(gateway.calls).toHaveLength(0);
  });

  it('should fail when the baseline cannot be evaluated', async () => {
    const { service, gateway } = harness({
      records: makeRecords(4),
      behaviour: { 'small-model': always },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
    });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('FAILED');
    expect(job.error?.code).toBe('EVALUATOR_UNAVAILABLE');
    expect(job.error?.stage).toBe('BASELINE_EVAL');
    expect(gateway.callsFor('small-model')).toHaveLength(0);
  });

  it('should keep a failing candidate from affecting the others', async () => {
    const { service } = harness({
      records: makeRecords(20),
      behaviour: { 'big-model': always, 'good-model': always, 'slow-tuner': always },
      customization: () => [{ state: 'RUNNING' }],
      config: { execution: { customization_deadline_ms: 20 } },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [
        { model_name: 'good-model' },
        { model_name: 'missing-model' },
        { model_name: 'slow-tuner', customization_enabled: true },
      ],
    });
    const job = await service.waitForCompletion(jobId);
    const report = await service.getReport(jobId);

    expect(job.state).toBe('COMPLETE');
    expect(job.candidates.map((c) => [c.key, c.state])).toEqual([
      ['good-model:latest', 'DONE'],
      ['missing-model:latest', 'FAILED'],
      ['slow-tuner:latest', 'FAILED'],
    ]);
    const byKey = new Map(report.candidates.map((c) => [c.key, c]));
    expect(byKey.get('good-model:latest')?.status).toBe('complete');
    expect(byKey.get('missing-model:latest')?.status).toBe('not_evaluable');
    expect(byKey.get('missing-model:latest')?.issues[0].code).toBe('EVALUATOR_UNAVAILABLE');
    expect(byKey.get('slow-tuner:latest')?.status).toBe('partial');
    expect(byKey.get('slow-tuner:latest')?.missing).toEqual(['post']);
    expect(byKey.get('slow-tuner:latest')?.issues[0].code).toBe('CUSTOMIZATION_TIMEOUT');
    expect(report.ranking).toEqual(['good-model:latest', 'slow-tuner:latest']);
  });

  it('should fail the job when every candidate fails its first evaluation', async () => {
    const { service } = harness({ records: makeRecords(3), behaviour: { 'big-model': always } });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'gone-a' }, { model_name: 'gone-b' }],
    });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('FAILED');
    expect(job.error).toEqual({
      code: 'CANDIDATES_EXHAUSTED',
      message: 'All 2 candidates failed pre-customization evaluation',
      stage: 'PER_CANDIDATE',
    });
  });

  it('should run at most the configured number of candidates at once', async () => {
    const { service, events } = harness({
      records: makeRecords(3),
      behaviour: { 'big-model': always, a: always, b: always },
      config: { execution: { max_concurrent_candidates: 1 } },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'a' }, { model_name: 'b' }],
    });
    await service.waitForCompletion(jobId);

    expect(events.candidateStates.map((s) => `${s.key} ${s.state}`)).toEqual([
      'a:latest EVAL_PRE',
      'a:latest DONE',
      'b:latest EVAL_PRE',
      'b:latest DONE',
    ]);
  });

  it('should evaluate the baseline model named in the submission', async () => {
    const { service, gateway } = harness({
      records: makeRecords(4),
      behaviour: { 'pinned-model': always, 'small-model': always },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
      baseline_model: 'pinned-model',
    });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('COMPLETE');
    expect(gateway.callsFor('pinned-model')).toHaveLength(4);
    expect(gateway.callsFor('big-model')).toHaveLength(0);
  });

  it('should stop a cancelled job and keep it failed', async () => {
    const { service, events } = harness({
      records: makeRecords(4),
      behaviour: { 'big-model': always, 'small-model': () => 'hang' },
    });

    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
    });
    await vi.waitFor(() => expect(events.candidateStates.map((s) => s.state)).toContain('EVAL_PRE'));

    expect(service.cancel(jobId, 'operator stop')).toBe(true);
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('FAILED');
    expect(job.error).toEqual({ code: 'JOB_CANCELLED', message: 'operator stop', stage: 'PER_CANDIDATE' });
    expect(service.cancel(jobId)).toBe(false);
  });

  it('should fail a job that runs past its deadline', async () => {
    const { service } = harness({
      records: makeRecords(2),
      behaviour: { 'big-model': () => 'hang' },
      config: { execution: { job_deadline_ms: 30 } },
    });

    const jobId = await service.submit({ workload_id: 'wl-support', client_id: 'client-a', configs: [{ model_name: 'x' }] });
    const job = await service.waitForCompletion(jobId);

    expect(job.error?.code).toBe('JOB_TIMEOUT');
    expect(job.error?.stage).toBe('BASELINE_EVAL');
  });

  it('should not cut a deadline longer than a single timer allows short', async () => {
    const { service } = harness({
      records: makeRecords(2),
      behaviour: { 'big-model': () => 'slow', x: () => 'slow' },
      config: { execution: { job_deadline_ms: 30 * 24 * 60 * 60 * 1000 } },
    });

    const jobId = await service.submit({ workload_id: 'wl-support', client_id: 'client-a', configs: [{ model_name: 'x' }] });
    const job = await service.waitForCompletion(jobId);

    expect(job.state).toBe('COMPLETE');
    expect(job.error).toBeNull();
  });

  it('should reject invalid submissions', async () => {
    const { service, repository } = harness({ records: [], behaviour: {} });

    await expect(service.submit({ workload_id: 'wl', client_id: 'c', configs: [] })).rejects.toBeInstanceOf(ConfigError);
    await expect(
      service.submit({ workload_id: 'wl', client_id: 'c', configs: [{ model_name: 'x' }, { model_name: 'x' }] }),
    ).rejects.toThrow('Candidate x:latest is listed more than once');
    expect(repository.jobs.size).toBe(0);
  });

  it('should regenerate a report with another tolerance without calling models', async () => {
    const { service, gateway } = harness({
      records: makeRecords(100),
      behaviour: { 'big-model': always, 'small-model': everyTenthWrong },
    });
    const jobId = await service.submit({
      workload_id: 'wl-support',
      client_id: 'client-a',
      configs: [{ model_name: 'small-model' }],
    });
    await service.waitForCompletion(jobId);
    const callsBefore = gateway.calls.length;

    const report = await service.regenerateReport(jobId, 0.2);

    expect(report.recommendation).toBe('small-model:latest');
    expect(report.tolerance).toBe(0.2);
    expect(gateway.calls).toHaveLength(callsBefore);
    expect((await service.getReport(jobId)).tolerance).toBe(0.2);
  });

  it('should list submitted jobs', async () => {
    const { service } = harness({ records: makeRecords(2), behaviour: { 'big-model': always, x: always } });

    const jobId = await service.submit({ workload_id: 'wl-support', client_id: 'client-a', configs: [{ model_name: 'x' }] });
    await service.waitForCompletion(jobId);

    const [summary] = await service.list();
    expect(summary).toMatchObject({ id: jobId, state: 'COMPLETE', candidateCount: 1, recommendation: 'x:latest' });
  });
});
