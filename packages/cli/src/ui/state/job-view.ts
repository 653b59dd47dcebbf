import type {
  CandidateState,
  CustomizationState,
  FlywheelJobSnapshot,
  JobState,
  ReportArtifact,
} from '@flywheel/core';
import type { EventHandler } from '../../adapters/callback-event-bridge.js';

export interface Progress {
  completed: number;
  total: number;
}

export interface CandidateView {
  key: string;
  state: CandidateState;
  pre: Progress | null;
  post: Progress | null;
  customization: { state: CustomizationState; externalJobId: string } | null;
}

export interface JobViewState {
  jobId: string | null;
  state: JobState | null;
  baseline: Progress | null;
  candidates: Map<string, CandidateView>;
  job: FlywheelJobSnapshot | null;
  report: ReportArtifact | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'JOB_STATE'; jobId: string; state: JobState }
  | { type: 'CANDIDATE_STATE'; key: string; state: CandidateState }
  | { type: 'PROGRESS'; label: string; completed: number; total: number }
  | { type: 'CUSTOMIZATION'; key: string; state: CustomizationState; externalJobId: string }
  | { type: 'COMPLETE'; job: FlywheelJobSnapshot; report: ReportArtifact }
  | { type: 'ERROR'; error: string };

// Progress labels are `baseline`, `<key> (pre)` or `<key> (post)`.
const CANDIDATE_LABEL = /^(.+) \((pre|post)\)$/;

function candidateView(state: JobViewState, key: string): CandidateView {
  return state.candidates.get(key) ?? { key, state: 'QUEUED', pre: null, post: null, customization: null };
}

export function jobViewReducer(state: JobViewState, action: Action): JobViewState {
  switch (action.type) {
    case 'JOB_STATE':
      return {
        ...state,
        jobId: action.jobId,
        state: action.state,
        done: state.done || action.state === 'COMPLETE' || action.state === 'FAILED',
      };

    case 'CANDIDATE_STATE': {
      const candidates = new Map(state.candidates);
      candidates.set(action.key, { ...candidateView(state, action.key), state: action.state });
      return { ...state, candidates };
    }

    case 'PROGRESS': {
      const progress = { completed: action.completed, total: action.total };
      if (action.label === 'baseline') return { ...state, baseline: progress };

      const match = CANDIDATE_LABEL.exec(action.label);
      if (!match) return state;
      const [, key, phase] = match;
      const candidates = new Map(state.candidates);
      const current = candidateView(state, key);
      candidates.set(key, phase === 'pre' ? { ...current, pre: progress } : { ...current, post: progress });
      return { ...state, candidates };
    }

    case 'CUSTOMIZATION': {
      const candidates = new Map(state.candidates);
      candidates.set(action.key, {
        ...candidateView(state, action.key),
        customization: { state: action.state, externalJobId: action.externalJobId },
      });
      return { ...state, candidates };
    }

    case 'COMPLETE':
      return { ...state, job: action.job, report: action.report, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: JobViewState = {
  jobId: null,
  state: null,
  baseline: null,
  candidates: new Map(),
  job: null,
  report: null,
  error: null,
  done: false,
};

/** Event handlers that feed every job event into `dispatch`. */
export function jobViewHandlers(dispatch: (action: Action) => void): EventHandler {
  return {
    onJobState: (jobId, state) => dispatch({ type: 'JOB_STATE', jobId, state }),
    onCandidateState: (_jobId, key, state) => dispatch({ type: 'CANDIDATE_STATE', key, state }),
    onEvaluationProgress: (_jobId, label, completed, total) => dispatch({ type: 'PROGRESS', label, completed, total }),
    onCustomizationUpdate: (_jobId, key, handle) =>
      dispatch({ type: 'CUSTOMIZATION', key, state: handle.state, externalJobId: handle.externalJobId }),
    onComplete: (job, report) => dispatch({ type: 'COMPLETE', job, report }),
    onError: (_jobId, error) => dispatch({ type: 'ERROR', error }),
  };
}
