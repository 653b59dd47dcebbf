import type { ChatMessage } from '../domain/records/chat-completion.js';

export interface JudgeRequest {
  /** The conversation the answers respond to. */
  messages: ChatMessage[];
  reference: string;
  candidate: string;
}

export interface Judge {
  readonly modelId: string;
  /** Similarity of `candidate` to `reference`, in [0, 1]. */
  rate(request: JudgeRequest, options?: { signal?: AbortSignal }): Promise<number>;
}
