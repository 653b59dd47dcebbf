import { buildJudgePrompt, parseJudgeRating } from '../domain/evaluation/judge-prompt.js';
import { extractCompletion } from '../domain/records/chat-completion.js';
import type { Judge, JudgeRequest } from '../ports/judge.js';
import type { ModelGateway } from '../ports/model-gateway.js';
import { ModelCallError } from '../shared/errors.js';

/**
 * Asks a judge model to rate a candidate answer against the reference. Where
 * the judge runs (local or remote) is decided by the gateway it is given.
 */
export class LlmJudge implements Judge {
  constructor(
    private readonly gateway: ModelGateway,
    readonly modelId: string,
  ) {}

  async rate(request: JudgeRequest, options: { signal?: AbortSignal } = {}): Promise<number> {
    const response = await this.gateway.complete(
      {
        model: this.modelId,
        messages: [{ role: 'user', content: buildJudgePrompt(request.messages, request.reference, request.candidate) }],
        temperature: 0,
      },
      options,
    );
    const { content } = extractCompletion(response);
    const rating = parseJudgeRating(content);
    if (rating === undefined) {
      throw new ModelCallError(`Judge ${this.modelId} returned no rating: ${content.slice(0, 80)}`);
    }
    return rating;
  }
}
