import {
  ChatCompletionResponseSchema,
  type ChatCompletionRequest,
  type ChatCompletionResponse,
} from '../domain/records/chat-completion.js';
import type { ModelCallOptions, ModelGateway } from '../ports/model-gateway.js';
import { ModelCallError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('model-gateway');

/** Calls `POST {baseUrl}/chat/completions` on any OpenAI-compatible server. */
export class OpenAiCompatibleGateway implements ModelGateway {
  private readonly endpoint: string;

  constructor(baseUrl: string, private readonly apiKey?: string) {
    this.endpoint = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
  }

  async complete(request: ChatCompletionRequest, options: ModelCallOptions = {}): Promise<ChatCompletionResponse> {
    log.debug(`complete: ${request.model} (${request.messages.length} messages)`);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const response = await fetch(this.endpoint, {
      method: 'POST',
      headers,
      body: JSON.stringify(request),
      signal: options.signal,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'could not read response body');
      log.warn(`complete: HTTP ${response.status} ${response.statusText} for ${request.model}`, errorText.slice(0, 500));
      throw new ModelCallError(`HTTP ${response.status} from ${request.model}`, response.status);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelCallError(`Malformed completion from ${request.model}: ${parsed.error.issues[0].message}`);
    }
    return parsed.data;
  }
}
