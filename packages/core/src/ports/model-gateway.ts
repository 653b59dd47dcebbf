import type { ChatCompletionRequest, ChatCompletionResponse } from '../domain/records/chat-completion.js';

export interface ModelCallOptions {
  signal?: AbortSignal;
}

/** A chat-completion endpoint serving the model named in `request.model`. */
export interface ModelGateway {
  complete(request: ChatCompletionRequest, options?: ModelCallOptions): Promise<ChatCompletionResponse>;
}
