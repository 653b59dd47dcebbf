import { z } from 'zod';

const ContentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const MessageContentSchema = z.union([z.string(), z.array(ContentPartSchema)]).nullable();

export const ToolCallSchema = z.object({
  id: z.string().optional(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string().min(1),
    arguments: z.string(),
  }),
});

export const ChatMessageSchema = z
  .object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: MessageContentSchema.optional(),
    name: z.string().optional(),
    tool_calls: z.array(ToolCallSchema).optional(),
    tool_call_id: z.string().optional(),
  })
  .passthrough();

export const ToolDefinitionSchema = z
  .object({
    type: z.literal('function'),
    function: z
      .object({
        name: z.string().min(1),
        description: z.string().optional(),
        parameters: z.record(z.unknown()).optional(),
      })
      .passthrough(),
  })
  .passthrough();

export const ChatCompletionRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(ChatMessageSchema).min(1),
    tools: z.array(ToolDefinitionSchema).optional(),
  })
  .passthrough();

export const ChatCompletionResponseSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            index: z.number().int().optional(),
            message: ChatMessageSchema,
            finish_reason: z.string().nullable().optional(),
          })
          .passthrough(),
      )
      .min(1),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Sampling settings carried over when a recorded request is replayed. */
const ReplayedSamplingSchema = z.object({
  temperature: z.number().optional().catch(undefined),
  top_p: z.number().optional().catch(undefined),
  max_tokens: z.number().int().positive().optional().catch(undefined),
  tool_choice: z.union([z.string(), z.record(z.unknown())]).optional().catch(undefined),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;
export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

/**
 * The recorded request addressed to `model`. Streaming, `n` and other
 * passthrough fields are dropped so the reply is a single completion.
 */
export function replayRequest(request: ChatCompletionRequest, model: string): ChatCompletionRequest {
  const replay: ChatCompletionRequest = { model, messages: request.messages, ...ReplayedSamplingSchema.parse(request) };
  if (request.tools) replay.tools = request.tools;
  return replay;
}

/** A tool call with its JSON arguments decoded; undecodable arguments stay a string. */
export interface ParsedToolCall {
  name: string;
  arguments: unknown;
}

export interface Completion {
  content: string;
  toolCalls: ParsedToolCall[];
}

export function messageText(content: ChatMessage['content']): string {
  if (content == null) return '';
  if (typeof content === 'string') return content;
  return content
    .map((part) => part.text ?? '')
    .filter(Boolean)
    .join('\n');
}

function decodeArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/** Reads the first choice of a completion into text plus decoded tool calls. */
export function extractCompletion(response: ChatCompletionResponse): Completion {
  const message = response.choices[0].message;
  return {
    content: messageText(message.content),
    toolCalls: (message.tool_calls ?? []).map((call) => ({
      name: call.function.name,
      arguments: decodeArguments(call.function.arguments),
    })),
  };
}
