import { messageText, type ChatMessage } from '../records/chat-completion.js';

const MAX_CONTEXT_CHARS = 4000;

function renderConversation(messages: readonly ChatMessage[]): string {
  const rendered = messages
    .map((message) => `${message.role.toUpperCase()}: ${messageText(message.content)}`)
    .join('\n');
  return rendered.length > MAX_CONTEXT_CHARS ? rendered.slice(rendered.length - MAX_CONTEXT_CHARS) : rendered;
}

export function buildJudgePrompt(messages: readonly ChatMessage[], reference: string, candidate: string): string {
  return `You are grading how closely a candidate answer matches a reference answer to the same conversation.

Conversation:
${renderConversation(messages)}

Reference answer:
${reference}

Candidate answer:
${candidate}

Judge only whether the candidate conveys the same content as the reference; ignore wording and formatting.
Reply with a single line of the form:
RATING: <integer from 0 to 10>`;
}

/** Reads a 0-10 rating and normalizes it to [0, 1]; undefined when none is present. */
export function parseJudgeRating(text: string): number | undefined {
  const explicit = text.match(/RATING:\s*(\d+(?:\.\d+)?)/i);
  const raw = explicit?.[1] ?? text.match(/\b(\d+(?:\.\d+)?)\b/)?.[1];
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 10) return undefined;
  return value / 10;
}
