import type { ParsedToolCall } from '../records/chat-completion.js';

export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b || a === null || b === null || typeof a !== 'object' || typeof b !== 'object') {
    return false;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqual(a[i], b[i])) return false;
    }
    return true;
  }
  const aEntries = Object.entries(a);
  const bRecord = new Map(Object.entries(b));
  if (aEntries.length !== bRecord.size) return false;
  return aEntries.every(([key, value]) => bRecord.has(key) && deepEqual(value, bRecord.get(key)));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Share of argument keys (union of both sides) whose values match exactly.
 * Non-object arguments compare as a whole.
 */
export function argumentSimilarity(expected: unknown, actual: unknown): number {
  if (!isPlainObject(expected) || !isPlainObject(actual)) {
    return deepEqual(expected, actual) ? 1 : 0;
  }
  const keys = new Set([...Object.keys(expected), ...Object.keys(actual)]);
  if (keys.size === 0) return 1;
  let matched = 0;
  for (const key of keys) {
    if (key in expected && key in actual && deepEqual(expected[key], actual[key])) matched++;
  }
  return matched / keys.size;
}

/**
 * Position-wise tool-call agreement. A wrong function name scores 0 for that
 * position; missing or extra calls count as 0 against the longer list.
 */
export function toolCallSimilarity(expected: readonly ParsedToolCall[], actual: readonly ParsedToolCall[]): number {
  const length = Math.max(expected.length, actual.length);
  if (length === 0) return 1;
  let total = 0;
  for (let i = 0; i < Math.min(expected.length, actual.length); i++) {
    if (expected[i].name !== actual[i].name) continue;
    total += argumentSimilarity(expected[i].arguments, actual[i].arguments);
  }
  return total / length;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/** Token-overlap F1 between two texts; 1 for identical token bags. */
export function tokenF1(reference: string, candidate: string): number {
  const refTokens = tokenize(reference);
  const candTokens = tokenize(candidate);
  if (refTokens.length === 0 && candTokens.length === 0) return 1;
  if (refTokens.length === 0 || candTokens.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const token of refTokens) counts.set(token, (counts.get(token) ?? 0) + 1);
  let overlap = 0;
  for (const token of candTokens) {
    const remaining = counts.get(token) ?? 0;
    if (remaining > 0) {
      overlap++;
      counts.set(token, remaining - 1);
    }
  }
  if (overlap === 0) return 0;
  const precision = overlap / candTokens.length;
  const recall = overlap / refTokens.length;
  return (2 * precision * recall) / (precision + recall);
}
