import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError, CandidateSpecSchema, type CandidateSpec } from '@flywheel/core';
import { z } from 'zod';

/** Reads a file argument; `-` means stdin. */
export function readInput(path: string): string {
  return path === '-' ? readFileSync('/dev/stdin', 'utf-8') : readFileSync(resolve(path), 'utf-8');
}

/**
 * Candidates file: a JSON array of candidate specs, or an object with a
 * `configs` array as in a job submission.
 */
export function parseCandidatesFile(text: string, source = 'candidates file'): CandidateSpec[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const specs = typeof json === 'object' && json !== null && 'configs' in json ? json.configs : json;
  const parsed = z.array(CandidateSpecSchema).min(1).safeParse(specs);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new ConfigError(`${source}: ${path}: ${issue.message}`);
  }
  return parsed.data;
}

/** Accepts epoch seconds or anything `Date` parses. */
export function parseTimestamp(value: string, flag: string): number {
  if (/^\d+$/.test(value)) return Number(value);
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new ConfigError(`${flag} must be epoch seconds or a date, got "${value}"`);
  return Math.floor(ms / 1000);
}
