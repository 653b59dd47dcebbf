import { describe, it, expect } from 'vitest';
import { buildJudgePrompt, parseJudgeRating } from './judge-prompt.js';

describe('parseJudgeRating', () => {
  it('should normalize an explicit rating', () => {
    expect(parseJudgeRating('RATING: 7')).toBe(0.7);
    expect(parseJudgeRating('The answers agree.\nrating: 10')).toBe(1);
  });

  it('should fall back to the first number', () => {
    expect(parseJudgeRating('I would give it 4 out of 10')).toBe(0.4);
  });

  it('should reject missing or out-of-range ratings', () => {
    expect(parseJudgeRating('no idea')).toBeUndefined();
    expect(parseJudgeRating('RATING: 11')).toBeUndefined();
  });
});

describe('buildJudgePrompt', () => {
  it('should include the conversation and both answers', () => {
    const prompt = buildJudgePrompt([{ role: 'user', content: 'What is 2+2?' }], '4', 'four');

    expect(prompt).toContain('USER: What is 2+2?');
    expect(prompt).toContain('Reference answer:\n4\n');
    expect(prompt).toContain('Candidate answer:\nfour\n');
    expect(prompt.endsWith('RATING: <integer from 0 to 10>')).toBe(true);
  });

  it('should keep only the end of a long conversation', () => {
    const prompt = buildJudgePrompt([{ role: 'user', content: `start ${'x'.repeat(5000)} end` }], 'a', 'b');

    expect(prompt).not.toContain('USER: start');
    expect(prompt).toContain('x end\n');
  });
});
