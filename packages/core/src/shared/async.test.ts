import { describe, it, expect } from 'vitest';
import { MAX_TIMER_DELAY_MS, sleep, timerDelay, withTimeout } from './async.js';
import { CallTimeoutError } from './errors.js';

const thirtyDays = 30 * 24 * 60 * 60 * 1000;

describe('timerDelay', () => {
  it('should keep delays within what setTimeout takes', () => {
    expect(timerDelay(10)).toBe(10);
    expect(timerDelay(-5)).toBe(0);
    expect(timerDelay(thirtyDays)).toBe(MAX_TIMER_DELAY_MS);
  });
});

describe('sleep', () => {
  it('should not resolve early when the delay is longer than a timer allows', async () => {
    const controller = new AbortController();
    let resolved = false;
    const pending = sleep(thirtyDays, controller.signal).then(() => {
      resolved = true;
    });

    await sleep(20);
    expect(resolved).toBe(false);

    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
    expect(resolved).toBe(false);
  });
});

describe('withTimeout', () => {
  it('should reject with CallTimeoutError once the timeout passes', async () => {
    await expect(withTimeout(() => new Promise<never>(() => undefined), 5)).rejects.toBeInstanceOf(CallTimeoutError);
  });

  it('should not time out early when the timeout is longer than a timer allows', async () => {
    await expect(withTimeout(() => sleep(20).then(() => 'done'), thirtyDays)).resolves.toBe('done');
  });
});
