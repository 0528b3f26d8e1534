import { describe, it, expect } from 'vitest';
import { exponentialBackoff, sleep } from '../../src/application/backoff.js';

describe('exponentialBackoff', () => {
  it('doubles the delay for each retry up to the ceiling', () => {
    const delay = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 });

    expect([1, 2, 3, 4, 5].map(delay)).toEqual([100, 200, 400, 800, 1000]);
  });

  it('adds bounded jitter', () => {
    const delay = exponentialBackoff({ baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 50, random: () => 0.5 });

    expect(delay(1)).toBe(125);
  });

  it('keeps jitter under the ceiling', () => {
    const delay = exponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 1000, jitterMs: 500, random: () => 0.99 });

    expect(delay(1)).toBe(1000);
  });
});

describe('sleep', () => {
  it('resolves at once when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const started = Date.now();

    await sleep(60_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves early when the signal aborts mid-wait', async () => {
    const controller = new AbortController();
    const waiting = sleep(60_000, controller.signal);
    controller.abort();

    await expect(waiting).resolves.toBeUndefined();
  });
});
