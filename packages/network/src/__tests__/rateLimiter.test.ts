import { describe, it, expect } from 'vitest';
import { AbortError } from '@mediafetch/utils';
import { RateLimiter } from '../rateLimiter.js';
import { createFakeClock } from './fakeClock.js';

describe('RateLimiter', () => {
  const noJitter = { min: 0, max: 0 };

  it('should let maxRequests through and hold the next one until the oldest leaves the window', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({
      maxRequests: 75,
      windowMs: 660_000,
      jitterMs: noJitter,
      now: clock.now,
      sleep: clock.sleep,
    });

    for (let i = 0; i < 75; i++) {
      await limiter.admit();
      limiter.record();
    }
    expect(clock.sleeps.filter(ms => ms > 0)).toEqual([]);
    expect(limiter.stats().requestsInWindow).toBe(75);

    await limiter.admit();
    limiter.record();

    expect(clock.sleeps.filter(ms => ms > 0)).toEqual([660_000]);
    expect(clock.now()).toBe(660_000);
    expect(limiter.stats().requestsInWindow).toBe(1);
  });

  it('should wait only for the remainder of the window', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({
      maxRequests: 2,
      windowMs: 1_000,
      jitterMs: noJitter,
      now: clock.now,
      sleep: clock.sleep,
    });

    await limiter.schedule(async () => undefined);
    clock.advance(400);
    await limiter.schedule(async () => undefined);
    await limiter.schedule(async () => undefined);

    expect(clock.sleeps.filter(ms => ms > 0)).toEqual([600]);
    expect(limiter.stats()).toEqual({ requestsInWindow: 2, maxRequests: 2, windowMs: 1_000 });
  });

  it('should add uniform jitter to every admission', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({
      jitterMs: { min: 500, max: 5_000 },
      now: clock.now,
      sleep: clock.sleep,
      random: () => 0.5,
    });

    await limiter.admit();
    limiter.record();

    expect(clock.sleeps).toEqual([2_750]);
  });

  it('should serialize admit and record across concurrent callers', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({ jitterMs: noJitter, now: clock.now, sleep: clock.sleep });
    const order: string[] = [];

    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = limiter.schedule(async () => {
      order.push('first:start');
      await firstGate;
      order.push('first:end');
    });
    const second = limiter.schedule(async () => {
      order.push('second:start');
    });

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(order).toEqual(['first:start']);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should release the gate when an admission is aborted', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({
      maxRequests: 1,
      windowMs: 1_000,
      jitterMs: noJitter,
      now: clock.now,
      sleep: clock.sleep,
    });

    await limiter.schedule(async () => undefined);

    const controller = new AbortController();
    controller.abort();
    await expect(limiter.admit(controller.signal)).rejects.toBeInstanceOf(AbortError);

    await limiter.admit();
    limiter.record();
    expect(clock.now()).toBe(1_000);
  });

  it('should let a queued caller leave when its signal fires', async () => {
    const clock = createFakeClock();
    const limiter = new RateLimiter({ jitterMs: noJitter, now: clock.now, sleep: clock.sleep });
    await limiter.admit();

    const controller = new AbortController();
    const queued = limiter.admit(controller.signal);
    controller.abort();

    await expect(queued).rejects.toBeInstanceOf(AbortError);
    limiter.record();
    expect(limiter.stats().requestsInWindow).toBe(1);

    await limiter.admit();
    limiter.record();
    expect(limiter.stats().requestsInWindow).toBe(2);
  });
});
