import { describe, it, expect } from '@jest/globals';
import { DeterministicClock } from '@location-bridge/adapters';
import { MAX_SLEEP_STEP_MS, PollRateLimiter } from '../services/poll-rate-limiter.js';
import { sleep } from '../services/sleep.js';
import type { SleepFn } from '../services/sleep.js';
import { InMemoryBridgeStore, clockSleep, makeLogger } from './fakes.js';

const T0 = 1_700_000_000; // unix seconds

function setup(intervalSec = 60) {
  const store = new InMemoryBridgeStore();
  const clock = new DeterministicClock(T0 * 1000);
  const steps: number[] = [];
  const limiter = new PollRateLimiter({
    metadata: store,
    clock,
    pollingIntervalSec: intervalSec,
    logger: makeLogger(),
    sleep: clockSleep(clock, steps),
  });
  return { store, clock, steps, limiter };
}

describe('PollRateLimiter.blockUntilNextPoll', () => {
  it('returns at once when no poll was ever recorded', async () => {
    const { limiter, steps } = setup();
    await expect(limiter.blockUntilNextPoll()).resolves.toBe(true);
    expect(steps).toEqual([]);
    await expect(limiter.nextPollAt()).resolves.toBeNull();
  });

  it('waits out the remaining interval in steps of at most one second', async () => {
    const { store, clock, steps, limiter } = setup(60);
    store.lastPollTime = T0 - 10;

    await expect(limiter.blockUntilNextPoll()).resolves.toBe(true);

    expect(steps).toHaveLength(50);
    expect(steps.every((ms) => ms <= MAX_SLEEP_STEP_MS)).toBe(true);
    expect(steps.reduce((a, b) => a + b, 0)).toBe(50_000);
    expect(clock.peek().getTime() / 1000 - (T0 - 10)).toBe(60);
  });

  it('finishes with a partial step when the due time is not on a second boundary', async () => {
    const { store, clock, steps, limiter } = setup(60);
    clock.advance(250);
    store.lastPollTime = T0 - 58;

    await limiter.blockUntilNextPoll();

    expect(steps).toEqual([1000, 750]);
  });

  it('does not wait when the interval already elapsed', async () => {
    const { store, steps, limiter } = setup(60);
    store.lastPollTime = T0 - 60;
    await expect(limiter.blockUntilNextPoll()).resolves.toBe(true);
    expect(steps).toEqual([]);
  });

  it('keeps the gate across a restart through persisted metadata', async () => {
    const { store, clock, limiter } = setup(3600);
    await limiter.recordPollAttempt();
    expect(store.lastPollTime).toBe(T0);

    const steps: number[] = [];
    const restarted = new PollRateLimiter({
      metadata: store,
      clock,
      pollingIntervalSec: 3600,
      logger: makeLogger(),
      sleep: clockSleep(clock, steps),
    });
    clock.advance(1_000_000); // 1000 s of downtime

    await restarted.blockUntilNextPoll();

    expect(steps.reduce((a, b) => a + b, 0)).toBe(2_600_000);
    expect(Math.floor(clock.peek().getTime() / 1000) - T0).toBe(3600);
    await expect(restarted.nextPollAt()).resolves.toBe(T0 + 3600);
  });

  it('returns false once the signal aborts between steps', async () => {
    const { store, clock } = setup(3600);
    store.lastPollTime = T0;
    const controller = new AbortController();
    const steps: number[] = [];
    const abortingSleep: SleepFn = async (ms) => {
      steps.push(ms);
      clock.advance(ms);
      if (steps.length === 3) controller.abort();
    };
    const limiter = new PollRateLimiter({
      metadata: store,
      clock,
      pollingIntervalSec: 3600,
      logger: makeLogger(),
      sleep: abortingSleep,
    });

    await expect(limiter.blockUntilNextPoll(controller.signal)).resolves.toBe(false);
    expect(steps).toHaveLength(3);
  });

  it('is interrupted within a second by a real abort', async () => {
    const store = new InMemoryBridgeStore();
    store.lastPollTime = Math.floor(Date.now() / 1000);
    const limiter = new PollRateLimiter({
      metadata: store,
      clock: { now: () => new Date() },
      pollingIntervalSec: 3600,
      logger: makeLogger(),
      sleep,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    await expect(limiter.blockUntilNextPoll(controller.signal)).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('PollRateLimiter.recordPollAttempt', () => {
  it('keeps gating polls when the durable write fails', async () => {
    const { store, clock, steps, limiter } = setup(60);
    store.setLastPollTime = async () => {
      throw new Error('metadata table locked');
    };

    await expect(limiter.recordPollAttempt()).rejects.toThrow('metadata table locked');
    await expect(limiter.nextPollAt()).resolves.toBe(T0 + 60);

    await expect(limiter.blockUntilNextPoll()).resolves.toBe(true);
    expect(steps.reduce((a, b) => a + b, 0)).toBe(60_000);
    expect(clock.peek().getTime()).toBe((T0 + 60) * 1000);
  });

  it('uses the later of the stored and the in-process attempt', async () => {
    const { store, limiter } = setup(60);
    await limiter.recordPollAttempt(T0);
    store.lastPollTime = T0 + 30;
    await expect(limiter.nextPollAt()).resolves.toBe(T0 + 90);
    store.lastPollTime = T0 - 30;
    await expect(limiter.nextPollAt()).resolves.toBe(T0 + 60);
  });

  it('overwrites the stored time unconditionally', async () => {
    const { store, limiter } = setup();
    store.lastPollTime = T0 + 999;
    await limiter.recordPollAttempt(T0 - 5);
    expect(store.lastPollTime).toBe(T0 - 5);
  });
});

describe('sleep', () => {
  it('resolves early and quietly on abort', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    const started = Date.now();
    await expect(sleep(5_000, controller.signal)).resolves.toBeUndefined();
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('returns immediately for an already aborted signal', async () => {
    await expect(sleep(5_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
