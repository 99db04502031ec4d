import { unixSeconds } from '@location-bridge/domain';
import type { ClockPort, Logger, PollMetadataPort } from '@location-bridge/domain';
import { sleep as defaultSleep } from './sleep.js';
import type { SleepFn } from './sleep.js';

/** Longest single sleep; bounds how long a shutdown waits on the limiter. */
export const MAX_SLEEP_STEP_MS = 1_000;

export interface PollRateLimiterOptions {
  metadata: PollMetadataPort;
  clock: ClockPort;
  pollingIntervalSec: number;
  logger: Logger;
  sleep?: SleepFn;
}

/**
 * Gates upstream polls to one per interval, using the last attempt time kept
 * in durable metadata so the gate holds across restarts. Attempts count the
 * same as successes, so a failing upstream is not polled in a crash loop.
 */
export class PollRateLimiter {
  readonly pollingIntervalSec: number;
  private readonly metadata: PollMetadataPort;
  private readonly clock: ClockPort;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  /** Last attempt seen by this process; holds the gate if the durable write failed. */
  private lastAttempt: number | null = null;

  constructor(opts: PollRateLimiterOptions) {
    this.metadata = opts.metadata;
    this.clock = opts.clock;
    this.pollingIntervalSec = opts.pollingIntervalSec;
    this.logger = opts.logger;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /** Unix seconds at which the next poll is allowed; null when none was ever recorded. */
  async nextPollAt(): Promise<number | null> {
    const stored = await this.metadata.getLastPollTime();
    const last = stored === null ? this.lastAttempt : Math.max(stored, this.lastAttempt ?? stored);
    return last === null ? null : last + this.pollingIntervalSec;
  }

  /**
   * Waits until `pollingIntervalSec` has elapsed since the last recorded attempt.
   * Sleeps in steps of at most MAX_SLEEP_STEP_MS and checks `signal` between
   * steps. Resolves `true` when a poll is due, `false` when aborted first.
   */
  async blockUntilNextPoll(signal?: AbortSignal): Promise<boolean> {
    const dueAt = await this.nextPollAt();
    if (dueAt === null) return !signal?.aborted;

    const dueAtMs = dueAt * 1000;
    let announced = false;
    for (;;) {
      if (signal?.aborted) return false;
      const remainingMs = dueAtMs - this.clock.now().getTime();
      if (remainingMs <= 0) return true;
      if (!announced) {
        this.logger.info(`next poll in ${Math.ceil(remainingMs / 1000)}s`, {
          at: new Date(dueAtMs).toISOString(),
        });
        announced = true;
      }
      await this.sleep(Math.min(MAX_SLEEP_STEP_MS, remainingMs), signal);
    }
  }

  /**
   * Records an attempt; called after every fetch, whatever its outcome.
   * The attempt gates this process even when the durable write rejects.
   */
  async recordPollAttempt(now: number = unixSeconds(this.clock)): Promise<void> {
    this.lastAttempt = now;
    await this.metadata.setLastPollTime(now);
  }
}
