import type { ClockPort } from '@location-bridge/domain';

/**
 * Deterministic clock for tests and replays.
 * Starts at `epochMs` and advances by `tickMs` on each `now()` call (0 = frozen
 * until `advance` is called).
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

/** Wall-clock implementation for live mode. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
