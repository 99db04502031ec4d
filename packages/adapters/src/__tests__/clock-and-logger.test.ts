import { describe, it, expect, afterEach, jest } from '@jest/globals';
import { DeterministicClock, SystemClock } from '../clock/deterministic-clock.js';
import { createConsoleLogger } from '../logging/console-logger.js';

describe('DeterministicClock', () => {
  it('stays frozen until advanced when tickMs is 0', () => {
    const clock = new DeterministicClock(1_000_000);
    expect(clock.now().getTime()).toBe(1_000_000);
    expect(clock.now().getTime()).toBe(1_000_000);
    clock.advance(1_500);
    expect(clock.peek().getTime()).toBe(1_001_500);
  });

  it('advances by tickMs on each now()', () => {
    const clock = new DeterministicClock(0, 1_000);
    expect(clock.now().getTime()).toBe(0);
    expect(clock.now().getTime()).toBe(1_000);
    expect(clock.peek().getTime()).toBe(2_000);
  });

  it('SystemClock returns the wall clock', () => {
    const before = Date.now();
    const t = new SystemClock().now().getTime();
    expect(t).toBeGreaterThanOrEqual(before);
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prefixes the tag and appends extras as JSON', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    createConsoleLogger('bridge').info('started', { devices: 2 });
    expect(spy).toHaveBeenCalledWith('[bridge] started {"devices":2}');
  });

  it('drops messages below the configured level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createConsoleLogger('bridge', 'warn');

    logger.debug('noise');
    logger.warn('careful');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[bridge] careful');
  });
});
