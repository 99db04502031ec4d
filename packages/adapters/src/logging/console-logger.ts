import type { Logger, LogLevel } from '@location-bridge/domain';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Console logger with a `[tag]` prefix. Messages below `level` are dropped;
 * extras are appended as JSON.
 */
export function createConsoleLogger(tag: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const format = (msg: string, extra?: Record<string, unknown>): string =>
    extra ? `[${tag}] ${msg} ${JSON.stringify(extra)}` : `[${tag}] ${msg}`;

  return {
    debug: (msg, extra) => {
      if (threshold <= LEVEL_ORDER.debug) console.debug(format(msg, extra));
    },
    info: (msg, extra) => {
      if (threshold <= LEVEL_ORDER.info) console.log(format(msg, extra));
    },
    warn: (msg, extra) => {
      if (threshold <= LEVEL_ORDER.warn) console.warn(format(msg, extra));
    },
    error: (msg, extra) => {
      if (threshold <= LEVEL_ORDER.error) console.error(format(msg, extra));
    },
  };
}
