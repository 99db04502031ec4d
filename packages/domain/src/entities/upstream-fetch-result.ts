import type { RawReport } from './observation.js';

export interface UpstreamFetchSuccess {
  readonly kind: 'success';
  /** Reports keyed by device id. A device with no new fixes maps to `[]`. */
  readonly reports: ReadonlyMap<number, readonly RawReport[]>;
}

export interface UpstreamTransientFailure {
  readonly kind: 'transient_failure';
  readonly reason: string;
  readonly cause?: unknown;
}

export type UpstreamFetchResult = UpstreamFetchSuccess | UpstreamTransientFailure;

export function fetchSuccess(
  reports: ReadonlyMap<number, readonly RawReport[]>,
): UpstreamFetchSuccess {
  return { kind: 'success', reports };
}

export function transientFailure(reason: string, cause?: unknown): UpstreamTransientFailure {
  return cause === undefined
    ? { kind: 'transient_failure', reason }
    : { kind: 'transient_failure', reason, cause };
}

export function countReports(result: UpstreamFetchSuccess): number {
  let total = 0;
  for (const reports of result.reports.values()) total += reports.length;
  return total;
}
