import { countReports, transientFailure, unixSeconds } from '@location-bridge/domain';
import type {
  ClockPort,
  DeliveryLedgerPort,
  DeliverySummary,
  DeviceRef,
  IngestSummary,
  LocationPusherPort,
  LocationStorePort,
  Logger,
  Observation,
  ReconciliationPort,
  TickSummary,
  UpstreamFetchResult,
  UpstreamLocationSourcePort,
} from '@location-bridge/domain';
import type { PollRateLimiter } from './poll-rate-limiter.js';
import { sleep as defaultSleep } from './sleep.js';
import type { SleepFn } from './sleep.js';

/** Pause after a tick that failed as a whole (e.g. database unreachable). */
const FAILED_TICK_PAUSE_MS = 5_000;

export interface ReconciliationLoopDeps {
  devices: readonly DeviceRef[];
  source: UpstreamLocationSourcePort;
  locations: LocationStorePort;
  ledger: DeliveryLedgerPort;
  limiter: PollRateLimiter;
  pushers: readonly LocationPusherPort[];
  clock: ClockPort;
  logger: Logger;
  sleep?: SleepFn;
  failedTickPauseMs?: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function emptyIngest(): IngestSummary {
  return {
    polled: false,
    fetchFailed: false,
    reportsReceived: 0,
    observationsAdded: 0,
    duplicatesIgnored: 0,
    storeErrors: 0,
  };
}

/**
 * Reconciliation Loop
 *
 * One tick = ingest, then deliver:
 * - ingest(): wait for the poll window, fetch every configured device, record
 *   the attempt, store new observations (duplicates are no-ops).
 * - deliver(): for each device, then each endpoint, push the pending set in
 *   timestamp order and record each success in the ledger.
 *
 * Failed pushes stay pending and are retried on every tick with no limit.
 * Failures are contained to the item or (device, endpoint) pair they hit.
 */
export class ReconciliationLoop implements ReconciliationPort {
  private readonly deps: ReconciliationLoopDeps;
  private readonly sleep: SleepFn;
  private readonly failedTickPauseMs: number;

  constructor(deps: ReconciliationLoopDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
    this.failedTickPauseMs = deps.failedTickPauseMs ?? FAILED_TICK_PAUSE_MS;
  }

  async ingest(signal?: AbortSignal): Promise<IngestSummary> {
    const { devices, source, locations, limiter, clock, logger } = this.deps;
    const summary = emptyIngest();

    if (!(await limiter.blockUntilNextPoll(signal))) return summary;

    let result: UpstreamFetchResult;
    try {
      result = await source.fetchReports(devices);
    } catch (err) {
      result = transientFailure(`upstream source threw: ${errorMessage(err)}`, err);
    }
    try {
      await limiter.recordPollAttempt(unixSeconds(clock));
    } catch (err) {
      logger.error('could not record poll time', { error: errorMessage(err) });
    }
    summary.polled = true;

    if (result.kind === 'transient_failure') {
      summary.fetchFailed = true;
      logger.error(`upstream poll failed: ${result.reason}`);
      return summary;
    }

    summary.reportsReceived = countReports(result);
    logger.info(`upstream polled, next poll in ${limiter.pollingIntervalSec}s`, {
      reports: summary.reportsReceived,
    });

    for (const [deviceId, reports] of result.reports) {
      logger.info(`received ${reports.length} locations for device ${deviceId}`);
      for (const report of reports) {
        try {
          const added = await locations.addLocation(
            deviceId,
            report.timestamp,
            report.latitude,
            report.longitude,
          );
          if (added) summary.observationsAdded++;
          else summary.duplicatesIgnored++;
        } catch (err) {
          summary.storeErrors++;
          logger.error(`could not store location for device ${deviceId}`, {
            timestamp: report.timestamp,
            error: errorMessage(err),
          });
        }
      }
    }
    return summary;
  }

  async deliver(signal?: AbortSignal): Promise<DeliverySummary> {
    const { devices, pushers, locations, ledger, logger } = this.deps;
    const summary: DeliverySummary = { pendingSeen: 0, delivered: 0, failed: 0, pairErrors: 0 };

    for (const device of devices) {
      for (const pusher of pushers) {
        if (signal?.aborted) return summary;

        let pending: Observation[];
        try {
          pending = await locations.getPending(device.id, pusher.endpointId);
        } catch (err) {
          summary.pairErrors++;
          logger.error(`could not read pending locations for device ${device.id}`, {
            endpoint: pusher.address,
            error: errorMessage(err),
          });
          continue;
        }
        summary.pendingSeen += pending.length;
        logger.debug(`found ${pending.length} pending locations for device ${device.id}`, {
          endpoint: pusher.address,
        });

        for (const observation of pending) {
          let accepted = false;
          try {
            accepted = await pusher.push(observation);
          } catch (err) {
            logger.warn(`pusher for ${pusher.address} threw`, {
              deviceId: device.id,
              timestamp: observation.timestamp,
              error: errorMessage(err),
            });
          }
          if (!accepted) {
            summary.failed++;
            continue;
          }

          try {
            await ledger.markDelivered(device.id, pusher.endpointId, observation.timestamp);
            summary.delivered++;
          } catch (err) {
            // pushed but not recorded: it is pushed again next tick
            summary.failed++;
            logger.error(`could not record delivery for device ${device.id}`, {
              endpoint: pusher.address,
              timestamp: observation.timestamp,
              error: errorMessage(err),
            });
          }
        }
      }
    }
    return summary;
  }

  async tick(signal?: AbortSignal): Promise<TickSummary> {
    const ingest = await this.ingest(signal);
    const delivery = await this.deliver(signal);
    if (ingest.polled) {
      this.deps.logger.info('tick complete', { ...ingest, ...delivery });
    }
    return { ingest, delivery };
  }

  async run(signal: AbortSignal): Promise<void> {
    const { devices, pushers, logger } = this.deps;
    logger.info(`starting with ${devices.length} device(s) and ${pushers.length} endpoint(s)`);

    while (!signal.aborted) {
      try {
        await this.tick(signal);
      } catch (err) {
        logger.error('tick failed', { error: errorMessage(err) });
        await this.sleep(this.failedTickPauseMs, signal);
      }
    }
    logger.info('stopped');
  }
}
