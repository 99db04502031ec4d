import 'dotenv/config';
import {
  applySchema,
  closePool,
  createConsoleLogger,
  createPool,
  PgDeliveryLedger,
  PgLocationStore,
  PgPollMetadataStore,
  RecordingLocationSource,
  ReplayFileLocationSource,
  SystemClock,
  TraccarLocationPusher,
} from '@location-bridge/adapters';
import type { UpstreamLocationSourcePort } from '@location-bridge/domain';
import { loadBridgeConfig } from './config/bridge-config.js';
import type { BridgeConfig } from './config/bridge-config.js';
import { PollRateLimiter } from './services/poll-rate-limiter.js';
import { ReconciliationLoop } from './services/reconciliation-loop.js';

/**
 * Location bridge process.
 *
 * Env vars: see `loadBridgeConfig`. A `.env` file in the working directory is
 * read first. SIGTERM / SIGINT stop the loop within about a second.
 */

function buildSource(config: BridgeConfig): UpstreamLocationSourcePort {
  const replay = new ReplayFileLocationSource(config.replayFile);
  if (!config.recordFile) return replay;
  return new RecordingLocationSource(
    replay,
    config.recordFile,
    createConsoleLogger('recorder', config.logLevel),
  );
}

async function main(): Promise<void> {
  const config = loadBridgeConfig(process.env);
  const level = config.logLevel;
  const log = createConsoleLogger('bridge', level);

  const pool = createPool({ connectionString: config.databaseUrl }, createConsoleLogger('pg-pool', level));
  await applySchema(pool, createConsoleLogger('schema', level));
  log.info('database ready');

  const clock = new SystemClock();
  const pushers = config.endpoints.map(
    (address) =>
      new TraccarLocationPusher({
        address,
        timeoutMs: config.pushTimeoutMs,
        logger: createConsoleLogger('traccar', level),
      }),
  );
  for (const pusher of pushers) {
    log.info(`endpoint ${pusher.address} has id ${pusher.endpointId}`);
  }

  const loop = new ReconciliationLoop({
    devices: config.devices,
    source: buildSource(config),
    locations: new PgLocationStore(pool, createConsoleLogger('location-store', level)),
    ledger: new PgDeliveryLedger(pool, createConsoleLogger('delivery-ledger', level)),
    limiter: new PollRateLimiter({
      metadata: new PgPollMetadataStore(pool),
      clock,
      pollingIntervalSec: config.pollingIntervalSec,
      logger: createConsoleLogger('poll-limiter', level),
    }),
    pushers,
    clock,
    logger: createConsoleLogger('reconciliation', level),
  });

  const controller = new AbortController();
  const shutdown = (sig: NodeJS.Signals) => {
    log.info(`received ${sig}, shutting down...`);
    controller.abort();
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  try {
    await loop.run(controller.signal);
  } finally {
    await closePool(pool);
  }
}

main().catch((err) => {
  console.error('[bridge] fatal startup error', err instanceof Error ? err.message : err);
  process.exit(1);
});
