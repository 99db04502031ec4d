// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { createPool, closePool } from './postgres/pool.js';
export type { DbPool, Queryable, PoolOptions } from './postgres/pool.js';
export { applySchema, splitStatements } from './postgres/schema.js';
export { PgLocationStore } from './postgres/location-store.repository.js';
export { PgDeliveryLedger } from './postgres/delivery-ledger.repository.js';
export { PgPollMetadataStore } from './postgres/poll-metadata.repository.js';

// ─── HTTP Pushers ─────────────────────────────────────────────────────────────
export {
  TraccarLocationPusher,
  buildTraccarPayload,
  toEndpointUrl,
  UNCLAIMED_DEVICE_STATUS,
} from './http/traccar-location.pusher.js';
export type { TraccarPusherOptions } from './http/traccar-location.pusher.js';

// ─── Upstream Sources ─────────────────────────────────────────────────────────
export {
  ReplayFileLocationSource,
  replayFileSchema,
  rawReportSchema,
} from './upstream/replay-file.source.js';
export type { ReplayFile } from './upstream/replay-file.source.js';
export { RecordingLocationSource } from './upstream/recording.source.js';

// ─── Clock / Logging ──────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/deterministic-clock.js';
export { createConsoleLogger } from './logging/console-logger.js';
