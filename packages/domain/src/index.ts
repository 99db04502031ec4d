// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/observation.js';
export * from './entities/delivery-record.js';
export * from './entities/device-ref.js';
export * from './entities/upstream-fetch-result.js';

// ─── Identity / Errors ────────────────────────────────────────────────────────
export * from './identity/stable-id.js';
export * from './errors/configuration-error.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/reconciliation.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/location-store.port.js';
export * from './ports/outbound/delivery-ledger.port.js';
export * from './ports/outbound/poll-metadata.port.js';
export * from './ports/outbound/upstream-location-source.port.js';
export * from './ports/outbound/location-pusher.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/logger.port.js';
