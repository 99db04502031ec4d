/** A single location fix as reported upstream. `timestamp` is unix seconds. */
export interface RawReport {
  readonly timestamp: number;
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * A stored location fix. Unique by (deviceId, timestamp); written once and
 * never updated. Coordinates are kept exactly as the upstream reported them.
 */
export interface Observation {
  readonly deviceId: number;
  readonly timestamp: number;
  readonly lat: number;
  readonly lon: number;
}
