import type { Observation } from '../../entities/observation.js';

export interface LocationStorePort {
  /**
   * Stores a fix. Resolves `false` when (deviceId, timestamp) is already known;
   * the stored row is left untouched in that case.
   */
  addLocation(deviceId: number, timestamp: number, lat: number, lon: number): Promise<boolean>;
  /** Observations of `deviceId` not yet delivered to `endpointId`, oldest first. */
  getPending(deviceId: number, endpointId: number): Promise<Observation[]>;
}
