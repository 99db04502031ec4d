import type { DeviceRef } from '../../entities/device-ref.js';
import type { UpstreamFetchResult } from '../../entities/upstream-fetch-result.js';

/**
 * Supplies current reports for a set of devices. Implementations report
 * auth, network and protocol problems as a transient failure instead of throwing.
 */
export interface UpstreamLocationSourcePort {
  fetchReports(devices: readonly DeviceRef[]): Promise<UpstreamFetchResult>;
}
