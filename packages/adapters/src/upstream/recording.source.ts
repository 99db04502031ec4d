import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type {
  DeviceRef,
  Logger,
  UpstreamFetchResult,
  UpstreamLocationSourcePort,
} from '@location-bridge/domain';
import type { ReplayFile } from './replay-file.source.js';

/**
 * Decorates another source and writes every successful result to `filePath`
 * in the replay format, so the session can be fed back through
 * `ReplayFileLocationSource`. A failed write is logged; the result still
 * reaches the caller.
 */
export class RecordingLocationSource implements UpstreamLocationSourcePort {
  constructor(
    private readonly inner: UpstreamLocationSourcePort,
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  async fetchReports(devices: readonly DeviceRef[]): Promise<UpstreamFetchResult> {
    const result = await this.inner.fetchReports(devices);
    if (result.kind !== 'success') return result;

    const snapshot: ReplayFile = {};
    for (const [deviceId, reports] of result.reports) {
      snapshot[String(deviceId)] = reports.map((r) => ({
        timestamp: r.timestamp,
        latitude: r.latitude,
        longitude: r.longitude,
      }));
    }

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(snapshot, null, 2), 'utf-8');
      this.logger.debug(`recorded fetch result to ${this.filePath}`);
    } catch (err) {
      this.logger.warn(`could not record fetch result to ${this.filePath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return result;
  }
}
