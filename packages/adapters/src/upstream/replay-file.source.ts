import { readFile } from 'fs/promises';
import { z } from 'zod';
import { fetchSuccess, transientFailure } from '@location-bridge/domain';
import type {
  DeviceRef,
  RawReport,
  UpstreamFetchResult,
  UpstreamLocationSourcePort,
} from '@location-bridge/domain';

export const rawReportSchema = z.object({
  timestamp: z.number().int(),
  latitude: z.number(),
  longitude: z.number(),
});

/** `{ "<device id or identity>": [RawReport, ...] }` */
export const replayFileSchema = z.record(z.array(rawReportSchema));

export type ReplayFile = z.infer<typeof replayFileSchema>;

// Own keys only: an identity like "constructor" must not hit Object.prototype.
function entryFor(content: ReplayFile, key: string): RawReport[] | undefined {
  return Object.hasOwn(content, key) ? content[key] : undefined;
}

/**
 * Upstream source that answers every fetch from a JSON snapshot on disk.
 * Entries are matched by numeric device id first, then by identity string.
 * The file is re-read on each fetch so it can be swapped while running.
 */
export class ReplayFileLocationSource implements UpstreamLocationSourcePort {
  constructor(private readonly filePath: string) {}

  async fetchReports(devices: readonly DeviceRef[]): Promise<UpstreamFetchResult> {
    let content: ReplayFile;
    try {
      const raw = await readFile(this.filePath, 'utf-8');
      content = replayFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return transientFailure(`replay file ${this.filePath} unusable: ${msg}`, err);
    }

    const reports = new Map<number, RawReport[]>();
    for (const device of devices) {
      const entry = entryFor(content, String(device.id)) ?? entryFor(content, device.identity);
      reports.set(device.id, entry ?? []);
    }
    return fetchSuccess(reports);
  }
}
