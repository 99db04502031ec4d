import { z } from 'zod';
import type { LocationStorePort, Observation, Logger } from '@location-bridge/domain';
import type { Queryable } from './pool.js';

// BIGINT columns come back from pg as strings.
const observationRowSchema = z.object({
  device_id: z.coerce.number().int(),
  ts: z.coerce.number().int(),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
});

export class PgLocationStore implements LocationStorePort {
  constructor(
    private readonly db: Queryable,
    private readonly logger: Logger,
  ) {}

  async addLocation(deviceId: number, timestamp: number, lat: number, lon: number): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `INSERT INTO bridge.observations (device_id, ts, lat, lon)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (device_id, ts) DO NOTHING`,
      [deviceId, timestamp, lat, lon],
    );
    const inserted = (rowCount ?? 0) > 0;
    if (inserted) {
      this.logger.debug('stored location', { deviceId, timestamp, lat, lon });
    } else {
      this.logger.debug('location already exists', { deviceId, timestamp });
    }
    return inserted;
  }

  async getPending(deviceId: number, endpointId: number): Promise<Observation[]> {
    const { rows } = await this.db.query(
      `SELECT o.device_id, o.ts, o.lat, o.lon
       FROM bridge.observations o
       WHERE o.device_id = $1
         AND NOT EXISTS (
           SELECT 1 FROM bridge.deliveries d
           WHERE d.device_id = o.device_id
             AND d.endpoint_id = $2
             AND d.ts = o.ts
         )
       ORDER BY o.ts ASC`,
      [deviceId, endpointId],
    );
    return rows.map(mapObservationRow);
  }
}

function mapObservationRow(row: unknown): Observation {
  const r = observationRowSchema.parse(row);
  return { deviceId: r.device_id, timestamp: r.ts, lat: r.lat, lon: r.lon };
}
