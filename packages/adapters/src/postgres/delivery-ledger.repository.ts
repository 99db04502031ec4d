import type { DeliveryLedgerPort, Logger } from '@location-bridge/domain';
import type { Queryable } from './pool.js';

export class PgDeliveryLedger implements DeliveryLedgerPort {
  constructor(
    private readonly db: Queryable,
    private readonly logger: Logger,
  ) {}

  async markDelivered(deviceId: number, endpointId: number, timestamp: number): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `INSERT INTO bridge.deliveries (device_id, endpoint_id, ts)
       VALUES ($1, $2, $3)
       ON CONFLICT (device_id, endpoint_id, ts) DO NOTHING`,
      [deviceId, endpointId, timestamp],
    );
    const inserted = (rowCount ?? 0) > 0;
    if (inserted) {
      this.logger.debug(`marked timestamp ${timestamp} as pushed`, { deviceId, endpointId });
    } else {
      this.logger.debug(`timestamp ${timestamp} already marked as pushed`, { deviceId, endpointId });
    }
    return inserted;
  }
}
