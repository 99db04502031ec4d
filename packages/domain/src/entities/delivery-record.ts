/** Proof that an observation reached one endpoint. Unique by all three fields. */
export interface DeliveryRecord {
  readonly deviceId: number;
  readonly endpointId: number;
  readonly timestamp: number;
}
