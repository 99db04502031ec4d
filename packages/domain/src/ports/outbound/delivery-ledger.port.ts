export interface DeliveryLedgerPort {
  /** Resolves `false` when the delivery was already recorded. */
  markDelivered(deviceId: number, endpointId: number, timestamp: number): Promise<boolean>;
}
