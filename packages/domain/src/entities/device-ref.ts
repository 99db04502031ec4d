export interface DeviceRef {
  /** Derived from `identity` with `deriveStableId`. */
  readonly id: number;
  /** Public identity material the device is configured with. */
  readonly identity: string;
}
