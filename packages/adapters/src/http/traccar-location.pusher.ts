import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { deriveStableId } from '@location-bridge/domain';
import type { LocationPusherPort, Observation, Logger } from '@location-bridge/domain';

const DEFAULT_TIMEOUT_MS = 10_000;

/** Status the receiving side answers with while a device id is not yet claimed. */
export const UNCLAIMED_DEVICE_STATUS = 400;

export interface TraccarPusherOptions {
  /** Endpoint address as configured; also the input of the endpoint id. */
  address: string;
  logger: Logger;
  timeoutMs?: number;
  /** Custom undici dispatcher (connection pool, proxy, MockAgent). */
  dispatcher?: Dispatcher;
}

/** Adds `https://` to addresses configured without a scheme. */
export function toEndpointUrl(address: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(address) ? address : `https://${address}`;
}

/** OsmAnd-style form body: exactly id, timestamp, lat, lon. */
export function buildTraccarPayload(observation: Observation): string {
  return new URLSearchParams({
    id: String(observation.deviceId),
    timestamp: String(observation.timestamp),
    lat: String(observation.lat),
    lon: String(observation.lon),
  }).toString();
}

/**
 * Pushes single observations to a Traccar server (OsmAnd protocol, form POST).
 *
 * 2xx is success. A 400 means the device id is not claimed on the server yet;
 * that resolves only after an operator registers the device, so it is logged
 * at info when a device starts or stops being rejected and at debug otherwise.
 * Anything else is unexpected and logged as a warning. Every failure resolves
 * `false` so the observation stays pending.
 */
export class TraccarLocationPusher implements LocationPusherPort {
  readonly address: string;
  readonly endpointId: number;
  private readonly url: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly rejectedDevices = new Set<number>();

  constructor(opts: TraccarPusherOptions) {
    this.address = opts.address;
    this.endpointId = deriveStableId(opts.address);
    this.url = toEndpointUrl(opts.address);
    this.logger = opts.logger;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.dispatcher = opts.dispatcher;
  }

  /** Device ids currently answered with 400 by this endpoint. */
  get unclaimedDevices(): ReadonlySet<number> {
    return this.rejectedDevices;
  }

  async push(observation: Observation): Promise<boolean> {
    const payload = buildTraccarPayload(observation);

    let status: number;
    let text: string;
    try {
      const resp = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: payload,
        signal: AbortSignal.timeout(this.timeoutMs),
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      status = resp.status;
      text = await resp.text();
    } catch (err) {
      this.logger.warn(`failed to push location to ${this.address}`, {
        deviceId: observation.deviceId,
        timestamp: observation.timestamp,
        error: err instanceof Error ? `${err.name}: ${err.message}` : String(err),
      });
      return false;
    }

    if (status >= 200 && status < 300) {
      if (this.rejectedDevices.delete(observation.deviceId)) {
        this.logger.info(`device ${observation.deviceId} is now accepted by ${this.address}`);
      }
      this.logger.debug(`pushed location ${payload} to ${this.address}`);
      return true;
    }

    if (status === UNCLAIMED_DEVICE_STATUS) {
      if (!this.rejectedDevices.has(observation.deviceId)) {
        this.rejectedDevices.add(observation.deviceId);
        this.logger.info(
          `device ${observation.deviceId} rejected by ${this.address}; register it on the server, retrying every tick`,
          { unclaimedDevices: [...this.rejectedDevices] },
        );
      } else {
        this.logger.debug(`device ${observation.deviceId} still unclaimed at ${this.address}`, {
          timestamp: observation.timestamp,
        });
      }
      return false;
    }

    this.logger.warn(`unexpected response ${status} from ${this.address}`, {
      deviceId: observation.deviceId,
      timestamp: observation.timestamp,
      body: text.slice(0, 200),
    });
    return false;
  }
}
