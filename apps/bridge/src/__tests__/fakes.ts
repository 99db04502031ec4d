/**
 * In-process stand-ins for the outbound ports, shared by the bridge tests.
 */

import { jest } from '@jest/globals';
import { DeterministicClock } from '@location-bridge/adapters';
import { fetchSuccess } from '@location-bridge/domain';
import type {
  DeliveryLedgerPort,
  LocationPusherPort,
  LocationStorePort,
  Logger,
  Observation,
  PollMetadataPort,
  RawReport,
  UpstreamFetchResult,
  UpstreamLocationSourcePort,
} from '@location-bridge/domain';
import type { SleepFn } from '../services/sleep.js';

/** Location store, delivery ledger and poll metadata over plain maps. */
export class InMemoryBridgeStore implements LocationStorePort, DeliveryLedgerPort, PollMetadataPort {
  readonly observations = new Map<string, Observation>();
  readonly deliveries = new Set<string>();
  lastPollTime: number | null = null;

  async addLocation(deviceId: number, timestamp: number, lat: number, lon: number): Promise<boolean> {
    const key = `${deviceId}:${timestamp}`;
    if (this.observations.has(key)) return false;
    this.observations.set(key, { deviceId, timestamp, lat, lon });
    return true;
  }

  async getPending(deviceId: number, endpointId: number): Promise<Observation[]> {
    return [...this.observations.values()]
      .filter((o) => o.deviceId === deviceId)
      .filter((o) => !this.deliveries.has(`${deviceId}:${endpointId}:${o.timestamp}`))
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  async markDelivered(deviceId: number, endpointId: number, timestamp: number): Promise<boolean> {
    const key = `${deviceId}:${endpointId}:${timestamp}`;
    if (this.deliveries.has(key)) return false;
    this.deliveries.add(key);
    return true;
  }

  async getLastPollTime(): Promise<number | null> {
    return this.lastPollTime;
  }

  async setLastPollTime(unixSeconds: number): Promise<void> {
    this.lastPollTime = unixSeconds;
  }
}

/** Upstream source answering from a queue of canned results; empty queue = no reports. */
export class ScriptedSource implements UpstreamLocationSourcePort {
  readonly calls: number[][] = [];
  private readonly script: Array<UpstreamFetchResult | Error> = [];

  enqueue(...results: Array<UpstreamFetchResult | Error>): this {
    this.script.push(...results);
    return this;
  }

  async fetchReports(devices: readonly { id: number }[]): Promise<UpstreamFetchResult> {
    this.calls.push(devices.map((d) => d.id));
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    return next ?? fetchSuccess(new Map(devices.map((d) => [d.id, []])));
  }
}

export function reportsOf(entries: Array<[number, RawReport[]]>): UpstreamFetchResult {
  return fetchSuccess(new Map(entries));
}

/** Pusher whose answer per call is decided by `decide`; records every push. */
export class FakePusher implements LocationPusherPort {
  readonly pushed: Observation[] = [];

  constructor(
    readonly endpointId: number,
    private readonly decide: (obs: Observation, attempt: number) => boolean = () => true,
    readonly address: string = `http://sink-${endpointId}.test`,
  ) {}

  async push(observation: Observation): Promise<boolean> {
    this.pushed.push(observation);
    return this.decide(observation, this.pushed.length);
  }
}

export function makeLogger() {
  return {
    debug: jest.fn<Logger['debug']>(),
    info: jest.fn<Logger['info']>(),
    warn: jest.fn<Logger['warn']>(),
    error: jest.fn<Logger['error']>(),
  };
}

/** Sleep that advances a deterministic clock instead of waiting. */
export function clockSleep(clock: DeterministicClock, steps: number[] = []): SleepFn {
  return async (ms) => {
    steps.push(ms);
    clock.advance(ms);
  };
}
