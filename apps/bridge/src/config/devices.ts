import { ConfigurationError, deriveStableId } from '@location-bridge/domain';
import type { DeviceRef } from '@location-bridge/domain';

/**
 * Turns configured identity strings into device refs. Repeated identities
 * collapse into one device; two identities landing on the same id are refused,
 * since their locations would be merged under one device.
 */
export function loadDevices(identities: readonly string[]): DeviceRef[] {
  const byId = new Map<number, DeviceRef>();
  const collisions: string[] = [];

  for (const identity of identities) {
    const id = deriveStableId(identity);
    const existing = byId.get(id);
    if (existing === undefined) {
      byId.set(id, { id, identity });
    } else if (existing.identity !== identity) {
      collisions.push(`device id ${id} derived from more than one identity`);
    }
  }

  if (collisions.length > 0) {
    throw new ConfigurationError('Conflicting device identities', collisions);
  }
  return [...byId.values()];
}
