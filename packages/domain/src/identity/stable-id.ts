import { createHash } from 'node:crypto';

/** Exclusive upper bound of every derived id. */
export const STABLE_ID_RANGE = 1_000_000;

/**
 * Maps identity material (a device key, an endpoint address) to an integer in
 * [0, STABLE_ID_RANGE). SHA-256 of the UTF-8 input, first 64 bits, modulo the range.
 */
export function deriveStableId(material: string): number {
  const hex = createHash('sha256').update(material, 'utf8').digest('hex');
  return Number(BigInt(`0x${hex.slice(0, 16)}`) % BigInt(STABLE_ID_RANGE));
}
