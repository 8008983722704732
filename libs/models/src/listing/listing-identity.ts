import { createHash } from 'crypto';
import { GENERATED_ID_DIGEST_BYTES, GENERATED_ID_MARKER } from '@libs/common';

export type IdentitySource = {
  id: string;
  areaM2: number;
  address: string;
};

/**
 * Deterministic fallback id for listings the portal publishes without one.
 * The same unit (same size, same address) yields the same id across runs.
 */
export function generateId(areaM2: number, address: string): string {
  const digest = createHash('shake128', { outputLength: GENERATED_ID_DIGEST_BYTES })
    .update(`${areaM2} ${address}`)
    .digest('hex');

  return `${GENERATED_ID_MARKER}${digest}`.toUpperCase();
}

export function resolveId(listing: IdentitySource): string {
  return listing.id !== '' ? listing.id : generateId(listing.areaM2, listing.address);
}

export function isGeneratedId(id: string): boolean {
  return id.startsWith(GENERATED_ID_MARKER);
}
