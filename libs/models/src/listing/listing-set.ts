import { Listing } from './listing.model';

/**
 * Insertion-ordered set of listings keyed by {@link Listing.identityKey}.
 * Adding a listing whose key is already present keeps the first one.
 */
export class ListingSet implements Iterable<Listing> {
  private readonly items = new Map<string, Listing>();

  public constructor(listings: Iterable<Listing> = []) {
    for (const listing of listings) {
      this.add(listing);
    }
  }

  public add(listing: Listing): boolean {
    const key = listing.identityKey;
    if (this.items.has(key)) {
      return false;
    }
    this.items.set(key, listing);
    return true;
  }

  public has(listing: Listing): boolean {
    return this.items.has(listing.identityKey);
  }

  public get size(): number {
    return this.items.size;
  }

  public values(): Listing[] {
    return [...this.items.values()];
  }

  public [Symbol.iterator](): Iterator<Listing> {
    return this.items.values();
  }
}

/**
 * Keeps one listing per (portal, id): the one with the later dateListed,
 * or the last one seen when both carry the same date.
 */
export function dedupeByPortalId(listings: Iterable<Listing>): Listing[] {
  const byId = new Map<string, Listing>();

  for (const listing of listings) {
    const key = JSON.stringify([listing.portal, listing.id]);
    const existing = byId.get(key);
    if (existing && existing.dateListed > listing.dateListed) {
      continue;
    }
    byId.set(key, listing);
  }

  return [...byId.values()];
}
