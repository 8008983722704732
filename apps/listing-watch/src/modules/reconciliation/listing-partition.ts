import { Listing } from '@libs/models';

export interface ListingPartition {
  newListings: Listing[];
  expiredListings: Listing[];
  unchanged: Listing[];
}

/**
 * Splits a scrape against the previously active listings by content equality.
 * `unchanged` holds the scraped side of the intersection.
 */
export function partitionListings(scraped: readonly Listing[], previouslyActive: readonly Listing[]): ListingPartition {
  const scrapedKeys = new Set(scraped.map((listing) => listing.contentKey));
  const activeKeys = new Set(previouslyActive.map((listing) => listing.contentKey));

  return {
    newListings: scraped.filter((listing) => !activeKeys.has(listing.contentKey)),
    expiredListings: previouslyActive.filter((listing) => !scrapedKeys.has(listing.contentKey)),
    unchanged: scraped.filter((listing) => activeKeys.has(listing.contentKey)),
  };
}
