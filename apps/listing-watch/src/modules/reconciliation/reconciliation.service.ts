import { Injectable, Logger } from '@nestjs/common';
import { epochSeconds, Portal } from '@libs/common';
import { ListingRepository } from '@libs/database';
import { dedupeByPortalId, Listing, ListingSet } from '@libs/models';
import { BatchValidator } from './batch-validator.service';
import { partitionListings } from './listing-partition';

export type ReconciliationStatus = 'merged' | 'rejected';

export interface ReconciliationResult {
  portal: Portal;
  status: ReconciliationStatus;
  scrapedCount: number;
  newListings: Listing[];
  expiredListings: Listing[];
  unchangedCount: number;
  failedCount: number;
}

/**
 * Merges one portal's scrape into the store: listings seen for the first time
 * are inserted, active listings missing from the scrape are marked unlisted.
 */
@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);

  public constructor(
    private readonly listingRepository: ListingRepository,
    private readonly batchValidator: BatchValidator,
  ) {}

  public async reconcile(portal: Portal, scraped: readonly Listing[], now: number = epochSeconds()): Promise<ReconciliationResult> {
    const result: ReconciliationResult = {
      portal,
      status: 'rejected',
      scrapedCount: scraped.length,
      newListings: [],
      expiredListings: [],
      unchangedCount: 0,
      failedCount: 0,
    };

    const validation = this.batchValidator.validate(scraped);
    if (!validation.valid) {
      this.logger.warn(
        `Rejected ${portal} batch of ${scraped.length} listings: none of ${validation.sampleSize} sampled has an address`,
      );
      return result;
    }

    const ownListings = scraped.filter((listing) => listing.portal === portal);
    if (ownListings.length < scraped.length) {
      this.logger.warn(`Ignoring ${scraped.length - ownListings.length} listings of other portals in ${portal} batch`);
    }

    const unique = dedupeByPortalId(new ListingSet(ownListings));
    const previouslyActive = await this.listingRepository.findActive(portal);
    const { newListings, expiredListings, unchanged } = partitionListings(unique, previouslyActive);

    await this.listingRepository.runBatch(async (batch) => {
      // Expire first: a re-priced listing keeps its id and revives the same row
      for (const listing of expiredListings) {
        try {
          const affected = await batch.expire(listing, now);
          if (affected === 0) {
            this.logger.warn(`No active row left to expire for ${listing}`);
          }
          listing.active = false;
          listing.dateUnlisted = now;
          result.expiredListings.push(listing);
        } catch (error) {
          result.failedCount++;
          this.logger.error(
            `Failed to expire ${listing}: ${error instanceof Error ? error.message : 'Unknown error'}`,
            error instanceof Error ? error.stack : undefined,
          );
        }
      }

      for (const listing of newListings) {
        try {
          const outcome = await batch.insert(listing);
          if (outcome === 'revived') {
            this.logger.debug(`Relisted ${listing}`);
          }
          listing.active = true;
          listing.reported = false;
          listing.dateUnlisted = 0;
          result.newListings.push(listing);
        } catch (error) {
          result.failedCount++;
          this.logger.error(
            `Failed to insert ${listing}: ${error instanceof Error ? error.message : 'Unknown error'}`,
            error instanceof Error ? error.stack : undefined,
          );
        }
      }
    });

    result.status = 'merged';
    result.unchangedCount = unchanged.length;

    this.logger.log(
      `${portal}: ${unique.length} scraped, ${result.newListings.length} new, ` +
        `${result.expiredListings.length} expired, ${result.unchangedCount} unchanged, ${result.failedCount} failed`,
    );

    return result;
  }
}
