import { Logger } from '@nestjs/common';
import { Portal } from '@libs/common';
import { Listing, ListingField, resolveId } from '@libs/models';
import { ExtractionContext, PortalAdapter } from '../portal-adapter.interface';

/**
 * Base class for portal adapters.
 *
 * Subclasses extract one field at a time through {@link extract}; a field
 * that cannot be read is logged and left at its zero value while the rest of
 * the record is still extracted.
 */
export abstract class BasePortalAdapter<TRaw, TRecord = TRaw> implements PortalAdapter<TRaw> {
  protected abstract readonly logger: Logger;

  public abstract readonly portal: Portal;

  public get fileIndicator(): string {
    return this.portal;
  }

  public abstract readBatch(content: string): TRaw[];

  /** Structural check of a raw record. Throws MalformedRecordError. */
  protected abstract readRecord(raw: TRaw): TRecord;

  /** Fills the listing from the record, id included. */
  protected abstract extractFields(record: TRecord, listing: Listing): void;

  public toListing(raw: TRaw, context: ExtractionContext): Listing {
    const record = this.readRecord(raw);

    const listing = new Listing();
    listing.portal = this.portal;
    listing.active = true;
    listing.reported = false;
    listing.dateScraped = context.scrapedAt;

    this.extractFields(record, listing);

    if (listing.id === '') {
      listing.id = resolveId(listing);
      this.logger.log(`No portal id for ${listing}, using generated id`);
    }

    return listing;
  }

  protected extract(listing: Listing, field: ListingField, read: () => unknown): void {
    try {
      listing.set(field, read());
    } catch (error) {
      this.logger.warn(
        `Could not extract ${field} for ${listing}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
