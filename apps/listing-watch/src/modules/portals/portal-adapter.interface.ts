import { Portal } from '@libs/common';
import { Listing } from '@libs/models';

export interface ExtractionContext {
  // epoch seconds
  scrapedAt: number;
}

/**
 * Turns the captured pages of one portal into listings.
 */
export interface PortalAdapter<TRaw> {
  readonly portal: Portal;

  /** Suffix of captured page file names: `<stamp>_<indicator>.<ext>` */
  readonly fileIndicator: string;

  /**
   * Splits a captured page into raw records; a result page without results
   * yields an empty list. Throws MalformedBatchError when the page does not
   * carry the portal's result data at all.
   */
  readBatch(content: string): TRaw[];

  /** Throws MalformedRecordError only when the record itself is unreadable. */
  toListing(raw: TRaw, context: ExtractionContext): Listing;
}
