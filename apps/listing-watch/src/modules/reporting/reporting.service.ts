import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { epochSeconds } from '@libs/common';
import { ListingRepository } from '@libs/database';
import { Listing } from '@libs/models';
import { reportingConfig } from '../../config';
import { AddressMatcher } from './address-matcher';
import { DigestRenderer } from './digest.renderer';
import { matchesAll } from './filters/condition';
import { MAIL_TRANSPORT, MailTransport } from './mail/mail-transport.interface';
import { ReportCriteriaLoader } from './report-criteria.loader';

export interface ReportSummary {
  unreported: number;
  matching: number;
  highlighted: number;
  emailsSent: number;
  emailsFailed: number;
  reported: number;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

@Injectable()
export class ReportingService {
  private readonly logger = new Logger(ReportingService.name);

  public constructor(
    @Inject(reportingConfig.KEY)
    private readonly config: ConfigType<typeof reportingConfig>,
    private readonly listingRepository: ListingRepository,
    private readonly criteriaLoader: ReportCriteriaLoader,
    private readonly addressMatcher: AddressMatcher,
    private readonly renderer: DigestRenderer,
    @Inject(MAIL_TRANSPORT)
    private readonly transport: MailTransport,
  ) {}

  /**
   * Mails the active, not yet reported listings that pass every filter, in
   * digests of `listingsPerEmail`. A digest's listings are marked reported
   * only once it has been sent.
   */
  public async report(now: number = epochSeconds()): Promise<ReportSummary> {
    const [conditions, highlights] = await Promise.all([
      this.criteriaLoader.loadConditions(),
      this.criteriaLoader.loadHighlights(),
    ]);

    const unreported = await this.listingRepository.findUnreported();
    const matching = unreported.filter((listing) => matchesAll(conditions, listing));

    const summary: ReportSummary = {
      unreported: unreported.length,
      matching: matching.length,
      highlighted: 0,
      emailsSent: 0,
      emailsFailed: 0,
      reported: 0,
    };

    if (matching.length === 0) {
      this.logger.log(`No new listings to report (${unreported.length} unreported, ${conditions.length} filters)`);
      return summary;
    }

    const digests = chunk(matching, Math.max(1, this.config.listingsPerEmail));

    for (const [index, listings] of digests.entries()) {
      const items = listings.map((listing) => ({
        listing,
        highlighted: this.addressMatcher.matchesAny(listing, highlights),
      }));
      summary.highlighted += items.filter((item) => item.highlighted).length;

      const sent = await this.sendDigest(listings, {
        subject: this.renderer.subject(index + 1, digests.length, now),
        html: this.renderer.render(items),
      });

      if (sent) {
        summary.emailsSent++;
        summary.reported += await this.listingRepository.markReported(listings.map((listing) => listing.id));
      } else {
        summary.emailsFailed++;
      }
    }

    this.logger.log(
      `Reported ${summary.reported}/${summary.matching} listings in ${summary.emailsSent} email(s), ` +
        `${summary.emailsFailed} failed, ${summary.highlighted} highlighted`,
    );
    return summary;
  }

  private async sendDigest(listings: Listing[], message: { subject: string; html: string }): Promise<boolean> {
    try {
      await this.transport.send(message);
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to send "${message.subject}" with ${listings.length} listings: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error.stack : undefined,
      );
      return false;
    }
  }
}
