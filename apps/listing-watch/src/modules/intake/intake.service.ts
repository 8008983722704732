import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, readFile, stat } from 'fs/promises';
import { basename, join } from 'path';
import { epochSeconds, MalformedBatchError, MalformedRecordError, Portal } from '@libs/common';
import { Listing } from '@libs/models';
import { intakeConfig, IntakeConfig } from '../../config';
import { PortalAdapter, PortalRegistry } from '../portals';
import { ReconciliationResult, ReconciliationService } from '../reconciliation';
import { ArchiveService } from './archive.service';

export type IntakeStatus = 'merged' | 'rejected' | 'unreadable' | 'skipped' | 'failed';

export interface IntakeFileResult {
  file: string;
  status: IntakeStatus;
  portal?: Portal;
  reconciliation?: ReconciliationResult;
}

/**
 * Processes the captured pages waiting in the intake directory, one file per
 * portal scrape, oldest name first.
 */
@Injectable()
export class IntakeService {
  private readonly logger = new Logger(IntakeService.name);

  public constructor(
    @Inject(intakeConfig.KEY)
    private readonly config: IntakeConfig,
    private readonly portalRegistry: PortalRegistry,
    private readonly reconciliationService: ReconciliationService,
    private readonly archiveService: ArchiveService,
  ) {}

  public async processPending(now: number = epochSeconds()): Promise<IntakeFileResult[]> {
    const files = await this.listPending();
    if (files.length === 0) {
      this.logger.log(`No captured pages in ${this.config.newDir}`);
    }

    const results: IntakeFileResult[] = [];
    for (const file of files) {
      results.push(await this.processFile(file, now));
    }

    await this.archiveService.enforceSizeLimit();
    return results;
  }

  public async processFile(filePath: string, now: number = epochSeconds()): Promise<IntakeFileResult> {
    const file = basename(filePath);
    const adapter = this.portalRegistry.forFile(file);
    if (!adapter) {
      this.logger.warn(`Skipping ${file}: no portal for its name`);
      return { file, status: 'skipped' };
    }

    const { portal } = adapter;
    try {
      const [content, stats] = await Promise.all([readFile(filePath, 'utf8'), stat(filePath)]);
      const listings = this.extractListings(adapter, content, epochSeconds(stats.mtime), file);

      if (listings.length === 0) {
        this.logger.warn(`No listings in ${file}`);
        await this.archiveService.archive(filePath, { used: false });
        return { file, portal, status: 'unreadable' };
      }

      const reconciliation = await this.reconciliationService.reconcile(portal, listings, now);
      await this.archiveService.archive(filePath, { used: reconciliation.status === 'merged' });

      return { file, portal, status: reconciliation.status, reconciliation };
    } catch (error) {
      if (error instanceof MalformedBatchError) {
        this.logger.warn(`Unreadable page ${file}: ${error.message}`);
        await this.archiveService.archive(filePath, { used: false });
        return { file, portal, status: 'unreadable' };
      }

      // Left in place for the next run
      this.logger.error(
        `Failed to process ${file}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { file, portal, status: 'failed' };
    }
  }

  private extractListings(adapter: PortalAdapter<unknown>, content: string, scrapedAt: number, file: string): Listing[] {
    const listings: Listing[] = [];

    for (const raw of adapter.readBatch(content)) {
      try {
        listings.push(adapter.toListing(raw, { scrapedAt }));
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }
        this.logger.warn(`Skipping malformed record in ${file}: ${error.message}`);
      }
    }

    this.logger.log(`Extracted ${listings.length} ${adapter.portal} listings from ${file}`);
    return listings;
  }

  private async listPending(): Promise<string[]> {
    await mkdir(this.config.newDir, { recursive: true });
    const entries = await readdir(this.config.newDir, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(this.config.newDir, name));
  }
}
