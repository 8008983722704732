import { QueryRunner, Repository } from 'typeorm';
import { ListingWatchError } from '@libs/common';
import { Listing } from '@libs/models';
import { ListingEntity } from '../entities/listing.entity';
import { toListingEntity } from '../mappers/listing-entity.mapper';

export type InsertOutcome = 'inserted' | 'revived';

/**
 * Mutations of one reconciliation batch. Runs inside the batch transaction;
 * every mutation gets its own savepoint, so a failing record is rolled back
 * alone and the caller may carry on with the rest.
 */
export class ListingBatch {
  public constructor(private readonly queryRunner: QueryRunner) {}

  private get repository(): Repository<ListingEntity> {
    return this.queryRunner.manager.getRepository(ListingEntity);
  }

  /**
   * Marks the stored active counterpart of a listing as unlisted.
   * Returns the number of rows changed.
   */
  public async expire(listing: Listing, unlistedAt: number): Promise<number> {
    return this.withSavepoint(async () => {
      const result = await this.repository.update(
        {
          id: listing.id,
          portal: listing.portal,
          address: listing.address,
          areaM2: listing.areaM2,
          price: listing.price,
          active: 1,
        },
        { active: 0, dateUnlisted: unlistedAt },
      );
      return result.affected ?? 0;
    });
  }

  /**
   * Stores a new listing as active and unreported. A row of the same portal
   * that already holds the id (an expired observation of the same unit) is
   * overwritten; an id held by another portal's row is refused.
   */
  public async insert(listing: Listing): Promise<InsertOutcome> {
    return this.withSavepoint(async () => {
      const entity = toListingEntity(listing);
      entity.active = 1;
      entity.reported = 0;
      entity.dateUnlisted = 0;

      const existing = await this.repository.findOne({ where: { id: listing.id } });
      if (existing && existing.portal !== listing.portal) {
        throw new ListingWatchError(`Id ${listing.id} is already stored for portal ${existing.portal}`, {
          id: listing.id,
          portal: listing.portal,
          storedPortal: existing.portal,
        });
      }
      if (existing) {
        await this.repository.update({ id: listing.id }, entity);
        return 'revived';
      }

      await this.repository.insert(entity);
      return 'inserted';
    });
  }

  private async withSavepoint<T>(work: () => Promise<T>): Promise<T> {
    await this.queryRunner.startTransaction();
    try {
      const result = await work();
      await this.queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await this.queryRunner.rollbackTransaction();
      throw error;
    }
  }
}
