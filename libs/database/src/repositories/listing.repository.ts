import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { Listing } from '@libs/models';

import { ListingEntity } from '../entities/listing.entity';
import { toListing } from '../mappers/listing-entity.mapper';
import { ListingBatch } from './listing-batch';

@Injectable()
export class ListingRepository {
  private readonly logger = new Logger(ListingRepository.name);

  public constructor(
    @InjectRepository(ListingEntity)
    private readonly repository: Repository<ListingEntity>,
  ) {}

  public get manager(): EntityManager {
    return this.repository.manager;
  }

  public async findById(id: string): Promise<Listing | null> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? toListing(entity) : null;
  }

  /** Listings of a portal currently marked active. */
  public async findActive(portal: string): Promise<Listing[]> {
    const entities = await this.repository.find({
      where: { portal, active: 1 },
      order: { dateScraped: 'ASC', id: 'ASC' },
    });
    return entities.map(toListing);
  }

  /** Active listings no notification has covered yet. */
  public async findUnreported(): Promise<Listing[]> {
    const entities = await this.repository.find({
      where: { active: 1, reported: 0 },
      order: { dateScraped: 'ASC', id: 'ASC' },
    });
    return entities.map(toListing);
  }

  public async markReported(ids: string[]): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }
    const result = await this.repository.update({ id: In(ids) }, { reported: 1 });
    return result.affected ?? 0;
  }

  /**
   * Runs the work inside one transaction and commits once at the end.
   * Anything the work lets escape rolls the whole batch back.
   */
  public async runBatch<T>(work: (batch: ListingBatch) => Promise<T>): Promise<T> {
    const queryRunner = this.manager.connection.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(new ListingBatch(queryRunner));
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      this.logger.error(
        `Listing batch rolled back: ${error instanceof Error ? error.message : 'Unknown error'}`,
        error instanceof Error ? error.stack : undefined,
      );
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
