import { Logger } from '@nestjs/common';
import { DataSource, Repository } from 'typeorm';
import { Portal } from '@libs/common';
import { Listing } from '@libs/models';
import { ListingEntity } from '../entities';
import { createInMemoryDataSource } from '../testing';
import { ListingRepository } from './listing.repository';

const listing = (values: Parameters<typeof Listing.create>[0]) =>
  Listing.create({
    portal: Portal.Kv,
    address: 'Harju, Tallinn, Kesklinn, Tartu mnt 16',
    areaM2: 48.5,
    price: 189000,
    dateScraped: 1700000000,
    ...values,
  });

describe('ListingRepository', () => {
  let dataSource: DataSource;
  let repository: ListingRepository;

  beforeEach(async () => {
    dataSource = await createInMemoryDataSource();
    repository = new ListingRepository(dataSource.getRepository(ListingEntity));
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  it('stores new listings as active and unreported', async () => {
    const outcome = await repository.runBatch((batch) => batch.insert(listing({ id: '1', reported: true })));

    const stored = await repository.findById('1');
    expect(outcome).toBe('inserted');
    expect(stored?.toRecord()).toEqual(
      listing({ id: '1', active: true, reported: false }).toRecord(),
    );
  });

  it('finds active listings per portal', async () => {
    await repository.runBatch(async (batch) => {
      await batch.insert(listing({ id: '1' }));
      await batch.insert(listing({ id: '2', portal: Portal.City24 }));
    });

    const active = await repository.findActive(Portal.Kv);
    expect(active.map((item) => item.id)).toEqual(['1']);
  });

  it('expires only the row matching id and content', async () => {
    await repository.runBatch(async (batch) => {
      await batch.insert(listing({ id: '1' }));
      await batch.insert(listing({ id: '2' }));
    });

    const changed = await repository.runBatch((batch) => batch.expire(listing({ id: '1', price: 1 }), 1700009999));
    const expired = await repository.runBatch((batch) => batch.expire(listing({ id: '1' }), 1700009999));

    expect(changed).toBe(0);
    expect(expired).toBe(1);
    expect((await repository.findById('1'))?.active).toBe(false);
    expect((await repository.findById('1'))?.dateUnlisted).toBe(1700009999);
    expect((await repository.findById('2'))?.active).toBe(true);
  });

  it('revives an expired row that shares the id', async () => {
    await repository.runBatch((batch) => batch.insert(listing({ id: '1' })));
    await repository.runBatch((batch) => batch.expire(listing({ id: '1' }), 1700009999));

    const outcome = await repository.runBatch((batch) => batch.insert(listing({ id: '1', price: 179000 })));

    const stored = await repository.findById('1');
    expect(outcome).toBe('revived');
    expect(stored?.price).toBe(179000);
    expect(stored?.active).toBe(true);
    expect(stored?.dateUnlisted).toBe(0);
  });

  it('refuses an id already held by another portal', async () => {
    await repository.runBatch((batch) => batch.insert(listing({ id: '1', portal: Portal.City24 })));

    await repository.runBatch(async (batch) => {
      await expect(batch.insert(listing({ id: '1', price: 99000 }))).rejects.toThrow(
        'Id 1 is already stored for portal c24',
      );
    });

    const stored = await repository.findById('1');
    expect(stored?.portal).toBe(Portal.City24);
    expect(stored?.price).toBe(189000);
  });

  it('rolls back a failing record alone and keeps the batch going', async () => {
    const insert = jest.spyOn(Repository.prototype, 'insert').mockRejectedValueOnce(new Error('disk I/O error'));

    await repository.runBatch(async (batch) => {
      await expect(batch.insert(listing({ id: '1' }))).rejects.toThrow('disk I/O error');
      await batch.insert(listing({ id: '2' }));
    });

    expect(insert).toHaveBeenCalledTimes(2);
    expect(await repository.findById('1')).toBeNull();
    expect(await repository.findById('2')).not.toBeNull();
  });

  it('rolls back the whole batch when the work throws', async () => {
    await expect(
      repository.runBatch(async (batch) => {
        await batch.insert(listing({ id: '1' }));
        throw new Error('aborted');
      }),
    ).rejects.toThrow('aborted');

    expect(await repository.findById('1')).toBeNull();
  });

  it('lists unreported listings and marks them reported', async () => {
    await repository.runBatch(async (batch) => {
      await batch.insert(listing({ id: '1', dateScraped: 1700000200 }));
      await batch.insert(listing({ id: '2', dateScraped: 1700000100 }));
      await batch.insert(listing({ id: '3', dateScraped: 1700000300 }));
    });
    await repository.runBatch((batch) => batch.expire(listing({ id: '3' }), 1700009999));

    expect((await repository.findUnreported()).map((item) => item.id)).toEqual(['2', '1']);

    expect(await repository.markReported(['2'])).toBe(1);
    expect(await repository.markReported([])).toBe(0);
    expect((await repository.findUnreported()).map((item) => item.id)).toEqual(['1']);
  });
});
