import { Portal } from '@libs/common';
import { Listing } from './listing.model';
import { dedupeByPortalId, ListingSet } from './listing-set';

const listing = (values: Parameters<typeof Listing.create>[0]) =>
  Listing.create({ portal: Portal.Kv, address: 'Foo 1', areaM2: 50, price: 100000, ...values });

describe('ListingSet', () => {
  it('keeps the first of two listings with the same identity', () => {
    const first = listing({ id: '1', url: 'first' });
    const second = listing({ id: '1', url: 'second' });
    const set = new ListingSet([first, second]);

    expect(set.size).toBe(1);
    expect(set.values()[0].url).toBe('first');
  });

  it('keeps content-equal listings with different portal ids apart', () => {
    const set = new ListingSet([listing({ id: '1' }), listing({ id: '2' })]);

    expect(set.size).toBe(2);
    expect(set.has(listing({ id: '2' }))).toBe(true);
  });

  it('merges content-equal listings with generated ids', () => {
    const set = new ListingSet([listing({ id: 'X111111' }), listing({ id: 'X222222' })]);

    expect([...set].map((item) => item.id)).toEqual(['X111111']);
  });
});

describe('dedupeByPortalId', () => {
  it('keeps the listing with the later listing date', () => {
    const newer = listing({ id: '1', price: 90000, dateListed: 200 });
    const older = listing({ id: '1', price: 95000, dateListed: 100 });

    expect(dedupeByPortalId([newer, older])).toEqual([newer]);
    expect(dedupeByPortalId([older, newer])).toEqual([newer]);
  });

  it('keeps the last one seen on equal dates', () => {
    const first = listing({ id: '1', price: 90000, dateListed: 100 });
    const last = listing({ id: '1', price: 95000, dateListed: 100 });

    expect(dedupeByPortalId([first, last])).toEqual([last]);
  });

  it('treats equal ids on different portals as different listings', () => {
    const kv = listing({ id: '1' });
    const c24 = listing({ id: '1', portal: Portal.City24 });

    expect(dedupeByPortalId([kv, c24])).toEqual([kv, c24]);
  });
});
