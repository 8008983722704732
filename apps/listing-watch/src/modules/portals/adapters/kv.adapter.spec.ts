import { Logger } from '@nestjs/common';
import { Portal } from '@libs/common';
import { generateId } from '@libs/models';
import { KvAdapter } from './kv.adapter';

const PAGE = `
<html><body>
<section class="results">
  <article data-object-id="3456789" data-object-url="/en/kopli-64-5-3456789.html">
    <div class="media"><img src="placeholder.gif" data-src="https://img.example.test/kv/3456789.jpg"></div>
    <div class="description">
      <h2>
        <a class="object-important" href="#">Top</a>
        <a href="/en/kopli-64-5-3456789.html">Harju maakond, Tallinn, Põhja-Tallinna linnaosa, Kopli tn 64-5</a>
      </h2>
      <p class="object-excerpt">Hea seisukord, ehitusaasta 1954, ahiküte.</p>
    </div>
    <div class="rooms">2</div>
    <div class="area">54.3&nbsp;m²</div>
    <div class="price">185 000&nbsp;€<small>3 407 €/m²</small></div>
  </article>
  <article data-object-id="" data-object-url="/en/tartu-mnt-16.html">
    <div class="description"><h2><a href="/en/tartu-mnt-16.html">Harju maakond, Tallinn, Kesklinn, Tartu mnt 16</a></h2></div>
    <div class="rooms">1</div>
    <div class="area">30 m²</div>
    <div class="price">99 000 €</div>
  </article>
</section>
</body></html>
`;

describe('KvAdapter', () => {
  const adapter = new KvAdapter();
  const context = { scrapedAt: 1700000000 };
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('is identified by its file indicator', () => {
    expect(adapter.portal).toBe(Portal.Kv);
    expect(adapter.fileIndicator).toBe('kv');
  });

  it('finds one record per listing article', () => {
    expect(adapter.readBatch(PAGE)).toHaveLength(2);
  });

  it('returns no records for a page without listing articles', () => {
    expect(adapter.readBatch('<html><body>Nothing found</body></html>')).toEqual([]);
  });

  it('maps a complete article', () => {
    const [article] = adapter.readBatch(PAGE);

    expect(adapter.toListing(article, context).toRecord()).toEqual({
      id: '3456789',
      portal: 'kv',
      active: true,
      reported: false,
      url: 'https://www2.kv.ee/en/kopli-64-5-3456789.html',
      imageUrl: 'https://img.example.test/kv/3456789.jpg',
      address: 'Harju maakond, Tallinn, Põhja-Tallinna linnaosa, Kopli tn 64-5',
      city: 'Tallinn',
      street: 'Kopli',
      houseNumber: '64',
      apartmentNumber: '5',
      nRooms: 2,
      areaM2: 54.3,
      price: 185000,
      constructionYear: 1954,
      dateListed: 0,
      dateScraped: 1700000000,
      dateUnlisted: 0,
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('extracts what it can from an incomplete article', () => {
    const [, article] = adapter.readBatch(PAGE);
    const address = 'Harju maakond, Tallinn, Kesklinn, Tartu mnt 16';

    const listing = adapter.toListing(article, context);

    expect(listing.id).toBe(generateId(30, address));
    expect(listing.address).toBe(address);
    expect(listing.street).toBe('Tartu');
    expect(listing.houseNumber).toBe('16');
    expect(listing.price).toBe(99000);
    expect(listing.imageUrl).toBe('');
    expect(listing.constructionYear).toBe(0);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});
