import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { MalformedRecordError, parseFreeTextAddress, Portal, PORTAL_BASE_URLS } from '@libs/common';
import { Listing } from '@libs/models';
import { BasePortalAdapter } from './base-portal.adapter';

const ARTICLE_SELECTOR = 'article[data-object-id]';
const AREA_PATTERN = /\d+\.?\d*/;
const CONSTRUCTION_YEAR_PATTERN = /ehitusaasta\s*(\d{4})/i;

function selectArticles(content: string) {
  const $ = cheerio.load(content);
  return $(ARTICLE_SELECTOR)
    .toArray()
    .map((element) => $(element));
}

export type KvArticle = ReturnType<typeof selectArticles>[number];

function required<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`missing ${name}`);
  }
  return value;
}

/**
 * KV.ee search result pages: one `<article data-object-id>` per listing,
 * the address given only as rendered text.
 */
@Injectable()
export class KvAdapter extends BasePortalAdapter<KvArticle> {
  protected readonly logger = new Logger(KvAdapter.name);

  public readonly portal = Portal.Kv;

  public readBatch(content: string): KvArticle[] {
    return selectArticles(content);
  }

  protected readRecord(raw: KvArticle): KvArticle {
    if (raw.length !== 1 || !raw.is('article')) {
      throw new MalformedRecordError('Listing record is not a single <article> element', { portal: this.portal });
    }
    return raw;
  }

  protected extractFields(article: KvArticle, listing: Listing): void {
    this.extract(listing, 'url', () => `${PORTAL_BASE_URLS.kv}${required(article.attr('data-object-url'), 'data-object-url')}`);
    this.extract(listing, 'imageUrl', () => required(article.find('div.media img').attr('data-src'), 'image data-src'));

    this.extract(listing, 'address', () => {
      const link = article.find('div.description a:not([class])').first();
      if (link.length === 0) {
        throw new Error('missing address link');
      }
      return link.text().trim();
    });

    const { city, street, houseNumber, apartmentNumber } = parseFreeTextAddress(listing.address);
    this.extract(listing, 'city', () => city);
    this.extract(listing, 'street', () => street);
    this.extract(listing, 'houseNumber', () => houseNumber);
    this.extract(listing, 'apartmentNumber', () => apartmentNumber);

    this.extract(listing, 'nRooms', () => article.find('div.rooms').first().text().trim());
    this.extract(listing, 'areaM2', () =>
      required(AREA_PATTERN.exec(article.find('div.area').first().text())?.[0], 'area'),
    );
    this.extract(listing, 'price', () => {
      // Direct text only: nested elements carry the price per m2
      const price = article.find('div.price').first().clone();
      price.children().remove();
      return required(price.text().replace(/\D/g, '') || undefined, 'price');
    });
    this.extract(listing, 'constructionYear', () =>
      required(CONSTRUCTION_YEAR_PATTERN.exec(article.find('p.object-excerpt').first().text())?.[1], 'construction year'),
    );

    this.extract(listing, 'id', () => required(article.attr('data-object-id'), 'data-object-id'));
  }
}
