import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { DateTime } from 'luxon';
import {
  combineAddress,
  MalformedBatchError,
  MalformedRecordError,
  Portal,
  PORTAL_BASE_URLS,
  slugify,
} from '@libs/common';
import { Listing } from '@libs/models';
import { BasePortalAdapter } from './base-portal.adapter';

type JsonObject = Record<string, unknown>;

const LISTING_PATH = '/real-estate/apartments-for-sale';
const IMAGE_FORMAT_TOKEN = '{fmt:em}';
const IMAGE_FORMAT = '11';

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Walks a JSON path; throws when an intermediate object or the key is missing. */
function pick(record: JsonObject, ...path: string[]): unknown {
  let current: unknown = record;
  for (const key of path) {
    if (!isJsonObject(current) || !(key in current)) {
      throw new Error(`missing "${path.join('.')}"`);
    }
    current = current[key];
  }
  return current;
}

function pickText(record: JsonObject, ...path: string[]): string {
  try {
    const value = pick(record, ...path);
    return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
  } catch {
    return '';
  }
}

function requireText(value: unknown, name: string): string {
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new Error(`"${name}" is not text`);
}

/** ISO 8601 timestamp with offset -> epoch seconds */
export function parsePublishedDate(value: unknown): number {
  const text = requireText(value, 'date_published');
  const date = DateTime.fromISO(text, { setZone: true });
  if (!date.isValid) {
    throw new Error(`unparseable date "${text}": ${date.invalidExplanation ?? date.invalidReason}`);
  }
  return date.toSeconds();
}

/**
 * City24 search results, exported from the portal's JSON API as the page
 * source of the browser's JSON viewer (the array sits inside a `<pre>`).
 */
@Injectable()
export class City24Adapter extends BasePortalAdapter<unknown, JsonObject> {
  protected readonly logger = new Logger(City24Adapter.name);

  public readonly portal = Portal.City24;

  public readBatch(content: string): unknown[] {
    const $ = cheerio.load(content);
    const pre = $('pre').first();
    const json = pre.length > 0 ? pre.text() : content;

    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (error) {
      throw new MalformedBatchError('Captured page holds no JSON listing data', {
        portal: this.portal,
        reason: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    if (!Array.isArray(data)) {
      throw new MalformedBatchError('Expected a JSON array of listings', { portal: this.portal });
    }
    return data;
  }

  protected readRecord(raw: unknown): JsonObject {
    if (!isJsonObject(raw)) {
      throw new MalformedRecordError('Listing record is not a JSON object', { portal: this.portal, raw });
    }
    return raw;
  }

  protected extractFields(record: JsonObject, listing: Listing): void {
    const street = pickText(record, 'address', 'street', 'name');
    const houseNumber = pickText(record, 'address', 'house_number');
    const apartmentNumber = pickText(record, 'address', 'apartment_number');
    const city = pickText(record, 'address', 'city', 'name');
    const parish = pickText(record, 'address', 'parish', 'name');
    const county = pickText(record, 'address', 'county', 'name');

    this.extract(listing, 'address', () =>
      [combineAddress(street, houseNumber, apartmentNumber), city, parish, county]
        .filter((part) => part !== '')
        .join(', '),
    );
    this.extract(listing, 'city', () => city);
    this.extract(listing, 'street', () => street);
    this.extract(listing, 'houseNumber', () => houseNumber);
    this.extract(listing, 'apartmentNumber', () => apartmentNumber);

    this.extract(listing, 'url', () => {
      const friendlyId = requireText(pick(record, 'friendly_id'), 'friendly_id');
      return `${PORTAL_BASE_URLS.c24}${LISTING_PATH}/${slugify([parish, city, street])}/${friendlyId}`;
    });
    this.extract(listing, 'imageUrl', () =>
      requireText(pick(record, 'main_image', 'url'), 'main_image.url').replace(IMAGE_FORMAT_TOKEN, IMAGE_FORMAT),
    );

    this.extract(listing, 'nRooms', () => pick(record, 'room_count'));
    this.extract(listing, 'areaM2', () => pick(record, 'property_size'));
    this.extract(listing, 'price', () => pick(record, 'price'));
    this.extract(listing, 'constructionYear', () => pick(record, 'attributes', 'CONSTRUCTION_YEAR'));
    this.extract(listing, 'dateListed', () => parsePublishedDate(pick(record, 'date_published')));

    this.extract(listing, 'id', () => pick(record, 'id'));
  }
}
