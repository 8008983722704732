import { InvalidFieldError } from '@libs/common';
import { isFieldOfKind, isListingField, ListingValues } from './listing-fields';
import { isGeneratedId } from './listing-identity';

function toText(field: string, value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  throw new InvalidFieldError(field, 'expected text', value);
}

function toNumber(field: string, value: unknown, integer: boolean): number {
  if (value === null || value === undefined) {
    return 0;
  }

  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    parsed = Number(value);
  } else if (typeof value === 'boolean') {
    parsed = value ? 1 : 0;
  } else {
    throw new InvalidFieldError(field, 'expected a number', value);
  }

  if (!Number.isFinite(parsed)) {
    throw new InvalidFieldError(field, 'expected a finite number', value);
  }
  return integer ? Math.trunc(parsed) : parsed;
}

function toFlag(field: string, value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 1 || value === '1' || value === 'true') {
    return true;
  }
  if (value === 0 || value === '0' || value === 'false') {
    return false;
  }
  throw new InvalidFieldError(field, 'expected a flag', value);
}

/**
 * One observation of a real-estate unit on a portal.
 *
 * Every field always holds a value of its declared type: absent values become
 * the type's zero value, unknown fields and unconvertible values throw
 * {@link InvalidFieldError}.
 *
 * Two listings are equal when portal, address, area and price match; the id
 * takes no part in equality.
 */
export class Listing implements ListingValues {
  public id = '';
  public portal = '';
  public active = false;
  public reported = false;
  public url = '';
  public imageUrl = '';
  public address = '';
  public city = '';
  public street = '';
  public houseNumber = '';
  public apartmentNumber = '';
  public nRooms = 0;
  public areaM2 = 0;
  public price = 0;
  public constructionYear = 0;
  public dateListed = 0;
  public dateScraped = 0;
  public dateUnlisted = 0;

  public static create(values: Partial<ListingValues> = {}): Listing {
    return Listing.fromRecord(values);
  }

  public static fromRecord(record: Readonly<Record<string, unknown>>): Listing {
    const listing = new Listing();
    for (const [field, value] of Object.entries(record)) {
      listing.set(field, value);
    }
    return listing;
  }

  public set(field: string, value: unknown): this {
    if (!isListingField(field)) {
      throw new InvalidFieldError(field, 'not a listing field', value);
    }

    const target: ListingValues = this;
    if (isFieldOfKind(field, 'text')) {
      target[field] = toText(field, value);
    } else if (isFieldOfKind(field, 'flag')) {
      target[field] = toFlag(field, value);
    } else if (isFieldOfKind(field, 'integer')) {
      target[field] = toNumber(field, value, true);
    } else if (isFieldOfKind(field, 'real')) {
      target[field] = toNumber(field, value, false);
    }
    return this;
  }

  public toRecord(): ListingValues {
    return {
      id: this.id,
      portal: this.portal,
      active: this.active,
      reported: this.reported,
      url: this.url,
      imageUrl: this.imageUrl,
      address: this.address,
      city: this.city,
      street: this.street,
      houseNumber: this.houseNumber,
      apartmentNumber: this.apartmentNumber,
      nRooms: this.nRooms,
      areaM2: this.areaM2,
      price: this.price,
      constructionYear: this.constructionYear,
      dateListed: this.dateListed,
      dateScraped: this.dateScraped,
      dateUnlisted: this.dateUnlisted,
    };
  }

  public clone(): Listing {
    return Listing.create(this.toRecord());
  }

  public equals(other: Listing): boolean {
    return this.contentKey === other.contentKey;
  }

  /** Encodes (portal, address, area, price). */
  public get contentKey(): string {
    return JSON.stringify([this.portal, this.address, this.areaM2, this.price]);
  }

  /**
   * Set-membership key. Generated ids are left out so that two runs that
   * derive slightly different ids for the same unit still agree.
   */
  public get identityKey(): string {
    if (isGeneratedId(this.id)) {
      return this.contentKey;
    }
    return JSON.stringify([this.id, this.portal, this.address, this.areaM2, this.price]);
  }

  public toString(): string {
    return `Listing(${this.portal}/${this.id || '?'} "${this.address}" ${this.areaM2}m2 ${this.price})`;
  }
}
