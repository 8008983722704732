import { Logger } from '@nestjs/common';

const logger = new Logger('AddressNormalizer');

const DIACRITICS: Record<string, string> = {
  ä: 'a',
  õ: 'o',
  ö: 'o',
  ü: 'u',
  š: 's',
  ž: 'z',
};

const CITY_PATTERN = /^[^,]*,\s*([^,]*?)\s*,/;
// Last comma that does not follow a digit: "Kalaranna 21, 23-49" stays one segment
const STREET_SEGMENT_PATTERN = /.*(?<!\d),(.+?)$/;
const INNER_COMMA_PATTERN = / ?, ?/g;
const STREET_TYPE_PATTERN = /\s(?:tn|pst|mnt)\.?(?=\s|$)/gi;
const APARTMENT_PATTERN = /-([\p{L}\p{N}_]+)$/u;
const SHORT_APARTMENT_SUFFIX_PATTERN = /-[^-]{0,3}$/;
const HOUSE_NUMBER_PATTERN = /\s([\p{L}\p{N}_/]+)$/u;

export interface ParsedAddress {
  city: string;
  street: string;
  houseNumber: string;
  apartmentNumber: string;
}

/**
 * Lower-cases and replaces local accented letters with their ASCII counterparts.
 */
export function normalizeDiacritics(text: string): string {
  return text.toLowerCase().replace(/[äõöüšž]/g, (char) => DIACRITICS[char] ?? char);
}

/**
 * Builds a URL path segment out of address parts: "Põhja-Tallinn", "Kopli tn" -> "pohja-tallinn-kopli-tn"
 */
export function slugify(parts: readonly string[]): string {
  const joined = parts
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join('-');

  return normalizeDiacritics(joined).replace(/\s+/g, '-');
}

/**
 * "Main St", "5", "12" -> "Main St 5-12". Missing parts are dropped.
 */
export function combineAddress(street: string, houseNumber: string, apartmentNumber: string): string {
  const unit = [houseNumber.trim(), apartmentNumber.trim()].filter((part) => part.length > 0).join('-');

  return [street.trim(), unit].filter((part) => part.length > 0).join(' ');
}

/**
 * Splits a rendered address of the form "<region>, <city>, ..., <street> <house>-<apartment>".
 * Never throws; unrecoverable parts come back empty.
 */
export function parseFreeTextAddress(address: string): ParsedAddress {
  const city = CITY_PATTERN.exec(address)?.[1] ?? '';

  const segment = (STREET_SEGMENT_PATTERN.exec(address)?.[1] ?? '')
    .replace(INNER_COMMA_PATTERN, '/')
    .replace(STREET_TYPE_PATTERN, '')
    .trim();

  const apartmentNumber = APARTMENT_PATTERN.exec(segment)?.[1] ?? '';

  // Longer suffixes belong to hyphenated street names, not apartments
  const withoutApartment = segment.replace(SHORT_APARTMENT_SUFFIX_PATTERN, '');
  const houseNumber = HOUSE_NUMBER_PATTERN.exec(withoutApartment)?.[1] ?? '';
  const street = withoutApartment.replace(HOUSE_NUMBER_PATTERN, '').trim();

  const parsed: ParsedAddress = { city, street, houseNumber, apartmentNumber };

  const missing = Object.entries(parsed)
    .filter(([, value]) => value === '')
    .map(([key]) => key);
  if (missing.length > 1) {
    logger.warn(`Suspect address "${address}": could not recover ${missing.join(', ')}`);
  }

  return parsed;
}
