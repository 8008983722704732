import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Listing } from '@libs/models';
import { reportingConfig } from '../../config';

export type SimilarityScorer = (search: string, candidate: string) => number;

export const SIMILARITY_SCORER = Symbol('SIMILARITY_SCORER');

/** An address the recipient wants flagged in the digest */
export interface AddressCriterion {
  city?: string;
  street: string;
  // empty: any house on the street
  houseNumbers: string[];
}

const GENERIC_ADDRESS_WORDS = new Set([
  'tn',
  'tänav',
  'pst',
  'puiestee',
  'mnt',
  'maantee',
  'linn',
  'linnaosa',
  'st',
  'ave',
  'blvd',
]);

const WORD_EDGES = /^[\s.]+|[\s.]+$/g;

/** "Tartu mnt." -> "tartu" */
export function normalizeAddressWord(word: string): string {
  return word
    .toLowerCase()
    .split(/\s+/)
    .filter((part) => !GENERIC_ADDRESS_WORDS.has(part.replace(WORD_EDGES, '')))
    .join(' ')
    .replace(WORD_EDGES, '');
}

export function longestCommonSubstringLength(a: string, b: string): number {
  let best = 0;
  let previous = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        current[j] = previous[j - 1] + 1;
        best = Math.max(best, current[j]);
      }
    }
    previous = current;
  }
  return best;
}

/**
 * Mean of the shared-run coverage of both words: 1 for equal words, 0 when
 * either is empty.
 */
export function similarityScore(search: string, candidate: string): number {
  const a = search.toLowerCase();
  const b = candidate.toLowerCase();
  if (a.length === 0 || b.length === 0) {
    return 0;
  }
  const shared = longestCommonSubstringLength(a, b);
  return 0.5 * (shared / a.length) + 0.5 * (shared / b.length);
}

@Injectable()
export class AddressMatcher {
  private readonly scorer: SimilarityScorer;

  public constructor(
    @Inject(reportingConfig.KEY)
    private readonly config: ConfigType<typeof reportingConfig>,
    @Optional() @Inject(SIMILARITY_SCORER) scorer?: SimilarityScorer,
  ) {
    this.scorer = scorer ?? similarityScore;
  }

  public matches(listing: Listing, criterion: AddressCriterion): boolean {
    if (criterion.city && !this.isSimilar(criterion.city, listing.city)) {
      return false;
    }
    if (!this.isSimilar(criterion.street, listing.street)) {
      return false;
    }
    if (criterion.houseNumbers.length === 0) {
      return true;
    }
    const houseNumber = listing.houseNumber.trim().toLowerCase();
    return criterion.houseNumbers.some((candidate) => candidate.trim().toLowerCase() === houseNumber);
  }

  public matchesAny(listing: Listing, criteria: readonly AddressCriterion[]): boolean {
    return criteria.some((criterion) => this.matches(listing, criterion));
  }

  private isSimilar(search: string, candidate: string): boolean {
    const score = this.scorer(normalizeAddressWord(search), normalizeAddressWord(candidate));
    return score >= this.config.addressMatchThreshold;
  }
}
