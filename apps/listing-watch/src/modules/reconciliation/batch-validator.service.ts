import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Listing } from '@libs/models';
import { intakeConfig, IntakeConfig } from '../../config';

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

export const RANDOM_SOURCE = Symbol('RANDOM_SOURCE');

export interface BatchValidation {
  valid: boolean;
  sampleSize: number;
  addressedInSample: number;
}

export function sampleSizeFor(total: number, ratio: number): number {
  return Math.min(total, 1 + Math.floor(ratio * total));
}

/** Draws `size` distinct items (partial Fisher-Yates). */
export function drawSample<T>(items: readonly T[], size: number, random: RandomSource): T[] {
  const pool = [...items];
  const count = Math.min(size, pool.length);

  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, count);
}

/**
 * Gate in front of reconciliation: a scraped batch whose random sample holds
 * no listing with an address is most likely a blocked or broken page and
 * must not expire the stored listings.
 */
@Injectable()
export class BatchValidator {
  private readonly logger = new Logger(BatchValidator.name);

  private readonly random: RandomSource;

  public constructor(
    @Inject(intakeConfig.KEY)
    private readonly config: IntakeConfig,
    @Optional()
    @Inject(RANDOM_SOURCE)
    random?: RandomSource,
  ) {
    this.random = random ?? Math.random;
  }

  public validate(listings: readonly Listing[]): BatchValidation {
    if (listings.length === 0) {
      return { valid: true, sampleSize: 0, addressedInSample: 0 };
    }

    const sample = drawSample(listings, sampleSizeFor(listings.length, this.config.batchSampleRatio), this.random);
    const addressedInSample = sample.filter((listing) => listing.address.trim() !== '').length;

    this.logger.debug(`Sampled ${sample.length}/${listings.length} listings, ${addressedInSample} with an address`);

    return { valid: addressedInSample > 0, sampleSize: sample.length, addressedInSample };
  }
}
