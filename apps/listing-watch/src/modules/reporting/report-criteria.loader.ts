import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { promises as fs } from 'fs';
import { ListingWatchError } from '@libs/common';
import { reportingConfig } from '../../config';
import { AddressCriterion } from './address-matcher';
import { Condition, parseCondition } from './filters/condition';

/** One condition per line or comma; `#` starts a comment. */
export function parseFilterFile(content: string): Condition[] {
  return content
    .split('\n')
    .map((line) => line.replace(/#.*$/, ''))
    .flatMap((line) => line.split(','))
    .map((part) => part.trim())
    .filter((part) => part !== '')
    .map((part) => parseCondition(part));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readHouseNumbers(value: unknown): string[] | undefined {
  if (value === undefined || value === null || value === '') {
    return [];
  }
  if (typeof value === 'string' || typeof value === 'number') {
    return [String(value)];
  }
  if (Array.isArray(value) && value.every((item) => typeof item === 'string' || typeof item === 'number')) {
    return value.map((item) => String(item));
  }
  return undefined;
}

/**
 * JSON lines of `{"city": "...", "street": "...", "house_number": ...}`,
 * where `house_number` is a single value or a list.
 */
export function parseHighlightFile(content: string): AddressCriterion[] {
  const criteria: AddressCriterion[] = [];

  content.split('\n').forEach((line, index) => {
    const text = line.trim();
    if (text === '' || text.startsWith('#')) {
      return;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(text);
    } catch (error) {
      throw new ListingWatchError(`Highlight line ${index + 1} is not JSON`, {
        reason: error instanceof Error ? error.message : 'Unknown error',
      });
    }

    const houseNumbers = isRecord(entry) ? readHouseNumbers(entry.house_number) : undefined;
    if (!isRecord(entry) || typeof entry.street !== 'string' || entry.street.trim() === '' || !houseNumbers) {
      throw new ListingWatchError(`Highlight line ${index + 1} needs a street and an optional house_number`);
    }

    const city = typeof entry.city === 'string' && entry.city.trim() !== '' ? entry.city : undefined;
    criteria.push({ city, street: entry.street, houseNumbers });
  });

  return criteria;
}

@Injectable()
export class ReportCriteriaLoader {
  private readonly logger = new Logger(ReportCriteriaLoader.name);

  public constructor(
    @Inject(reportingConfig.KEY)
    private readonly config: ConfigType<typeof reportingConfig>,
  ) {}

  public async loadConditions(): Promise<Condition[]> {
    const content = await this.readOptional(this.config.filtersFile);
    return content === undefined ? [] : parseFilterFile(content);
  }

  public async loadHighlights(): Promise<AddressCriterion[]> {
    const content = await this.readOptional(this.config.highlightsFile);
    return content === undefined ? [] : parseHighlightFile(content);
  }

  private async readOptional(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.debug(`${filePath} not found, using no criteria`);
        return undefined;
      }
      throw error;
    }
  }
}
