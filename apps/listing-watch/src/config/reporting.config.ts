import { registerAs } from '@nestjs/config';
import { DEFAULT_ADDRESS_MATCH_THRESHOLD, DEFAULT_LISTINGS_PER_EMAIL } from '@libs/common';

export interface ReportingConfig {
  filtersFile: string;
  highlightsFile: string;
  addressMatchThreshold: number;
  listingsPerEmail: number;
  timeZone: string;
}

export const reportingConfig = registerAs(
  'reporting',
  (): ReportingConfig => ({
    filtersFile: process.env.REPORT_FILTERS_FILE || 'config/filters.txt',
    highlightsFile: process.env.REPORT_HIGHLIGHTS_FILE || 'config/highlights.jsonl',
    addressMatchThreshold: parseFloat(
      process.env.ADDRESS_MATCH_THRESHOLD || String(DEFAULT_ADDRESS_MATCH_THRESHOLD),
    ),
    listingsPerEmail: parseInt(process.env.LISTINGS_PER_EMAIL || String(DEFAULT_LISTINGS_PER_EMAIL), 10),
    timeZone: process.env.REPORT_TIME_ZONE || 'Europe/Tallinn',
  }),
);
