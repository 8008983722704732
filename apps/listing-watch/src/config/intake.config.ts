import { registerAs } from '@nestjs/config';
import { DEFAULT_BATCH_SAMPLE_RATIO, DEFAULT_MAX_ARCHIVE_SIZE_MB } from '@libs/common';

export interface IntakeConfig {
  // Captured pages waiting to be processed
  newDir: string;
  archiveDir: string;
  maxArchiveSizeMb: number;
  // Share of a batch sampled by the validation gate
  batchSampleRatio: number;
}

export const intakeConfig = registerAs(
  'intake',
  (): IntakeConfig => ({
    newDir: process.env.INTAKE_NEW_DIR || 'data/scraped/new',
    archiveDir: process.env.INTAKE_ARCHIVE_DIR || 'data/scraped/archive',
    maxArchiveSizeMb: parseFloat(process.env.MAX_ARCHIVE_SIZE_MB || String(DEFAULT_MAX_ARCHIVE_SIZE_MB)),
    batchSampleRatio: parseFloat(process.env.BATCH_SAMPLE_RATIO || String(DEFAULT_BATCH_SAMPLE_RATIO)),
  }),
);
