// Generated ids: marker + 6 hex characters
export const GENERATED_ID_MARKER = 'X';
export const GENERATED_ID_DIGEST_BYTES = 3;

export const LISTINGS_TABLE = 'listings';

// Archived batches that were not merged into the store
export const NOT_USED_PREFIX = 'NOT_USED_';

export const DEFAULT_ADDRESS_MATCH_THRESHOLD = 0.88;
export const DEFAULT_BATCH_SAMPLE_RATIO = 0.02;
export const DEFAULT_LISTINGS_PER_EMAIL = 50;
export const DEFAULT_MAX_ARCHIVE_SIZE_MB = 5;

export const PORTAL_BASE_URLS = {
  c24: 'https://www.city24.ee',
  kv: 'https://www2.kv.ee',
} as const;
