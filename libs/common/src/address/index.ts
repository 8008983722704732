export * from './address-normalizer';
