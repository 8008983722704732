export * from './listing.repository';
export * from './listing-batch';
