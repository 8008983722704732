export * from './listing-fields';
export * from './listing-identity';
export * from './listing.model';
export * from './listing-set';
