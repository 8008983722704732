export * from './listing.constants';
