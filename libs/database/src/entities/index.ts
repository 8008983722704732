export * from './listing.entity';
