export * from './listing-entity.mapper';
