export * from './batch-validator.service';
export * from './listing-partition';
export * from './reconciliation.module';
export * from './reconciliation.service';
