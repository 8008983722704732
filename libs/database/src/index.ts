export * from './database.config';
export * from './database.module';
export * from './data-source.options';
export * from './entities';
export * from './mappers';
export * from './migrations';
export * from './repositories';
export * from './testing';
