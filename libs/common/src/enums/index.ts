export * from './portal.enum';
