export * from './address';
export * from './constants';
export * from './enums';
export * from './errors';
export * from './utils';
