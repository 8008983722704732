export * from './listing-watch.error';
export * from './invalid-field.error';
export * from './malformed-source.error';
export * from './condition-parse.error';
