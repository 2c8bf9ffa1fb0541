export * from './types.js';
export * from './correlation.js';
export * from './comparator.js';
