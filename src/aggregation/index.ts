export * from './types.js';
export * from './statistics.js';
export * from './aggregator.js';
