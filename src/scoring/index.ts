export * from './types.js';
export * from './lexicon/lexiconScorer.js';
export * from './transformer/types.js';
export * from './transformer/transformerScorer.js';
export * from './transformer/httpInferenceBackend.js';
export * from './scorerRegistry.js';
export * from './scoringService.js';
